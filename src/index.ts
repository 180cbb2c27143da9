import 'dotenv/config';
import { loadEnvironment } from './config/environment.js';
import { logger } from './config/logger.js';
import { getDatabase, closeDatabase } from './config/database.js';
import { defaultMonitoringConfig } from './config/monitoring.js';
import { toErrorMessage } from './utils/errors.js';
import { createApp } from './app.js';
import { PlacesClient } from './services/places/PlacesClient.js';
import { SnapshotStore } from './services/store/SnapshotStore.js';
import { SettingsStore } from './services/store/SettingsStore.js';
import { NotificationFeed } from './services/notifications/NotificationFeed.js';
import { ScanRunner } from './services/scanner/ScanRunner.js';
import { ScanScheduler } from './services/scheduler/ScanScheduler.js';

const env = loadEnvironment();

// Initialize services
const db = getDatabase();
const store = new SnapshotStore(db);
const settings = new SettingsStore(db, defaultMonitoringConfig(env));
const feed = new NotificationFeed();
const places = PlacesClient.fromEnvironment(env);
const runner = new ScanRunner({ client: places, store, feed });
const scheduler = new ScanScheduler({ runner, store, settings });

if (!env.PLACES_API_KEY) {
  logger.warn('PLACES_API_KEY is not set; scans will fail until it is configured');
}

feed.subscribe(({ scan, notifications }) => {
  for (const notification of notifications) {
    logger.info(`[Notify] scan #${scan.id} ${notification.kind}: ${notification.message}`);
  }
});

const app = createApp({ store, settings, scheduler, places, corsOrigin: env.CORS_ORIGIN });

// Close out scans a previous process left running
store.recoverInterruptedScans();

const server = app.listen(env.PORT, () => {
  logger.info(`Business radar running on port ${env.PORT}`);
  logger.info(`Environment: ${env.NODE_ENV}`);
  logger.info(`Health check: http://localhost:${env.PORT}/health`);

  // Start the scan tick after the server is listening
  scheduler.start();
});

// Graceful shutdown
const shutdown = async (): Promise<void> => {
  logger.info('Shutting down...');
  scheduler.stop();
  scheduler.cancel();
  await scheduler.whenIdle();
  server.close();
  closeDatabase();
  process.exit(0);
};

const onSignal = (): void => {
  shutdown().catch((error: unknown) => {
    logger.error(`Shutdown failed: ${toErrorMessage(error)}`);
    process.exit(1);
  });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);
