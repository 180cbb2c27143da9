import cron from 'node-cron';
import { logger } from '../../config/logger.js';
import { snapshotConfig, type MonitoringConfig } from '../../config/monitoring.js';
import { ScanInProgressError, toErrorMessage } from '../../utils/errors.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import type { ScanRunner } from '../scanner/ScanRunner.js';
import type { SnapshotStore } from '../store/SnapshotStore.js';
import type { ScanRecord, ScanTrigger, SchedulerState, SchedulerStatus } from '../../types/scan.types.js';

const MINUTE_MS = 60_000;

/** Checks every minute whether a scan is due */
const TICK_EXPRESSION = '* * * * *';

export interface ScanSchedulerDeps {
  runner: ScanRunner;
  store: SnapshotStore;
  settings: { get(): Readonly<MonitoringConfig> };
  clock?: Clock;
}

interface ActiveScan {
  scan: ScanRecord | null;
  controller: AbortController;
  done: Promise<ScanRecord | null>;
}

/**
 * Owns the idle/running state machine. Scheduled ticks and manual triggers
 * go through the same gate, so at most one scan runs at a time.
 */
export class ScanScheduler {
  private readonly clock: Clock;
  private state: SchedulerState = 'idle';
  private active: ActiveScan | null = null;
  private task: cron.ScheduledTask | null = null;
  private lastFireAt: Date | null = null;
  private skippedCycles = 0;

  constructor(private readonly deps: ScanSchedulerDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Register the cron tick. Call this once on server startup.
   */
  start(): void {
    if (this.task) return;

    this.task = cron.schedule(TICK_EXPRESSION, () => {
      this.tick().catch((error: unknown) => {
        logger.error(`[ScanScheduler] Tick failed: ${toErrorMessage(error)}`);
      });
    });

    const config = this.deps.settings.get();
    logger.info(
      `[ScanScheduler] Started, interval ${config.scanIntervalMinutes} min${config.enabled ? '' : ' (monitoring disabled)'}`,
    );
  }

  /** Stop the cron tick. A scan already running is left to finish. */
  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info('[ScanScheduler] Stopped');
  }

  /**
   * Fire a scheduled scan if the interval has elapsed since the last fire.
   * A fire that lands while a scan is running is dropped and counted.
   */
  async tick(): Promise<ScanRecord | null> {
    const config = this.deps.settings.get();
    if (!config.enabled) return null;

    const now = this.clock.now();
    const dueAt = this.nextDueAt(config);
    if (dueAt !== null && now.getTime() < dueAt.getTime()) return null;

    this.lastFireAt = now;

    if (this.state === 'running') {
      this.skippedCycles++;
      logger.warn(
        `[ScanScheduler] Skipped scheduled scan: scan #${this.active?.scan?.id ?? '?'} is still running`,
      );
      return null;
    }

    return this.launch('scheduled', config);
  }

  /**
   * Start a manual scan. Resolves once the scan record exists; the scan
   * itself keeps running in the background.
   */
  async triggerScan(): Promise<ScanRecord> {
    if (this.state === 'running') {
      throw new ScanInProgressError(this.active?.scan?.id ?? null);
    }
    return this.launch('manual', this.deps.settings.get());
  }

  /**
   * Ask the running scan to stop. Cooperative: a scan that already reached
   * its commit completes normally. Returns false when nothing is running.
   */
  cancel(): boolean {
    if (!this.active) return false;
    logger.info(`[ScanScheduler] Cancelling scan #${this.active.scan?.id ?? '?'}`);
    this.active.controller.abort();
    return true;
  }

  /** Resolves when no scan is running. */
  async whenIdle(): Promise<void> {
    while (this.active) {
      await this.active.done;
    }
  }

  getState(): SchedulerState {
    return this.state;
  }

  getStatus(): SchedulerStatus {
    const config = this.deps.settings.get();
    return {
      state: this.state,
      enabled: config.enabled,
      currentScanId: this.active?.scan?.id ?? null,
      lastFireAt: this.lastFireAt,
      nextDueAt: config.enabled ? this.nextDueAt(config) ?? this.clock.now() : null,
      lastScan: this.deps.store.getLastFinishedScan(),
      skippedCycles: this.skippedCycles,
    };
  }

  /**
   * Interval is measured from the last scheduled fire; after a restart,
   * from the start of the most recent stored scan.
   */
  private nextDueAt(config: Readonly<MonitoringConfig>): Date | null {
    const anchor = this.lastFireAt ?? this.deps.store.getScanHistory(1)[0]?.startedAt ?? null;
    if (anchor === null) return null;
    return new Date(anchor.getTime() + config.scanIntervalMinutes * MINUTE_MS);
  }

  private launch(trigger: ScanTrigger, config: Readonly<MonitoringConfig>): Promise<ScanRecord> {
    const controller = new AbortController();
    const active: ActiveScan = { scan: null, controller, done: Promise.resolve(null) };
    this.state = 'running';
    this.active = active;

    return new Promise<ScanRecord>((resolve, reject) => {
      active.done = this.deps.runner
        .runScan(snapshotConfig(config), {
          trigger,
          signal: controller.signal,
          onStarted: (scan) => {
            active.scan = scan;
            resolve(scan);
          },
        })
        .then(
          (record): ScanRecord | null => record,
          (error: unknown): null => {
            logger.error(`[ScanScheduler] ${trigger} scan crashed: ${toErrorMessage(error)}`);
            reject(error);
            return null;
          },
        )
        .finally(() => {
          this.state = 'idle';
          this.active = null;
        });
    });
  }
}
