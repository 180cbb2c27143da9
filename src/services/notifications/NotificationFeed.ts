import { EventEmitter } from 'node:events';
import { logger } from '../../config/logger.js';
import { toErrorMessage } from '../../utils/errors.js';
import type { Notification } from '../../types/notification.types.js';
import type { ScanRecord } from '../../types/scan.types.js';

export interface FeedBatch {
  scan: ScanRecord;
  notifications: Notification[];
}

export type FeedListener = (batch: FeedBatch) => void;

/**
 * In-process fan-out of notifications after they are committed.
 * Delivery channels subscribe here; a throwing listener is logged and
 * does not stop the others.
 */
export class NotificationFeed {
  private readonly emitter = new EventEmitter();

  subscribe(listener: FeedListener): () => void {
    const wrapped = (batch: FeedBatch): void => {
      try {
        listener(batch);
      } catch (error: unknown) {
        logger.error(`[NotificationFeed] Listener failed: ${toErrorMessage(error)}`);
      }
    };
    this.emitter.on('batch', wrapped);
    return () => {
      this.emitter.off('batch', wrapped);
    };
  }

  publish(batch: FeedBatch): void {
    if (batch.notifications.length === 0) return;
    logger.debug(
      `[NotificationFeed] Publishing ${batch.notifications.length} notification(s) from scan #${batch.scan.id}`,
    );
    this.emitter.emit('batch', batch);
  }

  listenerCount(): number {
    return this.emitter.listenerCount('batch');
  }
}
