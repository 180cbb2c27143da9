import { logger } from '../../config/logger.js';
import type { MonitoringConfig } from '../../config/monitoring.js';
import { AppError, ScanCancelledError, toErrorMessage } from '../../utils/errors.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { diff, reconcile } from '../detection/ChangeDetector.js';
import { defaultTrendingDetectors } from '../detection/trending.js';
import { buildNotifications, buildSystemStatus } from '../notifications/NotificationBuilder.js';
import type { NotificationFeed } from '../notifications/NotificationFeed.js';
import type { CommitResult, SnapshotStore, ScanFailure } from '../store/SnapshotStore.js';
import type { PlacesFetchResult, PlacesSearchFilters } from '../places/PlacesClient.js';
import type { Business, GeoPoint } from '../../types/business.types.js';
import type { ChangeEvent } from '../../types/change.types.js';
import type { ScanRecord, ScanTrigger } from '../../types/scan.types.js';

/** The slice of PlacesClient the runner needs */
export interface PlacesFetcher {
  fetch(
    location: GeoPoint,
    radiusMeters: number,
    filters?: PlacesSearchFilters,
    signal?: AbortSignal,
  ): Promise<PlacesFetchResult>;
}

export interface ScanRunnerDeps {
  client: PlacesFetcher;
  store: SnapshotStore;
  feed: NotificationFeed;
  clock?: Clock;
}

export interface RunScanOptions {
  trigger: ScanTrigger;
  signal?: AbortSignal;
  /** Called synchronously once the scan record exists */
  onStarted?: (scan: ScanRecord) => void;
}

function countChanged(events: readonly ChangeEvent[]): number {
  const ids = new Set<string>();
  for (const event of events) {
    if (event.kind === 'rating_changed' || event.kind === 'trending_activity') {
      ids.add(event.businessId);
    }
  }
  return ids.size;
}

/**
 * One scan end to end: fetch, diff against the stored snapshot, build
 * notifications and commit everything at once. Failures and cancellations
 * are recorded on the scan; the stored snapshot only changes on commit.
 */
export class ScanRunner {
  private readonly clock: Clock;

  constructor(private readonly deps: ScanRunnerDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async runScan(config: Readonly<MonitoringConfig>, options: RunScanOptions): Promise<ScanRecord> {
    const { store, client, feed } = this.deps;
    const scan = store.beginScan(options.trigger);
    options.onStarted?.(scan);
    logger.info(`[ScanRunner] Scan #${scan.id} started (${options.trigger})`);

    let fetched: PlacesFetchResult;
    try {
      this.throwIfCancelled(scan, options.signal);
      fetched = await client.fetch(
        config.location,
        config.radiusMeters,
        { categoryIds: config.placeCategoryIds, limit: config.resultLimit },
        options.signal,
      );
      this.throwIfCancelled(scan, options.signal);
    } catch (error: unknown) {
      // An unparsable envelope lands here too: with no records to trust the
      // scan fails outright; only per-record problems make it partial
      return this.fail(scan, error, config, options.signal);
    }

    const previous = store.getCurrent();
    const current = new Map<string, Business>(fetched.businesses.map((business) => [business.id, business]));

    // A record that failed to parse is not evidence that the business is gone
    for (const record of fetched.malformed) {
      if (record.externalId === null || current.has(record.externalId)) continue;
      const known = previous.get(record.externalId);
      if (known) current.set(known.id, known);
    }

    const events = diff(previous, current, {
      ratingChangeThreshold: config.ratingChangeThreshold,
      removalGraceScans: config.removalGraceScans,
      trendingDetectors: defaultTrendingDetectors(config.trending),
      detectedAt: fetched.fetchedAt,
    });
    const next = reconcile(previous, current, { removalGraceScans: config.removalGraceScans });
    const open = store.getOpenNotifications();
    const drafts = buildNotifications(events, config, open);

    const finished: ScanRecord = {
      ...scan,
      status: fetched.malformed.length > 0 ? 'partial' : 'success',
      finishedAt: this.clock.now(),
      businessesFetched: fetched.businesses.length,
      newCount: events.filter((event) => event.kind === 'new_business').length,
      changedCount: countChanged(events),
      removedCount: events.filter((event) => event.kind === 'business_removed').length,
      malformedCount: fetched.malformed.length,
      errorCode: null,
      errorMessage: null,
    };

    const partialNotice = finished.status === 'partial'
      ? buildSystemStatus(finished, { status: 'partial' }, config, open)
      : null;
    if (partialNotice) drafts.push(partialNotice);

    try {
      this.throwIfCancelled(scan, options.signal);
    } catch (error: unknown) {
      return this.fail(scan, error, config, options.signal);
    }

    let committed: CommitResult;
    try {
      committed = store.commit(next, finished, drafts);
    } catch (error: unknown) {
      return this.fail(scan, error, config, options.signal);
    }

    feed.publish(committed);
    logger.info(
      `[ScanRunner] Scan #${scan.id} ${finished.status}: ${finished.businessesFetched} fetched, ` +
        `${finished.newCount} new, ${finished.changedCount} changed, ${finished.removedCount} removed`,
    );
    return committed.scan;
  }

  private throwIfCancelled(scan: ScanRecord, signal: AbortSignal | undefined): void {
    if (signal?.aborted) throw new ScanCancelledError(scan.id);
  }

  private fail(
    scan: ScanRecord,
    error: unknown,
    config: Readonly<MonitoringConfig>,
    signal: AbortSignal | undefined,
  ): ScanRecord {
    const cancelled = error instanceof ScanCancelledError || signal?.aborted === true;
    const failure: ScanFailure = cancelled
      ? { code: 'CANCELLED', message: `Scan #${scan.id} was cancelled` }
      : {
          code: error instanceof AppError && error.code ? error.code : 'UNKNOWN',
          message: toErrorMessage(error),
        };

    const notice = cancelled
      ? null
      : buildSystemStatus(
          scan,
          { status: 'failed', errorMessage: failure.message },
          config,
          this.deps.store.getOpenNotifications(),
        );

    if (cancelled) {
      logger.info(`[ScanRunner] Scan #${scan.id} cancelled`);
    } else {
      logger.error(`[ScanRunner] Scan #${scan.id} failed (${failure.code}): ${failure.message}`);
    }

    const result = this.deps.store.failScan(scan, failure, notice);
    this.deps.feed.publish(result);
    return result.scan;
  }
}
