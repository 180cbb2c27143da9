import { describe, it, expect, beforeEach } from 'vitest';
import { ScanScheduler } from '../ScanScheduler.js';
import { ScanRunner, type PlacesFetcher } from '../../scanner/ScanRunner.js';
import { SnapshotStore } from '../../store/SnapshotStore.js';
import { NotificationFeed } from '../../notifications/NotificationFeed.js';
import { ScanInProgressError } from '../../../utils/errors.js';
import { FakeClock, Gate, T0, makeBusiness, makeConfig, memoryDatabase } from '../../../test/fakes.js';
import type { MonitoringConfig } from '../../../config/monitoring.js';

const MINUTE_MS = 60_000;

/** Fetcher that holds every call until the gate opens, and rejects when aborted */
function gatedFetcher(clock: FakeClock, gate: Gate): PlacesFetcher & { calls: number } {
  const fetcher = {
    calls: 0,
    fetch: (_location: unknown, _radius: number, _filters?: unknown, signal?: AbortSignal) => {
      fetcher.calls++;
      return new Promise<{ businesses: ReturnType<typeof makeBusiness>[]; malformed: []; fetchedAt: Date }>(
        (resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
          gate.opened.then(
            () => resolve({ businesses: [makeBusiness({ id: 'B1' })], malformed: [], fetchedAt: clock.now() }),
            reject,
          );
        },
      );
    },
  };
  return fetcher;
}

describe('ScanScheduler', () => {
  let clock: FakeClock;
  let store: SnapshotStore;
  let config: MonitoringConfig;
  let gate: Gate;
  let fetcher: ReturnType<typeof gatedFetcher>;
  let scheduler: ScanScheduler;

  beforeEach(() => {
    clock = new FakeClock();
    store = new SnapshotStore(memoryDatabase(), clock);
    config = makeConfig({ scanIntervalMinutes: 60 });
    gate = new Gate();
    fetcher = gatedFetcher(clock, gate);
    const runner = new ScanRunner({ client: fetcher, store, feed: new NotificationFeed(), clock });
    scheduler = new ScanScheduler({ runner, store, settings: { get: () => config }, clock });
  });

  it('fires on the first tick, then once per interval', async () => {
    gate.open();

    const first = await scheduler.tick();
    expect(first?.trigger).toBe('scheduled');
    await scheduler.whenIdle();

    clock.advance(30 * MINUTE_MS);
    expect(await scheduler.tick()).toBeNull();

    clock.advance(30 * MINUTE_MS);
    expect(await scheduler.tick()).not.toBeNull();
    await scheduler.whenIdle();

    expect(fetcher.calls).toBe(2);
    expect(store.getScanHistory(10).map((scan) => scan.status)).toEqual(['success', 'success']);
  });

  it('moves between idle and running', async () => {
    expect(scheduler.getState()).toBe('idle');

    const scan = await scheduler.triggerScan();
    expect(scheduler.getState()).toBe('running');
    expect(scheduler.getStatus().currentScanId).toBe(scan.id);

    gate.open();
    await scheduler.whenIdle();

    expect(scheduler.getState()).toBe('idle');
    expect(scheduler.getStatus()).toMatchObject({ currentScanId: null, lastScan: { id: scan.id, status: 'success' } });
  });

  it('rejects a manual trigger while a scan is running', async () => {
    const running = await scheduler.triggerScan();

    await expect(scheduler.triggerScan()).rejects.toBeInstanceOf(ScanInProgressError);
    await expect(scheduler.triggerScan()).rejects.toMatchObject({ statusCode: 409, code: 'SCAN_IN_PROGRESS', scanId: running.id });

    gate.open();
    await scheduler.whenIdle();
    expect(fetcher.calls).toBe(1);
    expect(store.getScanHistory(10)).toHaveLength(1);
  });

  it('drops a scheduled fire that lands while a scan is running', async () => {
    await scheduler.triggerScan();
    clock.advance(60 * MINUTE_MS);

    expect(await scheduler.tick()).toBeNull();
    expect(scheduler.getStatus()).toMatchObject({
      state: 'running',
      skippedCycles: 1,
      lastFireAt: new Date(T0.getTime() + 60 * MINUTE_MS),
    });

    gate.open();
    await scheduler.whenIdle();
    expect(fetcher.calls).toBe(1);
  });

  it('cancels the running scan without touching the snapshot', async () => {
    const scan = await scheduler.triggerScan();

    expect(scheduler.cancel()).toBe(true);
    await scheduler.whenIdle();

    expect(store.getScan(scan.id)).toMatchObject({ status: 'failed', errorCode: 'CANCELLED' });
    expect(store.getCurrent().size).toBe(0);
    expect(store.listNotifications()).toEqual([]);
    expect(scheduler.cancel()).toBe(false);
  });

  it('does not fire while monitoring is disabled, but still accepts manual scans', async () => {
    config = makeConfig({ enabled: false });
    gate.open();

    expect(await scheduler.tick()).toBeNull();
    expect(scheduler.getStatus().nextDueAt).toBeNull();

    await scheduler.triggerScan();
    await scheduler.whenIdle();
    expect(fetcher.calls).toBe(1);
  });

  it('measures the first interval from the latest stored scan after a restart', async () => {
    const previous = store.beginScan('scheduled');
    store.recoverInterruptedScans();
    clock.advance(10 * MINUTE_MS);

    expect(await scheduler.tick()).toBeNull();
    expect(scheduler.getStatus().nextDueAt).toEqual(new Date(previous.startedAt.getTime() + 60 * MINUTE_MS));
  });
});
