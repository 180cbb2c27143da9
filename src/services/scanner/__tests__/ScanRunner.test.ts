import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ScanRunner, type PlacesFetcher } from '../ScanRunner.js';
import { SnapshotStore } from '../../store/SnapshotStore.js';
import { NotificationFeed, type FeedBatch } from '../../notifications/NotificationFeed.js';
import { PlacesApiError, StorageError } from '../../../utils/errors.js';
import { FakeClock, makeBusiness, makeConfig, memoryDatabase } from '../../../test/fakes.js';
import type { PlacesFetchResult } from '../../places/PlacesClient.js';
import type { Business } from '../../../types/business.types.js';

type Response = Pick<PlacesFetchResult, 'businesses'> & Partial<Pick<PlacesFetchResult, 'malformed'>>;

/** Answers each fetch from the queue: a result, or an error to throw */
function queuedFetcher(clock: FakeClock, queue: Array<Response | Error>): PlacesFetcher {
  return {
    fetch: async () => {
      const next = queue.shift();
      if (!next) throw new Error('Unexpected fetch');
      if (next instanceof Error) throw next;
      return { businesses: next.businesses, malformed: next.malformed ?? [], fetchedAt: clock.now() };
    },
  };
}

function fetched(...businesses: Business[]): Response {
  return { businesses };
}

describe('ScanRunner', () => {
  let clock: FakeClock;
  let store: SnapshotStore;
  let feed: NotificationFeed;
  let published: FeedBatch[];

  beforeEach(() => {
    clock = new FakeClock();
    store = new SnapshotStore(memoryDatabase(), clock);
    feed = new NotificationFeed();
    published = [];
    feed.subscribe((batch) => published.push(batch));
  });

  function runner(queue: Array<Response | Error>): ScanRunner {
    return new ScanRunner({ client: queuedFetcher(clock, queue), store, feed, clock });
  }

  it('records a new business on the first scan', async () => {
    const scan = await runner([fetched(makeBusiness({ id: 'B1', rating: 4.2 }))]).runScan(makeConfig(), {
      trigger: 'manual',
    });

    expect(scan).toMatchObject({ status: 'success', businessesFetched: 1, newCount: 1, changedCount: 0, removedCount: 0 });
    expect([...store.getCurrent().keys()]).toEqual(['B1']);

    const notifications = store.listNotifications();
    expect(notifications).toHaveLength(1);
    expect(notifications[0]).toMatchObject({ kind: 'new_business', businessId: 'B1', scanId: scan.id });
    expect(published).toHaveLength(1);
    expect(published[0]?.notifications).toHaveLength(1);
  });

  it('leaves the snapshot alone and raises one system notice when the directory rejects the key', async () => {
    const scanner = runner([
      fetched(makeBusiness({ id: 'B1', rating: 4.0 })),
      new PlacesApiError('Places API rejected credentials (401)', 'unauthorized', { status: 401 }),
    ]);
    const config = makeConfig({ notify: { newBusiness: false } });
    await scanner.runScan(config, { trigger: 'scheduled' });
    const before = store.getCurrent();

    const scan = await scanner.runScan(config, { trigger: 'scheduled' });

    expect(scan).toMatchObject({ status: 'failed', errorCode: 'UNAUTHORIZED' });
    expect(store.getScan(scan.id)?.status).toBe('failed');
    expect(store.getCurrent()).toEqual(before);

    const notifications = store.listNotifications();
    expect(notifications).toHaveLength(1);
    expect(notifications[0]).toMatchObject({
      kind: 'system_status',
      businessId: null,
      message: `Scan #${scan.id} failed: Places API rejected credentials (401)`,
    });
  });

  it('refreshes one system notice while the key stays rejected', async () => {
    const rejected = () => new PlacesApiError('Places API rejected credentials (401)', 'unauthorized', { status: 401 });
    const scanner = runner([rejected(), rejected(), rejected()]);

    await scanner.runScan(makeConfig(), { trigger: 'scheduled' });
    await scanner.runScan(makeConfig(), { trigger: 'scheduled' });
    const last = await scanner.runScan(makeConfig(), { trigger: 'scheduled' });

    const notices = store.listNotifications({ kind: 'system_status' });
    expect(notices).toHaveLength(1);
    expect(notices[0]).toMatchObject({
      occurrences: 3,
      scanId: last.id,
      message: `Scan #${last.id} failed: Places API rejected credentials (401)`,
    });
  });

  it('leaves the open system notice alone when repeats are suppressed', async () => {
    const rejected = () => new PlacesApiError('Places API rejected credentials (401)', 'unauthorized', { status: 401 });
    const config = makeConfig({ repeatedAlerts: 'suppress' });
    const scanner = runner([rejected(), rejected()]);

    const first = await scanner.runScan(config, { trigger: 'scheduled' });
    await scanner.runScan(config, { trigger: 'scheduled' });

    expect(store.listNotifications({ kind: 'system_status' })).toEqual([
      expect.objectContaining({ occurrences: 1, message: `Scan #${first.id} failed: Places API rejected credentials (401)` }),
    ]);
  });

  it('reports a rating change and refreshes the same notification on repeats', async () => {
    const config = makeConfig({ notify: { newBusiness: false } });
    const scanner = runner([
      fetched(makeBusiness({ id: 'B1', rating: 4.0 })),
      fetched(makeBusiness({ id: 'B1', rating: 4.5 })),
      fetched(makeBusiness({ id: 'B1', rating: 4.0 })),
    ]);

    await scanner.runScan(config, { trigger: 'scheduled' });
    const second = await scanner.runScan(config, { trigger: 'scheduled' });
    await scanner.runScan(config, { trigger: 'scheduled' });

    expect(second.changedCount).toBe(1);
    const notifications = store.listNotifications();
    expect(notifications).toHaveLength(1);
    expect(notifications[0]).toMatchObject({
      kind: 'rating_changed',
      occurrences: 2,
      message: "'Business B1' rating dropped from 4.5 to 4.0 stars.",
    });
  });

  it('reports a removal only after consecutive misses', async () => {
    const config = makeConfig({ notify: { newBusiness: false } });
    const scanner = runner([fetched(makeBusiness({ id: 'B1' })), fetched(), fetched()]);

    await scanner.runScan(config, { trigger: 'scheduled' });
    const firstMiss = await scanner.runScan(config, { trigger: 'scheduled' });
    expect(firstMiss.removedCount).toBe(0);
    expect(store.getBusiness('B1')?.missedScans).toBe(1);

    const secondMiss = await scanner.runScan(config, { trigger: 'scheduled' });
    expect(secondMiss.removedCount).toBe(1);
    expect(store.getBusiness('B1')).toBeNull();
    expect(store.listNotifications().map((n) => n.kind)).toEqual(['business_removed']);
  });

  it('keeps the competitor flag when a removed business comes back', async () => {
    const config = makeConfig({ notify: { newBusiness: false } });
    const scanner = runner([fetched(makeBusiness({ id: 'B1' })), fetched(), fetched(), fetched(makeBusiness({ id: 'B1' }))]);

    await scanner.runScan(config, { trigger: 'scheduled' });
    expect(store.setCompetitorFlag('B1', true)?.isCompetitor).toBe(true);

    await scanner.runScan(config, { trigger: 'scheduled' });
    const removal = await scanner.runScan(config, { trigger: 'scheduled' });
    expect(removal.removedCount).toBe(1);
    expect(store.getBusiness('B1')).toBeNull();

    const back = await scanner.runScan(config, { trigger: 'scheduled' });
    expect(back.newCount).toBe(1);
    expect(store.getBusiness('B1')?.isCompetitor).toBe(true);
  });

  it('keeps a known business whose record came back malformed', async () => {
    const config = makeConfig({ removalGraceScans: 1, notify: { newBusiness: false } });
    const scanner = runner([
      fetched(makeBusiness({ id: 'B1' })),
      { businesses: [], malformed: [{ externalId: 'B1', reason: 'name: Required' }] },
    ]);

    await scanner.runScan(config, { trigger: 'scheduled' });
    const scan = await scanner.runScan(config, { trigger: 'scheduled' });

    expect(scan).toMatchObject({ status: 'partial', malformedCount: 1, removedCount: 0 });
    expect(store.getBusiness('B1')).not.toBeNull();
    expect(store.listNotifications().map((n) => n.message)).toEqual([
      `Scan #${scan.id} skipped 1 malformed record(s) from the directory.`,
    ]);
  });

  it('keeps the previous snapshot when the commit fails', async () => {
    const config = makeConfig();
    const scanner = runner([fetched(makeBusiness({ id: 'B1' })), fetched(makeBusiness({ id: 'B2' }))]);
    await scanner.runScan(config, { trigger: 'scheduled' });

    vi.spyOn(store, 'commit').mockImplementation(() => {
      throw new StorageError('disk full');
    });
    const scan = await scanner.runScan(config, { trigger: 'scheduled' });

    expect(scan).toMatchObject({ status: 'failed', errorCode: 'STORAGE_FAILURE', errorMessage: 'disk full' });
    expect([...store.getCurrent().keys()]).toEqual(['B1']);
    expect(store.listNotifications({ kind: 'system_status' }).map((n) => n.message)).toEqual([
      `Scan #${scan.id} failed: disk full`,
    ]);
  });

  it('finalizes a cancelled scan without a system notice', async () => {
    const controller = new AbortController();
    controller.abort();

    const scan = await runner([fetched(makeBusiness({ id: 'B1' }))]).runScan(makeConfig(), {
      trigger: 'manual',
      signal: controller.signal,
    });

    expect(scan).toMatchObject({ status: 'failed', errorCode: 'CANCELLED' });
    expect(store.getCurrent().size).toBe(0);
    expect(store.listNotifications()).toEqual([]);
  });

  it('does not notify for businesses outside the configured filters', async () => {
    const scan = await runner([
      fetched(
        makeBusiness({ id: 'B1', rating: 3.1 }),
        makeBusiness({ id: 'B2', rating: 4.6 }),
      ),
    ]).runScan(makeConfig({ minRating: 4 }), { trigger: 'manual' });

    expect(scan.newCount).toBe(2);
    expect(store.getCurrent().size).toBe(2);
    expect(store.listNotifications().map((n) => n.businessId)).toEqual(['B2']);
  });
});
