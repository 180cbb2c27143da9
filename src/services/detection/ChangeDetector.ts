import type { Business, Snapshot } from '../../types/business.types.js';
import type { ChangeEvent, ChangeKind } from '../../types/change.types.js';
import type { TrendingDetector } from './trending.js';

export interface DetectionOptions {
  /** Minimum absolute rating move, in stars, that counts as a change */
  ratingChangeThreshold: number;
  /** Consecutive absences before a business is reported removed */
  removalGraceScans: number;
  trendingDetectors: readonly TrendingDetector[];
  detectedAt: Date;
}

const KIND_ORDER: Record<ChangeKind, number> = {
  new_business: 0,
  rating_changed: 1,
  trending_activity: 2,
  business_removed: 3,
};

function compareEvents(a: ChangeEvent, b: ChangeEvent): number {
  if (a.businessId !== b.businessId) return a.businessId < b.businessId ? -1 : 1;
  return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
}

function ratingMoved(previous: number, current: number, threshold: number): boolean {
  // Ratings carry one decimal; round the delta so 4.3 - 4.0 counts as 0.3
  const delta = Math.round(Math.abs(current - previous) * 10) / 10;
  return delta > 0 && delta >= threshold;
}

function isRemovedThisScan(previous: Business, graceScans: number): boolean {
  return previous.missedScans + 1 >= graceScans;
}

/**
 * Compare the stored snapshot with freshly fetched businesses.
 * Pure and deterministic: events come back sorted by business ID, then kind.
 */
export function diff(
  previous: Snapshot,
  current: Snapshot,
  options: DetectionOptions,
): ChangeEvent[] {
  const events: ChangeEvent[] = [];
  const detectedAt = options.detectedAt;

  for (const [id, business] of current) {
    const before = previous.get(id);

    if (!before) {
      events.push({ kind: 'new_business', businessId: id, business, oldValue: null, newValue: null, detectedAt });
      continue;
    }

    if (
      before.rating !== null &&
      business.rating !== null &&
      ratingMoved(before.rating, business.rating, options.ratingChangeThreshold)
    ) {
      events.push({
        kind: 'rating_changed',
        businessId: id,
        business,
        oldValue: before.rating,
        newValue: business.rating,
        detectedAt,
      });
    }

    // One trending event per business per scan: the first detector that fires wins
    for (const detector of options.trendingDetectors) {
      const signal = detector.evaluate(before, business);
      if (!signal) continue;
      events.push({
        kind: 'trending_activity',
        businessId: id,
        business,
        signal: signal.signal,
        oldValue: signal.previous,
        newValue: signal.current,
        detectedAt,
      });
      break;
    }
  }

  for (const [id, before] of previous) {
    if (current.has(id)) continue;
    if (!isRemovedThisScan(before, options.removalGraceScans)) continue;
    events.push({ kind: 'business_removed', businessId: id, business: before, oldValue: null, newValue: null, detectedAt });
  }

  return events.sort(compareEvents);
}

/**
 * Build the snapshot to commit after a scan.
 * Keeps operator flags and first-seen dates, counts consecutive absences,
 * and drops businesses once they have been reported removed.
 */
export function reconcile(
  previous: Snapshot,
  current: Snapshot,
  options: Pick<DetectionOptions, 'removalGraceScans'>,
): Map<string, Business> {
  const next = new Map<string, Business>();

  for (const [id, business] of current) {
    const before = previous.get(id);
    next.set(id, {
      ...business,
      isCompetitor: before?.isCompetitor ?? false,
      firstSeenAt: before?.firstSeenAt ?? business.firstSeenAt,
      missedScans: 0,
    });
  }

  for (const [id, before] of previous) {
    if (current.has(id)) continue;
    if (isRemovedThisScan(before, options.removalGraceScans)) continue;
    next.set(id, { ...before, missedScans: before.missedScans + 1 });
  }

  return new Map([...next.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
