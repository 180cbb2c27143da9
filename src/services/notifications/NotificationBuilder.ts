import type { MonitoringConfig, NotifyToggles } from '../../config/monitoring.js';
import type { Business } from '../../types/business.types.js';
import type { ChangeEvent, ChangeKind } from '../../types/change.types.js';
import type { ScanRecord } from '../../types/scan.types.js';
import {
  openNotificationKey,
  type NotificationDraft,
  type OpenNotificationIndex,
} from '../../types/notification.types.js';

const KIND_TOGGLES: Record<ChangeKind, keyof NotifyToggles> = {
  new_business: 'newBusiness',
  rating_changed: 'ratingChanged',
  trending_activity: 'trendingActivity',
  business_removed: 'businessRemoved',
};

const TRENDING_LABELS: Record<string, string> = {
  popularity: 'popularity',
  review_count: 'review count',
};

function stars(rating: number): string {
  return rating.toFixed(1);
}

function formatSignal(signal: string, value: number): string {
  return signal === 'popularity' ? value.toFixed(2) : String(value);
}

function describe(event: ChangeEvent): { title: string; message: string } {
  const name = event.business.name;

  switch (event.kind) {
    case 'new_business': {
      const labels = event.business.categoryLabels.length > 0
        ? event.business.categoryLabels.join(', ')
        : event.business.category;
      return {
        title: 'New business nearby',
        message: `'${name}' appeared in your monitoring area (${labels}).`,
      };
    }
    case 'rating_changed': {
      const direction = event.newValue > event.oldValue ? 'rose' : 'dropped';
      return {
        title: 'Rating change',
        message: `'${name}' rating ${direction} from ${stars(event.oldValue)} to ${stars(event.newValue)} stars.`,
      };
    }
    case 'trending_activity': {
      const label = TRENDING_LABELS[event.signal] ?? event.signal;
      return {
        title: 'Trending nearby',
        message: `'${name}' is trending: ${label} went from ${formatSignal(event.signal, event.oldValue)} to ${formatSignal(event.signal, event.newValue)}.`,
      };
    }
    case 'business_removed':
      return {
        title: 'Business no longer listed',
        message: `'${name}' has disappeared from directory results.`,
      };
  }
}

function matchesCategory(business: Business, pattern: string): boolean {
  const needle = pattern.toLowerCase();
  if (business.category === needle) return true;
  return business.categoryLabels.some((label) => label.toLowerCase().includes(needle));
}

/**
 * Whether a business passes the operator's rating and category filters.
 * A business without a rating is never filtered out by minRating.
 */
export function passesFilters(business: Business, config: MonitoringConfig): boolean {
  if (config.minRating !== null && business.rating !== null && business.rating < config.minRating) {
    return false;
  }
  if (config.excludeCategories.some((pattern) => matchesCategory(business, pattern))) {
    return false;
  }
  if (config.includeCategories.length > 0) {
    return config.includeCategories.some((pattern) => matchesCategory(business, pattern));
  }
  return true;
}

/**
 * Turn change events into notification drafts.
 * Drops disabled kinds and filtered-out businesses, then deduplicates against
 * open notifications: an open (business, kind) is refreshed or left alone
 * depending on `repeatedAlerts`, never duplicated.
 */
export function buildNotifications(
  events: readonly ChangeEvent[],
  config: MonitoringConfig,
  open: OpenNotificationIndex,
): NotificationDraft[] {
  const drafts: NotificationDraft[] = [];
  const drafted = new Set<string>();

  for (const event of events) {
    if (!config.notify[KIND_TOGGLES[event.kind]]) continue;
    if (!passesFilters(event.business, config)) continue;

    const key = openNotificationKey(event.businessId, event.kind);
    if (drafted.has(key)) continue;
    drafted.add(key);

    const existing = open.get(key);
    if (existing && config.repeatedAlerts === 'suppress') continue;

    drafts.push({
      kind: event.kind,
      businessId: event.businessId,
      ...describe(event),
      replaces: existing?.id ?? null,
    });
  }

  return drafts;
}

/**
 * The operator-facing notice for a scan that failed or only partly succeeded.
 * There is one open system notice at a time: a repeat refreshes it or is
 * suppressed, following `repeatedAlerts`.
 * Returns null for clean scans, suppressed repeats, or when system notices are off.
 */
export function buildSystemStatus(
  record: Pick<ScanRecord, 'id' | 'malformedCount'>,
  outcome: { status: 'failed'; errorMessage: string } | { status: 'partial' } | { status: 'success' },
  config: Pick<MonitoringConfig, 'notify' | 'repeatedAlerts'>,
  open: OpenNotificationIndex = new Map(),
): NotificationDraft | null {
  if (!config.notify.systemStatus || outcome.status === 'success') return null;

  const existing = open.get(openNotificationKey(null, 'system_status'));
  if (existing && config.repeatedAlerts === 'suppress') return null;
  const replaces = existing?.id ?? null;

  if (outcome.status === 'failed') {
    return {
      kind: 'system_status',
      businessId: null,
      title: 'Scan failed',
      message: `Scan #${record.id} failed: ${outcome.errorMessage}`,
      replaces,
    };
  }

  return {
    kind: 'system_status',
    businessId: null,
    title: 'Scan partially completed',
    message: `Scan #${record.id} skipped ${record.malformedCount} malformed record(s) from the directory.`,
    replaces,
  };
}
