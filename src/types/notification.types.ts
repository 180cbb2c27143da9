import type { ChangeKind } from './change.types.js';

export type NotificationKind = ChangeKind | 'system_status';

export interface Notification {
  id: number;
  kind: NotificationKind;
  businessId: string | null;
  scanId: number | null;
  title: string;
  message: string;
  createdAt: Date;
  updatedAt: Date;
  read: boolean;
  dismissed: boolean;
  /** How many scans raised this same open condition */
  occurrences: number;
}

/**
 * A notification before it has an ID. `replaces` points at the open
 * notification for the same (business, kind) that this draft refreshes.
 */
export interface NotificationDraft {
  kind: NotificationKind;
  businessId: string | null;
  title: string;
  message: string;
  replaces: number | null;
}

export interface NotificationFilters {
  unreadOnly?: boolean;
  includeDismissed?: boolean;
  kind?: NotificationKind;
  businessId?: string;
  /** Only notifications raised or refreshed within the last N hours */
  sinceHours?: number;
  limit?: number;
}

export interface NotificationSummary {
  /** Open (not dismissed) notifications */
  open: number;
  unread: number;
  /** Open notifications raised or refreshed within the window */
  recent: number;
  byKind: Partial<Record<NotificationKind, number>>;
}

/** Open notifications keyed by `${businessId}:${kind}`; system notices by `:system_status` */
export type OpenNotificationIndex = ReadonlyMap<string, Notification>;

export function openNotificationKey(businessId: string | null, kind: NotificationKind): string {
  return `${businessId ?? ''}:${kind}`;
}
