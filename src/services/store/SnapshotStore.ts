import type { DatabaseConnection } from '../../config/database.js';
import type { MonitoringConfig } from '../../config/monitoring.js';
import { logger } from '../../config/logger.js';
import type { BusinessCategory } from '../../config/categories.js';
import { StorageError, toErrorMessage } from '../../utils/errors.js';
import { haversineMeters } from '../../utils/geo.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import type {
  Business,
  BusinessFilters,
  CompetitorSummary,
  Snapshot,
} from '../../types/business.types.js';
import type { ScanRecord, ScanTrigger } from '../../types/scan.types.js';
import {
  openNotificationKey,
  type Notification,
  type NotificationDraft,
  type NotificationFilters,
  type NotificationSummary,
  type OpenNotificationIndex,
} from '../../types/notification.types.js';
import {
  businessToRow,
  rowToBusiness,
  rowToNotification,
  rowToScan,
  toNotificationKind,
  type BusinessRow,
  type NotificationRow,
  type ScanRow,
} from './rows.js';

const RECENT_ADDITION_DAYS = 30;
const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;
const DEFAULT_NOTIFICATION_LIMIT = 100;

export interface ScanFailure {
  code: string;
  message: string;
}

export interface CommitResult {
  scan: ScanRecord;
  /** Notifications created or refreshed by this commit */
  notifications: Notification[];
}

type SqlValue = string | number;

/**
 * Durable state of the radar: the current business snapshot, scan history
 * and notifications. Every multi-row write runs in one SQLite transaction,
 * so a failed commit leaves the previous snapshot in place.
 */
export class SnapshotStore {
  constructor(
    private readonly db: DatabaseConnection,
    private readonly clock: Clock = systemClock,
  ) {}

  // ── Snapshot ─────────────────────────────────────────────────────

  getCurrent(): Map<string, Business> {
    const rows = this.db
      .prepare<[], BusinessRow>('SELECT * FROM businesses ORDER BY id')
      .all();
    return new Map(rows.map((row) => [row.id, rowToBusiness(row)]));
  }

  getBusiness(id: string): Business | null {
    const row = this.db
      .prepare<[string], BusinessRow>('SELECT * FROM businesses WHERE id = ?')
      .get(id);
    return row ? rowToBusiness(row) : null;
  }

  listBusinesses(filters: BusinessFilters = {}): Business[] {
    const clauses: string[] = [];
    const params: SqlValue[] = [];

    if (filters.category) {
      clauses.push('category = ?');
      params.push(filters.category);
    }
    if (filters.isCompetitor !== undefined) {
      clauses.push('is_competitor = ?');
      params.push(filters.isCompetitor ? 1 : 0);
    }
    if (filters.minRating !== undefined) {
      clauses.push('rating >= ?');
      params.push(filters.minRating);
    }
    if (filters.search) {
      clauses.push('(name LIKE ? OR address LIKE ?)');
      const pattern = `%${filters.search}%`;
      params.push(pattern, pattern);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare<SqlValue[], BusinessRow>(`SELECT * FROM businesses ${where} ORDER BY name COLLATE NOCASE, id`)
      .all(...params);

    const businesses = rows.map(rowToBusiness);
    const near = filters.near;
    const withinMeters = filters.withinMeters;
    if (!near || withinMeters === undefined) return businesses;

    return businesses.filter(
      (business) => business.location !== null && haversineMeters(near, business.location) <= withinMeters,
    );
  }

  /** Aggregate view of operator-flagged competitors inside the monitoring radius. */
  competitorSummary(config: Pick<MonitoringConfig, 'location' | 'radiusMeters'>): CompetitorSummary {
    const competitors = this.listBusinesses({
      isCompetitor: true,
      near: config.location,
      withinMeters: config.radiusMeters,
    });

    const rated = competitors.flatMap((business) => (business.rating === null ? [] : [business.rating]));
    const averageRating = rated.length > 0
      ? Math.round((rated.reduce((sum, rating) => sum + rating, 0) / rated.length) * 100) / 100
      : null;

    const categoryBreakdown: Partial<Record<BusinessCategory, number>> = {};
    for (const business of competitors) {
      categoryBreakdown[business.category] = (categoryBreakdown[business.category] ?? 0) + 1;
    }

    const recentSince = this.clock.now().getTime() - RECENT_ADDITION_DAYS * DAY_MS;

    return {
      totalCompetitors: competitors.length,
      averageRating,
      verifiedCompetitors: competitors.filter((business) => business.verified).length,
      categoryBreakdown,
      recentAdditions: competitors.filter((business) => business.firstSeenAt.getTime() >= recentSince).length,
    };
  }

  /**
   * Operator-owned flag. Stored apart from the snapshot so it survives the
   * business dropping out of results and coming back.
   * Returns the updated business, or null when the id is unknown.
   */
  setCompetitorFlag(id: string, isCompetitor: boolean): Business | null {
    const value = isCompetitor ? 1 : 0;
    const run = this.db.transaction((): boolean => {
      const result = this.db
        .prepare<[number, string]>('UPDATE businesses SET is_competitor = ? WHERE id = ?')
        .run(value, id);
      if (result.changes === 0) return false;

      this.db
        .prepare<[string, number, string]>(`
          INSERT INTO competitor_flags (business_id, is_competitor, updated_at) VALUES (?, ?, ?)
          ON CONFLICT (business_id) DO UPDATE SET
            is_competitor = excluded.is_competitor, updated_at = excluded.updated_at
        `)
        .run(id, value, this.clock.now().toISOString());
      return true;
    });

    if (!run()) return null;
    logger.info(`[SnapshotStore] Business ${id} competitor flag set to ${isCompetitor}`);
    return this.getBusiness(id);
  }

  // ── Scans ────────────────────────────────────────────────────────

  beginScan(trigger: ScanTrigger): ScanRecord {
    const startedAt = this.clock.now().toISOString();
    const result = this.db
      .prepare<[string, string]>("INSERT INTO scans (trigger, status, started_at) VALUES (?, 'running', ?)")
      .run(trigger, startedAt);
    const scan = this.getScan(Number(result.lastInsertRowid));
    if (!scan) {
      throw new StorageError('Scan record vanished right after insert');
    }
    return scan;
  }

  getScan(id: number): ScanRecord | null {
    const row = this.db.prepare<[number], ScanRow>('SELECT * FROM scans WHERE id = ?').get(id);
    return row ? rowToScan(row) : null;
  }

  getScanHistory(limit = 20): ScanRecord[] {
    return this.db
      .prepare<[number], ScanRow>('SELECT * FROM scans ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map(rowToScan);
  }

  /** Most recent scan that has finished, whatever its outcome. */
  getLastFinishedScan(): ScanRecord | null {
    const row = this.db
      .prepare<[], ScanRow>("SELECT * FROM scans WHERE status != 'running' ORDER BY id DESC LIMIT 1")
      .get();
    return row ? rowToScan(row) : null;
  }

  /**
   * Replace the snapshot, finalize the scan and record its notifications in
   * one transaction. Competitor flags come from the flag table, so one set
   * while the scan was running, or before the business went missing, holds.
   */
  commit(
    snapshot: Snapshot,
    scan: ScanRecord,
    notifications: readonly NotificationDraft[],
  ): CommitResult {
    const run = this.db.transaction((): CommitResult => {
      const flags = new Map(
        this.db
          .prepare<[], { business_id: string; is_competitor: number }>(
            'SELECT business_id, is_competitor FROM competitor_flags',
          )
          .all()
          .map((row) => [row.business_id, row.is_competitor === 1]),
      );

      this.db.prepare('DELETE FROM businesses').run();
      const insert = this.db.prepare<BusinessRow>(`
        INSERT INTO businesses (
          id, name, category, category_labels, lat, lng, address, rating, review_count,
          popularity, price_tier, verified, hours, website, phone, is_competitor,
          first_seen_at, last_seen_at, missed_scans
        ) VALUES (
          @id, @name, @category, @category_labels, @lat, @lng, @address, @rating, @review_count,
          @popularity, @price_tier, @verified, @hours, @website, @phone, @is_competitor,
          @first_seen_at, @last_seen_at, @missed_scans
        )
      `);
      for (const business of snapshot.values()) {
        const isCompetitor = flags.get(business.id) ?? business.isCompetitor;
        insert.run(businessToRow({ ...business, isCompetitor }));
      }

      const finalized = this.finalizeScan(scan);
      const written = this.writeNotifications(notifications, finalized.id);
      return { scan: finalized, notifications: written };
    });

    try {
      const result = run();
      logger.info(
        `[SnapshotStore] Committed scan #${result.scan.id}: ${snapshot.size} businesses, ${result.notifications.length} notification(s)`,
      );
      return result;
    } catch (error: unknown) {
      throw this.storageFailure(`Commit of scan #${scan.id} failed`, error);
    }
  }

  /**
   * Finalize a scan as failed and record its system notice atomically.
   * The snapshot is not touched.
   */
  failScan(scan: ScanRecord, failure: ScanFailure, notification: NotificationDraft | null): CommitResult {
    const failed: ScanRecord = {
      ...scan,
      status: 'failed',
      finishedAt: this.clock.now(),
      errorCode: failure.code,
      errorMessage: failure.message,
    };

    const run = this.db.transaction((): CommitResult => {
      const finalized = this.finalizeScan(failed);
      const written = notification ? this.writeNotifications([notification], finalized.id) : [];
      return { scan: finalized, notifications: written };
    });

    try {
      return run();
    } catch (error: unknown) {
      throw this.storageFailure(`Could not record failure of scan #${scan.id}`, error);
    }
  }

  /** Close out scans left running by a process that died mid-scan. */
  recoverInterruptedScans(): number {
    const result = this.db
      .prepare<[string]>(`
        UPDATE scans
        SET status = 'failed', finished_at = ?, error_code = 'INTERRUPTED',
            error_message = 'Scan was interrupted by a restart'
        WHERE status = 'running'
      `)
      .run(this.clock.now().toISOString());

    if (result.changes > 0) {
      logger.warn(`[SnapshotStore] Marked ${result.changes} interrupted scan(s) as failed`);
    }
    return result.changes;
  }

  // ── Notifications ────────────────────────────────────────────────

  /** Upsert drafts outside a scan commit (still one transaction). */
  recordNotifications(drafts: readonly NotificationDraft[], scanId: number | null = null): Notification[] {
    const run = this.db.transaction(() => this.writeNotifications(drafts, scanId));
    try {
      return run();
    } catch (error: unknown) {
      throw this.storageFailure('Recording notifications failed', error);
    }
  }

  getOpenNotifications(): OpenNotificationIndex {
    const rows = this.db
      .prepare<[], NotificationRow>('SELECT * FROM notifications WHERE dismissed = 0')
      .all();
    const index = new Map<string, Notification>();
    for (const row of rows) {
      const notification = rowToNotification(row);
      index.set(openNotificationKey(notification.businessId, notification.kind), notification);
    }
    return index;
  }

  getNotification(id: number): Notification | null {
    const row = this.db
      .prepare<[number], NotificationRow>('SELECT * FROM notifications WHERE id = ?')
      .get(id);
    return row ? rowToNotification(row) : null;
  }

  listNotifications(filters: NotificationFilters = {}): Notification[] {
    const clauses: string[] = [];
    const params: SqlValue[] = [];

    if (!filters.includeDismissed) clauses.push('dismissed = 0');
    if (filters.unreadOnly) clauses.push('read = 0');
    if (filters.kind) {
      clauses.push('kind = ?');
      params.push(filters.kind);
    }
    if (filters.businessId) {
      clauses.push('business_id = ?');
      params.push(filters.businessId);
    }
    if (filters.sinceHours !== undefined) {
      clauses.push('updated_at >= ?');
      params.push(this.hoursAgo(filters.sinceHours));
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(filters.limit ?? DEFAULT_NOTIFICATION_LIMIT);

    return this.db
      .prepare<SqlValue[], NotificationRow>(
        `SELECT * FROM notifications ${where} ORDER BY updated_at DESC, id DESC LIMIT ?`,
      )
      .all(...params)
      .map(rowToNotification);
  }

  countUnread(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM notifications WHERE read = 0 AND dismissed = 0')
      .get();
    return row?.count ?? 0;
  }

  /** Counts over open notifications, with `recent` limited to the last `recentHours`. */
  notificationSummary(recentHours = 24): NotificationSummary {
    const rows = this.db
      .prepare<[string], { kind: string; open: number; unread: number; recent: number }>(`
        SELECT kind,
               COUNT(*) AS open,
               SUM(CASE WHEN read = 0 THEN 1 ELSE 0 END) AS unread,
               SUM(CASE WHEN updated_at >= ? THEN 1 ELSE 0 END) AS recent
        FROM notifications
        WHERE dismissed = 0
        GROUP BY kind
        ORDER BY kind
      `)
      .all(this.hoursAgo(recentHours));

    const summary: NotificationSummary = { open: 0, unread: 0, recent: 0, byKind: {} };
    for (const row of rows) {
      const kind = toNotificationKind(row.kind);
      summary.open += row.open;
      summary.unread += row.unread;
      summary.recent += row.recent;
      summary.byKind[kind] = (summary.byKind[kind] ?? 0) + row.open;
    }
    return summary;
  }

  markNotificationRead(id: number): Notification | null {
    const result = this.db.prepare<[number]>('UPDATE notifications SET read = 1 WHERE id = ?').run(id);
    return result.changes === 0 ? null : this.getNotification(id);
  }

  /** Dismissing closes the notification; the next matching event opens a fresh one. */
  dismissNotification(id: number): Notification | null {
    const result = this.db
      .prepare<[number]>('UPDATE notifications SET dismissed = 1, read = 1 WHERE id = ?')
      .run(id);
    return result.changes === 0 ? null : this.getNotification(id);
  }

  markAllNotificationsRead(): number {
    return this.db.prepare('UPDATE notifications SET read = 1 WHERE read = 0 AND dismissed = 0').run().changes;
  }

  // ── Internals (callers hold a transaction) ───────────────────────

  private finalizeScan(scan: ScanRecord): ScanRecord {
    const finishedAt = scan.finishedAt ?? this.clock.now();
    const result = this.db
      .prepare<[string, string, number, number, number, number, number, string | null, string | null, number]>(`
        UPDATE scans
        SET status = ?, finished_at = ?, businesses_fetched = ?, new_count = ?, changed_count = ?,
            removed_count = ?, malformed_count = ?, error_code = ?, error_message = ?
        WHERE id = ? AND status = 'running'
      `)
      .run(
        scan.status,
        finishedAt.toISOString(),
        scan.businessesFetched,
        scan.newCount,
        scan.changedCount,
        scan.removedCount,
        scan.malformedCount,
        scan.errorCode,
        scan.errorMessage,
        scan.id,
      );

    if (result.changes === 0) {
      throw new StorageError(`Scan #${scan.id} is not running and cannot be finalized`);
    }
    return { ...scan, finishedAt };
  }

  private writeNotifications(drafts: readonly NotificationDraft[], scanId: number | null): Notification[] {
    const now = this.clock.now().toISOString();
    const written: Notification[] = [];

    for (const draft of drafts) {
      const openId = draft.replaces ?? this.findOpenId(draft);
      const id = openId === null ? null : this.refresh(openId, draft, scanId, now);

      if (id !== null) {
        const refreshed = this.getNotification(id);
        if (refreshed) written.push(refreshed);
        continue;
      }

      const result = this.db
        .prepare<[string, string | null, number | null, string, string, string, string]>(`
          INSERT INTO notifications (kind, business_id, scan_id, title, message, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, ?)
        `)
        .run(draft.kind, draft.businessId, scanId, draft.title, draft.message, now, now);
      const created = this.getNotification(Number(result.lastInsertRowid));
      if (created) written.push(created);
    }

    return written;
  }

  private findOpenId(draft: NotificationDraft): number | null {
    const row = this.db
      .prepare<[string | null, string], { id: number }>(
        'SELECT id FROM notifications WHERE business_id IS ? AND kind = ? AND dismissed = 0',
      )
      .get(draft.businessId, draft.kind);
    return row?.id ?? null;
  }

  /** Returns the id when an open notification was refreshed, null if it was dismissed meanwhile. */
  private refresh(id: number, draft: NotificationDraft, scanId: number | null, now: string): number | null {
    const result = this.db
      .prepare<[string, string, number | null, string, number]>(`
        UPDATE notifications
        SET title = ?, message = ?, scan_id = ?, updated_at = ?, read = 0, occurrences = occurrences + 1
        WHERE id = ? AND dismissed = 0
      `)
      .run(draft.title, draft.message, scanId, now, id);
    return result.changes === 0 ? null : id;
  }

  private hoursAgo(hours: number): string {
    return new Date(this.clock.now().getTime() - hours * HOUR_MS).toISOString();
  }

  private storageFailure(message: string, error: unknown): StorageError {
    if (error instanceof StorageError) return error;
    logger.error(`[SnapshotStore] ${message}: ${toErrorMessage(error)}`);
    return new StorageError(`${message}: ${toErrorMessage(error)}`, error);
  }
}
