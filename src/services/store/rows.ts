import { z } from 'zod';
import { isBusinessCategory } from '../../config/categories.js';
import type { Business, PriceTier } from '../../types/business.types.js';
import type { Notification, NotificationKind } from '../../types/notification.types.js';
import type { ScanRecord, ScanStatus, ScanTrigger } from '../../types/scan.types.js';

export interface BusinessRow {
  id: string;
  name: string;
  category: string;
  category_labels: string;
  lat: number | null;
  lng: number | null;
  address: string | null;
  rating: number | null;
  review_count: number | null;
  popularity: number | null;
  price_tier: number | null;
  verified: number;
  hours: string | null;
  website: string | null;
  phone: string | null;
  is_competitor: number;
  first_seen_at: string;
  last_seen_at: string;
  missed_scans: number;
}

export interface ScanRow {
  id: number;
  trigger: string;
  status: string;
  started_at: string;
  finished_at: string | null;
  businesses_fetched: number;
  new_count: number;
  changed_count: number;
  removed_count: number;
  malformed_count: number;
  error_code: string | null;
  error_message: string | null;
}

export interface NotificationRow {
  id: number;
  kind: string;
  business_id: string | null;
  scan_id: number | null;
  title: string;
  message: string;
  created_at: string;
  updated_at: string;
  read: number;
  dismissed: number;
  occurrences: number;
}

const labelsSchema = z.array(z.string()).catch([]);

const NOTIFICATION_KINDS: readonly NotificationKind[] = [
  'new_business',
  'rating_changed',
  'trending_activity',
  'business_removed',
  'system_status',
];

function toPriceTier(value: number | null): PriceTier | null {
  switch (value) {
    case 1:
    case 2:
    case 3:
    case 4:
      return value;
    default:
      return null;
  }
}

function toTrigger(value: string): ScanTrigger {
  return value === 'manual' ? 'manual' : 'scheduled';
}

function toStatus(value: string): ScanStatus {
  switch (value) {
    case 'running':
    case 'success':
    case 'partial':
    case 'failed':
      return value;
    default:
      return 'failed';
  }
}

export function toNotificationKind(value: string): NotificationKind {
  return NOTIFICATION_KINDS.find((kind) => kind === value) ?? 'system_status';
}

function parseLabels(raw: string): string[] {
  try {
    return labelsSchema.parse(JSON.parse(raw));
  } catch {
    return [];
  }
}

export function rowToBusiness(row: BusinessRow): Business {
  return {
    id: row.id,
    name: row.name,
    category: isBusinessCategory(row.category) ? row.category : 'other',
    categoryLabels: parseLabels(row.category_labels),
    location: row.lat !== null && row.lng !== null ? { lat: row.lat, lng: row.lng } : null,
    address: row.address,
    rating: row.rating,
    reviewCount: row.review_count,
    popularity: row.popularity,
    priceTier: toPriceTier(row.price_tier),
    verified: row.verified === 1,
    hours: row.hours,
    website: row.website,
    phone: row.phone,
    isCompetitor: row.is_competitor === 1,
    firstSeenAt: new Date(row.first_seen_at),
    lastSeenAt: new Date(row.last_seen_at),
    missedScans: row.missed_scans,
  };
}

export function businessToRow(business: Business): BusinessRow {
  return {
    id: business.id,
    name: business.name,
    category: business.category,
    category_labels: JSON.stringify(business.categoryLabels),
    lat: business.location?.lat ?? null,
    lng: business.location?.lng ?? null,
    address: business.address,
    rating: business.rating,
    review_count: business.reviewCount,
    popularity: business.popularity,
    price_tier: business.priceTier,
    verified: business.verified ? 1 : 0,
    hours: business.hours,
    website: business.website,
    phone: business.phone,
    is_competitor: business.isCompetitor ? 1 : 0,
    first_seen_at: business.firstSeenAt.toISOString(),
    last_seen_at: business.lastSeenAt.toISOString(),
    missed_scans: business.missedScans,
  };
}

export function rowToScan(row: ScanRow): ScanRecord {
  return {
    id: row.id,
    trigger: toTrigger(row.trigger),
    status: toStatus(row.status),
    startedAt: new Date(row.started_at),
    finishedAt: row.finished_at === null ? null : new Date(row.finished_at),
    businessesFetched: row.businesses_fetched,
    newCount: row.new_count,
    changedCount: row.changed_count,
    removedCount: row.removed_count,
    malformedCount: row.malformed_count,
    errorCode: row.error_code,
    errorMessage: row.error_message,
  };
}

export function rowToNotification(row: NotificationRow): Notification {
  return {
    id: row.id,
    kind: toNotificationKind(row.kind),
    businessId: row.business_id,
    scanId: row.scan_id,
    title: row.title,
    message: row.message,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    read: row.read === 1,
    dismissed: row.dismissed === 1,
    occurrences: row.occurrences,
  };
}
