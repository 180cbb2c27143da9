import type { BusinessCategory } from '../config/categories.js';

export interface GeoPoint {
  lat: number;
  lng: number;
}

export type PriceTier = 1 | 2 | 3 | 4;

/**
 * A tracked business as of the most recent committed scan.
 * `rating` is on a 0–5 scale with one decimal; null means the directory
 * did not report one.
 */
export interface Business {
  id: string;
  name: string;
  category: BusinessCategory;
  categoryLabels: string[];
  location: GeoPoint | null;
  address: string | null;
  rating: number | null;
  reviewCount: number | null;
  popularity: number | null;
  priceTier: PriceTier | null;
  verified: boolean;
  hours: string | null;
  website: string | null;
  phone: string | null;
  /** Operator-owned. Scans carry it forward and never set it. */
  isCompetitor: boolean;
  firstSeenAt: Date;
  lastSeenAt: Date;
  /** Consecutive scans in which the business was missing from the results */
  missedScans: number;
}

export type Snapshot = ReadonlyMap<string, Business>;

export interface BusinessFilters {
  category?: BusinessCategory;
  isCompetitor?: boolean;
  minRating?: number;
  search?: string;
  /** Only businesses within this many meters of `near` */
  withinMeters?: number;
  near?: GeoPoint;
}

export interface CompetitorSummary {
  totalCompetitors: number;
  averageRating: number | null;
  verifiedCompetitors: number;
  categoryBreakdown: Partial<Record<BusinessCategory, number>>;
  recentAdditions: number;
}
