import type { Business } from './business.types.js';

export type ChangeKind =
  | 'new_business'
  | 'rating_changed'
  | 'trending_activity'
  | 'business_removed';

export interface TrendingSignal {
  /** Which detector fired, e.g. 'popularity' or 'review_count' */
  signal: string;
  previous: number;
  current: number;
}

interface ChangeEventBase<K extends ChangeKind> {
  kind: K;
  businessId: string;
  /** Latest record, or the last known one for removals */
  business: Business;
  detectedAt: Date;
}

export interface NewBusinessEvent extends ChangeEventBase<'new_business'> {
  oldValue: null;
  newValue: null;
}

export interface RatingChangedEvent extends ChangeEventBase<'rating_changed'> {
  oldValue: number;
  newValue: number;
}

export interface TrendingActivityEvent extends ChangeEventBase<'trending_activity'> {
  oldValue: number;
  newValue: number;
  signal: string;
}

export interface BusinessRemovedEvent extends ChangeEventBase<'business_removed'> {
  oldValue: null;
  newValue: null;
}

export type ChangeEvent =
  | NewBusinessEvent
  | RatingChangedEvent
  | TrendingActivityEvent
  | BusinessRemovedEvent;
