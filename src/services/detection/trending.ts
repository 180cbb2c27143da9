import type { Business } from '../../types/business.types.js';
import type { TrendingSignal } from '../../types/change.types.js';

/**
 * Looks at one business across two scans and reports a trending signal,
 * or null when the signal is absent on either side or below threshold.
 * Detectors never invent a value the directory did not report.
 */
export interface TrendingDetector {
  readonly signal: string;
  evaluate(previous: Business, current: Business): TrendingSignal | null;
}

function deltaDetector(
  signal: string,
  read: (business: Business) => number | null,
  threshold: number,
): TrendingDetector {
  return {
    signal,
    evaluate(previous, current) {
      const before = read(previous);
      const after = read(current);
      if (before === null || after === null) return null;
      const rise = after - before;
      if (rise <= 0 || rise < threshold) return null;
      return { signal, previous: before, current: after };
    },
  };
}

/** Rise of the 0–1 popularity score between consecutive scans */
export function popularityDetector(threshold: number): TrendingDetector {
  return deltaDetector('popularity', (business) => business.popularity, threshold);
}

/** New reviews gained between consecutive scans */
export function reviewCountDetector(threshold: number): TrendingDetector {
  return deltaDetector('review_count', (business) => business.reviewCount, threshold);
}

export interface TrendingThresholds {
  popularityDelta: number;
  reviewCountDelta: number;
}

export function defaultTrendingDetectors(thresholds: TrendingThresholds): TrendingDetector[] {
  return [
    popularityDetector(thresholds.popularityDelta),
    reviewCountDetector(thresholds.reviewCountDelta),
  ];
}
