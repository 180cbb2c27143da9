import type { Clock } from '../utils/clock.js';
import type { Business } from '../types/business.types.js';
import { openDatabase, type DatabaseConnection } from '../config/database.js';
import { monitoringConfigSchema, type MonitoringConfig, type MonitoringConfigInput } from '../config/monitoring.js';

export const T0 = new Date('2026-03-02T09:00:00.000Z');

/**
 * Clock whose sleeps complete immediately by moving time forward.
 * Every requested sleep is recorded in `sleeps`.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      return Promise.reject(error);
    }
    this.sleeps.push(ms);
    this.current += ms;
    return Promise.resolve();
  }
}

export function makeBusiness(overrides: Partial<Business> & { id: string }): Business {
  return {
    name: `Business ${overrides.id}`,
    category: 'cafe',
    categoryLabels: ['Coffee Shop'],
    location: { lat: 40.7128, lng: -74.006 },
    address: '1 Test Street',
    rating: 4.0,
    reviewCount: 100,
    popularity: 0.5,
    priceTier: 2,
    verified: false,
    hours: null,
    website: null,
    phone: null,
    isCompetitor: false,
    firstSeenAt: T0,
    lastSeenAt: T0,
    missedScans: 0,
    ...overrides,
  };
}

export function snapshotOf(...businesses: Business[]): Map<string, Business> {
  return new Map(businesses.map((business) => [business.id, business]));
}

export function makeConfig(overrides: Partial<MonitoringConfigInput> = {}): MonitoringConfig {
  return monitoringConfigSchema.parse({
    location: { lat: 40.7128, lng: -74.006 },
    radiusMeters: 1000,
    scanIntervalMinutes: 60,
    ...overrides,
  });
}

export function memoryDatabase(): DatabaseConnection {
  return openDatabase(':memory:');
}

/** Raw directory record in the upstream shape (0–10 ratings). */
export function placeRecord(
  id: string,
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    fsq_id: id,
    name: `Place ${id}`,
    categories: [{ name: 'Coffee Shop' }],
    geocodes: { main: { latitude: 40.713, longitude: -74.0061 } },
    location: { formatted_address: `${id} Main St` },
    rating: 8.4,
    stats: { total_ratings: 120 },
    popularity: 0.62,
    price: 2,
    verified: true,
    ...overrides,
  };
}

/** A promise the test opens by hand. */
export class Gate {
  readonly opened: Promise<void>;
  private release: (() => void) | null = null;

  constructor() {
    this.opened = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  open(): void {
    this.release?.();
  }
}
