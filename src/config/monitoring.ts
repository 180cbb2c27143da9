import { z } from 'zod';
import type { Environment } from './environment.js';

export const notifyTogglesSchema = z.object({
  newBusiness: z.boolean().default(true),
  ratingChanged: z.boolean().default(true),
  trendingActivity: z.boolean().default(true),
  businessRemoved: z.boolean().default(true),
  systemStatus: z.boolean().default(true),
});

export const trendingSchema = z.object({
  /** Minimum rise of the 0–1 popularity signal between two scans */
  popularityDelta: z.number().positive().max(1).default(0.15),
  /** Minimum number of new reviews between two scans */
  reviewCountDelta: z.number().int().positive().default(25),
});

export const monitoringConfigSchema = z.object({
  businessName: z.string().default(''),
  location: z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
  }),
  radiusMeters: z.number().int().min(100).max(5000),
  scanIntervalMinutes: z.number().int().min(15),
  /** Directory category IDs passed through to the places search */
  placeCategoryIds: z.array(z.string().min(1)).default([]),
  includeCategories: z.array(z.string().min(1)).default([]),
  excludeCategories: z.array(z.string().min(1)).default([]),
  minRating: z.number().min(0).max(5).nullable().default(null),
  ratingChangeThreshold: z.number().min(0).max(5).default(0.3),
  removalGraceScans: z.number().int().min(1).max(10).default(2),
  trending: trendingSchema.default({}),
  notify: notifyTogglesSchema.default({}),
  repeatedAlerts: z.enum(['update', 'suppress']).default('update'),
  resultLimit: z.number().int().min(1).max(50).default(50),
  enabled: z.boolean().default(true),
});

export type MonitoringConfig = z.infer<typeof monitoringConfigSchema>;
export type MonitoringConfigInput = z.input<typeof monitoringConfigSchema>;
export type NotifyToggles = MonitoringConfig['notify'];

/** Partial settings update; nested objects are merged, not replaced. */
export const monitoringConfigPatchSchema = monitoringConfigSchema
  .extend({
    location: monitoringConfigSchema.shape.location.partial(),
    trending: trendingSchema.partial(),
    notify: notifyTogglesSchema.partial(),
  })
  .partial()
  .strict();

export type MonitoringConfigPatch = z.infer<typeof monitoringConfigPatchSchema>;

export function defaultMonitoringConfig(env: Environment): MonitoringConfig {
  return monitoringConfigSchema.parse({
    location: { lat: env.DEFAULT_LATITUDE, lng: env.DEFAULT_LONGITUDE },
    radiusMeters: env.DEFAULT_RADIUS_METERS,
    scanIntervalMinutes: env.DEFAULT_SCAN_INTERVAL_MINUTES,
  });
}

/**
 * Overlay a patch on the current config. Nested objects are merged key by
 * key; the result still has to pass `monitoringConfigSchema`.
 */
export function mergeConfigPatch(current: MonitoringConfig, patch: MonitoringConfigPatch): MonitoringConfigInput {
  return {
    ...current,
    ...patch,
    location: { ...current.location, ...patch.location },
    trending: { ...current.trending, ...patch.trending },
    notify: { ...current.notify, ...patch.notify },
  };
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Copy and freeze a config so a running scan never observes later edits.
 */
export function snapshotConfig(config: MonitoringConfig): Readonly<MonitoringConfig> {
  return deepFreeze(structuredClone(config));
}
