import { describe, it, expect } from 'vitest';
import {
  defaultMonitoringConfig,
  mergeConfigPatch,
  monitoringConfigPatchSchema,
  monitoringConfigSchema,
  snapshotConfig,
} from '../monitoring.js';
import { getEnv } from '../environment.js';
import { makeConfig } from '../../test/fakes.js';

describe('monitoringConfigSchema', () => {
  it('fills in defaults', () => {
    const config = makeConfig();
    expect(config).toMatchObject({
      ratingChangeThreshold: 0.3,
      removalGraceScans: 2,
      minRating: null,
      repeatedAlerts: 'update',
      resultLimit: 50,
      enabled: true,
      trending: { popularityDelta: 0.15, reviewCountDelta: 25 },
    });
    expect(Object.values(config.notify).every(Boolean)).toBe(true);
  });

  it.each([
    ['radius below 100 m', { radiusMeters: 99 }],
    ['radius above 5 km', { radiusMeters: 5001 }],
    ['interval under 15 minutes', { scanIntervalMinutes: 10 }],
    ['threshold above 5', { ratingChangeThreshold: 6 }],
    ['grace of zero scans', { removalGraceScans: 0 }],
  ])('rejects %s', (_label, overrides) => {
    const result = monitoringConfigSchema.safeParse({ ...makeConfig(), ...overrides });
    expect(result.success).toBe(false);
  });
});

describe('defaultMonitoringConfig', () => {
  it('takes location, radius and interval from the environment', () => {
    const env = getEnv();
    expect(defaultMonitoringConfig(env)).toMatchObject({
      location: { lat: env.DEFAULT_LATITUDE, lng: env.DEFAULT_LONGITUDE },
      radiusMeters: env.DEFAULT_RADIUS_METERS,
      scanIntervalMinutes: env.DEFAULT_SCAN_INTERVAL_MINUTES,
    });
  });
});

describe('mergeConfigPatch', () => {
  it('keeps untouched nested keys', () => {
    const patch = monitoringConfigPatchSchema.parse({ trending: { reviewCountDelta: 40 } });
    const merged = monitoringConfigSchema.parse(mergeConfigPatch(makeConfig(), patch));
    expect(merged.trending).toEqual({ popularityDelta: 0.15, reviewCountDelta: 40 });
  });
});

describe('snapshotConfig', () => {
  it('is a deep frozen copy', () => {
    const config = makeConfig({ includeCategories: ['pizza'] });
    const frozen = snapshotConfig(config);
    config.includeCategories.push('sushi');

    expect(frozen.includeCategories).toEqual(['pizza']);
    expect(Object.isFrozen(frozen.includeCategories)).toBe(true);
  });
});
