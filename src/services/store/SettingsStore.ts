import type { DatabaseConnection } from '../../config/database.js';
import { logger } from '../../config/logger.js';
import {
  mergeConfigPatch,
  monitoringConfigPatchSchema,
  monitoringConfigSchema,
  snapshotConfig,
  type MonitoringConfig,
} from '../../config/monitoring.js';
import { ValidationError, toErrorMessage } from '../../utils/errors.js';
import { systemClock, type Clock } from '../../utils/clock.js';

interface SettingsRow {
  config: string;
  updated_at: string;
}

/**
 * Operator monitoring settings, persisted as one JSON row.
 * Readers get frozen copies; a scan holds on to the copy it started with.
 */
export class SettingsStore {
  private cached: Readonly<MonitoringConfig> | undefined;

  constructor(
    private readonly db: DatabaseConnection,
    private readonly defaults: MonitoringConfig,
    private readonly clock: Clock = systemClock,
  ) {}

  get(): Readonly<MonitoringConfig> {
    if (this.cached) return this.cached;

    const row = this.db
      .prepare<[], SettingsRow>('SELECT config, updated_at FROM settings WHERE id = 1')
      .get();

    if (!row) {
      this.write(this.defaults);
      logger.info('[SettingsStore] Seeded monitoring settings from environment defaults');
      return this.remember(this.defaults);
    }

    const stored = this.parseStored(row.config);
    return this.remember(stored);
  }

  /**
   * Validate and merge a partial update. Nested objects (location, trending,
   * notify) are merged key by key.
   */
  update(patch: unknown): Readonly<MonitoringConfig> {
    const parsed = monitoringConfigPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', '),
      );
    }

    const merged = monitoringConfigSchema.safeParse(mergeConfigPatch(this.get(), parsed.data));
    if (!merged.success) {
      throw new ValidationError(
        merged.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', '),
      );
    }

    this.write(merged.data);
    logger.info(`[SettingsStore] Settings updated (${Object.keys(parsed.data).join(', ')})`);
    return this.remember(merged.data);
  }

  private parseStored(raw: string): MonitoringConfig {
    try {
      const result = monitoringConfigSchema.safeParse(JSON.parse(raw));
      if (result.success) return result.data;
      logger.warn('[SettingsStore] Stored settings failed validation, falling back to defaults');
    } catch (error: unknown) {
      logger.warn(`[SettingsStore] Stored settings are not valid JSON: ${toErrorMessage(error)}`);
    }
    return this.defaults;
  }

  private write(config: MonitoringConfig): void {
    this.db
      .prepare<[string, string]>(`
        INSERT INTO settings (id, config, updated_at) VALUES (1, ?, ?)
        ON CONFLICT (id) DO UPDATE SET config = excluded.config, updated_at = excluded.updated_at
      `)
      .run(JSON.stringify(config), this.clock.now().toISOString());
  }

  private remember(config: MonitoringConfig): Readonly<MonitoringConfig> {
    this.cached = snapshotConfig(config);
    return this.cached;
  }
}
