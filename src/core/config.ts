import { DeepPartial, PlannerConfig } from '../types';
import { InvalidConfigError } from './errors';
import { MAX_TIMER_DELAY_MS, isValidTimeZone, systemTimeZone } from '../utils/temporal';

const HOUR_MS = 60 * 60 * 1000;

export const defaultDragConfig = {
  granularityMinutes: 15,
  precisionQuantumMs: 60_000,
  confineToDay: true,
};

export const defaultPersistenceConfig: PlannerConfig['persistence'] = {
  calendarDir: null,
  cachePath: ':memory:',
  fingerprint: 'metadata',
};

export const defaultNotificationConfig = {
  enabled: true,
  maxSleepMs: HOUR_MS,
  anomalyToleranceMs: 2 * 60 * 1000,
};

export const defaultHookConfig: PlannerConfig['hooks'] = {
  postUpdate: null,
  postUpdateDelayMs: 5_000,
};

export function defaultPlannerConfig(): PlannerConfig {
  return {
    timeZone: systemTimeZone(),
    defaultGroup: 'personal',
    drag: { ...defaultDragConfig },
    persistence: { ...defaultPersistenceConfig },
    notifications: { ...defaultNotificationConfig },
    hooks: { ...defaultHookConfig },
    history: { maxDepth: 200 },
  };
}

function definedOnly<T extends object>(patch: Partial<T>): Partial<T> {
  const out: Partial<T> = {};
  for (const key in patch) {
    if (patch[key] !== undefined) out[key] = patch[key];
  }
  return out;
}

function mergeSection<T extends object>(base: T, patch?: Partial<T>): T {
  return patch ? { ...base, ...definedOnly(patch) } : { ...base };
}

/**
 * Merge sources into target section by section. Arrays and null replace;
 * undefined leaves the target value alone.
 */
export function deepMerge(
  target: PlannerConfig,
  ...sources: DeepPartial<PlannerConfig>[]
): PlannerConfig {
  return sources.reduce<PlannerConfig>(
    (merged, source) => ({
      timeZone: source.timeZone ?? merged.timeZone,
      defaultGroup: source.defaultGroup ?? merged.defaultGroup,
      drag: mergeSection(merged.drag, source.drag),
      persistence: mergeSection(merged.persistence, source.persistence),
      notifications: mergeSection(merged.notifications, source.notifications),
      hooks: mergeSection(merged.hooks, source.hooks),
      history: mergeSection(merged.history, source.history),
    }),
    target
  );
}

export function createPlannerConfig(
  overrides?: DeepPartial<PlannerConfig>
): PlannerConfig {
  return deepMerge(defaultPlannerConfig(), overrides ?? {});
}

const isPositiveNumber = (value: unknown): boolean =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

// Configuration validation function
export function validatePlannerConfig(
  config: DeepPartial<PlannerConfig>
): string[] {
  const errors: string[] = [];

  if (config.timeZone !== undefined && !isValidTimeZone(config.timeZone)) {
    errors.push(`timeZone "${config.timeZone}" is not a known IANA time zone`);
  }

  if (config.defaultGroup !== undefined && config.defaultGroup.trim() === '') {
    errors.push('defaultGroup must be a non-empty string');
  }

  if (config.drag) {
    const { drag } = config;
    if (
      drag.granularityMinutes !== undefined &&
      (!Number.isInteger(drag.granularityMinutes) ||
        drag.granularityMinutes <= 0 ||
        drag.granularityMinutes > 24 * 60)
    ) {
      errors.push('granularityMinutes must be an integer between 1 and 1440');
    }
    if (
      drag.precisionQuantumMs !== undefined &&
      !isPositiveNumber(drag.precisionQuantumMs)
    ) {
      errors.push('precisionQuantumMs must be a positive number');
    }
  }

  if (config.persistence) {
    const { persistence } = config;
    if (persistence.cachePath !== undefined && persistence.cachePath === '') {
      errors.push('cachePath must not be empty');
    }
    if (
      persistence.fingerprint !== undefined &&
      persistence.fingerprint !== 'metadata' &&
      persistence.fingerprint !== 'content-hash'
    ) {
      errors.push('fingerprint must be "metadata" or "content-hash"');
    }
  }

  if (config.notifications) {
    const { notifications } = config;
    if (
      notifications.maxSleepMs !== undefined &&
      !isPositiveNumber(notifications.maxSleepMs)
    ) {
      errors.push('maxSleepMs must be a positive number');
    } else if (
      notifications.maxSleepMs !== undefined &&
      notifications.maxSleepMs > MAX_TIMER_DELAY_MS
    ) {
      errors.push(`maxSleepMs must be at most ${MAX_TIMER_DELAY_MS}`);
    }
    if (
      notifications.anomalyToleranceMs !== undefined &&
      !isPositiveNumber(notifications.anomalyToleranceMs)
    ) {
      errors.push('anomalyToleranceMs must be a positive number');
    }
  }

  if (config.hooks) {
    const { hooks } = config;
    if (hooks.postUpdate && hooks.postUpdate.length === 0) {
      errors.push('postUpdate must name a command');
    }
    if (
      hooks.postUpdateDelayMs !== undefined &&
      (typeof hooks.postUpdateDelayMs !== 'number' || hooks.postUpdateDelayMs < 0)
    ) {
      errors.push('postUpdateDelayMs must be a non-negative number');
    }
  }

  if (
    config.history?.maxDepth !== undefined &&
    (!Number.isInteger(config.history.maxDepth) || config.history.maxDepth < 1)
  ) {
    errors.push('history.maxDepth must be a positive integer');
  }

  return errors;
}

export class ConfigManager {
  private config: PlannerConfig;

  constructor(initialConfig?: DeepPartial<PlannerConfig>) {
    this.config = ConfigManager.build(initialConfig);
  }

  private static build(overrides?: DeepPartial<PlannerConfig>): PlannerConfig {
    const errors = validatePlannerConfig(overrides ?? {});
    if (errors.length > 0) {
      throw new InvalidConfigError(errors);
    }
    return createPlannerConfig(overrides);
  }

  getConfig(): PlannerConfig {
    return structuredClone(this.config);
  }

  getDragConfig(): PlannerConfig['drag'] {
    return this.config.drag;
  }

  updateConfig(updates: DeepPartial<PlannerConfig>): void {
    const errors = validatePlannerConfig(updates);
    if (errors.length > 0) {
      throw new InvalidConfigError(errors);
    }
    this.config = deepMerge(this.config, updates);
  }

  resetConfig(newConfig?: DeepPartial<PlannerConfig>): void {
    this.config = ConfigManager.build(newConfig);
  }
}
