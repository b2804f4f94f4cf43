import { describe, it, expect } from 'vitest';
import {
  ConfigManager,
  createPlannerConfig,
  deepMerge,
  defaultPlannerConfig,
  validatePlannerConfig,
} from './config';
import { InvalidConfigError } from './errors';

describe('createPlannerConfig', () => {
  it('fills in defaults', () => {
    const config = createPlannerConfig({ timeZone: 'UTC' });
    expect(config).toEqual({
      timeZone: 'UTC',
      defaultGroup: 'personal',
      drag: { granularityMinutes: 15, precisionQuantumMs: 60_000, confineToDay: true },
      persistence: { calendarDir: null, cachePath: ':memory:', fingerprint: 'metadata' },
      notifications: { enabled: true, maxSleepMs: 3_600_000, anomalyToleranceMs: 120_000 },
      hooks: { postUpdate: null, postUpdateDelayMs: 5_000 },
      history: { maxDepth: 200 },
    });
  });

  it('does not share default objects between configs', () => {
    const a = defaultPlannerConfig();
    a.drag.granularityMinutes = 5;
    expect(defaultPlannerConfig().drag.granularityMinutes).toBe(15);
  });
});

describe('deepMerge', () => {
  it('merges section by section, later sources winning', () => {
    const merged = deepMerge(
      createPlannerConfig({ timeZone: 'UTC' }),
      { drag: { granularityMinutes: 30 } },
      { drag: { confineToDay: false }, hooks: { postUpdate: ['sync', '--quiet'] } }
    );
    expect(merged.drag).toEqual({
      granularityMinutes: 30,
      precisionQuantumMs: 60_000,
      confineToDay: false,
    });
    expect(merged.hooks.postUpdate).toEqual(['sync', '--quiet']);
    expect(merged.timeZone).toBe('UTC');
  });

  it('ignores undefined and honours null', () => {
    const base = createPlannerConfig({
      timeZone: 'UTC',
      persistence: { calendarDir: '/home/user/calendars' },
    });
    expect(deepMerge(base, { persistence: { calendarDir: undefined } }).persistence.calendarDir).toBe(
      '/home/user/calendars'
    );
    expect(deepMerge(base, { persistence: { calendarDir: null } }).persistence.calendarDir).toBeNull();
  });
});

describe('validatePlannerConfig', () => {
  it('accepts an empty override', () => {
    expect(validatePlannerConfig({})).toEqual([]);
  });

  it('lists every problem', () => {
    expect(
      validatePlannerConfig({
        timeZone: 'Nowhere/Special',
        defaultGroup: ' ',
        drag: { granularityMinutes: 7.5, precisionQuantumMs: 0 },
        persistence: { cachePath: '' },
        notifications: { maxSleepMs: -1, anomalyToleranceMs: Number.NaN },
        hooks: { postUpdate: [], postUpdateDelayMs: -5 },
        history: { maxDepth: 0 },
      })
    ).toEqual([
      'timeZone "Nowhere/Special" is not a known IANA time zone',
      'defaultGroup must be a non-empty string',
      'granularityMinutes must be an integer between 1 and 1440',
      'precisionQuantumMs must be a positive number',
      'cachePath must not be empty',
      'maxSleepMs must be a positive number',
      'anomalyToleranceMs must be a positive number',
      'postUpdate must name a command',
      'postUpdateDelayMs must be a non-negative number',
      'history.maxDepth must be a positive integer',
    ]);
  });

  it('rejects a granularity longer than a day', () => {
    expect(validatePlannerConfig({ drag: { granularityMinutes: 1441 } })).toEqual([
      'granularityMinutes must be an integer between 1 and 1440',
    ]);
  });

  it('rejects a maxSleepMs no timer can hold', () => {
    expect(validatePlannerConfig({ notifications: { maxSleepMs: 2_147_483_647 } })).toEqual([]);
    expect(validatePlannerConfig({ notifications: { maxSleepMs: 2_147_483_648 } })).toEqual([
      'maxSleepMs must be at most 2147483647',
    ]);
  });
});

describe('ConfigManager', () => {
  it('throws on an invalid initial config', () => {
    expect(() => new ConfigManager({ drag: { granularityMinutes: 0 } })).toThrow(
      InvalidConfigError
    );
  });

  it('hands out copies', () => {
    const manager = new ConfigManager({ timeZone: 'UTC' });
    manager.getConfig().drag.granularityMinutes = 1;
    expect(manager.getDragConfig().granularityMinutes).toBe(15);
  });

  it('applies valid updates and refuses invalid ones whole', () => {
    const manager = new ConfigManager({ timeZone: 'UTC' });
    manager.updateConfig({ drag: { granularityMinutes: 10 } });
    expect(manager.getDragConfig().granularityMinutes).toBe(10);

    let problems: string[] = [];
    try {
      manager.updateConfig({ defaultGroup: 'work', history: { maxDepth: -1 } });
    } catch (error) {
      if (error instanceof InvalidConfigError) problems = error.problems;
    }
    expect(problems).toEqual(['history.maxDepth must be a positive integer']);
    expect(manager.getConfig().defaultGroup).toBe('personal');
  });

  it('resets to defaults plus the given overrides', () => {
    const manager = new ConfigManager({ timeZone: 'UTC', defaultGroup: 'work' });
    manager.resetConfig({ timeZone: 'Europe/Paris' });
    expect(manager.getConfig().defaultGroup).toBe('personal');
    expect(manager.getConfig().timeZone).toBe('Europe/Paris');
  });
});
