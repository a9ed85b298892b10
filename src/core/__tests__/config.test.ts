/**
 * Tests for the mediator config engine.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULTS, getConfig, getConfigSource, loadConfig, resetConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('returns defaults when nothing is set', () => {
    expect(loadConfig({}, {})).toEqual(DEFAULTS);
    expect(DEFAULTS.performance.slowRequestThresholdMs).toBe(500);
    expect(DEFAULTS.cache.keyPrefix).toBe('mediator:cache');
    expect(DEFAULTS.publish.failureMode).toBe('first');
  });

  it('reads environment variables', () => {
    const config = loadConfig({}, {
      MEDIATOR_LOG_LEVEL: 'debug',
      MEDIATOR_SLOW_REQUEST_THRESHOLD_MS: '250',
      MEDIATOR_CACHE_KEY_PREFIX: 'orders',
      MEDIATOR_PUBLISH_FAILURE_MODE: 'aggregate',
    });

    expect(config).toEqual({
      logging: { level: 'debug' },
      performance: { slowRequestThresholdMs: 250 },
      cache: { keyPrefix: 'orders' },
      publish: { failureMode: 'aggregate' },
    });
  });

  it('keeps numeric-looking strings for string fields', () => {
    const config = loadConfig({}, { MEDIATOR_CACHE_KEY_PREFIX: '2024' });

    expect(config.cache.keyPrefix).toBe('2024');
  });

  it('rejects a fractional threshold', () => {
    expect(() => loadConfig({}, { MEDIATOR_SLOW_REQUEST_THRESHOLD_MS: '2.5' })).toThrow(
      /performance\.slowRequestThresholdMs/,
    );
  });

  it('lets overrides win over environment variables', () => {
    const config = loadConfig(
      { performance: { slowRequestThresholdMs: 100 } },
      { MEDIATOR_SLOW_REQUEST_THRESHOLD_MS: '250', MEDIATOR_LOG_LEVEL: 'warn' },
    );

    expect(config.performance.slowRequestThresholdMs).toBe(100);
    expect(config.logging.level).toBe('warn');
  });

  it('keeps sibling defaults when overriding one key of a section', () => {
    const config = loadConfig({ logging: {} }, {});

    expect(config.logging.level).toBe('info');
  });

  it('rejects invalid values with a ConfigError naming the field', () => {
    let caught: unknown;
    try {
      loadConfig({}, { MEDIATOR_SLOW_REQUEST_THRESHOLD_MS: 'soon' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.errorCode).toBe('E_CONFIG_INVALID');
    expect(caught.message).toMatch(/^Invalid mediator configuration: performance\.slowRequestThresholdMs: /);
    expect(caught.details?.['issues']).toHaveLength(1);
  });

  it('rejects an unknown failure mode', () => {
    expect(() => loadConfig({}, { MEDIATOR_PUBLISH_FAILURE_MODE: 'ignore' })).toThrow(
      /publish\.failureMode/,
    );
  });
});

describe('getConfigSource', () => {
  it('reports where a value comes from', () => {
    const env = { MEDIATOR_LOG_LEVEL: 'debug' };
    const overrides = { cache: { keyPrefix: 'x' } };

    expect(getConfigSource('cache.keyPrefix', overrides, env)).toBe('override');
    expect(getConfigSource('logging.level', overrides, env)).toBe('env');
    expect(getConfigSource('publish.failureMode', overrides, env)).toBe('default');
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('memoizes until reset', () => {
    const first = getConfig();

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
