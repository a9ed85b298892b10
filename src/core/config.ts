/**
 * Configuration engine for the mediator host.
 *
 * Resolution priority: explicit overrides > environment vars > defaults.
 * The merged result is validated against a zod schema. Environment values
 * stay strings; numeric fields coerce them.
 */

import { z } from 'zod';
import type { ConfigSource, MediatorConfig, MediatorConfigOverrides } from '../types/config.js';
import { ConfigError } from './errors.js';

/** Default configuration values. */
export const DEFAULTS: MediatorConfig = {
  logging: {
    level: 'info',
  },
  performance: {
    slowRequestThresholdMs: 500,
  },
  cache: {
    keyPrefix: 'mediator:cache',
  },
  publish: {
    failureMode: 'first',
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  MEDIATOR_LOG_LEVEL: 'logging.level',
  MEDIATOR_SLOW_REQUEST_THRESHOLD_MS: 'performance.slowRequestThresholdMs',
  MEDIATOR_CACHE_KEY_PREFIX: 'cache.keyPrefix',
  MEDIATOR_PUBLISH_FAILURE_MODE: 'publish.failureMode',
};

const ConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  }),
  performance: z.object({
    slowRequestThresholdMs: z.coerce.number().int().nonnegative(),
  }),
  cache: z.object({
    keyPrefix: z.string().min(1),
  }),
  publish: z.object({
    failureMode: z.enum(['first', 'aggregate']),
  }),
});

type RawConfig = Record<string, Record<string, unknown>>;

function splitPath(path: string): [string, string] {
  const [section = '', key = ''] = path.split('.');
  return [section, key];
}

function toRaw(config: MediatorConfig): RawConfig {
  return {
    logging: { ...config.logging },
    performance: { ...config.performance },
    cache: { ...config.cache },
    publish: { ...config.publish },
  };
}

function applyOverrides(raw: RawConfig, overrides: MediatorConfigOverrides): void {
  for (const [section, values] of Object.entries(overrides)) {
    if (!values) continue;
    raw[section] = { ...raw[section], ...values };
  }
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < environment vars < overrides
 *
 * @throws ConfigError when the merged configuration is invalid
 */
export function loadConfig(
  overrides: MediatorConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): MediatorConfig {
  const merged = toRaw(DEFAULTS);

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined) {
      const [section, key] = splitPath(configPath);
      merged[section] = { ...merged[section], [key]: envValue };
    }
  }

  applyOverrides(merged, overrides);

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid mediator configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join('; ')}`,
      issues,
    );
  }
  return parsed.data;
}

/**
 * Report which source a config path resolves from.
 */
export function getConfigSource(
  path: string,
  overrides: MediatorConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ConfigSource {
  const [section, key] = splitPath(path);
  const sectionOverrides = Object.entries(overrides).find(([name]) => name === section)?.[1];
  if (sectionOverrides && Object.entries(sectionOverrides).some(([name, value]) => name === key && value !== undefined)) {
    return 'override';
  }
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    if (configPath === path && env[envKey] !== undefined) return 'env';
  }
  return 'default';
}

let cachedConfig: MediatorConfig | null = null;

/**
 * Get the process-wide configuration, loading it on first use.
 */
export function getConfig(): MediatorConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Drop the memoized configuration (tests, reloads).
 */
export function resetConfig(): void {
  cachedConfig = null;
}
