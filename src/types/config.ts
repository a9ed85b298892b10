/**
 * Configuration type definitions for the mediator host.
 * Covers logging, behavior defaults and fan-out policy.
 */

/** pino level names accepted by logging.level. */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** How publish reports handler failures once every handler has settled. */
export type FanOutFailureMode = 'first' | 'aggregate';

/** Logging configuration. */
export interface LoggingConfig {
  level: LogLevel;
}

/** Performance logging behavior configuration. */
export interface PerformanceConfig {
  /** Elapsed time (ms) at or above which a request is logged as slow. */
  slowRequestThresholdMs: number;
}

/** Caching behavior configuration. */
export interface CacheConfig {
  /** Namespace prefix of every derived cache key. */
  keyPrefix: string;
}

/** Notification fan-out configuration. */
export interface PublishConfig {
  failureMode: FanOutFailureMode;
}

/** Fully-resolved mediator configuration. */
export interface MediatorConfig {
  logging: LoggingConfig;
  performance: PerformanceConfig;
  cache: CacheConfig;
  publish: PublishConfig;
}

/** Partial overrides, one level deep. */
export type MediatorConfigOverrides = {
  [K in keyof MediatorConfig]?: Partial<MediatorConfig[K]>;
};

/** Where a resolved value came from. */
export type ConfigSource = 'default' | 'env' | 'override';
