/**
 * Central type exports.
 */

export { ErrorCode, getErrorCodeName, isRetryableCode } from './error-codes.js';
export type {
  LogLevel,
  FanOutFailureMode,
  LoggingConfig,
  PerformanceConfig,
  CacheConfig,
  PublishConfig,
  MediatorConfig,
  MediatorConfigOverrides,
  ConfigSource,
} from './config.js';
