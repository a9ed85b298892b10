/**
 * request-mediator
 *
 * In-process request routing: a typed request goes to its single handler
 * through an ordered chain of pipeline behaviors; notifications fan out to
 * every bound handler; stream requests return a lazy sequence.
 */

export * from './dispatch/index.js';
export * from './types/index.js';
export {
  MediatorError,
  HandlerNotFoundError,
  ValidationFailedError,
  FanOutError,
  RequestTimeoutError,
  ConfigError,
  type MediatorErrorOptions,
} from './core/errors.js';
export { loadConfig, getConfig, resetConfig, getConfigSource, DEFAULTS as CONFIG_DEFAULTS } from './core/config.js';
export {
  initLogger,
  getLogger,
  createLogger,
  closeLogger,
  type Logger,
  type LoggerConfig,
  type LogDestination,
} from './core/logger.js';
