/**
 * Mediator Dispatch Layer -- Public API
 *
 * Single entry point for the dispatch layer: request types, the registry,
 * the mediator and the reference behaviors.
 */

export { Mediator, type MediatorOptions } from './mediator.js';
export { MediatorBuilder, createMediator, type MediatorBuilderOptions } from './setup.js';
export {
  HandlerRegistry,
  type HandlerSource,
  type ValidatorSource,
  type BehaviorOptions,
  type RequestHandlerBinding,
  type StreamHandlerBinding,
  type NotificationHandlerBinding,
} from './registry.js';
export { Unit, isUnit } from './unit.js';
export { compose } from './middleware/pipeline.js';
export {
  PerformanceLoggingBehavior,
  createPerformanceLogging,
  DEFAULT_SLOW_REQUEST_THRESHOLD_MS,
  type PerformanceLoggingOptions,
} from './middleware/performance-logging.js';
export { ValidationBehavior, createValidation, type ValidationOptions } from './middleware/validation.js';
export {
  CachingBehavior,
  createCaching,
  deriveCacheKey,
  isCacheableRequest,
  DEFAULT_CACHE_KEY_PREFIX,
  type CachingOptions,
} from './middleware/caching.js';
export { TimeoutBehavior, createTimeout } from './middleware/timeout.js';
export { zodValidator } from './lib/zod-validator.js';
export { ok, fail, unwrap, toResult, type Result, type ResultError } from './lib/result.js';
export { Request, Command, StreamRequest, Notification } from './types.js';
export type {
  AnyRequest,
  AnyStreamRequest,
  RequestType,
  ResponseOf,
  ElementOf,
  RequestHandler,
  CommandHandler,
  StreamRequestHandler,
  NotificationHandler,
  RequestHandlerDelegate,
  PipelineBehavior,
  FieldError,
  Validator,
  CachePriority,
  CacheableRequest,
  CacheLookup,
  CacheEntryOptions,
  CacheStore,
  DispatchOptions,
  Provider,
} from './types.js';
