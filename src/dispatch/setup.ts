/**
 * Mediator setup -- fluent registration of handlers and behaviors.
 *
 * Behaviors are appended in call order, which is pipeline order:
 * call withValidation() before withCaching() to validate before serving
 * from cache.
 *
 * @example
 * ```typescript
 * const mediator = new MediatorBuilder()
 *   .withPerformanceLogging()
 *   .withValidation()
 *   .handle(Echo, { handle: (req) => req.text })
 *   .build();
 *
 * await mediator.send(new Echo('hi')); // 'hi'
 * ```
 */

import { getConfig } from '../core/config.js';
import { getLogger, type Logger } from '../core/logger.js';
import type { MediatorConfig } from '../types/config.js';
import { Mediator } from './mediator.js';
import { CachingBehavior } from './middleware/caching.js';
import { PerformanceLoggingBehavior } from './middleware/performance-logging.js';
import { TimeoutBehavior } from './middleware/timeout.js';
import { ValidationBehavior } from './middleware/validation.js';
import { HandlerRegistry, type BehaviorOptions } from './registry.js';
import type {
  AnyRequest,
  AnyStreamRequest,
  CacheStore,
  Command,
  CommandHandler,
  ElementOf,
  Notification,
  NotificationHandler,
  PipelineBehavior,
  Provider,
  RequestHandler,
  RequestType,
  ResponseOf,
  StreamRequestHandler,
  Validator,
} from './types.js';

export interface MediatorBuilderOptions {
  /** Resolved host configuration; defaults to getConfig(). */
  config?: MediatorConfig;
  /** Registry to populate; a fresh one by default. */
  registry?: HandlerRegistry;
  /** Base logger; behaviors get children of it. */
  logger?: Logger;
}

export class MediatorBuilder {
  readonly registry: HandlerRegistry;
  private config: MediatorConfig;
  private logger: Logger | undefined;

  constructor(options: MediatorBuilderOptions = {}) {
    this.logger = options.logger;
    this.config = options.config ?? getConfig();
    this.registry = options.registry ?? new HandlerRegistry({ logger: this.childLogger('registry') });
  }

  handle<TRequest extends AnyRequest>(
    type: RequestType<TRequest>,
    handler: Provider<RequestHandler<TRequest, ResponseOf<TRequest>>>,
  ): this {
    this.registry.addRequestHandler(type, handler);
    return this;
  }

  handleCommand<TCommand extends Command>(
    type: RequestType<TCommand>,
    handler: Provider<CommandHandler<TCommand>>,
  ): this {
    this.registry.addCommandHandler(type, handler);
    return this;
  }

  handleStream<TRequest extends AnyStreamRequest>(
    type: RequestType<TRequest>,
    handler: Provider<StreamRequestHandler<TRequest, ElementOf<TRequest>>>,
  ): this {
    this.registry.addStreamHandler(type, handler);
    return this;
  }

  on<TNotification extends Notification>(
    type: RequestType<TNotification>,
    handler: Provider<NotificationHandler<TNotification>>,
  ): this {
    this.registry.addNotificationHandler(type, handler);
    return this;
  }

  validate<TRequest extends AnyRequest>(
    type: RequestType<TRequest>,
    validator: Provider<Validator<TRequest>>,
  ): this {
    this.registry.addValidator(type, validator);
    return this;
  }

  /** Append a custom behavior. */
  use(behavior: Provider<PipelineBehavior>, options?: BehaviorOptions): this {
    this.registry.addBehavior(behavior, options);
    return this;
  }

  withPerformanceLogging(options: { slowRequestThresholdMs?: number } = {}): this {
    return this.use(new PerformanceLoggingBehavior({
      slowRequestThresholdMs: options.slowRequestThresholdMs ?? this.config.performance.slowRequestThresholdMs,
      logger: this.childLogger('performance'),
    }));
  }

  withValidation(): this {
    return this.use(new ValidationBehavior(this.registry, { logger: this.childLogger('validation') }));
  }

  withCaching(store: CacheStore, options: { keyPrefix?: string } = {}): this {
    return this.use(new CachingBehavior(store, {
      keyPrefix: options.keyPrefix ?? this.config.cache.keyPrefix,
      logger: this.childLogger('cache'),
    }));
  }

  withTimeout(timeoutMs: number, options?: BehaviorOptions): this {
    return this.use(new TimeoutBehavior(timeoutMs), options);
  }

  build(): Mediator {
    return new Mediator({
      registry: this.registry,
      logger: this.childLogger('mediator'),
      publishFailureMode: this.config.publish.failureMode,
    });
  }

  private childLogger(subsystem: string): Logger {
    return this.logger ? this.logger.child({ subsystem }) : getLogger(subsystem);
  }
}

/**
 * Build a mediator over an already-populated registry.
 */
export function createMediator(registry: HandlerRegistry, options: Omit<MediatorBuilderOptions, 'registry'> = {}): Mediator {
  return new MediatorBuilder({ ...options, registry }).build();
}
