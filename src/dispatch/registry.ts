/**
 * Handler Registry -- maps request types to the handlers, behaviors and
 * validators bound to them.
 *
 * Registration captures a type-erased invocation thunk while the concrete
 * request type is still known to the compiler, so dispatch needs no
 * runtime reflection: resolution is a Map lookup on the request's
 * constructor.
 *
 * Lifetimes: an instance is reused for every call; a factory is invoked
 * on every resolution.
 */

import { getLogger, type Logger } from '../core/logger.js';
import { HandlerNotFoundError } from '../core/errors.js';
import { Unit } from './unit.js';
import type {
  AnyRequest,
  AnyStreamRequest,
  Command,
  CommandHandler,
  Notification,
  NotificationHandler,
  PipelineBehavior,
  Provider,
  RequestHandler,
  RequestType,
  ResponseOf,
  ElementOf,
  StreamRequestHandler,
  Validator,
} from './types.js';

/** Type-erased handler invocation for one request type. */
export interface RequestHandlerBinding {
  readonly requestType: string;
  invoke(request: AnyRequest, signal: AbortSignal): Promise<unknown>;
}

/** Type-erased stream handler invocation for one stream request type. */
export interface StreamHandlerBinding {
  readonly requestType: string;
  invoke(request: AnyStreamRequest, signal: AbortSignal): AsyncIterable<unknown>;
}

/** Type-erased notification handler invocation. */
export interface NotificationHandlerBinding {
  invoke(notification: Notification, signal: AbortSignal): Promise<void>;
}

export interface BehaviorOptions {
  /** Restrict the behavior to these request types. Omit to apply to every request. */
  requestTypes?: ReadonlyArray<RequestType<AnyRequest>>;
}

/**
 * Lookup contract the mediator consumes.
 */
export interface HandlerSource {
  /** @throws HandlerNotFoundError when nothing is registered */
  resolveOne(request: AnyRequest): RequestHandlerBinding;
  /** @throws HandlerNotFoundError when nothing is registered */
  resolveStream(request: AnyStreamRequest): StreamHandlerBinding;
  /** Bound notification handlers in registration order; empty when none. */
  resolveMany(notification: Notification): NotificationHandlerBinding[];
  /** Applicable behaviors in registration order; empty when none. */
  resolveBehaviors(request: AnyRequest): PipelineBehavior[];
}

/**
 * Lookup contract the validation behavior consumes.
 */
export interface ValidatorSource {
  resolveValidators(request: AnyRequest): Validator[];
  /** Bumped on every validator registration. */
  readonly validatorGeneration: number;
}

interface BehaviorRegistration {
  provider: Provider<PipelineBehavior>;
  requestTypes: ReadonlySet<Function> | null;
}

function isFactory<T extends object>(provider: Provider<T>): provider is () => T {
  return typeof provider === 'function';
}

function resolveProvider<T extends object>(provider: Provider<T>): T {
  return isFactory(provider) ? provider() : provider;
}

function typeName(value: object): string {
  return value.constructor.name || 'AnonymousRequest';
}

/**
 * In-memory registry. Populate it at startup, then hand it to a Mediator.
 */
export class HandlerRegistry implements HandlerSource, ValidatorSource {
  private requestHandlers: Map<Function, RequestHandlerBinding> = new Map();
  private streamHandlers: Map<Function, StreamHandlerBinding> = new Map();
  private notificationHandlers: Map<Function, Map<object, Provider<NotificationHandler<Notification>>>> = new Map();
  private validators: Map<Function, Array<() => Validator>> = new Map();
  private validatorCount = 0;
  private behaviors: BehaviorRegistration[] = [];
  private behaviorCache: Map<Function, BehaviorRegistration[]> = new Map();
  private log: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.log = options.logger ?? getLogger('registry');
  }

  get validatorGeneration(): number {
    return this.validatorCount;
  }

  /**
   * Bind the handler for a request type. A later registration for the
   * same type replaces the earlier one.
   */
  addRequestHandler<TRequest extends AnyRequest>(
    type: RequestType<TRequest>,
    handler: Provider<RequestHandler<TRequest, ResponseOf<TRequest>>>,
  ): this {
    const requestType = type.name;
    this.bindRequest(type, {
      requestType,
      async invoke(request, signal) {
        if (!(request instanceof type)) {
          throw new TypeError(`Handler for ${requestType} received ${typeName(request)}`);
        }
        return resolveProvider(handler).handle(request, signal);
      },
    });
    return this;
  }

  /**
   * Bind the handler for a command type. The binding returns Unit once
   * the handler completes.
   */
  addCommandHandler<TCommand extends Command>(
    type: RequestType<TCommand>,
    handler: Provider<CommandHandler<TCommand>>,
  ): this {
    const requestType = type.name;
    this.bindRequest(type, {
      requestType,
      async invoke(request, signal) {
        if (!(request instanceof type)) {
          throw new TypeError(`Handler for ${requestType} received ${typeName(request)}`);
        }
        await resolveProvider(handler).handle(request, signal);
        return Unit.value;
      },
    });
    return this;
  }

  /**
   * Bind the handler for a stream request type.
   */
  addStreamHandler<TRequest extends AnyStreamRequest>(
    type: RequestType<TRequest>,
    handler: Provider<StreamRequestHandler<TRequest, ElementOf<TRequest>>>,
  ): this {
    const requestType = type.name;
    if (this.streamHandlers.has(type)) {
      this.log.warn({ requestType }, 'Replacing previously registered stream handler');
    }
    this.streamHandlers.set(type, {
      requestType,
      invoke(request, signal) {
        if (!(request instanceof type)) {
          throw new TypeError(`Handler for ${requestType} received ${typeName(request)}`);
        }
        return resolveProvider(handler).handle(request, signal);
      },
    });
    return this;
  }

  /**
   * Add a handler for a notification type. Registering the same provider
   * twice keeps a single entry.
   */
  addNotificationHandler<TNotification extends Notification>(
    type: RequestType<TNotification>,
    handler: Provider<NotificationHandler<TNotification>>,
  ): this {
    const providers = this.notificationHandlers.get(type)
      ?? new Map<object, Provider<NotificationHandler<Notification>>>();
    if (!providers.has(handler)) {
      providers.set(handler, eraseNotificationProvider(type, handler));
    }
    this.notificationHandlers.set(type, providers);
    return this;
  }

  /**
   * Append a pipeline behavior. Registration order is pipeline order:
   * the first behavior added is the outermost.
   */
  addBehavior(behavior: Provider<PipelineBehavior>, options: BehaviorOptions = {}): this {
    this.behaviors.push({
      provider: behavior,
      requestTypes: options.requestTypes ? new Set(options.requestTypes) : null,
    });
    this.behaviorCache.clear();
    return this;
  }

  /**
   * Add a validator for a request type.
   */
  addValidator<TRequest extends AnyRequest>(
    type: RequestType<TRequest>,
    validator: Provider<Validator<TRequest>>,
  ): this {
    const list = this.validators.get(type) ?? new Array<() => Validator>();
    list.push(() => {
      const instance = resolveProvider(validator);
      return {
        validate(request, signal) {
          if (!(request instanceof type)) {
            throw new TypeError(`Validator for ${type.name} received ${typeName(request)}`);
          }
          return instance.validate(request, signal);
        },
      };
    });
    this.validators.set(type, list);
    this.validatorCount++;
    return this;
  }

  resolveOne(request: AnyRequest): RequestHandlerBinding {
    const binding = this.requestHandlers.get(request.constructor);
    if (!binding) {
      throw new HandlerNotFoundError(typeName(request));
    }
    return binding;
  }

  resolveStream(request: AnyStreamRequest): StreamHandlerBinding {
    const binding = this.streamHandlers.get(request.constructor);
    if (!binding) {
      throw new HandlerNotFoundError(typeName(request), 'stream');
    }
    return binding;
  }

  resolveMany(notification: Notification): NotificationHandlerBinding[] {
    const providers = this.notificationHandlers.get(notification.constructor);
    if (!providers) return [];
    return [...providers.values()].map((provider): NotificationHandlerBinding => ({
      async invoke(value, signal) {
        await resolveProvider(provider).handle(value, signal);
      },
    }));
  }

  resolveBehaviors(request: AnyRequest): PipelineBehavior[] {
    const key = request.constructor;
    let applicable = this.behaviorCache.get(key);
    if (!applicable) {
      applicable = this.behaviors.filter((b) => b.requestTypes === null || b.requestTypes.has(key));
      this.behaviorCache.set(key, applicable);
    }
    return applicable.map((b) => resolveProvider(b.provider));
  }

  resolveValidators(request: AnyRequest): Validator[] {
    const list = this.validators.get(request.constructor) ?? [];
    return list.map((factory) => factory());
  }

  /** Whether a request or command handler is bound for this type. */
  hasHandler(type: RequestType<AnyRequest>): boolean {
    return this.requestHandlers.has(type);
  }

  /** Registration counts, for diagnostics. */
  getCounts(): { requests: number; streams: number; notifications: number; behaviors: number; validators: number } {
    let notifications = 0;
    for (const providers of this.notificationHandlers.values()) notifications += providers.size;
    let validators = 0;
    for (const list of this.validators.values()) validators += list.length;
    return {
      requests: this.requestHandlers.size,
      streams: this.streamHandlers.size,
      notifications,
      behaviors: this.behaviors.length,
      validators,
    };
  }

  private bindRequest(type: Function, binding: RequestHandlerBinding): void {
    if (this.requestHandlers.has(type)) {
      this.log.warn({ requestType: binding.requestType }, 'Replacing previously registered request handler');
    }
    this.requestHandlers.set(type, binding);
  }
}

/**
 * Wrap a typed notification provider so it can live in the erased map.
 */
function eraseNotificationProvider<TNotification extends Notification>(
  type: RequestType<TNotification>,
  handler: Provider<NotificationHandler<TNotification>>,
): Provider<NotificationHandler<Notification>> {
  const guard = (instance: NotificationHandler<TNotification>): NotificationHandler<Notification> => ({
    handle(notification, signal) {
      if (!(notification instanceof type)) {
        throw new TypeError(`Handler for ${type.name} received ${typeName(notification)}`);
      }
      return instance.handle(notification, signal);
    },
  });
  if (isFactory(handler)) {
    const factory = handler;
    return () => guard(factory());
  }
  return guard(handler);
}
