/**
 * Mediator Dispatch Layer -- Shared Types
 *
 * Request values are routed by their runtime constructor. Every request
 * flows through:
 *   Request → PipelineBehavior* → RequestHandler → Response
 * Notifications bypass behaviors and fan out to every bound handler.
 * Stream requests bypass behaviors and return the handler's sequence.
 */

import type { Unit } from './unit.js';

// ---------------------------------------------------------------------------
// Phantom type markers
// ---------------------------------------------------------------------------

declare const responseMarker: unique symbol;
declare const elementMarker: unique symbol;
declare const notificationMarker: unique symbol;

// ---------------------------------------------------------------------------
// Request flavors
// ---------------------------------------------------------------------------

/**
 * A request routed to exactly one handler, declaring its response type.
 *
 * Subclasses are plain immutable data; the class itself is the routing key.
 *
 * @example
 * ```typescript
 * class Echo extends Request<string> {
 *   constructor(readonly text: string) { super(); }
 * }
 * ```
 */
export abstract class Request<TResponse> {
  declare readonly [responseMarker]?: TResponse;
}

/**
 * A request with no meaningful result. Routed through the same pipeline
 * as queries, with `Unit` as its response type.
 */
export abstract class Command extends Request<Unit> {}

/**
 * A request that produces a lazy sequence of elements instead of a single value.
 */
export abstract class StreamRequest<TElement> {
  declare readonly [elementMarker]?: TElement;
}

/**
 * A value broadcast to zero or more handlers.
 */
export abstract class Notification {
  declare readonly [notificationMarker]?: true;
}

export type AnyRequest = Request<unknown>;
export type AnyStreamRequest = StreamRequest<unknown>;

/** Constructor of a request value; used as its routing key. */
export type RequestType<T> = new (...args: never[]) => T;

/** Declared response type of a request class. */
export type ResponseOf<T> = T extends Request<infer R> ? R : never;

/** Declared element type of a stream request class. */
export type ElementOf<T> = T extends StreamRequest<infer E> ? E : never;

// ---------------------------------------------------------------------------
// Handler contracts
// ---------------------------------------------------------------------------

export interface RequestHandler<TRequest extends AnyRequest, TResponse = ResponseOf<TRequest>> {
  handle(request: TRequest, signal: AbortSignal): Promise<TResponse> | TResponse;
}

export interface CommandHandler<TCommand extends Command> {
  handle(command: TCommand, signal: AbortSignal): Promise<void> | void;
}

export interface StreamRequestHandler<TRequest extends AnyStreamRequest, TElement = ElementOf<TRequest>> {
  handle(request: TRequest, signal: AbortSignal): AsyncIterable<TElement>;
}

export interface NotificationHandler<TNotification extends Notification> {
  handle(notification: TNotification, signal: AbortSignal): Promise<void> | void;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/** The rest of the pipeline, ending at the handler. */
export type RequestHandlerDelegate<TResponse> = () => Promise<TResponse>;

/**
 * Cross-cutting wrapper around handler execution.
 *
 * A behavior may call `next` once (pass-through), never (short-circuit),
 * or inspect and transform what it returns.
 */
export interface PipelineBehavior<TRequest extends AnyRequest = AnyRequest, TResponse = unknown> {
  handle(
    request: TRequest,
    next: RequestHandlerDelegate<TResponse>,
    signal: AbortSignal,
  ): Promise<TResponse>;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** One reported problem with a request field. Empty `field` means the whole request. */
export interface FieldError {
  field: string;
  message: string;
}

export interface Validator<TRequest extends AnyRequest = AnyRequest> {
  validate(request: TRequest, signal: AbortSignal): Promise<readonly FieldError[]> | readonly FieldError[];
}

// ---------------------------------------------------------------------------
// Caching
// ---------------------------------------------------------------------------

/** Eviction hint passed through to the cache store. */
export type CachePriority = 'low' | 'normal' | 'high' | 'never-remove';

/**
 * Descriptive cache data a query may carry for the caching behavior.
 */
export interface CacheableRequest {
  readonly cacheKey: string;
  readonly cacheExpirationMs: number;
  readonly cachePriority?: CachePriority;
}

export type CacheLookup =
  | { found: true; value: unknown }
  | { found: false };

export interface CacheEntryOptions {
  expirationMs: number;
  priority: CachePriority;
}

/** Key/value store with per-entry expiry. */
export interface CacheStore {
  tryGet(key: string): Promise<CacheLookup> | CacheLookup;
  set(key: string, value: unknown, options: CacheEntryOptions): Promise<void> | void;
}

// ---------------------------------------------------------------------------
// Dispatch options
// ---------------------------------------------------------------------------

export interface DispatchOptions {
  /** Cancellation signal threaded to every behavior and handler. */
  signal?: AbortSignal;
}

/** Returns a handler instance, or the factory producing one per resolution. */
export type Provider<T> = T | (() => T);
