/**
 * Mediator -- Routes requests through pipeline behaviors to their handlers.
 *
 * The mediator is the single entry point for callers. It resolves handlers
 * from the registry, runs the behavior pipeline, and returns the result.
 *
 * Flow:
 *   send:    Request → behaviors (registration order) → handler → Response
 *   publish: Notification → every bound handler, concurrently
 *   stream:  StreamRequest → handler → lazy sequence
 *
 * The handler is resolved inside the terminal continuation, so a behavior
 * that short-circuits (e.g. a cache hit) never needs a handler to exist.
 */

import { getLogger, type Logger } from '../core/logger.js';
import { FanOutError } from '../core/errors.js';
import type { FanOutFailureMode } from '../types/config.js';
import { compose } from './middleware/pipeline.js';
import type { HandlerSource } from './registry.js';
import { toResult, type Result } from './lib/result.js';
import type {
  DispatchOptions,
  Notification,
  Request,
  StreamRequest,
} from './types.js';

export interface MediatorOptions {
  registry: HandlerSource;
  logger?: Logger;
  /** How publish reports failures; defaults to rethrowing the first-to-fail error. */
  publishFailureMode?: FanOutFailureMode;
}

/** Signal for calls made without one; it never aborts. */
const NEVER_ABORTED: AbortSignal = new AbortController().signal;

export class Mediator {
  private registry: HandlerSource;
  private log: Logger;
  private publishFailureMode: FanOutFailureMode;

  constructor(config: MediatorOptions) {
    this.registry = config.registry;
    this.log = config.logger ?? getLogger('mediator');
    this.publishFailureMode = config.publishFailureMode ?? 'first';
  }

  /**
   * Send a request (query or command) through the behavior pipeline to its
   * single handler. Commands resolve to `Unit.value`.
   *
   * @throws HandlerNotFoundError when the pipeline reaches a request type with no handler
   */
  async send<TResponse>(request: Request<TResponse>, options: DispatchOptions = {}): Promise<TResponse> {
    const signal = options.signal ?? NEVER_ABORTED;
    signal.throwIfAborted();

    const behaviors = this.registry.resolveBehaviors(request);
    const terminal = async (): Promise<unknown> =>
      this.registry.resolveOne(request).invoke(request, signal);

    const response = await compose(behaviors).handle(request, terminal, signal);
    // The binding registered for this request type produces its declared response.
    return response as TResponse;
  }

  /**
   * Like send, but reports failure as a Result instead of throwing.
   */
  trySend<TResponse>(request: Request<TResponse>, options: DispatchOptions = {}): Promise<Result<TResponse>> {
    return toResult(() => this.send(request, options));
  }

  /**
   * Broadcast a notification to every bound handler.
   *
   * All handlers start without waiting on each other. The call settles only
   * once every handler has settled; failures do not cancel siblings.
   */
  async publish(notification: Notification, options: DispatchOptions = {}): Promise<void> {
    const signal = options.signal ?? NEVER_ABORTED;
    signal.throwIfAborted();

    const notificationType = notification.constructor.name;
    const handlers = this.registry.resolveMany(notification);
    if (handlers.length === 0) {
      this.log.debug({ notificationType }, 'No handlers bound for notification');
      return;
    }

    // Failures in the order they occurred, not registration order.
    const failures: unknown[] = [];
    await Promise.all(handlers.map(async (handler) => {
      try {
        await handler.invoke(notification, signal);
      } catch (err) {
        failures.push(err);
      }
    }));

    if (failures.length === 0) return;

    this.log.warn(
      { notificationType, failed: failures.length, handlerCount: handlers.length },
      'Notification handlers failed',
    );
    if (this.publishFailureMode === 'aggregate') {
      throw new FanOutError(notificationType, failures, handlers.length);
    }
    throw failures[0];
  }

  /**
   * Open the lazy sequence produced by a stream request's handler.
   *
   * Behaviors do not apply. Aborting the signal ends the sequence at the
   * next element boundary, or immediately if the handler is waiting, and
   * asks the handler's iterator to close.
   *
   * @throws HandlerNotFoundError on first iteration when no handler is bound
   */
  async *stream<TElement>(
    request: StreamRequest<TElement>,
    options: DispatchOptions = {},
  ): AsyncGenerator<TElement, void, undefined> {
    const signal = options.signal ?? NEVER_ABORTED;
    signal.throwIfAborted();

    const binding = this.registry.resolveStream(request);
    const iterator = binding.invoke(request, signal)[Symbol.asyncIterator]();
    let settled = false;

    try {
      while (!signal.aborted) {
        const step = await nextOrAbort(iterator, signal);
        if (step === undefined) break;
        if (step.done) {
          settled = true;
          break;
        }
        // The binding registered for this request type yields its declared element type.
        yield step.value as TElement;
      }
    } catch (err) {
      settled = true;
      throw err;
    } finally {
      if (!settled) {
        this.release(iterator, binding.requestType);
      }
    }
  }

  /**
   * Ask an unfinished handler iterator to close. Not awaited: a handler
   * stuck mid-element would otherwise hold the caller.
   */
  private release(iterator: AsyncIterator<unknown>, requestType: string): void {
    void Promise.resolve()
      .then(() => iterator.return?.())
      .catch((err: unknown) => {
        this.log.warn({ err, requestType }, 'Stream handler failed while closing');
      });
  }
}

/**
 * Await the iterator's next element, resolving undefined if the signal
 * aborts first.
 */
function nextOrAbort<T>(
  iterator: AsyncIterator<T>,
  signal: AbortSignal,
): Promise<IteratorResult<T> | undefined> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(undefined);
    signal.addEventListener('abort', onAbort, { once: true });
    iterator.next().then(
      (step) => {
        signal.removeEventListener('abort', onAbort);
        resolve(step);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
