/**
 * Caching Behavior
 *
 * Serves cacheable requests from a CacheStore. On a hit the continuation
 * is skipped. On a miss the continuation runs and only a successful
 * response is stored, under the request's expiration and priority.
 * Requests that carry no cache data pass straight through.
 */

import { getLogger, type Logger } from '../../core/logger.js';
import type {
  AnyRequest,
  CacheableRequest,
  CacheStore,
  PipelineBehavior,
  RequestHandlerDelegate,
} from '../types.js';

export const DEFAULT_CACHE_KEY_PREFIX = 'mediator:cache';

export interface CachingOptions {
  /** Namespace prefix of every derived key. */
  keyPrefix?: string;
  logger?: Logger;
}

/**
 * Whether a request carries the data the caching behavior needs.
 */
export function isCacheableRequest<T extends object>(request: T): request is T & CacheableRequest {
  if (!('cacheKey' in request) || !('cacheExpirationMs' in request)) return false;
  return typeof request.cacheKey === 'string' && typeof request.cacheExpirationMs === 'number';
}

/**
 * Derive the store key for a request: prefix, runtime type name and the
 * request's own key, joined by ':'. Keys are distinct only as far as class
 * names are: two classes with the same `name` (or two anonymous classes)
 * share entries.
 */
export function deriveCacheKey(
  request: AnyRequest & CacheableRequest,
  prefix: string = DEFAULT_CACHE_KEY_PREFIX,
): string {
  return `${prefix}:${request.constructor.name}:${request.cacheKey}`;
}

export class CachingBehavior implements PipelineBehavior {
  private store: CacheStore;
  private keyPrefix: string;
  private log: Logger;

  constructor(store: CacheStore, options: CachingOptions = {}) {
    this.store = store;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_CACHE_KEY_PREFIX;
    this.log = options.logger ?? getLogger('cache');
  }

  async handle(request: AnyRequest, next: RequestHandlerDelegate<unknown>): Promise<unknown> {
    if (!isCacheableRequest(request)) {
      return next();
    }

    const requestType = request.constructor.name;
    const key = deriveCacheKey(request, this.keyPrefix);

    const lookup = await this.store.tryGet(key);
    if (lookup.found) {
      this.log.debug({ requestType, cacheKey: request.cacheKey }, 'Cache hit');
      return lookup.value;
    }

    this.log.debug({ requestType, cacheKey: request.cacheKey }, 'Cache miss');
    const response = await next();

    await this.store.set(key, response, {
      expirationMs: request.cacheExpirationMs,
      priority: request.cachePriority ?? 'normal',
    });
    this.log.debug(
      { requestType, cacheKey: request.cacheKey, expirationMs: request.cacheExpirationMs },
      'Cached response',
    );
    return response;
  }
}

/**
 * Create a caching behavior backed by `store`.
 */
export function createCaching(store: CacheStore, options?: CachingOptions): PipelineBehavior {
  return new CachingBehavior(store, options);
}
