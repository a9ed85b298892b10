/**
 * Performance Logging Behavior
 *
 * Measures wall-clock time around the rest of the pipeline. Requests
 * under the threshold log at info, at or above it at warn. A failure is
 * logged at error with the elapsed time and rethrown unchanged.
 */

import { performance } from 'node:perf_hooks';
import { getLogger, type Logger } from '../../core/logger.js';
import type { AnyRequest, PipelineBehavior, RequestHandlerDelegate } from '../types.js';

export const DEFAULT_SLOW_REQUEST_THRESHOLD_MS = 500;

export interface PerformanceLoggingOptions {
  /** Elapsed ms at or above which a request is logged as slow. */
  slowRequestThresholdMs?: number;
  logger?: Logger;
  /** Clock in milliseconds; injectable for tests. */
  now?: () => number;
}

export class PerformanceLoggingBehavior implements PipelineBehavior {
  private thresholdMs: number;
  private log: Logger;
  private now: () => number;

  constructor(options: PerformanceLoggingOptions = {}) {
    this.thresholdMs = options.slowRequestThresholdMs ?? DEFAULT_SLOW_REQUEST_THRESHOLD_MS;
    this.log = options.logger ?? getLogger('performance');
    this.now = options.now ?? (() => performance.now());
  }

  async handle(request: AnyRequest, next: RequestHandlerDelegate<unknown>): Promise<unknown> {
    const requestType = request.constructor.name;
    const start = this.now();

    try {
      const response = await next();
      const elapsed = this.now() - start;
      const elapsedMs = Math.floor(elapsed);

      if (elapsed >= this.thresholdMs) {
        this.log.warn(
          { requestType, elapsedMs, thresholdMs: this.thresholdMs },
          `Slow request detected: ${requestType} (${elapsedMs} ms)`,
        );
      } else {
        this.log.info({ requestType, elapsedMs }, `Request: ${requestType} (${elapsedMs} ms)`);
      }
      return response;
    } catch (err) {
      const elapsedMs = Math.floor(this.now() - start);
      this.log.error({ err, requestType, elapsedMs }, `Error handling ${requestType} after ${elapsedMs} ms`);
      throw err;
    }
  }
}

/**
 * Create a performance logging behavior.
 */
export function createPerformanceLogging(options?: PerformanceLoggingOptions): PipelineBehavior {
  return new PerformanceLoggingBehavior(options);
}
