/**
 * Timeout Behavior
 *
 * Races the rest of the pipeline against a timer and fails with
 * RequestTimeoutError if the timer wins. The timer is cleared as soon as
 * the race settles. The inner work is not cancelled; handlers that must
 * stop should observe the dispatch signal.
 */

import { RequestTimeoutError } from '../../core/errors.js';
import type { AnyRequest, PipelineBehavior, RequestHandlerDelegate } from '../types.js';

export class TimeoutBehavior implements PipelineBehavior {
  private timeoutMs: number;

  constructor(timeoutMs: number) {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
    }
    this.timeoutMs = timeoutMs;
  }

  async handle(request: AnyRequest, next: RequestHandlerDelegate<unknown>): Promise<unknown> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new RequestTimeoutError(request.constructor.name, this.timeoutMs)),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([next(), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Create a timeout behavior.
 */
export function createTimeout(timeoutMs: number): PipelineBehavior {
  return new TimeoutBehavior(timeoutMs);
}
