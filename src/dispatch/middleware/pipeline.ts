/**
 * Mediator Dispatch Layer -- Behavior Pipeline
 *
 * Provides compose() to chain multiple PipelineBehaviors together
 * into a single executable behavior.
 */

import type { AnyRequest, PipelineBehavior, RequestHandlerDelegate } from '../types.js';

/**
 * Composes an array of behaviors into a single behavior.
 * Execution flows through the array from first to last, and returns bubble
 * back up from last to first.
 *
 * The chain is folded right-to-left: each behavior receives a continuation
 * that runs the behaviors after it and, finally, the `next` given to the
 * composed behavior. A behavior may call its continuation any number of
 * times; each call re-runs the inner part of the chain.
 *
 * @param behaviors Array of behaviors to chain, outermost first
 * @returns A single composed behavior
 */
export function compose<TRequest extends AnyRequest, TResponse>(
  behaviors: ReadonlyArray<PipelineBehavior<TRequest, TResponse>>,
): PipelineBehavior<TRequest, TResponse> {
  if (behaviors.length === 0) {
    return { handle: (_request, next) => next() };
  }

  return {
    handle(request, next, signal): Promise<TResponse> {
      const chain = behaviors.reduceRight<RequestHandlerDelegate<TResponse>>(
        (inner, behavior) => () => behavior.handle(request, inner, signal),
        next,
      );
      return chain();
    },
  };
}
