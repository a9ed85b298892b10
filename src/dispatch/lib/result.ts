/**
 * Result values for callers that prefer returned failures over thrown ones.
 */

import { MediatorError } from '../../core/errors.js';

export interface ResultError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: ResultError };

/** A successful result carrying `data`. */
export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

/** A failed result. */
export function fail<T = never>(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): Result<T> {
  return { success: false, error: { code, message, ...(details && { details }) } };
}

/**
 * Return the data of a successful result.
 *
 * @throws Error carrying the failure's code and message
 */
export function unwrap<T>(result: Result<T>): T {
  if (result.success) return result.data;
  throw new Error(`${result.error.code}: ${result.error.message}`);
}

/**
 * Run `fn`, capturing any thrown error as a failed result.
 * MediatorErrors keep their code and details; anything else is E_GENERAL_ERROR.
 */
export async function toResult<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    if (err instanceof MediatorError) {
      return fail(err.errorCode, err.message, err.details);
    }
    return fail('E_GENERAL_ERROR', err instanceof Error ? err.message : String(err));
  }
}
