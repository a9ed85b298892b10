/**
 * Mediator error codes.
 * Ranges: 1-9 = dispatch errors, 10-19 = pipeline behavior errors,
 * 20-29 = fan-out errors.
 */

export enum ErrorCode {
  // === DISPATCH ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_REQUEST = 2,
  HANDLER_NOT_FOUND = 4,
  CONFIG_INVALID = 8,

  // === BEHAVIOR ERRORS (10-19) ===
  VALIDATION_FAILED = 10,
  TIMEOUT = 11,

  // === FAN-OUT ERRORS (20-29) ===
  FAN_OUT_FAILED = 20,
}

/** Codes a caller may reasonably retry. */
const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.TIMEOUT,
]);

/**
 * Get the symbolic name of an error code (e.g. 'HANDLER_NOT_FOUND').
 */
export function getErrorCodeName(code: ErrorCode): string {
  return ErrorCode[code] ?? 'UNKNOWN';
}

/**
 * Whether a failure with this code may succeed if retried unchanged.
 */
export function isRetryableCode(code: ErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}
