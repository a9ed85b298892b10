/**
 * Mediator error types with error code integration.
 *
 * Failures raised by handlers are never wrapped in these types; they
 * cover only the conditions the mediator and its behaviors detect.
 */

import { ErrorCode, getErrorCodeName, isRetryableCode } from '../types/error-codes.js';
import type { FieldError } from '../dispatch/types.js';

export interface MediatorErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Structured error class for mediator operations.
 * Carries an error code, a human-readable message, and optional details.
 */
export class MediatorError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options?: MediatorErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'MediatorError';
    this.code = code;
    this.details = options?.details;
  }

  /** String error code, e.g. 'E_HANDLER_NOT_FOUND'. */
  get errorCode(): string {
    return `E_${getErrorCodeName(this.code)}`;
  }

  get retryable(): boolean {
    return isRetryableCode(this.code);
  }

  /** Structured JSON representation. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.errorCode,
      exitCode: this.code,
      message: this.message,
      retryable: this.retryable,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * No handler is registered for the routed request type.
 */
export class HandlerNotFoundError extends MediatorError {
  readonly requestType: string;

  constructor(requestType: string, kind: string = 'request') {
    super(
      ErrorCode.HANDLER_NOT_FOUND,
      `No ${kind} handler registered for ${requestType}`,
      { details: { requestType, kind } },
    );
    this.name = 'HandlerNotFoundError';
    this.requestType = requestType;
  }
}

/**
 * One or more validators rejected the request.
 * `errors` holds every field error reported across all validators.
 */
export class ValidationFailedError extends MediatorError {
  readonly requestType: string;
  readonly errors: readonly FieldError[];

  constructor(requestType: string, errors: readonly FieldError[]) {
    super(
      ErrorCode.VALIDATION_FAILED,
      `Validation failed for ${requestType}: ${errors.map((e) => formatFieldError(e)).join('; ')}`,
      { details: { requestType, errors: errors.map((e) => ({ ...e })) } },
    );
    this.name = 'ValidationFailedError';
    this.requestType = requestType;
    this.errors = errors;
  }
}

/**
 * Several notification handlers failed during one publish.
 * `errors` is in the order the handlers failed; `cause` is the first.
 */
export class FanOutError extends MediatorError {
  readonly notificationType: string;
  readonly errors: readonly unknown[];

  constructor(notificationType: string, errors: readonly unknown[], handlerCount: number) {
    super(
      ErrorCode.FAN_OUT_FAILED,
      `${errors.length} of ${handlerCount} handlers failed for ${notificationType}`,
      { details: { notificationType, failed: errors.length, handlerCount }, cause: errors[0] },
    );
    this.name = 'FanOutError';
    this.notificationType = notificationType;
    this.errors = errors;
  }
}

/**
 * The continuation did not settle within the allowed time.
 */
export class RequestTimeoutError extends MediatorError {
  readonly timeoutMs: number;

  constructor(requestType: string, timeoutMs: number) {
    super(
      ErrorCode.TIMEOUT,
      `${requestType} timed out after ${timeoutMs} ms`,
      { details: { requestType, timeoutMs } },
    );
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Configuration failed schema validation.
 */
export class ConfigError extends MediatorError {
  constructor(message: string, issues: readonly FieldError[]) {
    super(ErrorCode.CONFIG_INVALID, message, { details: { issues: issues.map((i) => ({ ...i })) } });
    this.name = 'ConfigError';
  }
}

function formatFieldError(error: FieldError): string {
  return error.field ? `${error.field}: ${error.message}` : error.message;
}
