/**
 * Validation Behavior
 *
 * Runs every validator bound to the request's type before the rest of the
 * pipeline. Any reported field error fails the request with
 * ValidationFailedError and the continuation is never called.
 */

import { getLogger, type Logger } from '../../core/logger.js';
import { ValidationFailedError } from '../../core/errors.js';
import type { ValidatorSource } from '../registry.js';
import type { AnyRequest, FieldError, PipelineBehavior, RequestHandlerDelegate } from '../types.js';

export interface ValidationOptions {
  logger?: Logger;
}

export class ValidationBehavior implements PipelineBehavior {
  private validators: ValidatorSource;
  private log: Logger;
  /**
   * Request types seen with no validators, keyed to the source's generation
   * at that time. A later registration invalidates the entry.
   */
  private unvalidatedTypes: WeakMap<Function, number> = new WeakMap();

  constructor(validators: ValidatorSource, options: ValidationOptions = {}) {
    this.validators = validators;
    this.log = options.logger ?? getLogger('validation');
  }

  async handle(
    request: AnyRequest,
    next: RequestHandlerDelegate<unknown>,
    signal: AbortSignal,
  ): Promise<unknown> {
    const type = request.constructor;
    const generation = this.validators.validatorGeneration;
    if (this.unvalidatedTypes.get(type) === generation) {
      return next();
    }

    const validators = this.validators.resolveValidators(request);
    if (validators.length === 0) {
      this.unvalidatedTypes.set(type, generation);
      return next();
    }

    const reports = await Promise.all(validators.map(async (v) => v.validate(request, signal)));
    const errors: FieldError[] = reports.flat();
    if (errors.length === 0) {
      return next();
    }

    const requestType = type.name;
    this.log.warn(
      { requestType, errorCount: errors.length },
      `Validation failed for ${requestType} with ${errors.length} errors`,
    );
    for (const error of errors) {
      this.log.debug({ requestType, field: error.field }, `Validation error: ${error.message}`);
    }
    throw new ValidationFailedError(requestType, errors);
  }
}

/**
 * Create a validation behavior reading validators from `validators`.
 */
export function createValidation(validators: ValidatorSource, options?: ValidationOptions): PipelineBehavior {
  return new ValidationBehavior(validators, options);
}
