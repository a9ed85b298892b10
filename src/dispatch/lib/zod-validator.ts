/**
 * Adapts zod schemas to the Validator contract.
 */

import type { ZodType } from 'zod';
import type { AnyRequest, FieldError, Validator } from '../types.js';

/**
 * Build a validator that parses the request against `schema` and reports
 * each issue as a field error. Nested paths are joined with '.'; an issue
 * on the request itself has field ''.
 *
 * @example
 * ```typescript
 * registry.addValidator(CreateUser, zodValidator(z.object({ email: z.string().email() })));
 * ```
 */
export function zodValidator<TRequest extends AnyRequest>(schema: ZodType): Validator<TRequest> {
  return {
    async validate(request: TRequest): Promise<FieldError[]> {
      const parsed = await schema.safeParseAsync(request);
      if (parsed.success) return [];
      return parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));
    },
  };
}
