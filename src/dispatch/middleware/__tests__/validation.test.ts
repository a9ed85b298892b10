import { describe, it, expect, vi } from 'vitest';
import { ValidationBehavior } from '../validation.js';
import { ValidationFailedError } from '../../../core/errors.js';
import { HandlerRegistry } from '../../registry.js';
import type { AnyRequest, Validator } from '../../types.js';
import { captureLogger } from '../../../../tests/helpers/log-capture.js';
import { CreateUser, Echo } from '../../../../tests/helpers/fixtures.js';

const signal = new AbortController().signal;

function sourceOf(validators: Validator[]) {
  return { resolveValidators: vi.fn((_request: AnyRequest) => validators), validatorGeneration: 0 };
}

describe('ValidationBehavior', () => {
  it('calls next when every validator passes', async () => {
    const source = sourceOf([{ validate: () => [] }, { validate: async () => [] }]);
    const behavior = new ValidationBehavior(source, { logger: captureLogger().logger });

    const res = await behavior.handle(new CreateUser('ada', 'ada@example.test'), async () => 7, signal);

    expect(res).toBe(7);
  });

  it('fails with the union of every reported field error and skips next', async () => {
    const source = sourceOf([
      { validate: () => [{ field: 'name', message: 'Name is required' }] },
      {
        validate: async () => [
          { field: 'email', message: 'Email is required' },
          { field: 'email', message: 'Email must be valid' },
        ],
      },
    ]);
    const behavior = new ValidationBehavior(source, { logger: captureLogger().logger });
    const next = vi.fn(async () => 1);

    const error = await behavior.handle(new CreateUser('', ''), next, signal).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationFailedError);
    if (!(error instanceof ValidationFailedError)) return;
    expect(error.requestType).toBe('CreateUser');
    expect(error.errors).toEqual([
      { field: 'name', message: 'Name is required' },
      { field: 'email', message: 'Email is required' },
      { field: 'email', message: 'Email must be valid' },
    ]);
    expect(next).not.toHaveBeenCalled();
  });

  it('logs a warning with the error count', async () => {
    const { logger, entries } = captureLogger();
    const source = sourceOf([{ validate: () => [{ field: 'email', message: 'Email is required' }] }]);
    const behavior = new ValidationBehavior(source, { logger });

    await expect(behavior.handle(new CreateUser('ada', ''), async () => 1, signal)).rejects.toThrow(
      ValidationFailedError,
    );

    expect(entries[0]).toMatchObject({
      level: 'WARN',
      msg: 'Validation failed for CreateUser with 1 errors',
      errorCount: 1,
    });
    expect(entries[1]).toMatchObject({ level: 'DEBUG', field: 'email', msg: 'Validation error: Email is required' });
  });

  it('passes the request and signal to each validator', async () => {
    const validate = vi.fn<Validator['validate']>(() => []);
    const behavior = new ValidationBehavior(sourceOf([{ validate }]), { logger: captureLogger().logger });
    const request = new CreateUser('ada', 'ada@example.test');

    await behavior.handle(request, async () => 1, signal);

    expect(validate).toHaveBeenCalledWith(request, signal);
  });

  it('stops resolving validators for a type once it has none', async () => {
    const source = sourceOf([]);
    const behavior = new ValidationBehavior(source, { logger: captureLogger().logger });

    await behavior.handle(new Echo('a'), async () => 'a', signal);
    await behavior.handle(new Echo('b'), async () => 'b', signal);

    expect(source.resolveValidators).toHaveBeenCalledTimes(1);
  });

  it('picks up validators registered after a type was first dispatched', async () => {
    const registry = new HandlerRegistry({ logger: captureLogger().logger });
    const behavior = new ValidationBehavior(registry, { logger: captureLogger().logger });

    await expect(behavior.handle(new Echo(''), async () => 'ok', signal)).resolves.toBe('ok');

    registry.addValidator(Echo, {
      validate: (req) => (req.text ? [] : [{ field: 'text', message: 'Text is required' }]),
    });

    await expect(behavior.handle(new Echo(''), async () => 'ok', signal)).rejects.toThrow(ValidationFailedError);
  });
});
