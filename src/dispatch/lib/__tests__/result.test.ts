import { describe, it, expect } from 'vitest';
import { fail, ok, toResult, unwrap } from '../result.js';
import { HandlerNotFoundError } from '../../../core/errors.js';

describe('Result helpers', () => {
  it('wraps data in a successful result', () => {
    expect(ok(42)).toEqual({ success: true, data: 42 });
  });

  it('omits details when none are given', () => {
    expect(fail('E_X', 'broken')).toEqual({ success: false, error: { code: 'E_X', message: 'broken' } });
    expect(fail('E_X', 'broken', { id: 1 })).toEqual({
      success: false,
      error: { code: 'E_X', message: 'broken', details: { id: 1 } },
    });
  });

  it('unwraps successes and throws on failures', () => {
    expect(unwrap(ok('v'))).toBe('v');
    expect(() => unwrap(fail('E_X', 'broken'))).toThrow('E_X: broken');
  });

  describe('toResult', () => {
    it('captures resolved values', async () => {
      await expect(toResult(async () => 'v')).resolves.toEqual({ success: true, data: 'v' });
    });

    it('keeps the code and details of mediator errors', async () => {
      const result = await toResult(async () => {
        throw new HandlerNotFoundError('Echo');
      });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'E_HANDLER_NOT_FOUND',
          message: 'No request handler registered for Echo',
          details: { requestType: 'Echo', kind: 'request' },
        },
      });
    });

    it('maps any other failure to E_GENERAL_ERROR', async () => {
      const result = await toResult(async () => {
        throw new Error('disk full');
      });

      expect(result).toEqual({ success: false, error: { code: 'E_GENERAL_ERROR', message: 'disk full' } });
    });
  });
});
