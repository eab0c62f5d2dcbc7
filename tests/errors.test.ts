import { describe, it, expect } from 'vitest';
import { ERROR_CODES, ProtocolError, fail, ok, toError, toProtocolError } from '../src/core/errors.js';

describe('ProtocolError', () => {
  it('maps every kind onto its code', () => {
    expect(ERROR_CODES).toEqual({
      invalid_intent: 'ICNP-001',
      capability_mismatch: 'ICNP-002',
      constraints_unsatisfiable: 'ICNP-003',
      unauthorised_action: 'ICNP-004',
      token_invalid: 'ICNP-005',
      internal_error: 'ICNP-006',
    });
  });

  it('only internal errors are retryable by default', () => {
    expect(new ProtocolError('internal_error', 'signer down').retryable).toBe(true);
    expect(new ProtocolError('token_invalid', 'expired').retryable).toBe(false);
    expect(new ProtocolError('token_invalid', 'expired', { retryable: true }).retryable).toBe(true);
  });

  it('serialises to JSON', () => {
    const error = new ProtocolError('capability_mismatch', 'No capability offers delete', { details: { action: 'delete' } });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ProtocolError');
    expect(error.toJSON()).toEqual({
      kind: 'capability_mismatch',
      code: 'ICNP-002',
      message: 'No capability offers delete',
      retryable: false,
      details: { action: 'delete' },
    });
  });
});

describe('Result helpers', () => {
  it('fail builds a failed Result', () => {
    const result = fail<number>('unauthorised_action', 'nope');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('ICNP-004');
  });

  it('ok wraps a value', () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
  });

  it('toError normalises thrown values', () => {
    const original = new Error('boom');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });

  it('toProtocolError keeps protocol errors and wraps the rest as internal_error', () => {
    const denied = new ProtocolError('token_invalid', 'expired');
    expect(toProtocolError(denied)).toBe(denied);
    const wrapped = toProtocolError(new TypeError('boom'));
    expect(wrapped.kind).toBe('internal_error');
    expect(wrapped.message).toBe('boom');
    expect(wrapped.retryable).toBe(true);
  });
});
