/**
 * Protocol error taxonomy.
 */

import type { JsonObject, Result } from './types.js';

export type ErrorKind =
  | 'invalid_intent'
  | 'capability_mismatch'
  | 'constraints_unsatisfiable'
  | 'unauthorised_action'
  | 'token_invalid'
  | 'internal_error';

export type ErrorCode = 'ICNP-001' | 'ICNP-002' | 'ICNP-003' | 'ICNP-004' | 'ICNP-005' | 'ICNP-006';

export const ERROR_CODES: Record<ErrorKind, ErrorCode> = {
  invalid_intent: 'ICNP-001',
  capability_mismatch: 'ICNP-002',
  constraints_unsatisfiable: 'ICNP-003',
  unauthorised_action: 'ICNP-004',
  token_invalid: 'ICNP-005',
  internal_error: 'ICNP-006',
};

export class ProtocolError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;
  /** True for transient collaborator failures, false for structural violations */
  readonly retryable: boolean;
  readonly details: JsonObject;

  constructor(kind: ErrorKind, message: string, options: { retryable?: boolean; details?: JsonObject } = {}) {
    super(message);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.code = ERROR_CODES[kind];
    this.retryable = options.retryable ?? kind === 'internal_error';
    this.details = options.details ?? {};
  }

  toJSON(): JsonObject {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/** Shorthand for a failed Result carrying a ProtocolError */
export function fail<T>(
  kind: ErrorKind,
  message: string,
  options?: { retryable?: boolean; details?: JsonObject },
): Result<T, ProtocolError> {
  return { ok: false, error: new ProtocolError(kind, message, options) };
}

export function ok<T>(value: T): Result<T, ProtocolError> {
  return { ok: true, value };
}

/** Normalise anything thrown into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Anything thrown while serving a request, as the error reported back */
export function toProtocolError(err: unknown): ProtocolError {
  if (err instanceof ProtocolError) return err;
  return new ProtocolError('internal_error', toError(err).message);
}
