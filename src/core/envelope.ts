/**
 * Envelope Validator — structural and causality checks on inbound messages,
 * plus builders for outbound envelopes. Knows nothing about session phases.
 */

import type {
  Actor,
  Envelope,
  EnvelopePhase,
  JsonObject,
  MessageType,
  Result,
} from './types.js';
import { ProtocolError } from './errors.js';
import { check, validators } from './schemas.js';
import { generateId } from './crypto.js';

/** Per-session message bookkeeping the validator reads and updates */
export interface MessageLedger {
  /** Inbound message ids already admitted */
  seenMessageIds: Set<string>;
  /** Every message id known to the session, inbound and outbound */
  recordedMessageIds: Set<string>;
}

export type Admission = 'accepted' | 'duplicate';

/** Structural check of a raw envelope against the normative field set */
export function validateEnvelope(raw: unknown): Result<Envelope, ProtocolError> {
  const result = check(validators.envelope, raw);
  if (!result.ok) {
    return {
      ok: false,
      error: new ProtocolError('invalid_intent', `Malformed envelope: ${result.error}`, { retryable: false }),
    };
  }
  if (Number.isNaN(Date.parse(result.value.timestamp))) {
    return {
      ok: false,
      error: new ProtocolError('invalid_intent', `Malformed envelope: unparseable timestamp ${result.value.timestamp}`),
    };
  }
  return result;
}

/**
 * Admit an envelope into a session's message ledger.
 * Re-delivery of an admitted message is a no-op success; a reply to an
 * unknown message is a causality error and leaves the ledger untouched.
 */
export function admit(ledger: MessageLedger, envelope: Envelope): Result<Admission, ProtocolError> {
  if (ledger.seenMessageIds.has(envelope.message_id)) {
    return { ok: true, value: 'duplicate' };
  }
  if (envelope.in_reply_to !== undefined && !ledger.recordedMessageIds.has(envelope.in_reply_to)) {
    return {
      ok: false,
      error: new ProtocolError('invalid_intent', `in_reply_to references unknown message ${envelope.in_reply_to}`, {
        details: { in_reply_to: envelope.in_reply_to },
      }),
    };
  }
  ledger.seenMessageIds.add(envelope.message_id);
  ledger.recordedMessageIds.add(envelope.message_id);
  return { ok: true, value: 'accepted' };
}

const PHASE_BY_TYPE: Record<MessageType, EnvelopePhase> = {
  intent_declaration: 'intent',
  capability_disclosure: 'capability',
  contract_proposal: 'contract',
  contract_counterproposal: 'contract',
  contract_acceptance: 'contract',
  contract_rejection: 'contract',
  execution_token: 'token',
  execution_request: 'execution',
  execution_result: 'execution',
  audit_event: 'audit',
  error: 'error',
};

export function phaseForType(type: MessageType): EnvelopePhase {
  return PHASE_BY_TYPE[type];
}

export interface EnvelopeParams<P extends object> {
  icnpVersion: string;
  type: MessageType;
  sender: Actor;
  sessionId: string;
  payload: P;
  recipient?: Actor;
  inReplyTo?: string;
  trace?: JsonObject;
  extensions?: JsonObject;
  now?: Date;
}

export function createEnvelope<P extends object>(params: EnvelopeParams<P>): Envelope<P> {
  const envelope: Envelope<P> = {
    icnp_version: params.icnpVersion,
    type: params.type,
    phase: phaseForType(params.type),
    message_id: generateId(),
    session_id: params.sessionId,
    timestamp: (params.now ?? new Date()).toISOString(),
    sender: params.sender,
    payload: params.payload,
  };
  if (params.recipient) envelope.recipient = params.recipient;
  if (params.inReplyTo) envelope.in_reply_to = params.inReplyTo;
  if (params.trace) envelope.trace = params.trace;
  if (params.extensions) envelope.extensions = params.extensions;
  return envelope;
}

export interface ErrorPayload {
  error: {
    error_id: string;
    code: string;
    kind: string;
    message: string;
    related_message_id?: string;
    retryable: boolean;
    details: JsonObject;
    timestamp: string;
  };
}

/** Error envelope answering `related` (when it could be parsed) */
export function createErrorEnvelope(
  error: ProtocolError,
  options: {
    icnpVersion: string;
    sender: Actor;
    sessionId: string;
    /** Triggering message; only its id is known when the envelope itself was malformed */
    related?: { message_id: string; sender?: Actor; trace?: JsonObject };
    now?: Date;
  },
): Envelope<ErrorPayload> {
  const now = options.now ?? new Date();
  const payload: ErrorPayload = {
    error: {
      error_id: generateId(),
      code: error.code,
      kind: error.kind,
      message: error.message,
      retryable: error.retryable,
      details: error.details,
      timestamp: now.toISOString(),
    },
  };
  if (options.related) payload.error.related_message_id = options.related.message_id;
  return createEnvelope({
    icnpVersion: options.icnpVersion,
    type: 'error',
    sender: options.sender,
    sessionId: options.sessionId,
    payload,
    recipient: options.related?.sender,
    inReplyTo: options.related?.message_id,
    trace: options.related?.trace,
    now,
  });
}
