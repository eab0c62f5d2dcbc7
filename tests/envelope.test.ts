import { describe, it, expect } from 'vitest';
import { admit, createEnvelope, createErrorEnvelope, phaseForType, validateEnvelope } from '../src/core/envelope.js';
import type { MessageLedger } from '../src/core/envelope.js';
import { ProtocolError } from '../src/core/errors.js';
import { generateId } from '../src/core/crypto.js';
import type { Actor } from '../src/core/types.js';

const orchestrator: Actor = { id: 'orchestrator', role: 'orchestrator' };
const writer: Actor = { id: 'writer', role: 'agent' };
const NOW = new Date('2026-01-01T00:00:00.000Z');

function ledger(): MessageLedger {
  return { seenMessageIds: new Set(), recordedMessageIds: new Set() };
}

function intentEnvelope(inReplyTo?: string) {
  return createEnvelope({
    icnpVersion: '1.0.0',
    type: 'intent_declaration',
    sender: orchestrator,
    sessionId: generateId(),
    payload: { intent: {} },
    inReplyTo,
    now: NOW,
  });
}

describe('createEnvelope', () => {
  it('derives the phase from the type and fills the header', () => {
    const envelope = intentEnvelope();
    expect(envelope.phase).toBe('intent');
    expect(envelope.timestamp).toBe('2026-01-01T00:00:00.000Z');
    expect(envelope.icnp_version).toBe('1.0.0');
    expect(envelope.in_reply_to).toBeUndefined();
    expect(envelope.recipient).toBeUndefined();
  });

  it('maps every message type onto its phase', () => {
    expect(phaseForType('contract_counterproposal')).toBe('contract');
    expect(phaseForType('execution_token')).toBe('token');
    expect(phaseForType('execution_result')).toBe('execution');
    expect(phaseForType('audit_event')).toBe('audit');
    expect(phaseForType('error')).toBe('error');
  });
});

describe('validateEnvelope', () => {
  it('accepts a well-formed envelope', () => {
    const result = validateEnvelope(intentEnvelope());
    expect(result.ok).toBe(true);
  });

  it('rejects missing fields as invalid_intent', () => {
    const { sender: _sender, ...withoutSender } = intentEnvelope();
    const result = validateEnvelope(withoutSender);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('invalid_intent');
      expect(result.error.code).toBe('ICNP-001');
      expect(result.error.retryable).toBe(false);
      expect(result.error.message).toContain("must have required property 'sender'");
    }
  });

  it('rejects a non-UUID message id and an unknown type', () => {
    expect(validateEnvelope({ ...intentEnvelope(), message_id: 'msg-1' }).ok).toBe(false);
    expect(validateEnvelope({ ...intentEnvelope(), type: 'gossip' }).ok).toBe(false);
  });

  it('rejects a timestamp that matches the pattern but is not a date', () => {
    const result = validateEnvelope({ ...intentEnvelope(), timestamp: '2026-13-45T99:99:99Z' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Malformed envelope: unparseable timestamp 2026-13-45T99:99:99Z');
  });

  it('rejects non-objects', () => {
    expect(validateEnvelope('hello').ok).toBe(false);
    expect(validateEnvelope(null).ok).toBe(false);
  });
});

describe('admit', () => {
  it('accepts once and reports re-delivery as a duplicate', () => {
    const book = ledger();
    const envelope = intentEnvelope();
    expect(admit(book, envelope)).toEqual({ ok: true, value: 'accepted' });
    expect(admit(book, envelope)).toEqual({ ok: true, value: 'duplicate' });
    expect(book.seenMessageIds.size).toBe(1);
  });

  it('requires in_reply_to to reference a recorded message', () => {
    const book = ledger();
    const orphan = intentEnvelope(generateId());
    const result = admit(book, orphan);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe(`in_reply_to references unknown message ${orphan.in_reply_to}`);
    expect(book.seenMessageIds.size).toBe(0);
  });

  it('accepts replies to outbound messages the session recorded', () => {
    const book = ledger();
    const outboundId = generateId();
    book.recordedMessageIds.add(outboundId);
    expect(admit(book, intentEnvelope(outboundId))).toEqual({ ok: true, value: 'accepted' });
  });
});

describe('createErrorEnvelope', () => {
  it('answers the related message with the error payload', () => {
    const relatedId = generateId();
    const sessionId = generateId();
    const error = new ProtocolError('token_invalid', 'Token expired', { details: { token_id: 'tok-1' } });
    const envelope = createErrorEnvelope(error, {
      icnpVersion: '1.0.0',
      sender: orchestrator,
      sessionId,
      related: { message_id: relatedId, sender: writer, trace: { trace_id: 'trace-1' } },
      now: NOW,
    });

    expect(envelope.type).toBe('error');
    expect(envelope.phase).toBe('error');
    expect(envelope.in_reply_to).toBe(relatedId);
    expect(envelope.recipient).toEqual(writer);
    expect(envelope.trace).toEqual({ trace_id: 'trace-1' });
    expect(envelope.payload.error).toMatchObject({
      code: 'ICNP-005',
      kind: 'token_invalid',
      message: 'Token expired',
      related_message_id: relatedId,
      retryable: false,
      details: { token_id: 'tok-1' },
      timestamp: '2026-01-01T00:00:00.000Z',
    });
    expect(validateEnvelope(envelope).ok).toBe(true);
  });

  it('leaves the reply fields unset without a related message', () => {
    const envelope = createErrorEnvelope(new ProtocolError('invalid_intent', 'bad'), {
      icnpVersion: '1.0.0',
      sender: orchestrator,
      sessionId: generateId(),
    });
    expect(envelope.in_reply_to).toBeUndefined();
    expect(envelope.payload.error.related_message_id).toBeUndefined();
  });
});
