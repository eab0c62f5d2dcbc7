/**
 * Audit Log — append-only, globally sequenced record of protocol and execution facts.
 *
 * One log is shared by every session. Sequence numbers come from a single
 * counter that is read and bumped synchronously, so ordering is comparable
 * across sessions even though sessions run independently.
 */

import type { AuditEvent, AuditEventInput, AuditFilter, AuditKind, AuditSeverity, AuditSink } from './types.js';
import type { CollaboratorGuard } from './collaborator.js';
import { generateId } from './crypto.js';
import { ProtocolError, toError } from './errors.js';
import { KeyedMutex } from './mutex.js';
import { createLogger } from './logger.js';

const logger = createLogger('AuditLog');

export const AUDIT_KINDS: readonly AuditKind[] = [
  'intent_recorded',
  'capability_disclosed',
  'contract_proposed',
  'contract_signed',
  'contract_accepted',
  'contract_rejected',
  'token_issued',
  'token_revoked',
  'execution_started',
  'execution_completed',
  'execution_failed',
  'violation',
  'rollback',
  'phase_transition',
  'session_expired',
  'message_recorded',
  'rejected',
];

const SEVERITIES: readonly AuditSeverity[] = ['info', 'warning', 'critical'];

export function isAuditKind(value: string): value is AuditKind {
  return AUDIT_KINDS.some(k => k === value);
}

export function isAuditSeverity(value: string): value is AuditSeverity {
  return SEVERITIES.some(s => s === value);
}

/** Whether `event` passes every field of `filter` */
export function matchesFilter(event: AuditEvent, filter: AuditFilter = {}): boolean {
  if (filter.sessionId !== undefined && event.session_id !== filter.sessionId) return false;
  if (filter.kind !== undefined && event.kind !== filter.kind) return false;
  if (filter.afterSequence !== undefined && event.sequence <= filter.afterSequence) return false;
  return true;
}

export class AuditLog {
  private events: AuditEvent[] = [];
  /** Recorded events the sink has not acknowledged yet, in sequence order */
  private unsent: AuditEvent[] = [];
  private nextSequence = 1;
  private delivery = new KeyedMutex();

  constructor(
    private sink?: AuditSink,
    private clock: () => Date = () => new Date(),
    private guard?: CollaboratorGuard,
  ) {}

  /**
   * Append an event. The sequence is assigned and the event kept in memory
   * before the sink is awaited; see `flush` for sink failures.
   */
  async record(input: AuditEventInput): Promise<AuditEvent> {
    const event: AuditEvent = Object.freeze({
      ...input,
      subject_ids: [...input.subject_ids],
      severity: input.severity ?? 'info',
      sequence: this.nextSequence++,
      event_id: generateId(),
      timestamp: this.clock().toISOString(),
    });
    this.events.push(event);
    if (this.sink) {
      this.unsent.push(event);
      await this.flush();
    }
    return event;
  }

  /**
   * Deliver queued events to the sink in sequence order. On failure the
   * undelivered events stay queued for the next record or flush, and a
   * retryable `internal_error` is thrown.
   */
  async flush(): Promise<void> {
    const sink = this.sink;
    if (!sink) return;
    const guard = this.guard;
    await this.delivery.run('sink', async () => {
      for (;;) {
        const next = this.unsent[0];
        if (!next) return;
        try {
          await (guard ? guard.call(() => sink.append(next)) : sink.append(next));
        } catch (err) {
          const reason = toError(err).message;
          logger.error('Audit sink append failed', { sequence: next.sequence, kind: next.kind, pending: this.unsent.length, error: reason });
          throw new ProtocolError('internal_error', `Audit sink failed: ${reason}`, {
            details: { sequence: next.sequence, pending: this.unsent.length },
          });
        }
        this.unsent.shift();
      }
    });
  }

  /** Events waiting for the sink */
  get pending(): number {
    return this.unsent.length;
  }

  entries(): readonly AuditEvent[] {
    return this.events;
  }

  bySession(sessionId: string): AuditEvent[] {
    return this.events.filter(e => e.session_id === sessionId);
  }

  byKind(kind: AuditKind): AuditEvent[] {
    return this.events.filter(e => e.kind === kind);
  }

  byMessage(messageId: string): AuditEvent[] {
    return this.events.filter(e => e.related_message_id === messageId);
  }

  get size(): number {
    return this.events.length;
  }

  toJSON(): string {
    return JSON.stringify(this.events, null, 2);
  }
}
