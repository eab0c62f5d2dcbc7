/**
 * Session Store — arena of sessions keyed by session_id.
 *
 * Every artifact of a negotiation (intent, capability ledger, contract, token,
 * invocation counters) hangs off its SessionEntry and is reachable only through
 * the store. Mutations of one session are serialised with a keyed mutex.
 */

import type {
  Actor,
  Contract,
  Envelope,
  ExecutionToken,
  IntentDeclaration,
  PhaseChange,
  Result,
  SessionPhase,
  SessionSnapshot,
  TerminalPhase,
} from './types.js';
import type { MessageLedger } from './envelope.js';
import { CapabilityLedger } from './capability.js';
import { ProtocolError } from './errors.js';
import { KeyedMutex } from './mutex.js';
import type { AuditLog } from './audit.js';
import { createLogger } from './logger.js';

const logger = createLogger('SessionStore');

// ── Phase machine ──

export const PHASE_TRANSITIONS = {
  intent: ['capability', 'aborted', 'expired'],
  capability: ['contract', 'aborted', 'expired'],
  contract: ['token', 'aborted', 'expired'],
  token: ['execution', 'aborted', 'expired'],
  execution: ['completed', 'aborted', 'expired'],
  completed: [],
  aborted: [],
  expired: [],
} as const satisfies Record<SessionPhase, readonly SessionPhase[]>;

/** Phases reachable in one step from `P` */
export type NextPhase<P extends SessionPhase> = (typeof PHASE_TRANSITIONS)[P][number];

/** Phases some transition leads to; `intent` is only ever the starting phase */
export type TransitionTarget = NextPhase<SessionPhase>;

/** Phases in which the negotiation time-to-live applies */
const NEGOTIATING: ReadonlySet<SessionPhase> = new Set<SessionPhase>(['intent', 'capability', 'contract']);

export function canTransition(from: SessionPhase, to: SessionPhase): boolean {
  const allowed: readonly SessionPhase[] = PHASE_TRANSITIONS[from];
  return allowed.includes(to);
}

export function isTerminal(phase: SessionPhase): phase is TerminalPhase {
  return PHASE_TRANSITIONS[phase].length === 0;
}

// ── Session state ──

export interface InvocationCounters {
  /** actor id → authorised invocations */
  perActor: Map<string, number>;
  /** agreed action_id → authorised invocations */
  perAction: Map<string, number>;
}

export interface SessionEntry extends MessageLedger {
  readonly id: string;
  phase: SessionPhase;
  readonly initiator: Actor;
  readonly participants: Map<string, Actor>;
  readonly createdAt: Date;
  closedAt?: Date;
  intent?: Readonly<IntentDeclaration>;
  readonly capabilities: CapabilityLedger;
  /** Pending proposal collecting signatures */
  proposal?: Contract;
  /** Accepted, frozen contract */
  contract?: Readonly<Contract>;
  token?: Readonly<ExecutionToken>;
  readonly counters: InvocationCounters;
  /** Replies produced for each admitted inbound message, replayed on re-delivery */
  readonly replies: Map<string, Envelope<object>[]>;
}

export interface SessionStoreConfig {
  negotiationTtlMs: number;
  clock: () => Date;
}

// ── Store ──

export class SessionStore {
  private sessions = new Map<string, SessionEntry>();
  private mutex = new KeyedMutex();

  constructor(
    private config: SessionStoreConfig,
    private audit: AuditLog,
  ) {}

  /** Run `fn` as the single writer of session `id` (the session may not exist yet) */
  withSession<T>(id: string, fn: (entry: SessionEntry | undefined) => Promise<T>): Promise<T> {
    return this.mutex.run(id, () => fn(this.sessions.get(id)));
  }

  create(id: string, initiator: Actor): Result<SessionEntry, ProtocolError> {
    if (this.sessions.has(id)) {
      return { ok: false, error: new ProtocolError('invalid_intent', `Session ${id} already exists`) };
    }
    const entry: SessionEntry = {
      id,
      phase: 'intent',
      initiator,
      participants: new Map([[initiator.id, initiator]]),
      createdAt: this.config.clock(),
      capabilities: new CapabilityLedger(),
      counters: { perActor: new Map(), perAction: new Map() },
      seenMessageIds: new Set(),
      recordedMessageIds: new Set(),
      replies: new Map(),
    };
    this.sessions.set(id, entry);
    logger.info('Session created', { sessionId: id, initiator: initiator.id });
    return { ok: true, value: entry };
  }

  /** Entry of session `id`; only for callers already inside `withSession(id)` */
  get(id: string): SessionEntry | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  transition(entry: SessionEntry, target: TransitionTarget): Result<PhaseChange, ProtocolError> {
    const from = entry.phase;
    if (!canTransition(from, target)) return illegalTransition(from, target);
    entry.phase = target;
    if (isTerminal(target)) {
      entry.closedAt = this.config.clock();
    }
    logger.debug('Phase transition', { sessionId: entry.id, from, to: target });
    return { ok: true, value: { from, to: target } };
  }

  /** Move to `target` only if not already there */
  advanceTo(entry: SessionEntry, target: SessionPhase): Result<PhaseChange | null, ProtocolError> {
    if (entry.phase === target) return { ok: true, value: null };
    if (target === 'intent') return illegalTransition(entry.phase, target);
    return this.transition(entry, target);
  }

  /**
   * Lazy expiry: a negotiating session past its time-to-live moves to
   * `expired`. Returns true when the session is expired after the check.
   */
  async expireIfStale(entry: SessionEntry): Promise<boolean> {
    if (entry.phase === 'expired') return true;
    if (!NEGOTIATING.has(entry.phase)) return false;
    const age = this.config.clock().getTime() - entry.createdAt.getTime();
    if (age < this.config.negotiationTtlMs) return false;

    const change = this.transition(entry, 'expired');
    if (!change.ok) return false;
    logger.warn('Session expired', { sessionId: entry.id, phase: change.value.from, ageMs: age });
    await this.audit.record({
      kind: 'session_expired',
      session_id: entry.id,
      subject_ids: [entry.id],
      severity: 'warning',
      details: { transition: { from: change.value.from, to: change.value.to }, age_ms: age },
    });
    return true;
  }

  addParticipant(entry: SessionEntry, actor: Actor): void {
    if (!entry.participants.has(actor.id)) {
      entry.participants.set(actor.id, actor);
    }
  }

  snapshot(id: string): SessionSnapshot | null {
    const entry = this.sessions.get(id);
    return entry ? toSnapshot(entry) : null;
  }

  list(): SessionSnapshot[] {
    return Array.from(this.sessions.values(), toSnapshot);
  }

  /**
   * Drop closed sessions whose terminal transition happened before `before`.
   * `onRemove` sees each dropped entry so state kept outside the store can go too.
   */
  prune(before: Date, onRemove?: (entry: SessionEntry) => void): number {
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (entry.closedAt && entry.closedAt.getTime() < before.getTime()) {
        this.sessions.delete(id);
        onRemove?.(entry);
        removed++;
      }
    }
    return removed;
  }
}

function illegalTransition(from: SessionPhase, to: SessionPhase): Result<never, ProtocolError> {
  return {
    ok: false,
    error: new ProtocolError(
      isTerminal(from) ? 'token_invalid' : 'invalid_intent',
      `Illegal phase transition ${from} → ${to}`,
      { details: { from, to } },
    ),
  };
}

function toSnapshot(entry: SessionEntry): SessionSnapshot {
  const snapshot: SessionSnapshot = {
    id: entry.id,
    phase: entry.phase,
    initiator: entry.initiator,
    participants: Array.from(entry.participants.values()),
    createdAt: entry.createdAt.toISOString(),
    seenMessageIds: Array.from(entry.seenMessageIds),
    intentRecorded: entry.intent !== undefined,
    capabilityIds: entry.capabilities.list().map(c => c.capability_id),
    contractAccepted: entry.contract !== undefined,
  };
  if (entry.closedAt) snapshot.closedAt = entry.closedAt.toISOString();
  const contractId = entry.contract?.contract_id ?? entry.proposal?.contract_id;
  if (contractId) snapshot.contractId = contractId;
  if (entry.token) snapshot.tokenId = entry.token.token_id;
  return snapshot;
}
