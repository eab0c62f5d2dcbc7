import { describe, it, expect, expectTypeOf, beforeEach } from 'vitest';
import { SessionStore, canTransition, isTerminal } from '../src/core/session.js';
import type { NextPhase, TransitionTarget } from '../src/core/session.js';
import { AuditLog } from '../src/core/audit.js';
import type { Actor, SessionPhase } from '../src/core/types.js';
import { TestClock } from './helpers.js';

const orchestrator: Actor = { id: 'orchestrator', role: 'orchestrator' };
const TTL = 15 * 60_000;

describe('phase machine', () => {
  it('allows only the forward path plus abort and expiry', () => {
    expect(canTransition('intent', 'capability')).toBe(true);
    expect(canTransition('contract', 'token')).toBe(true);
    expect(canTransition('execution', 'completed')).toBe(true);
    expect(canTransition('intent', 'contract')).toBe(false);
    expect(canTransition('token', 'contract')).toBe(false);
    expect(canTransition('token', 'aborted')).toBe(true);
    expect(canTransition('completed', 'aborted')).toBe(false);
  });

  it('derives the legal targets from the transition table', () => {
    expectTypeOf<NextPhase<'token'>>().toEqualTypeOf<'execution' | 'aborted' | 'expired'>();
    expectTypeOf<NextPhase<'completed'>>().toBeNever();
    expectTypeOf<TransitionTarget>().toEqualTypeOf<Exclude<SessionPhase, 'intent'>>();
  });

  it('knows the terminal phases', () => {
    expect(isTerminal('completed')).toBe(true);
    expect(isTerminal('aborted')).toBe(true);
    expect(isTerminal('expired')).toBe(true);
    expect(isTerminal('execution')).toBe(false);
  });
});

describe('SessionStore', () => {
  let clock: TestClock;
  let audit: AuditLog;
  let store: SessionStore;

  beforeEach(() => {
    clock = new TestClock();
    audit = new AuditLog(undefined, clock.now);
    store = new SessionStore({ negotiationTtlMs: TTL, clock: clock.now }, audit);
  });

  it('creates a session in the intent phase with the initiator as participant', () => {
    const created = store.create('s-1', orchestrator);
    expect(created.ok).toBe(true);
    expect(store.snapshot('s-1')).toEqual({
      id: 's-1',
      phase: 'intent',
      initiator: orchestrator,
      participants: [orchestrator],
      createdAt: '2026-01-01T00:00:00.000Z',
      seenMessageIds: [],
      intentRecorded: false,
      capabilityIds: [],
      contractAccepted: false,
    });
  });

  it('refuses a second session with the same id', () => {
    store.create('s-1', orchestrator);
    const again = store.create('s-1', orchestrator);
    expect(again.ok).toBe(false);
    if (!again.ok) expect(again.error.message).toBe('Session s-1 already exists');
  });

  it('applies legal transitions and stamps closedAt on terminal ones', () => {
    const created = store.create('s-1', orchestrator);
    if (!created.ok) throw created.error;
    const entry = created.value;

    expect(store.transition(entry, 'capability')).toEqual({ ok: true, value: { from: 'intent', to: 'capability' } });
    clock.advance(1000);
    store.transition(entry, 'aborted');
    expect(store.snapshot('s-1')?.closedAt).toBe('2026-01-01T00:00:01.000Z');
  });

  it('rejects illegal transitions with a kind depending on the source phase', () => {
    const created = store.create('s-1', orchestrator);
    if (!created.ok) throw created.error;
    const entry = created.value;

    const skip = store.transition(entry, 'token');
    expect(skip.ok).toBe(false);
    if (!skip.ok) {
      expect(skip.error.kind).toBe('invalid_intent');
      expect(skip.error.message).toBe('Illegal phase transition intent → token');
    }

    store.transition(entry, 'aborted');
    const reopen = store.transition(entry, 'capability');
    expect(reopen.ok).toBe(false);
    if (!reopen.ok) expect(reopen.error.kind).toBe('token_invalid');
  });

  it('advanceTo is a no-op when already in the target phase', () => {
    const created = store.create('s-1', orchestrator);
    if (!created.ok) throw created.error;
    expect(store.advanceTo(created.value, 'intent')).toEqual({ ok: true, value: null });
  });

  it('advanceTo never leads back to the intent phase', () => {
    const created = store.create('s-1', orchestrator);
    if (!created.ok) throw created.error;
    store.transition(created.value, 'capability');
    const back = store.advanceTo(created.value, 'intent');
    expect(back.ok).toBe(false);
    if (!back.ok) {
      expect(back.error.kind).toBe('invalid_intent');
      expect(back.error.message).toBe('Illegal phase transition capability → intent');
    }
  });

  describe('expiry', () => {
    it('expires a negotiating session at its time-to-live and audits it', async () => {
      const created = store.create('s-1', orchestrator);
      if (!created.ok) throw created.error;
      const entry = created.value;

      clock.advance(TTL - 1);
      expect(await store.expireIfStale(entry)).toBe(false);
      clock.advance(1);
      expect(await store.expireIfStale(entry)).toBe(true);
      expect(entry.phase).toBe('expired');

      const [event] = audit.byKind('session_expired');
      expect(event.session_id).toBe('s-1');
      expect(event.severity).toBe('warning');
      expect(event.details).toEqual({ transition: { from: 'intent', to: 'expired' }, age_ms: TTL });
    });

    it('leaves sessions past the contract phase alone', async () => {
      const created = store.create('s-1', orchestrator);
      if (!created.ok) throw created.error;
      const entry = created.value;
      store.transition(entry, 'capability');
      store.transition(entry, 'contract');
      store.transition(entry, 'token');

      clock.advance(TTL * 2);
      expect(await store.expireIfStale(entry)).toBe(false);
      expect(entry.phase).toBe('token');
      expect(audit.size).toBe(0);
    });
  });

  it('lists, adds participants and prunes closed sessions', () => {
    const first = store.create('s-1', orchestrator);
    store.create('s-2', orchestrator);
    if (!first.ok) throw first.error;

    const writer: Actor = { id: 'writer', role: 'agent' };
    store.addParticipant(first.value, writer);
    store.addParticipant(first.value, writer);
    expect(store.snapshot('s-1')?.participants).toEqual([orchestrator, writer]);
    expect(store.list().map(s => s.id)).toEqual(['s-1', 's-2']);

    store.transition(first.value, 'aborted');
    clock.advance(1);
    expect(store.prune(clock.now())).toBe(1);
    expect(store.has('s-1')).toBe(false);
    expect(store.has('s-2')).toBe(true);
    expect(store.snapshot('s-1')).toBeNull();
  });

  it('serialises work on one session', async () => {
    store.create('s-1', orchestrator);
    const order: number[] = [];
    await Promise.all([1, 2, 3].map(n => store.withSession('s-1', async entry => {
      order.push(n);
      await new Promise(r => setTimeout(r, 3));
      return entry?.id;
    })));
    expect(order).toEqual([1, 2, 3]);
  });
});
