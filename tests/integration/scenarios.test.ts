import { describe, it, expect } from 'vitest';
import type { Disclosed } from '../../src/core/capability.js';
import type { ForbiddenAction } from '../../src/core/types.js';
import type { EngineOutcome } from '../../src/engine.js';
import { check, validators } from '../../src/core/schemas.js';
import { generateId } from '../../src/core/crypto.js';
import {
  acceptanceBy,
  agreed,
  createWorld,
  executionRequest,
  intentDeclaration,
  message,
  negotiate,
  openSession,
  propose,
} from '../helpers.js';

const writeAndDelete: Disclosed = {
  capability_id: 'cap-writer',
  actions: [
    { action: 'write', scopes: ['production'], requires_approval: false, confidence: 0.8, effects: 'write' },
    { action: 'delete', scopes: ['any'], requires_approval: false, confidence: 0.8, effects: 'write' },
  ],
};

function resultOf(outcome: EngineOutcome) {
  const parsed = check(validators.executionResult, outcome.replies[0]?.payload);
  if (!parsed.ok) throw new Error(`no execution_result reply: ${parsed.error}`);
  return parsed.value.result;
}

describe('Scenario A: approval required, none recorded', () => {
  it('refuses to issue a token with unauthorised_action', async () => {
    const world = createWorld();
    await openSession(world, { constraints: { human_approval_required: true } });
    await propose(world);

    const issued = await world.engine.issueToken(world.sessionId);
    expect(issued.ok).toBe(false);
    if (!issued.ok) {
      expect(issued.error.kind).toBe('unauthorised_action');
      expect(issued.error.code).toBe('ICNP-004');
    }
    expect(world.engine.getSession(world.sessionId)?.tokenId).toBeUndefined();
    expect(world.engine.getSession(world.sessionId)?.phase).toBe('contract');
    expect(world.engine.audit.byKind('token_issued')).toHaveLength(0);
  });

  it('rejects the final acceptance instead of auto-issuing', async () => {
    const world = createWorld();
    await openSession(world, { constraints: { human_approval_required: true } });
    const draft = await propose(world);

    const outcome = await acceptanceBy(world, world.writer, draft);
    expect(outcome.status).toBe('rejected');
    expect(outcome.error?.code).toBe('ICNP-004');
    expect(outcome.replies[0].type).toBe('error');
    expect(world.engine.getSession(world.sessionId)?.contractAccepted).toBe(false);
  });

  it('issues once an approval is part of the contract', async () => {
    const world = createWorld();
    const { token } = await negotiate(world, {
      constraints: { human_approval_required: true },
      contract: { approvals: [{ approver_id: 'reviewer', decision: 'approve', timestamp: '2026-01-01T00:00:00.000Z' }] },
    });
    expect(token.contract_id).toBe('contract-1');
  });
});

describe('Scenario B: forbidden action also agreed', () => {
  it('denies the dominated action regardless of the agreement', async () => {
    const world = createWorld();
    const { token } = await negotiate(world, {
      capabilities: [writeAndDelete],
      agreed: [agreed('cap-writer', 'writer', 'write'), agreed('cap-writer', 'writer', 'delete', 'any')],
      contract: { forbidden_actions: [{ action: 'delete', scope: 'any' }] },
    });

    const outcome = await world.engine.receive(executionRequest(world, token, { action: 'delete', scope: 'any' }));
    expect(outcome.status).toBe('rejected');
    expect(outcome.error?.kind).toBe('unauthorised_action');
    expect(outcome.error?.message).toBe('Action delete is forbidden');
    expect(world.executor.requests).toHaveLength(0);
    expect(world.engine.audit.byKind('violation')).toHaveLength(1);

    const allowed = await world.engine.receive(executionRequest(world, token));
    expect(allowed.status).toBe('accepted');
    expect(resultOf(allowed).status).toBe('success');
  });
});

describe('Scenario C: token of another contract, strict with rollback', () => {
  it('denies with token_invalid, records the violation and rolls back', async () => {
    const world = createWorld();
    const { token } = await negotiate(world, {
      contract: { enforcement: { mode: 'strict', violation_action: 'abort_and_rollback' } },
    });

    const request = executionRequest(world, token, { contract_id: 'contract-other' });
    const outcome = await world.engine.receive(request);

    expect(outcome.status).toBe('rejected');
    expect(outcome.error?.kind).toBe('token_invalid');
    expect(outcome.error?.code).toBe('ICNP-005');
    expect(outcome.replies[0].type).toBe('error');
    expect(outcome.replies[0].in_reply_to).toBe(request.message_id);

    const violations = world.engine.audit.byKind('violation');
    expect(violations).toHaveLength(1);
    expect(violations[0].severity).toBe('critical');
    expect(violations[0].details.transition).toEqual({ from: 'token', to: 'aborted' });

    expect(world.rollback.invocations).toEqual([request.payload.request.invocation_id]);
    expect(world.engine.audit.byKind('rollback')).toHaveLength(1);
    expect(world.executor.requests).toHaveLength(0);
    expect(world.engine.getSession(world.sessionId)?.phase).toBe('aborted');
  });

  it('denies a token presented in a session it was not issued for', async () => {
    const world = createWorld();
    const other = { ...world, sessionId: generateId() };
    const { token } = await negotiate(world);
    await negotiate(other);

    const outcome = await world.engine.receive(executionRequest(other, token));
    expect(outcome.error?.kind).toBe('token_invalid');
    expect(outcome.error?.message).toBe(`Token ${token.token_id} belongs to session ${world.sessionId}`);
  });
});

describe('Scenario D: audit-only enforcement', () => {
  it('executes the unauthorised action and records a violation', async () => {
    const world = createWorld();
    const { token } = await negotiate(world, {
      contract: { enforcement: { mode: 'audit_only', violation_action: 'deny' } },
    });

    const outcome = await world.engine.receive(executionRequest(world, token, { action: 'delete' }));
    expect(outcome.status).toBe('accepted');
    const result = resultOf(outcome);
    expect(result.status).toBe('success');
    expect(result.output).toEqual({ performed: 'delete' });
    expect(result.violations).toEqual(['writer is not authorised to perform delete']);

    const violations = world.engine.audit.byKind('violation');
    expect(violations).toHaveLength(1);
    expect(violations[0].severity).toBe('info');
    expect(violations[0].details.outcome).toBe('tolerated');
    expect(world.engine.audit.byKind('execution_completed')).toHaveLength(1);
  });
});

describe('Properties', () => {
  const forbiddenVariants: ForbiddenAction[] = [
    { action: 'delete', scope: 'any' },
    { action: 'delete', scope: '*' },
    { action: 'delete' },
    { action: '*' },
  ];

  for (const forbidden of forbiddenVariants) {
    it(`always denies an action that is both agreed and forbidden (${JSON.stringify(forbidden)})`, async () => {
      const world = createWorld();
      const { token } = await negotiate(world, {
        capabilities: [writeAndDelete],
        agreed: [agreed('cap-writer', 'writer', 'delete', 'any')],
        actions: ['delete'],
        contract: { forbidden_actions: [forbidden] },
      });

      for (const scope of ['any', 'production', 'staging']) {
        const outcome = await world.engine.receive(executionRequest(world, token, { action: 'delete', scope }));
        expect(outcome.error?.kind).toBe('unauthorised_action');
      }
      expect(world.executor.requests).toHaveLength(0);
    });
  }

  it('validates tokens inside [not_before, not_after) only', async () => {
    const world = createWorld();
    const { token } = await negotiate(world);
    const notBefore = Date.parse(token.validity.not_before);
    const notAfter = Date.parse(token.validity.not_after);
    const issuer = world.engine.issuer;

    expect(notAfter - notBefore).toBe(10 * 60_000);
    expect(await issuer.validate(token, new Date(notBefore))).toBe(true);
    expect(await issuer.validate(token, new Date(notAfter - 1))).toBe(true);
    expect(await issuer.validate(token, new Date(notAfter))).toBe(false);
    expect(await issuer.validate(token, new Date(notBefore - 1))).toBe(false);
  });

  it('rejects a token whose signed fields were altered', async () => {
    const world = createWorld();
    const { token } = await negotiate(world);
    const tampered = { ...token, limits: { ...token.limits, max_invocations_per_actor: 99 } };
    expect(await world.engine.issuer.validate(tampered, new Date(token.validity.not_before))).toBe(false);
  });

  for (const n of [1, 3, 5]) {
    it(`denies exactly the request after ${n} from the same actor`, async () => {
      const world = createWorld({ defaultLimits: { max_invocations_per_actor: n } });
      const { token } = await negotiate(world);

      const statuses: string[] = [];
      for (let i = 0; i <= n; i++) {
        const outcome = await world.engine.receive(executionRequest(world, token));
        statuses.push(outcome.error?.code ?? outcome.status);
      }
      expect(statuses).toEqual([...Array<string>(n).fill('accepted'), 'ICNP-004']);
      expect(world.executor.requests).toHaveLength(n);
    });
  }

  it('treats a re-delivered envelope as a no-op with one audit entry', async () => {
    const world = createWorld();
    const intent = message('intent_declaration', world.orchestrator.actor, world.sessionId, intentDeclaration());

    const first = await world.engine.receive(intent);
    const snapshot = world.engine.getSession(world.sessionId);
    const second = await world.engine.receive(intent);

    expect(first.status).toBe('accepted');
    expect(second.status).toBe('duplicate');
    expect(world.engine.getSession(world.sessionId)).toEqual(snapshot);
    expect(world.engine.audit.bySession(world.sessionId)).toHaveLength(1);
  });

  it('replays the original reply for a re-delivered execution request', async () => {
    const world = createWorld();
    const { token } = await negotiate(world);
    const request = executionRequest(world, token);

    const first = await world.engine.receive(request);
    const auditSize = world.engine.audit.size;
    const again = await world.engine.receive(request);

    expect(again.status).toBe('duplicate');
    expect(again.replies).toEqual(first.replies);
    expect(world.engine.audit.size).toBe(auditSize);
    expect(world.executor.requests).toHaveLength(1);
  });

  it('numbers audit events with one global sequence across sessions', async () => {
    const world = createWorld();
    const other = { ...world, sessionId: generateId() };
    await Promise.all([negotiate(world), negotiate(other)]);

    const sequences = world.engine.audit.entries().map(e => e.sequence);
    expect(sequences).toEqual(sequences.map((_, i) => i + 1));
    expect(new Set(world.engine.audit.entries().map(e => e.session_id))).toEqual(
      new Set([world.sessionId, other.sessionId]),
    );
  });
});
