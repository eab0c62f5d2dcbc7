// Shared fixtures: a controllable clock, signing parties, document builders and
// a `negotiate` driver that takes a fresh session up to an issued token.

import type {
  ActionExecutor,
  Actor,
  ActorRole,
  AgreedAction,
  Approval,
  AuditEvent,
  AuditSink,
  CapabilityAction,
  Contract,
  Envelope,
  ExecutionRequest,
  ExecutionToken,
  IntentConstraints,
  IntentDeclaration,
  JsonValue,
  MessageType,
  Result,
  RollbackExecutor,
} from '../src/core/types.js';
import type { Disclosed } from '../src/core/capability.js';
import type { EngineConfig } from '../src/core/config.js';
import type { EngineDeps, EngineOutcome } from '../src/engine.js';
import { NegotiationEngine } from '../src/engine.js';
import { Ed25519Signer, Ed25519Verifier, generateId, generateKeypair } from '../src/core/crypto.js';
import type { Keypair } from '../src/core/crypto.js';
import { createEnvelope } from '../src/core/envelope.js';
import { MemoryAuditSink } from '../src/storage/memory.js';

export const START = '2026-01-01T00:00:00.000Z';

export class TestClock {
  private current: number;

  constructor(start: string = START) {
    this.current = Date.parse(start);
  }

  readonly now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export class Party {
  readonly actor: Actor;
  readonly keypair: Keypair = generateKeypair();
  readonly signer: Ed25519Signer;

  constructor(id: string, role: ActorRole = 'agent') {
    this.actor = { id, role };
    this.signer = new Ed25519Signer(this.keypair);
  }
}

// ── Documents ──

export function intentDeclaration(
  constraints: Partial<IntentConstraints> = {},
  actions: string[] = ['write'],
): IntentDeclaration {
  return {
    intent: { goal: 'Publish the release notes', requested_actions: actions.map(action => ({ action })) },
    constraints: {
      risk_tolerance: 'low',
      human_approval_required: false,
      external_side_effects_allowed: false,
      audit_level: 'standard',
      ...constraints,
    },
  };
}

export function capability(capabilityId: string, action: string, options: Partial<CapabilityAction> = {}): Disclosed {
  return {
    capability_id: capabilityId,
    actions: [{ action, scopes: ['production'], requires_approval: false, confidence: 0.8, effects: 'write', ...options }],
  };
}

export function agreed(
  capabilityId: string,
  executorId: string,
  action: string,
  scope = 'production',
  extra: Partial<AgreedAction> = {},
): AgreedAction {
  return { action_id: `aa-${action}-${scope}`, capability_id: capabilityId, executor_id: executorId, action, scope, ...extra };
}

export function contract(
  sessionId: string,
  parties: Actor[],
  agreedActions: AgreedAction[],
  overrides: Partial<Contract> = {},
): Contract {
  return {
    contract_id: 'contract-1',
    session_id: sessionId,
    issued_at: START,
    parties,
    agreed_actions: agreedActions,
    forbidden_actions: [],
    constraints: {},
    enforcement: { mode: 'strict', violation_action: 'deny' },
    approvals: [],
    signatures: {},
    ...overrides,
  };
}

export function approval(decision: Approval['decision'] = 'approve', approverId = 'reviewer'): Approval {
  return { approver_id: approverId, decision, timestamp: START };
}

export function message<P extends object>(
  type: MessageType,
  sender: Actor,
  sessionId: string,
  payload: P,
  options: { inReplyTo?: string; now?: Date } = {},
): Envelope<P> {
  return createEnvelope({
    icnpVersion: '1.0.0',
    type,
    sender,
    sessionId,
    payload,
    inReplyTo: options.inReplyTo,
    now: options.now,
  });
}

// ── Collaborators ──

export class RecordingExecutor implements ActionExecutor {
  readonly requests: ExecutionRequest[] = [];

  async execute(request: ExecutionRequest): Promise<JsonValue> {
    this.requests.push(request);
    return { performed: request.action };
  }
}

export class RecordingRollback implements RollbackExecutor {
  readonly invocations: string[] = [];

  async rollback(invocationId: string): Promise<Result<void, string>> {
    this.invocations.push(invocationId);
    return { ok: true, value: undefined };
  }
}

/** Stores events, except that it refuses the next `failNext(n)` appends */
export class FlakySink implements AuditSink {
  readonly stored = new MemoryAuditSink();
  private refusals = 0;

  failNext(count: number): void {
    this.refusals = count;
  }

  async append(event: AuditEvent): Promise<void> {
    if (this.refusals > 0) {
      this.refusals--;
      throw new Error('disk full');
    }
    await this.stored.append(event);
  }
}

// ── Engine world ──

export interface World {
  clock: TestClock;
  engine: NegotiationEngine;
  verifier: Ed25519Verifier;
  executor: RecordingExecutor;
  rollback: RecordingRollback;
  orchestrator: Party;
  writer: Party;
  sessionId: string;
}

export function createWorld(config: Partial<EngineConfig> = {}, deps: EngineDeps = {}): World {
  const clock = new TestClock();
  const verifier = new Ed25519Verifier();
  const executor = new RecordingExecutor();
  const rollback = new RecordingRollback();
  const orchestrator = new Party('orchestrator', 'orchestrator');
  const writer = new Party('writer');
  verifier.register(writer.actor.id, writer.keypair.publicKey);
  const engine = new NegotiationEngine({ clock: clock.now, ...config }, { verifier, executor, rollback, ...deps });
  return { clock, engine, verifier, executor, rollback, orchestrator, writer, sessionId: generateId() };
}

export interface NegotiateOptions {
  constraints?: Partial<IntentConstraints>;
  actions?: string[];
  capabilities?: Disclosed[];
  contract?: Partial<Contract>;
  agreed?: AgreedAction[];
}

export function expectStatus(outcome: EngineOutcome, status: EngineOutcome['status'], step: string): void {
  if (outcome.status !== status) {
    throw new Error(`${step}: expected ${status}, got ${outcome.status} (${outcome.error?.message ?? 'no error'})`);
  }
}

/** Intent and disclosure only; the session ends in the capability phase */
export async function openSession(world: World, options: NegotiateOptions = {}): Promise<void> {
  const { engine, orchestrator, writer, sessionId, clock } = world;
  const intent = message('intent_declaration', orchestrator.actor, sessionId,
    intentDeclaration(options.constraints, options.actions), { now: clock.now() });
  expectStatus(await engine.receive(intent), 'accepted', 'intent');
  const disclosure = message('capability_disclosure', writer.actor, sessionId,
    { capabilities: options.capabilities ?? [capability('cap-writer', 'write')] }, { now: clock.now() });
  expectStatus(await engine.receive(disclosure), 'accepted', 'disclosure');
}

/** Propose the contract and return it; the session ends in the contract phase */
export async function propose(world: World, options: NegotiateOptions = {}): Promise<Contract> {
  const { engine, orchestrator, writer, sessionId, clock } = world;
  const draft = contract(
    sessionId,
    [orchestrator.actor, writer.actor],
    options.agreed ?? [agreed('cap-writer', writer.actor.id, 'write')],
    options.contract,
  );
  const proposal = message('contract_proposal', orchestrator.actor, sessionId, { contract: draft }, { now: clock.now() });
  expectStatus(await engine.receive(proposal), 'accepted', 'proposal');
  return draft;
}

export async function acceptanceBy(world: World, party: Party, draft: Contract): Promise<EngineOutcome> {
  const signature = await party.signer.sign(world.engine.negotiator.signingBytes(draft));
  return world.engine.receive(message('contract_acceptance', party.actor, world.sessionId,
    { contract_id: draft.contract_id, decision: 'accept', signature }, { now: world.clock.now() }));
}

/** Drive a fresh session up to an issued token */
export async function negotiate(
  world: World,
  options: NegotiateOptions = {},
): Promise<{ contract: Contract; token: Readonly<ExecutionToken> }> {
  await openSession(world, options);
  const draft = await propose(world, options);
  expectStatus(await acceptanceBy(world, world.writer, draft), 'accepted', 'acceptance');

  const tokenId = world.engine.getSession(world.sessionId)?.tokenId;
  const token = tokenId ? world.engine.issuer.resolve(tokenId) : undefined;
  if (!token) throw new Error('negotiate: no token issued');
  return { contract: draft, token };
}

export function executionRequest(
  world: World,
  token: Readonly<ExecutionToken>,
  overrides: Partial<ExecutionRequest> = {},
): Envelope<{ request: ExecutionRequest }> {
  return message('execution_request', world.orchestrator.actor, world.sessionId, {
    request: {
      invocation_id: generateId(),
      token_id: token.token_id,
      contract_id: token.contract_id,
      action: 'write',
      scope: 'production',
      executor: world.writer.actor,
      parameters: {},
      ...overrides,
    },
  }, { now: world.clock.now() });
}
