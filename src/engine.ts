/**
 * Negotiation Engine — entry point for inbound envelopes.
 *
 * Each envelope goes through: structural validation → per-session lock →
 * duplicate check → lazy expiry → causality check → payload schema → handler.
 * Every rejected message yields exactly one `rejected` audit record and an
 * `error` envelope referencing it. Replies are cached per message id so a
 * re-delivered envelope gets the same answer and changes nothing.
 */

import type {
  ActionExecutor,
  AuditEventInput,
  AuditSink,
  Contract,
  Envelope,
  ExecutionToken,
  JsonObject,
  MessageType,
  PhaseChange,
  Result,
  RollbackExecutor,
  SessionSnapshot,
} from './core/types.js';
import type { EngineConfig } from './core/config.js';
import type { Canonicalizer, Signer, Verifier } from './core/crypto.js';
import type { CapabilityScorer } from './core/capability.js';
import type { DraftOptions } from './core/contract.js';
import type { IssueOptions } from './core/token.js';
import type { RevocationEntry, RevocationListInterface } from './core/revocation.js';
import type { SessionEntry } from './core/session.js';
import type { ValidateFunction } from 'ajv';
import { resolveConfig } from './core/config.js';
import { AuditLog } from './core/audit.js';
import { SessionStore, isTerminal } from './core/session.js';
import { admit, createEnvelope, createErrorEnvelope, validateEnvelope } from './core/envelope.js';
import { recordIntent, requestedActionNames, validateIntent } from './core/intent.js';
import { ExactActionScorer, discloseCapabilities } from './core/capability.js';
import { ContractNegotiator } from './core/contract.js';
import { TokenIssuer } from './core/token.js';
import { DryRunExecutor, EnforcementGate } from './core/enforcement.js';
import { InMemoryRevocationList } from './core/revocation.js';
import { CollaboratorGuard } from './core/collaborator.js';
import { Ed25519Signer, Ed25519Verifier, JcsCanonicalizer, generateKeypair } from './core/crypto.js';
import { MetricsCollector } from './core/metrics.js';
import { ProtocolError, fail, ok, toError, toProtocolError } from './core/errors.js';
import type { ErrorKind } from './core/errors.js';
import { check, validators } from './core/schemas.js';
import { createLogger } from './core/logger.js';

const logger = createLogger('NegotiationEngine');

/** Collaborators; every one has an in-process default */
export interface EngineDeps {
  signer?: Signer;
  verifier?: Verifier;
  canonicalizer?: Canonicalizer;
  scorer?: CapabilityScorer;
  executor?: ActionExecutor;
  rollback?: RollbackExecutor;
  sink?: AuditSink;
  revocations?: RevocationListInterface;
  metrics?: MetricsCollector;
}

export type OutcomeStatus = 'accepted' | 'duplicate' | 'rejected';

export interface EngineOutcome {
  status: OutcomeStatus;
  replies: Envelope<object>[];
  error?: ProtocolError;
  session: SessionSnapshot | null;
}

interface HandlerOutput {
  replies: Envelope<object>[];
  /** Failure already audited by the handler (execution denials) */
  denied?: ProtocolError;
}

type HandlerResult = Result<HandlerOutput, ProtocolError>;

/** Error kind for a payload that fails its schema */
const MALFORMED_KIND: Record<MessageType, ErrorKind> = {
  intent_declaration: 'invalid_intent',
  capability_disclosure: 'capability_mismatch',
  contract_proposal: 'constraints_unsatisfiable',
  contract_counterproposal: 'constraints_unsatisfiable',
  contract_acceptance: 'unauthorised_action',
  contract_rejection: 'unauthorised_action',
  execution_token: 'token_invalid',
  execution_request: 'unauthorised_action',
  execution_result: 'invalid_intent',
  audit_event: 'invalid_intent',
  error: 'invalid_intent',
};

function transitionDetails(change: PhaseChange | null, details: JsonObject = {}): JsonObject {
  return change ? { ...details, transition: { from: change.from, to: change.to } } : details;
}

/** Best-effort id fields of an envelope that failed validation */
function salvageIds(raw: unknown): { messageId?: string; sessionId?: string } {
  if (typeof raw !== 'object' || raw === null) return {};
  const messageId: unknown = Reflect.get(raw, 'message_id');
  const sessionId: unknown = Reflect.get(raw, 'session_id');
  return {
    messageId: typeof messageId === 'string' ? messageId : undefined,
    sessionId: typeof sessionId === 'string' ? sessionId : undefined,
  };
}

export class NegotiationEngine {
  readonly config: EngineConfig;
  readonly audit: AuditLog;
  readonly sessions: SessionStore;
  readonly negotiator: ContractNegotiator;
  readonly issuer: TokenIssuer;
  readonly gate: EnforcementGate;
  readonly metrics: MetricsCollector;
  readonly verifier: Verifier;
  readonly signatureGuard: CollaboratorGuard;

  constructor(config: Partial<EngineConfig> = {}, deps: EngineDeps = {}) {
    this.config = resolveConfig(config);
    const { clock, collaboratorTimeoutMs, circuitBreaker } = this.config;

    this.metrics = deps.metrics ?? new MetricsCollector();
    this.audit = new AuditLog(deps.sink, clock, new CollaboratorGuard('audit sink', collaboratorTimeoutMs, circuitBreaker, clock));
    this.sessions = new SessionStore({ negotiationTtlMs: this.config.negotiationTtlMs, clock }, this.audit);
    this.verifier = deps.verifier ?? new Ed25519Verifier();
    const canonicalizer = deps.canonicalizer ?? new JcsCanonicalizer();
    this.signatureGuard = new CollaboratorGuard('signature', collaboratorTimeoutMs, circuitBreaker, clock);

    this.negotiator = new ContractNegotiator({
      store: this.sessions,
      verifier: this.verifier,
      canonicalizer,
      scorer: deps.scorer ?? new ExactActionScorer(),
      guard: this.signatureGuard,
      clock,
    });
    this.issuer = new TokenIssuer({
      store: this.sessions,
      signer: deps.signer ?? new Ed25519Signer(generateKeypair()),
      verifier: this.verifier,
      canonicalizer,
      revocations: deps.revocations ?? new InMemoryRevocationList(),
      guard: this.signatureGuard,
      issuer: this.config.engineActor,
      tokenTtlMs: this.config.tokenTtlMs,
      defaultLimits: this.config.defaultLimits,
      clock,
    });
    this.gate = new EnforcementGate({
      store: this.sessions,
      issuer: this.issuer,
      audit: this.audit,
      metrics: this.metrics,
      executor: deps.executor ?? new DryRunExecutor(),
      rollback: deps.rollback,
      executorGuard: new CollaboratorGuard('executor', collaboratorTimeoutMs, circuitBreaker, clock),
      rollbackGuard: new CollaboratorGuard('rollback', collaboratorTimeoutMs, circuitBreaker, clock),
      clock,
    });
  }

  // ── Inbound messages ──

  async receive(raw: unknown): Promise<EngineOutcome> {
    const validated = validateEnvelope(raw);
    if (!validated.ok) {
      const { messageId, sessionId } = salvageIds(raw);
      return this.rejectMalformed(validated.error, messageId, sessionId);
    }
    const envelope = validated.value;

    return this.sessions.withSession(envelope.session_id, async (existing): Promise<EngineOutcome> => {
      try {
        return await this.process(existing, envelope);
      } catch (err) {
        // Whatever state the handler reached stands; the sender learns of the failure
        return this.reject(this.sessions.get(envelope.session_id), envelope, toProtocolError(err));
      }
    });
  }

  private async process(existing: SessionEntry | undefined, envelope: Envelope): Promise<EngineOutcome> {
    const log = logger.child({ sessionId: envelope.session_id, messageId: envelope.message_id, type: envelope.type });

    if (existing?.seenMessageIds.has(envelope.message_id)) {
      log.debug('Duplicate delivery');
      this.metrics.counter('engine.duplicate', { type: envelope.type });
      return {
        status: 'duplicate',
        replies: existing.replies.get(envelope.message_id) ?? [],
        session: this.sessions.snapshot(existing.id),
      };
    }

    let entry = existing;
    if (!entry) {
      const opened = this.openSession(envelope);
      if (!opened.ok) return this.reject(undefined, envelope, opened.error);
      entry = opened.value;
    } else if (await this.sessions.expireIfStale(entry)) {
      return this.refuseFinally(entry, envelope, new ProtocolError('token_invalid', `Session ${entry.id} has expired`));
    }

    if (isTerminal(entry.phase) && envelope.type !== 'execution_request') {
      return this.refuseFinally(entry, envelope, new ProtocolError('token_invalid', `Session ${entry.id} is ${entry.phase}`));
    }

    const admission = admit(entry, envelope);
    if (!admission.ok) return this.reject(entry, envelope, admission.error);

    const handled = await this.dispatch(entry, envelope);
    if (!handled.ok) return this.reject(entry, envelope, handled.error);

    this.remember(entry, envelope, handled.value.replies);
    if (handled.value.denied) {
      return {
        status: 'rejected',
        replies: handled.value.replies,
        error: handled.value.denied,
        session: this.sessions.snapshot(entry.id),
      };
    }
    log.info('Message accepted', { phase: entry.phase });
    return { status: 'accepted', replies: handled.value.replies, session: this.sessions.snapshot(entry.id) };
  }

  /** A session opens with its intent declaration; the sender becomes the initiator */
  private openSession(envelope: Envelope): Result<SessionEntry, ProtocolError> {
    if (envelope.type !== 'intent_declaration') {
      return fail('invalid_intent', `Unknown session ${envelope.session_id}`);
    }
    // Nothing has been said in a session that does not exist yet
    if (envelope.in_reply_to !== undefined) {
      return fail('invalid_intent', `in_reply_to references unknown message ${envelope.in_reply_to}`, {
        details: { in_reply_to: envelope.in_reply_to },
      });
    }
    const payload = this.payload(validators.intentDeclaration, envelope);
    if (!payload.ok) return payload;
    const semantic = validateIntent(payload.value);
    if (!semantic.ok) return semantic;
    return this.sessions.create(envelope.session_id, envelope.sender);
  }

  private dispatch(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    switch (envelope.type) {
      case 'intent_declaration':
        return this.onIntent(entry, envelope);
      case 'capability_disclosure':
        return this.onCapabilities(entry, envelope);
      case 'contract_proposal':
      case 'contract_counterproposal':
        return this.onProposal(entry, envelope);
      case 'contract_acceptance':
        return this.onAcceptance(entry, envelope);
      case 'contract_rejection':
        return this.onRejection(entry, envelope);
      case 'execution_request':
        return this.onExecutionRequest(entry, envelope);
      case 'execution_result':
        return this.onExecutionResult(entry, envelope);
      case 'execution_token':
      case 'audit_event':
      case 'error':
        return this.onRecordOnly(entry, envelope);
    }
  }

  private async onIntent(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    const payload = this.payload(validators.intentDeclaration, envelope);
    if (!payload.ok) return payload;
    const recorded = recordIntent(entry, payload.value);
    if (!recorded.ok) return recorded;

    await this.audit.record({
      kind: 'intent_recorded',
      session_id: entry.id,
      subject_ids: [envelope.sender.id],
      related_message_id: envelope.message_id,
      details: {
        goal: recorded.value.intent.goal,
        requested_actions: requestedActionNames(recorded.value),
        human_approval_required: recorded.value.constraints.human_approval_required,
      },
    });
    return ok({ replies: [] });
  }

  private async onCapabilities(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    const payload = this.payload(validators.capabilityDisclosure, envelope);
    if (!payload.ok) return payload;
    const disclosed = discloseCapabilities(this.sessions, entry, envelope.sender, payload.value);
    if (!disclosed.ok) return disclosed;

    await this.audit.record({
      kind: 'capability_disclosed',
      session_id: entry.id,
      subject_ids: [envelope.sender.id, ...disclosed.value.added],
      related_message_id: envelope.message_id,
      details: transitionDetails(disclosed.value.transition, {
        owner_id: envelope.sender.id,
        capability_ids: disclosed.value.added,
      }),
    });
    return ok({ replies: [] });
  }

  private async onProposal(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    const payload = this.payload(validators.contractProposal, envelope);
    if (!payload.ok) return payload;
    if (!entry.participants.has(envelope.sender.id)) {
      return fail('unauthorised_action', `${envelope.sender.id} is not a participant of session ${entry.id}`);
    }

    const counter = envelope.type === 'contract_counterproposal';
    const replaced = entry.proposal?.contract_id;
    const proposed = counter
      ? this.negotiator.counterPropose(entry, payload.value.contract)
      : this.negotiator.propose(entry, payload.value.contract);
    if (!proposed.ok) return proposed;

    const details: JsonObject = {
      contract_id: proposed.value.contract.contract_id,
      agreed_actions: proposed.value.contract.agreed_actions.length,
      forbidden_actions: proposed.value.contract.forbidden_actions.length,
      counter,
    };
    if (counter && replaced) details.replaced = replaced;
    await this.audit.record({
      kind: 'contract_proposed',
      session_id: entry.id,
      subject_ids: [proposed.value.contract.contract_id],
      related_message_id: envelope.message_id,
      details: transitionDetails(proposed.value.transition, details),
    });
    return ok({ replies: [] });
  }

  private async onAcceptance(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    const payload = this.payload(validators.contractAcceptance, envelope);
    if (!payload.ok) return payload;
    const { contract_id: contractId, signature } = payload.value;

    const signed = await this.negotiator.sign(entry, envelope.sender.id, contractId, signature);
    if (!signed.ok) return signed;
    await this.audit.record({
      kind: 'contract_signed',
      session_id: entry.id,
      subject_ids: [contractId, envelope.sender.id],
      related_message_id: envelope.message_id,
      details: { contract_id: contractId, signer_id: envelope.sender.id, missing: signed.value.missing },
    });
    if (signed.value.missing.length > 0) return ok({ replies: [] });

    const accepted = this.negotiator.accept(entry);
    if (!accepted.ok) return accepted;
    await this.audit.record({
      kind: 'contract_accepted',
      session_id: entry.id,
      subject_ids: [contractId],
      related_message_id: envelope.message_id,
      details: {
        contract_id: contractId,
        mode: accepted.value.enforcement.mode,
        violation_action: accepted.value.enforcement.violation_action,
        approvals: accepted.value.approvals.length,
      },
    });
    if (!this.config.autoIssueToken) return ok({ replies: [] });

    const issued = await this.issueWithin(entry, {}, envelope.message_id);
    if (!issued.ok) return issued;
    return ok({ replies: [this.reply(envelope, 'execution_token', { token: issued.value })] });
  }

  private async onRejection(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    const payload = this.payload(validators.contractRejection, envelope);
    if (!payload.ok) return payload;
    const rejected = this.negotiator.reject(entry, payload.value.contract_id);
    if (!rejected.ok) return rejected;

    await this.audit.record({
      kind: 'contract_rejected',
      session_id: entry.id,
      subject_ids: [payload.value.contract_id, envelope.sender.id],
      related_message_id: envelope.message_id,
      severity: 'warning',
      details: transitionDetails(rejected.value, { contract_id: payload.value.contract_id, reason: payload.value.reason }),
    });
    return ok({ replies: [] });
  }

  private async onExecutionRequest(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    const payload = this.payload(validators.executionRequest, envelope);
    if (!payload.ok) return payload;
    const request = payload.value.request;

    const outcome = await this.gate.handle(entry, request, envelope.message_id);
    if (outcome.error) {
      const error = new ProtocolError(outcome.error.kind, outcome.error.message, {
        details: { invocation_id: request.invocation_id, token_id: request.token_id },
      });
      return ok({ replies: [this.errorReply(envelope, error)], denied: error });
    }
    return ok({ replies: [this.reply(envelope, 'execution_result', { result: outcome.result })] });
  }

  private async onExecutionResult(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    const payload = this.payload(validators.executionResult, envelope);
    if (!payload.ok) return payload;
    const { result } = payload.value;
    await this.audit.record({
      kind: 'message_recorded',
      session_id: entry.id,
      subject_ids: [result.invocation_id],
      related_message_id: envelope.message_id,
      details: { type: envelope.type, invocation_id: result.invocation_id, status: result.status },
    });
    return ok({ replies: [] });
  }

  private async onRecordOnly(entry: SessionEntry, envelope: Envelope): Promise<HandlerResult> {
    await this.audit.record({
      kind: 'message_recorded',
      session_id: entry.id,
      subject_ids: [envelope.sender.id],
      related_message_id: envelope.message_id,
      details: { type: envelope.type },
    });
    return ok({ replies: [] });
  }

  // ── Operations outside the message flow ──

  /** Issue the token of a session explicitly (when `autoIssueToken` is off, or to retry) */
  async issueToken(sessionId: string, options: IssueOptions = {}): Promise<Result<Readonly<ExecutionToken>, ProtocolError>> {
    return this.sessions.withSession(sessionId, entry => this.operation(sessionId, 'issue_token', async (): Promise<Result<Readonly<ExecutionToken>, ProtocolError>> => {
      const touched = await this.touch(sessionId, entry);
      if (!touched.ok) return this.rejectOperation(sessionId, 'issue_token', touched.error);
      const issued = await this.issueWithin(touched.value, options);
      if (!issued.ok) return this.rejectOperation(sessionId, 'issue_token', issued.error);
      return issued;
    }));
  }

  /** Close a session whose execution phase is over */
  async completeSession(sessionId: string): Promise<Result<PhaseChange, ProtocolError>> {
    return this.closeSession(sessionId, 'completed', 'complete_session');
  }

  async abortSession(sessionId: string, reason: string): Promise<Result<PhaseChange, ProtocolError>> {
    return this.closeSession(sessionId, 'aborted', 'abort_session', reason);
  }

  /** Apply a signed revocation entry; later execution requests with the token are denied */
  async revokeToken(revocation: RevocationEntry): Promise<Result<void, ProtocolError>> {
    const token = this.issuer.resolve(revocation.token_id);
    const sessionId = token?.session_id ?? null;
    const apply = async (): Promise<Result<void, ProtocolError>> => {
      const revoked = this.issuer.revoke(revocation);
      if (!revoked.ok) return this.rejectOperation(sessionId, 'revoke_token', revoked.error);
      await this.audit.record({
        kind: 'token_revoked',
        session_id: sessionId,
        subject_ids: [revocation.token_id],
        severity: 'warning',
        details: { token_id: revocation.token_id, revoked_by: revocation.revoked_by, reason: revocation.reason },
      });
      return ok(undefined);
    };
    const run = (): Promise<Result<void, ProtocolError>> => this.operation(sessionId, 'revoke_token', apply);
    return sessionId ? this.sessions.withSession(sessionId, run) : run();
  }

  /** Draft a contract for a session from its intent and capability ledger */
  async draftContract(sessionId: string, options: DraftOptions = {}): Promise<Result<Contract, ProtocolError>> {
    return this.sessions.withSession(sessionId, async (entry): Promise<Result<Contract, ProtocolError>> => {
      if (!entry) return fail('invalid_intent', `Unknown session ${sessionId}`);
      return this.negotiator.draftFromIntent(entry, options);
    });
  }

  /** Drop sessions closed before `before`, with the tokens they held */
  pruneSessions(before: Date): number {
    return this.sessions.prune(before, entry => {
      if (entry.token) this.issuer.forget(entry.token.token_id);
    });
  }

  getSession(sessionId: string): SessionSnapshot | null {
    return this.sessions.snapshot(sessionId);
  }

  listSessions(): SessionSnapshot[] {
    return this.sessions.list();
  }

  // ── Internals ──

  private async issueWithin(
    entry: SessionEntry,
    options: IssueOptions,
    relatedMessageId?: string,
  ): Promise<Result<Readonly<ExecutionToken>, ProtocolError>> {
    const issued = await this.issuer.issue(entry, options);
    if (!issued.ok) return issued;
    const { token, transition } = issued.value;
    await this.audit.record({
      kind: 'token_issued',
      session_id: entry.id,
      subject_ids: [token.token_id, ...token.audience.map(a => a.id)],
      related_message_id: relatedMessageId,
      details: transitionDetails(transition, {
        token_id: token.token_id,
        contract_id: token.contract_id,
        not_before: token.validity.not_before,
        not_after: token.validity.not_after,
      }),
    });
    return ok(token);
  }

  /** Resolve a session and apply lazy expiry */
  private async touch(sessionId: string, entry: SessionEntry | undefined): Promise<Result<SessionEntry, ProtocolError>> {
    if (!entry) return fail('invalid_intent', `Unknown session ${sessionId}`);
    if (await this.sessions.expireIfStale(entry)) return fail('token_invalid', `Session ${sessionId} has expired`);
    return ok(entry);
  }

  private closeSession(
    sessionId: string,
    target: 'completed' | 'aborted',
    operation: string,
    reason?: string,
  ): Promise<Result<PhaseChange, ProtocolError>> {
    return this.sessions.withSession(sessionId, entry => this.operation(sessionId, operation, async (): Promise<Result<PhaseChange, ProtocolError>> => {
      const touched = await this.touch(sessionId, entry);
      if (!touched.ok) return this.rejectOperation(sessionId, operation, touched.error);
      const change = this.sessions.transition(touched.value, target);
      if (!change.ok) return this.rejectOperation(sessionId, operation, change.error);

      const details: JsonObject = transitionDetails(change.value, { operation });
      if (reason !== undefined) details.reason = reason;
      await this.audit.record({
        kind: 'phase_transition',
        session_id: sessionId,
        subject_ids: [sessionId],
        severity: target === 'aborted' ? 'warning' : 'info',
        details,
      });
      return ok(change.value);
    }));
  }

  /** Run an operation, turning anything it throws into a rejected result */
  private async operation<T>(
    sessionId: string | null,
    name: string,
    fn: () => Promise<Result<T, ProtocolError>>,
  ): Promise<Result<T, ProtocolError>> {
    try {
      return await fn();
    } catch (err) {
      return this.rejectOperation(sessionId, name, toProtocolError(err));
    }
  }

  private payload<T>(validate: ValidateFunction<T>, envelope: Envelope): Result<T, ProtocolError> {
    const result = check(validate, envelope.payload);
    if (result.ok) return result;
    return fail(MALFORMED_KIND[envelope.type], `Malformed ${envelope.type} payload: ${result.error}`);
  }

  private reply(to: Envelope, type: MessageType, payload: object): Envelope<object> {
    return createEnvelope({
      icnpVersion: this.config.icnpVersion,
      type,
      sender: this.config.engineActor,
      sessionId: to.session_id,
      payload,
      recipient: to.sender,
      inReplyTo: to.message_id,
      trace: to.trace,
      now: this.config.clock(),
    });
  }

  private errorReply(to: Envelope, error: ProtocolError): Envelope<object> {
    return createErrorEnvelope(error, {
      icnpVersion: this.config.icnpVersion,
      sender: this.config.engineActor,
      sessionId: to.session_id,
      related: to,
      now: this.config.clock(),
    });
  }

  /** Cache the replies and make their ids referable by later messages */
  private remember(entry: SessionEntry, envelope: Envelope, replies: Envelope<object>[]): void {
    entry.replies.set(envelope.message_id, replies);
    for (const reply of replies) entry.recordedMessageIds.add(reply.message_id);
  }

  private async reject(entry: SessionEntry | undefined, envelope: Envelope, error: ProtocolError): Promise<EngineOutcome> {
    logger.warn('Message rejected', {
      sessionId: envelope.session_id,
      messageId: envelope.message_id,
      type: envelope.type,
      code: error.code,
      reason: error.message,
    });
    this.metrics.counter('engine.rejected', { kind: error.kind });
    await this.recordRejection({
      kind: 'rejected',
      session_id: envelope.session_id,
      subject_ids: [envelope.message_id],
      related_message_id: envelope.message_id,
      severity: error.kind === 'internal_error' ? 'critical' : 'warning',
      details: { type: envelope.type, error: error.toJSON() },
    });

    const replies = [this.errorReply(envelope, error)];
    // Cached once the message was admitted or refused for good; otherwise a re-delivery is judged afresh
    if (entry?.seenMessageIds.has(envelope.message_id)) this.remember(entry, envelope, replies);
    return {
      status: 'rejected',
      replies,
      error,
      session: entry ? this.sessions.snapshot(entry.id) : null,
    };
  }

  /** Refusals that no later delivery can change: admit the id so re-delivery replays the reply */
  private refuseFinally(entry: SessionEntry, envelope: Envelope, error: ProtocolError): Promise<EngineOutcome> {
    entry.seenMessageIds.add(envelope.message_id);
    return this.reject(entry, envelope, error);
  }

  /**
   * A failed sink write leaves the event in the log, queued for the sink;
   * the rejection itself still reaches the sender.
   */
  private async recordRejection(input: AuditEventInput): Promise<void> {
    try {
      await this.audit.record(input);
    } catch (err) {
      logger.error('Rejection not yet delivered to the audit sink', {
        sessionId: input.session_id,
        pending: this.audit.pending,
        error: toError(err).message,
      });
    }
  }

  private async rejectMalformed(error: ProtocolError, messageId?: string, sessionId?: string): Promise<EngineOutcome> {
    logger.warn('Malformed envelope', { messageId, sessionId, reason: error.message });
    this.metrics.counter('engine.rejected', { kind: error.kind });
    await this.recordRejection({
      kind: 'rejected',
      session_id: null,
      subject_ids: messageId ? [messageId] : [],
      related_message_id: messageId,
      severity: 'warning',
      details: { error: error.toJSON() },
    });
    const reply = createErrorEnvelope(error, {
      icnpVersion: this.config.icnpVersion,
      sender: this.config.engineActor,
      sessionId: sessionId ?? '',
      related: messageId ? { message_id: messageId } : undefined,
      now: this.config.clock(),
    });
    return { status: 'rejected', replies: [reply], error, session: null };
  }

  private async rejectOperation(
    sessionId: string | null,
    operation: string,
    error: ProtocolError,
  ): Promise<Result<never, ProtocolError>> {
    logger.warn('Operation rejected', { sessionId, operation, code: error.code, reason: error.message });
    this.metrics.counter('engine.rejected', { kind: error.kind });
    await this.recordRejection({
      kind: 'rejected',
      session_id: sessionId,
      subject_ids: sessionId ? [sessionId] : [],
      severity: error.kind === 'internal_error' ? 'critical' : 'warning',
      details: { operation, error: error.toJSON() },
    });
    return { ok: false, error };
  }
}
