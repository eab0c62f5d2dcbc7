/**
 * Enforcement Gate — decides every execution request against the session's
 * token and frozen contract.
 *
 * Per request: received → validated → executing → {completed, denied}.
 * Checks, in order:
 *   1. the token resolves, is inside its validity window, is not revoked,
 *      verifies and still matches the session documents;
 *   2. the token belongs to the requested contract and to this session;
 *   3. the executor is in the token audience and the action is authorised
 *      after forbidden-action dominance;
 *   4. the invocation budgets have room.
 * A failed check is handled according to the contract's enforcement mode.
 */

import type {
  ActionExecutor,
  AgreedAction,
  AuditSeverity,
  ExecutionRequest,
  ExecutionResult,
  ExecutionToken,
  JsonObject,
  JsonValue,
  PhaseChange,
  Result,
  RollbackExecutor,
} from './types.js';
import type { SessionEntry, SessionStore } from './session.js';
import type { TokenIssuer } from './token.js';
import type { AuditLog } from './audit.js';
import type { CollaboratorGuard } from './collaborator.js';
import type { MetricsCollector } from './metrics.js';
import { authorizedActions, findForbidden } from './contract.js';
import { isTerminal } from './session.js';
import { ProtocolError, toError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('EnforcementGate');

/** Executor used when the integrator supplies none: performs nothing, echoes the request */
export class DryRunExecutor implements ActionExecutor {
  async execute(request: ExecutionRequest): Promise<JsonValue> {
    return {
      dry_run: true,
      action: request.action,
      executor: request.executor.id,
      parameters: request.parameters,
    };
  }
}

export interface GateDeps {
  store: SessionStore;
  issuer: TokenIssuer;
  audit: AuditLog;
  metrics: MetricsCollector;
  executor: ActionExecutor;
  rollback?: RollbackExecutor;
  executorGuard: CollaboratorGuard;
  rollbackGuard: CollaboratorGuard;
  clock: () => Date;
}

export interface GateOutcome {
  result: ExecutionResult;
  /** Set only when the request is denied; the caller fails back with it */
  error?: ProtocolError;
  transition: PhaseChange | null;
}

interface Authorization {
  token: Readonly<ExecutionToken>;
  agreed: AgreedAction;
}

/** A failed check; `forced` denials ignore the enforcement mode */
interface Violation {
  error: ProtocolError;
  forced: boolean;
}

function violation(kind: ProtocolError['kind'], message: string, forced = false): Result<never, Violation> {
  return { ok: false, error: { error: new ProtocolError(kind, message), forced } };
}

export class EnforcementGate {
  constructor(private deps: GateDeps) {}

  /**
   * Run the checks and, when the request may proceed, the executor.
   * `relatedMessageId` links the audit records to the triggering envelope.
   */
  async handle(entry: SessionEntry, request: ExecutionRequest, relatedMessageId?: string): Promise<GateOutcome> {
    const auth = await this.authorize(entry, request);
    if (auth.ok) {
      this.deps.metrics.counter('gate.allowed', { action: request.action });
      return this.execute(entry, request, [], relatedMessageId);
    }

    const { error, forced } = auth.error;
    const mode = entry.contract?.enforcement.mode ?? 'strict';
    if (forced || mode === 'strict') {
      return this.deny(entry, request, error, relatedMessageId);
    }

    // permissive and audit_only: record and carry on
    const severity: AuditSeverity = mode === 'permissive' ? 'warning' : 'info';
    logger.warn('Violation tolerated', { sessionId: entry.id, mode, code: error.code, reason: error.message });
    this.deps.metrics.counter('gate.violation', { mode, kind: error.kind });
    await this.deps.audit.record({
      kind: 'violation',
      session_id: entry.id,
      subject_ids: [request.invocation_id, request.executor.id],
      related_message_id: relatedMessageId,
      severity,
      details: { ...this.requestDetails(request), mode, outcome: 'tolerated', error: error.toJSON() },
    });
    return this.execute(entry, request, [error.message], relatedMessageId);
  }

  /** Steps 1–4; counters move only when every check passes */
  async authorize(entry: SessionEntry, request: ExecutionRequest): Promise<Result<Authorization, Violation>> {
    if (entry.phase !== 'token' && entry.phase !== 'execution') {
      return violation('token_invalid', `Session ${entry.id} does not accept execution in phase ${entry.phase}`, true);
    }
    const contract = entry.contract;
    if (!contract) {
      return violation('token_invalid', `Session ${entry.id} has no accepted contract`, true);
    }

    // 1. token
    const token = this.deps.issuer.resolve(request.token_id);
    if (!token) return violation('token_invalid', `Unknown token ${request.token_id}`);
    const valid = await this.deps.issuer.check(token, this.deps.clock());
    if (!valid.ok) return { ok: false, error: { error: valid.error, forced: false } };

    // 2. token ↔ request ↔ session
    if (token.contract_id !== request.contract_id) {
      return violation('token_invalid', `Token ${token.token_id} is bound to contract ${token.contract_id}, not ${request.contract_id}`);
    }
    if (token.session_id !== entry.id) {
      return violation('token_invalid', `Token ${token.token_id} belongs to session ${token.session_id}`);
    }
    if (!this.deps.issuer.checkBinding(token, entry)) {
      return violation('token_invalid', `Token ${token.token_id} no longer matches the session documents`);
    }

    // 3. audience and authorisation
    const executorId = request.executor.id;
    if (!token.audience.some(a => a.id === executorId)) {
      return violation('unauthorised_action', `${executorId} is not in the audience of token ${token.token_id}`);
    }
    const authorized = authorizedActions(contract, request.action, executorId, request.scope);
    if (authorized.length === 0) {
      const forbidden = findForbidden(contract, request.action, request.scope ?? 'any');
      return violation(
        'unauthorised_action',
        forbidden
          ? `Action ${request.action} is forbidden${forbidden.reason ? `: ${forbidden.reason}` : ''}`
          : `${executorId} is not authorised to perform ${request.action}`,
      );
    }

    // 4. budgets
    const agreed = authorized[0];
    const reserved = this.deps.issuer.reserveInvocation(entry, token, executorId, agreed);
    if (!reserved.ok) return { ok: false, error: { error: reserved.error, forced: false } };
    return { ok: true, value: { token, agreed } };
  }

  private async deny(
    entry: SessionEntry,
    request: ExecutionRequest,
    error: ProtocolError,
    relatedMessageId?: string,
  ): Promise<GateOutcome> {
    const contract = entry.contract;
    // abort / rollback only act on a live session under strict enforcement
    const live = (contract?.enforcement.mode ?? 'strict') === 'strict' && !isTerminal(entry.phase);
    const violationAction = live ? contract?.enforcement.violation_action ?? 'deny' : 'deny';

    let transition: PhaseChange | null = null;
    if (violationAction !== 'deny') {
      const aborted = this.deps.store.transition(entry, 'aborted');
      if (aborted.ok) transition = aborted.value;
    }

    logger.warn('Execution denied', {
      sessionId: entry.id,
      invocationId: request.invocation_id,
      code: error.code,
      reason: error.message,
      violationAction,
    });
    this.deps.metrics.counter('gate.denied', { kind: error.kind });

    const details: JsonObject = {
      ...this.requestDetails(request),
      mode: contract?.enforcement.mode ?? 'strict',
      violation_action: violationAction,
      outcome: 'denied',
      error: error.toJSON(),
    };
    if (transition) details.transition = { from: transition.from, to: transition.to };
    await this.deps.audit.record({
      kind: 'violation',
      session_id: entry.id,
      subject_ids: [request.invocation_id, request.executor.id],
      related_message_id: relatedMessageId,
      severity: 'critical',
      details,
    });

    if (violationAction === 'abort_and_rollback') {
      await this.rollback(entry, request, relatedMessageId);
    }

    const now = this.deps.clock().toISOString();
    return {
      result: {
        invocation_id: request.invocation_id,
        token_id: request.token_id,
        contract_id: request.contract_id,
        status: 'denied',
        ended_at: now,
        error: { code: error.code, message: error.message },
      },
      error,
      transition,
    };
  }

  private async rollback(entry: SessionEntry, request: ExecutionRequest, relatedMessageId?: string): Promise<void> {
    const collaborator = this.deps.rollback;
    if (!collaborator) {
      logger.warn('Rollback requested but no rollback executor is configured', { sessionId: entry.id });
      return;
    }

    let outcome: Result<void, string>;
    try {
      outcome = await this.deps.rollbackGuard.call(() => collaborator.rollback(request.invocation_id));
    } catch (err) {
      outcome = { ok: false, error: toError(err).message };
    }

    if (!outcome.ok) {
      logger.error('Rollback failed', { sessionId: entry.id, invocationId: request.invocation_id, error: outcome.error });
    }
    await this.deps.audit.record({
      kind: 'rollback',
      session_id: entry.id,
      subject_ids: [request.invocation_id],
      related_message_id: relatedMessageId,
      severity: outcome.ok ? 'warning' : 'critical',
      details: outcome.ok
        ? { invocation_id: request.invocation_id, outcome: 'ok' }
        : { invocation_id: request.invocation_id, outcome: 'error', error: outcome.error },
    });
  }

  private async execute(
    entry: SessionEntry,
    request: ExecutionRequest,
    violations: string[],
    relatedMessageId?: string,
  ): Promise<GateOutcome> {
    let transition: PhaseChange | null = null;
    if (entry.phase === 'token') {
      const moved = this.deps.store.transition(entry, 'execution');
      if (moved.ok) transition = moved.value;
    }

    const started = this.deps.clock();
    const startedDetails: JsonObject = this.requestDetails(request);
    if (transition) startedDetails.transition = { from: transition.from, to: transition.to };
    await this.deps.audit.record({
      kind: 'execution_started',
      session_id: entry.id,
      subject_ids: [request.invocation_id, request.executor.id],
      related_message_id: relatedMessageId,
      details: startedDetails,
    });

    const base = {
      invocation_id: request.invocation_id,
      token_id: request.token_id,
      contract_id: request.contract_id,
      started_at: started.toISOString(),
    };
    const withViolations = violations.length > 0 ? { violations } : {};

    let output: JsonValue;
    try {
      output = await this.deps.executorGuard.call(() => this.deps.executor.execute(request));
    } catch (err) {
      const cause = toError(err);
      const ended = this.deps.clock();
      logger.error('Execution failed', { sessionId: entry.id, invocationId: request.invocation_id, error: cause.message });
      await this.deps.audit.record({
        kind: 'execution_failed',
        session_id: entry.id,
        subject_ids: [request.invocation_id, request.executor.id],
        related_message_id: relatedMessageId,
        severity: 'warning',
        details: { invocation_id: request.invocation_id, action: request.action, status: 'failure', error: cause.message },
      });
      return {
        result: {
          ...base,
          status: 'failure',
          ended_at: ended.toISOString(),
          error: { code: 'ICNP-006', message: cause.message },
          ...withViolations,
        },
        transition,
      };
    }

    const ended = this.deps.clock();
    this.deps.metrics.histogram('executor.duration_ms', ended.getTime() - started.getTime(), { action: request.action });
    await this.deps.audit.record({
      kind: 'execution_completed',
      session_id: entry.id,
      subject_ids: [request.invocation_id, request.executor.id],
      related_message_id: relatedMessageId,
      details: { invocation_id: request.invocation_id, action: request.action, status: 'success' },
    });
    logger.info('Execution completed', { sessionId: entry.id, invocationId: request.invocation_id });
    return {
      result: { ...base, status: 'success', ended_at: ended.toISOString(), output, ...withViolations },
      transition,
    };
  }

  private requestDetails(request: ExecutionRequest): JsonObject {
    const details: JsonObject = {
      invocation_id: request.invocation_id,
      token_id: request.token_id,
      contract_id: request.contract_id,
      action: request.action,
      executor_id: request.executor.id,
    };
    if (request.scope !== undefined) details.scope = request.scope;
    return details;
  }
}
