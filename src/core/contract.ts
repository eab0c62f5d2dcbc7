/**
 * Contract Negotiator — builds, validates, signs and freezes contracts
 * against the session's intent and capability ledger.
 *
 * Two rules hold for every contract:
 *   - forbidden-action dominance: an action+scope listed in forbidden_actions
 *     is never authorised, whatever agreed_actions says;
 *   - approval gating: when the intent or any selected capability action asks
 *     for approval, at least one `approve` (and no `reject`) must be present.
 */

import type {
  Actor,
  AgreedAction,
  Approval,
  Contract,
  ContractBody,
  Enforcement,
  ForbiddenAction,
  IntentDeclaration,
  PhaseChange,
  Result,
} from './types.js';
import type { SessionEntry, SessionStore } from './session.js';
import type { Canonicalizer, Verifier } from './crypto.js';
import type { CollaboratorGuard } from './collaborator.js';
import {
  WILDCARD_SCOPES,
  findOfferedAction,
  rankCapabilities,
  scopeCovers,
} from './capability.js';
import type { CapabilityLedger, CapabilityScorer } from './capability.js';
import { ProtocolError, toError } from './errors.js';
import { generateId } from './crypto.js';
import { frozenCopy } from './immutable.js';
import { createLogger } from './logger.js';

const logger = createLogger('ContractNegotiator');

function failure(kind: ProtocolError['kind'], message: string): Result<never, ProtocolError> {
  return { ok: false, error: new ProtocolError(kind, message) };
}

// ── Forbidden-action dominance ──

/** Whether `forbidden` removes `action` in `scope` from authorisation */
export function forbiddenCovers(forbidden: ForbiddenAction, action: string, scope: string): boolean {
  if (forbidden.action !== action && forbidden.action !== '*') return false;
  if (forbidden.scope === undefined || WILDCARD_SCOPES.has(forbidden.scope)) return true;
  // A wildcard agreement overlaps every forbidden scope
  return WILDCARD_SCOPES.has(scope) || forbidden.scope === scope;
}

export function findForbidden(
  contract: Pick<Contract, 'forbidden_actions'>,
  action: string,
  scope: string,
): ForbiddenAction | undefined {
  return contract.forbidden_actions.find(f => forbiddenCovers(f, action, scope));
}

/** Agreed actions that survive forbidden-action dominance */
export function effectiveAuthorizations(contract: Pick<Contract, 'agreed_actions' | 'forbidden_actions'>): AgreedAction[] {
  return contract.agreed_actions.filter(a => !findForbidden(contract, a.action, a.scope));
}

/**
 * Agreed actions authorising `executorId` to perform `action` (in `scope`,
 * when given) after dominance is applied.
 */
export function authorizedActions(
  contract: Pick<Contract, 'agreed_actions' | 'forbidden_actions'>,
  action: string,
  executorId: string,
  scope?: string,
): AgreedAction[] {
  return contract.agreed_actions.filter(a => {
    if (a.action !== action || a.executor_id !== executorId) return false;
    if (scope !== undefined && !scopeCovers(a.scope, scope)) return false;
    return !findForbidden(contract, a.action, scope ?? a.scope);
  });
}

export function isAuthorized(
  contract: Pick<Contract, 'agreed_actions' | 'forbidden_actions'>,
  action: string,
  executorId: string,
  scope?: string,
): boolean {
  return authorizedActions(contract, action, executorId, scope).length > 0;
}

// ── Approval gating ──

export function approvalRequired(
  intent: Readonly<IntentDeclaration>,
  contract: Pick<Contract, 'agreed_actions'>,
  ledger: CapabilityLedger,
): boolean {
  if (intent.constraints.human_approval_required) return true;
  return contract.agreed_actions.some(a => {
    const capability = ledger.lookup(a.capability_id);
    const offered = capability ? findOfferedAction(capability, a.action, a.scope) : undefined;
    return offered?.requires_approval === true;
  });
}

export function checkApprovals(
  intent: Readonly<IntentDeclaration>,
  contract: Pick<Contract, 'agreed_actions' | 'approvals' | 'contract_id'>,
  ledger: CapabilityLedger,
): Result<void, ProtocolError> {
  if (!approvalRequired(intent, contract, ledger)) return { ok: true, value: undefined };
  const rejected = contract.approvals.find(a => a.decision === 'reject');
  if (rejected) {
    return failure('unauthorised_action', `Contract ${contract.contract_id} was rejected by approver ${rejected.approver_id}`);
  }
  if (!contract.approvals.some(a => a.decision === 'approve')) {
    return failure('unauthorised_action', `Contract ${contract.contract_id} requires an approval`);
  }
  return { ok: true, value: undefined };
}

// ── Helpers ──

export function contractBody(contract: Contract | Readonly<Contract>): ContractBody {
  const { signatures: _, ...body } = contract;
  return body;
}

/** Participants whose signature acceptance requires */
export function requiredSigners(contract: Pick<Contract, 'agreed_actions'>): string[] {
  return Array.from(new Set(contract.agreed_actions.map(a => a.executor_id)));
}

export interface DraftOptions {
  contractId?: string;
  /** Scope to agree for every action; defaults to the first scope the capability offers */
  scope?: string;
  forbidden?: ForbiddenAction[];
  enforcement?: Enforcement;
  approvals?: Approval[];
  maxInvocationsPerAction?: number;
}

export interface NegotiatorDeps {
  store: SessionStore;
  verifier: Verifier;
  canonicalizer: Canonicalizer;
  scorer: CapabilityScorer;
  /** Guards calls into the verifier */
  guard: CollaboratorGuard;
  clock: () => Date;
}

// ── Negotiator ──

export class ContractNegotiator {
  constructor(private deps: NegotiatorDeps) {}

  /**
   * Validate a proposal and make it the session's pending contract.
   * The first proposal moves the session from capability to contract.
   */
  propose(entry: SessionEntry, draft: Contract): Result<{ contract: Contract; transition: PhaseChange | null }, ProtocolError> {
    if (entry.contract) {
      return failure('unauthorised_action', `Session ${entry.id} already has an accepted contract`);
    }
    if (entry.phase !== 'capability' && entry.phase !== 'contract') {
      return failure(
        entry.phase === 'intent' ? 'capability_mismatch' : 'unauthorised_action',
        `Contracts cannot be proposed in phase ${entry.phase}`,
      );
    }
    const validated = this.validate(entry, draft);
    if (!validated.ok) return validated;

    const transition = this.deps.store.advanceTo(entry, 'contract');
    if (!transition.ok) return transition;

    const contract: Contract = { ...structuredClone(draft), signatures: {} };
    entry.proposal = contract;
    logger.info('Contract proposed', {
      sessionId: entry.id,
      contractId: contract.contract_id,
      agreed: contract.agreed_actions.length,
      forbidden: contract.forbidden_actions.length,
    });
    return { ok: true, value: { contract, transition: transition.value } };
  }

  /**
   * Replace the pending proposal. Collected signatures are dropped; intent
   * and capabilities are kept as they are.
   */
  counterPropose(entry: SessionEntry, draft: Contract): Result<{ contract: Contract; transition: PhaseChange | null }, ProtocolError> {
    if (entry.phase !== 'contract' || !entry.proposal) {
      return failure('unauthorised_action', `Session ${entry.id} has no pending proposal to counter`);
    }
    const replaced = entry.proposal.contract_id;
    const result = this.propose(entry, draft);
    if (result.ok) {
      logger.info('Contract counter-proposed', { sessionId: entry.id, replaced, contractId: draft.contract_id });
    }
    return result;
  }

  /** Checks a draft against the intent and the capability ledger */
  validate(entry: SessionEntry, draft: Contract): Result<Contract, ProtocolError> {
    const intent = entry.intent;
    if (!intent) return failure('invalid_intent', `Session ${entry.id} has no intent`);
    if (draft.session_id !== entry.id) {
      return failure('unauthorised_action', `Contract ${draft.contract_id} belongs to session ${draft.session_id}`);
    }
    if (draft.agreed_actions.length === 0) {
      return failure('constraints_unsatisfiable', `Contract ${draft.contract_id} agrees no actions`);
    }

    const actionIds = new Set<string>();
    for (const agreed of draft.agreed_actions) {
      if (actionIds.has(agreed.action_id)) {
        return failure('constraints_unsatisfiable', `Duplicate action_id ${agreed.action_id}`);
      }
      actionIds.add(agreed.action_id);

      const capability = entry.capabilities.lookup(agreed.capability_id);
      if (!capability) {
        return failure('capability_mismatch', `Unknown capability ${agreed.capability_id} in session ${entry.id}`);
      }
      if (capability.owner_id !== agreed.executor_id) {
        return failure(
          'capability_mismatch',
          `Capability ${agreed.capability_id} belongs to ${capability.owner_id}, not ${agreed.executor_id}`,
        );
      }
      const offered = findOfferedAction(capability, agreed.action, agreed.scope);
      if (!offered) {
        return failure(
          'capability_mismatch',
          `Capability ${agreed.capability_id} does not offer ${agreed.action} in scope ${agreed.scope}`,
        );
      }
      const dominated = findForbidden(draft, agreed.action, agreed.scope) !== undefined;
      if (!dominated && offered.effects === 'external' && !intent.constraints.external_side_effects_allowed) {
        return failure(
          'constraints_unsatisfiable',
          `Action ${agreed.action} has external side effects, which the intent does not allow`,
        );
      }
    }
    return { ok: true, value: draft };
  }

  /** Build a draft that picks the best-scoring capability for every requested action */
  draftFromIntent(entry: SessionEntry, options: DraftOptions = {}): Result<Contract, ProtocolError> {
    const intent = entry.intent;
    if (!intent) return failure('invalid_intent', `Session ${entry.id} has no intent`);

    const agreed: AgreedAction[] = [];
    const executors = new Map<string, Actor>();
    for (const requested of intent.intent.requested_actions) {
      const scope = options.scope;
      const best = rankCapabilities(entry.capabilities, requested, this.deps.scorer).find(
        c => scope === undefined || c.action.scopes.some(s => scopeCovers(s, scope)),
      );
      if (!best) {
        return failure('capability_mismatch', `No disclosed capability qualifies for ${requested.action}`);
      }
      const action: AgreedAction = {
        action_id: generateId(),
        capability_id: best.capability.capability_id,
        executor_id: best.capability.owner_id,
        action: best.action.action,
        scope: scope ?? best.action.scopes[0],
      };
      if (options.maxInvocationsPerAction !== undefined) action.max_invocations = options.maxInvocationsPerAction;
      agreed.push(action);
      const executor = entry.participants.get(best.capability.owner_id);
      if (executor) executors.set(executor.id, executor);
    }

    return {
      ok: true,
      value: {
        contract_id: options.contractId ?? generateId(),
        session_id: entry.id,
        issued_at: this.deps.clock().toISOString(),
        parties: [entry.initiator, ...Array.from(executors.values()).filter(a => a.id !== entry.initiator.id)],
        agreed_actions: agreed,
        forbidden_actions: options.forbidden ?? [],
        constraints: { ...intent.constraints },
        enforcement: options.enforcement ?? { mode: 'strict', violation_action: 'deny' },
        approvals: options.approvals ?? [],
        signatures: {},
      },
    };
  }

  /** Bytes every participant signs: the canonical contract body */
  signingBytes(contract: Contract | Readonly<Contract>): Uint8Array {
    return this.deps.canonicalizer.canonicalize(contractBody(contract));
  }

  /**
   * Record `participantId`'s signature over the pending contract.
   * Returns the signers still missing.
   */
  async sign(
    entry: SessionEntry,
    participantId: string,
    contractId: string,
    signature: string,
  ): Promise<Result<{ missing: string[] }, ProtocolError>> {
    const proposal = entry.proposal;
    if (!proposal || proposal.contract_id !== contractId) {
      return failure('unauthorised_action', `Contract ${contractId} is not pending in session ${entry.id}`);
    }
    const isParty = proposal.parties.some(p => p.id === participantId)
      || requiredSigners(proposal).includes(participantId);
    if (!isParty) {
      return failure('unauthorised_action', `${participantId} is not a party to contract ${contractId}`);
    }

    let valid: boolean;
    try {
      const bytes = this.signingBytes(proposal);
      valid = await this.deps.guard.call(() => this.deps.verifier.verify(bytes, signature, participantId));
    } catch (err) {
      const cause = toError(err);
      logger.error('Signature verification unavailable', { sessionId: entry.id, contractId, error: cause.message });
      return {
        ok: false,
        error: new ProtocolError('internal_error', `Signature verification failed: ${cause.message}`, { retryable: true }),
      };
    }
    if (!valid) {
      logger.warn('Invalid contract signature', { sessionId: entry.id, contractId, participantId });
      return failure('unauthorised_action', `Signature of ${participantId} on contract ${contractId} does not verify`);
    }

    proposal.signatures[participantId] = signature;
    const missing = requiredSigners(proposal).filter(id => !(id in proposal.signatures));
    return { ok: true, value: { missing } };
  }

  /**
   * Freeze the pending contract. Requires the approval gate and a signature
   * from every executor named in agreed_actions.
   */
  accept(entry: SessionEntry): Result<Readonly<Contract>, ProtocolError> {
    const proposal = entry.proposal;
    const intent = entry.intent;
    if (!proposal || !intent) {
      return failure('unauthorised_action', `Session ${entry.id} has no pending contract`);
    }
    const approvals = checkApprovals(intent, proposal, entry.capabilities);
    if (!approvals.ok) return approvals;

    const missing = requiredSigners(proposal).filter(id => !(id in proposal.signatures));
    if (missing.length > 0) {
      return failure('unauthorised_action', `Contract ${proposal.contract_id} lacks signatures from ${missing.join(', ')}`);
    }

    const contract = frozenCopy(proposal);
    entry.contract = contract;
    entry.proposal = undefined;
    logger.info('Contract accepted', { sessionId: entry.id, contractId: contract.contract_id });
    return { ok: true, value: contract };
  }

  /** Rejection ends the session */
  reject(entry: SessionEntry, contractId: string): Result<PhaseChange, ProtocolError> {
    const current = entry.proposal?.contract_id ?? entry.contract?.contract_id;
    if (current !== contractId) {
      return failure('unauthorised_action', `Contract ${contractId} is not under negotiation in session ${entry.id}`);
    }
    const change = this.deps.store.transition(entry, 'aborted');
    if (change.ok) {
      entry.proposal = undefined;
      logger.info('Contract rejected', { sessionId: entry.id, contractId });
    }
    return change;
  }
}
