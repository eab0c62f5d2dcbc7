/**
 * Token Issuer — mints execution tokens bound to an accepted contract and
 * tracks their invocation budgets.
 *
 * A token binds three hashes (intent, frozen contract, capability snapshot)
 * so that any later drift of the session documents invalidates it. The total
 * budget is shared by every actor holding the token; the per-actor and
 * per-agreed-action budgets live in the owning session.
 */

import type {
  Actor,
  AgreedAction,
  ExecutionToken,
  PhaseChange,
  Result,
  TokenBinding,
  TokenBody,
  TokenLimits,
} from './types.js';
import type { SessionEntry, SessionStore } from './session.js';
import type { Canonicalizer, Signer, Verifier } from './crypto.js';
import type { CollaboratorGuard } from './collaborator.js';
import type { RevocationEntry, RevocationListInterface } from './revocation.js';
import { bindingHash, generateId } from './crypto.js';
import { checkApprovals, requiredSigners } from './contract.js';
import { ProtocolError, toError } from './errors.js';
import { frozenCopy } from './immutable.js';
import { createLogger } from './logger.js';

const logger = createLogger('TokenIssuer');

export interface TokenIssuerDeps {
  store: SessionStore;
  signer: Signer;
  verifier: Verifier;
  canonicalizer: Canonicalizer;
  revocations: RevocationListInterface;
  /** Guards signing and verification calls */
  guard: CollaboratorGuard;
  issuer: Actor;
  tokenTtlMs: number;
  defaultLimits: TokenLimits;
  clock: () => Date;
}

export interface IssueOptions {
  limits?: TokenLimits;
}

export interface InvocationCounts {
  perActor: number;
  total: number;
  perAction: number;
}

function failure(kind: ProtocolError['kind'], message: string): Result<never, ProtocolError> {
  return { ok: false, error: new ProtocolError(kind, message) };
}

export class TokenIssuer {
  private tokens = new Map<string, Readonly<ExecutionToken>>();
  private totals = new Map<string, number>();

  constructor(private deps: TokenIssuerDeps) {}

  /**
   * Issue the token of a session whose contract is accepted.
   * The approval gate is checked before anything else.
   */
  async issue(
    entry: SessionEntry,
    options: IssueOptions = {},
  ): Promise<Result<{ token: Readonly<ExecutionToken>; transition: PhaseChange }, ProtocolError>> {
    const intent = entry.intent;
    const candidate = entry.contract ?? entry.proposal;
    if (intent && candidate) {
      const approvals = checkApprovals(intent, candidate, entry.capabilities);
      if (!approvals.ok) return approvals;
    }

    const contract = entry.contract;
    if (entry.phase !== 'contract' || !contract || !intent) {
      return failure('token_invalid', `Session ${entry.id} has no accepted contract in phase contract (phase ${entry.phase})`);
    }

    let binding: TokenBinding;
    try {
      binding = this.bindingFor(entry);
    } catch (err) {
      return this.collaboratorFailure(entry, 'Binding hash computation failed', err);
    }

    const now = this.deps.clock();
    const executors = new Set(requiredSigners(contract));
    const audience = contract.parties.filter(p => executors.has(p.id));
    for (const id of executors) {
      if (!audience.some(a => a.id === id)) {
        audience.push(entry.participants.get(id) ?? { id, role: 'agent' });
      }
    }

    const body: TokenBody = {
      token_id: generateId(),
      session_id: entry.id,
      contract_id: contract.contract_id,
      issuer: this.deps.issuer,
      audience,
      issued_at: now.toISOString(),
      validity: {
        not_before: now.toISOString(),
        not_after: new Date(now.getTime() + this.deps.tokenTtlMs).toISOString(),
      },
      limits: options.limits ?? this.deps.defaultLimits,
      binding,
    };

    let value: string;
    try {
      const bytes = this.deps.canonicalizer.canonicalize(body);
      value = await this.deps.guard.call(() => this.deps.signer.sign(bytes));
    } catch (err) {
      return this.collaboratorFailure(entry, 'Token signing failed', err);
    }

    const transition = this.deps.store.transition(entry, 'token');
    if (!transition.ok) return transition;

    const token = frozenCopy<ExecutionToken>({
      ...body,
      signature: { alg: this.deps.signer.alg, key_id: this.deps.signer.keyId, value, signed_at: now.toISOString() },
    });
    entry.token = token;
    entry.counters.perActor.clear();
    entry.counters.perAction.clear();
    this.tokens.set(token.token_id, token);
    this.totals.set(token.token_id, 0);

    logger.info('Token issued', {
      sessionId: entry.id,
      tokenId: token.token_id,
      contractId: token.contract_id,
      notAfter: token.validity.not_after,
    });
    return { ok: true, value: { token, transition: transition.value } };
  }

  /** Look up a token issued by this issuer */
  resolve(tokenId: string): Readonly<ExecutionToken> | undefined {
    return this.tokens.get(tokenId);
  }

  /**
   * True iff `not_before <= now < not_after`, the token is not revoked and
   * its signature verifies. A verifier failure or timeout counts as invalid.
   */
  async validate(token: Readonly<ExecutionToken>, now: Date): Promise<boolean> {
    return (await this.check(token, now)).ok;
  }

  /** Like `validate`, with the reason of a negative answer */
  async check(token: Readonly<ExecutionToken>, now: Date): Promise<Result<void, ProtocolError>> {
    const notBefore = Date.parse(token.validity.not_before);
    const notAfter = Date.parse(token.validity.not_after);
    const t = now.getTime();
    if (Number.isNaN(notBefore) || Number.isNaN(notAfter)) {
      return failure('token_invalid', `Token ${token.token_id} has an unreadable validity window`);
    }
    if (t < notBefore) return failure('token_invalid', `Token ${token.token_id} is not valid yet`);
    if (t >= notAfter) return failure('token_invalid', `Token ${token.token_id} has expired`);
    if (this.deps.revocations.isRevoked(token.token_id)) {
      return failure('token_invalid', `Token ${token.token_id} has been revoked`);
    }

    const { signature, ...body } = token;
    let verified: boolean;
    try {
      const bytes = this.deps.canonicalizer.canonicalize(body);
      verified = await this.deps.guard.call(() => this.deps.verifier.verify(bytes, signature.value, signature.key_id));
    } catch (err) {
      logger.error('Token verification unavailable', { tokenId: token.token_id, error: toError(err).message });
      verified = false;
    }
    if (!verified) return failure('token_invalid', `Signature of token ${token.token_id} does not verify`);
    return { ok: true, value: undefined };
  }

  /** Binding hashes of the session's current intent, contract and capability ledger */
  bindingFor(entry: SessionEntry): TokenBinding {
    return {
      intent_hash: bindingHash(entry.intent ?? null, this.deps.canonicalizer),
      contract_hash: bindingHash(entry.contract ?? null, this.deps.canonicalizer),
      capabilities_hash: bindingHash(entry.capabilities.snapshot(), this.deps.canonicalizer),
    };
  }

  /** Recompute the binding and compare it with the one the token carries */
  checkBinding(token: Readonly<ExecutionToken>, entry: SessionEntry): boolean {
    const current = this.bindingFor(entry);
    return (
      current.intent_hash.value === token.binding.intent_hash.value
      && current.contract_hash.value === token.binding.contract_hash.value
      && current.capabilities_hash.value === token.binding.capabilities_hash.value
    );
  }

  /**
   * Count one invocation of `agreed` by `actorId`. Every budget is checked
   * before any counter moves, so a denial counts nothing.
   */
  reserveInvocation(
    entry: SessionEntry,
    token: Readonly<ExecutionToken>,
    actorId: string,
    agreed?: AgreedAction,
  ): Result<InvocationCounts, ProtocolError> {
    const { max_invocations_per_actor: perActorLimit, max_invocations_total: totalLimit } = token.limits;
    const perActor = (entry.counters.perActor.get(actorId) ?? 0) + 1;
    const total = (this.totals.get(token.token_id) ?? 0) + 1;
    const perAction = agreed ? (entry.counters.perAction.get(agreed.action_id) ?? 0) + 1 : 0;

    if (perActor > perActorLimit) {
      return failure('unauthorised_action', `${actorId} exhausted max_invocations_per_actor (${perActorLimit})`);
    }
    if (totalLimit !== undefined && total > totalLimit) {
      return failure('unauthorised_action', `Token ${token.token_id} exhausted max_invocations_total (${totalLimit})`);
    }
    if (agreed?.max_invocations !== undefined && perAction > agreed.max_invocations) {
      return failure(
        'unauthorised_action',
        `Agreed action ${agreed.action_id} exhausted max_invocations (${agreed.max_invocations})`,
      );
    }

    entry.counters.perActor.set(actorId, perActor);
    this.totals.set(token.token_id, total);
    if (agreed) entry.counters.perAction.set(agreed.action_id, perAction);
    return { ok: true, value: { perActor, total, perAction } };
  }

  /** Invocations counted against the token's total budget */
  totalInvocations(tokenId: string): number {
    return this.totals.get(tokenId) ?? 0;
  }

  /** Release the bookkeeping of a token whose session is gone */
  forget(tokenId: string): void {
    this.tokens.delete(tokenId);
    this.totals.delete(tokenId);
  }

  /** Add a signed revocation entry for one of this issuer's tokens */
  revoke(entry: RevocationEntry): Result<Readonly<ExecutionToken>, ProtocolError> {
    const token = this.tokens.get(entry.token_id);
    if (!token) return failure('token_invalid', `Unknown token ${entry.token_id}`);
    const added = this.deps.revocations.add(entry);
    if (!added.ok) return failure('unauthorised_action', added.error);
    logger.info('Token revoked', { tokenId: entry.token_id, sessionId: token.session_id, reason: entry.reason });
    return { ok: true, value: token };
  }

  private collaboratorFailure(entry: SessionEntry, message: string, err: unknown): Result<never, ProtocolError> {
    const cause = toError(err);
    logger.error(message, { sessionId: entry.id, error: cause.message });
    return {
      ok: false,
      error: new ProtocolError('internal_error', `${message}: ${cause.message}`, { retryable: true }),
    };
  }
}
