/**
 * Capability Ledger — per-session, participant-scoped, append-only record of
 * disclosed capabilities, plus the pluggable scorer used to match them
 * against requested actions.
 */

import type {
  Actor,
  Capability,
  CapabilityAction,
  CapabilityDisclosure,
  PhaseChange,
  RequestedAction,
  Result,
} from './types.js';
import type { SessionEntry, SessionStore } from './session.js';
import { ProtocolError } from './errors.js';
import { canonicalize } from './crypto.js';
import { frozenCopy } from './immutable.js';

export type Disclosed = Omit<Capability, 'owner_id'>;

/** Scopes that match every requested scope */
export const WILDCARD_SCOPES: ReadonlySet<string> = new Set(['any', '*']);

export function scopeCovers(offered: string, requested: string): boolean {
  return WILDCARD_SCOPES.has(offered) || offered === requested;
}

function mismatch(message: string): Result<never, ProtocolError> {
  return { ok: false, error: new ProtocolError('capability_mismatch', message) };
}

// ── Ledger ──

export class CapabilityLedger {
  private ordered: Readonly<Capability>[] = [];
  private byId = new Map<string, Readonly<Capability>>();

  /**
   * Whether `disclosed` may be appended for `ownerId`, without recording it.
   * Re-disclosing an identical capability is allowed (`unchanged`); any change
   * to a disclosed one would retract something and is rejected.
   */
  check(ownerId: string, disclosed: Disclosed): Result<'new' | 'unchanged', ProtocolError> {
    for (const action of disclosed.actions) {
      if (!(action.confidence >= 0 && action.confidence <= 1)) {
        return mismatch(`Capability ${disclosed.capability_id}: confidence ${action.confidence} outside [0, 1]`);
      }
    }
    const existing = this.byId.get(disclosed.capability_id);
    if (!existing) return { ok: true, value: 'new' };
    if (existing.owner_id !== ownerId) {
      return mismatch(`Capability ${disclosed.capability_id} is owned by another participant`);
    }
    if (canonicalize(existing) === canonicalize({ ...disclosed, owner_id: ownerId })) {
      return { ok: true, value: 'unchanged' };
    }
    return mismatch(`Capability ${disclosed.capability_id} was already disclosed; changes need a new session`);
  }

  /** Append after `check`; an unchanged re-disclosure records nothing */
  append(ownerId: string, disclosed: Disclosed): Result<'added' | 'unchanged', ProtocolError> {
    const checked = this.check(ownerId, disclosed);
    if (!checked.ok) return checked;
    if (checked.value === 'unchanged') return { ok: true, value: 'unchanged' };

    const frozen = frozenCopy<Capability>({ ...disclosed, owner_id: ownerId });
    this.ordered.push(frozen);
    this.byId.set(frozen.capability_id, frozen);
    return { ok: true, value: 'added' };
  }

  lookup(capabilityId: string): Readonly<Capability> | undefined {
    return this.byId.get(capabilityId);
  }

  list(): Readonly<Capability>[] {
    return [...this.ordered];
  }

  byOwner(ownerId: string): Readonly<Capability>[] {
    return this.ordered.filter(c => c.owner_id === ownerId);
  }

  /** Document hashed into the token binding; disclosure order is preserved */
  snapshot(): { capabilities: Readonly<Capability>[] } {
    return { capabilities: this.list() };
  }

  get size(): number {
    return this.ordered.length;
  }
}

/** The action entry of `capability` offering `action` in `scope`, if any */
export function findOfferedAction(
  capability: Readonly<Capability>,
  action: string,
  scope: string,
): Readonly<CapabilityAction> | undefined {
  return capability.actions.find(a => a.action === action && a.scopes.some(s => scopeCovers(s, scope)));
}

// ── Disclosure ──

/**
 * Record the capabilities a participant discloses. Allowed while the session
 * is in the intent or capability phase; the first disclosure opens the
 * capability phase. All capabilities of one disclosure are checked before any
 * is recorded.
 */
export function discloseCapabilities(
  store: SessionStore,
  entry: SessionEntry,
  owner: Actor,
  disclosure: CapabilityDisclosure,
): Result<{ added: string[]; transition: PhaseChange | null }, ProtocolError> {
  if (entry.phase !== 'intent' && entry.phase !== 'capability') {
    return mismatch(`Capabilities cannot be disclosed in phase ${entry.phase}`);
  }

  const seen = new Set<string>();
  for (const capability of disclosure.capabilities) {
    if (seen.has(capability.capability_id)) {
      return mismatch(`Capability ${capability.capability_id} disclosed twice in one message`);
    }
    seen.add(capability.capability_id);
    const checked = entry.capabilities.check(owner.id, capability);
    if (!checked.ok) return checked;
  }

  const added: string[] = [];
  for (const capability of disclosure.capabilities) {
    const result = entry.capabilities.append(owner.id, capability);
    if (!result.ok) return result;
    if (result.value === 'added') added.push(capability.capability_id);
  }

  const transition = store.advanceTo(entry, 'capability');
  if (!transition.ok) return transition;
  store.addParticipant(entry, owner);
  return { ok: true, value: { added, transition: transition.value } };
}

// ── Scoring ──

/** Scores how well an offered action serves a requested one; 0 means no match */
export interface CapabilityScorer {
  score(requested: RequestedAction, offered: Readonly<CapabilityAction>, capability: Readonly<Capability>): number;
}

/** Exact action-name match weighted by the discloser's confidence */
export class ExactActionScorer implements CapabilityScorer {
  score(requested: RequestedAction, offered: Readonly<CapabilityAction>): number {
    return offered.action === requested.action ? offered.confidence : 0;
  }
}

export interface RankedCapability {
  capability: Readonly<Capability>;
  action: Readonly<CapabilityAction>;
  score: number;
}

/** Candidates with a positive score, best first; ties keep disclosure order */
export function rankCapabilities(
  ledger: CapabilityLedger,
  requested: RequestedAction,
  scorer: CapabilityScorer,
): RankedCapability[] {
  const ranked: RankedCapability[] = [];
  for (const capability of ledger.list()) {
    for (const action of capability.actions) {
      const score = scorer.score(requested, action, capability);
      if (score > 0) ranked.push({ capability, action, score });
    }
  }
  return ranked.sort((a, b) => b.score - a.score);
}
