/**
 * Intent Registry — records the session's declared intent and constraints.
 * Immutable once recorded.
 */

import type { IntentDeclaration, Result } from './types.js';
import type { SessionEntry } from './session.js';
import { ProtocolError } from './errors.js';
import { frozenCopy } from './immutable.js';

function invalid(message: string): Result<never, ProtocolError> {
  return { ok: false, error: new ProtocolError('invalid_intent', message) };
}

/** Semantic checks that a JSON Schema cannot express */
export function validateIntent(declaration: IntentDeclaration): Result<IntentDeclaration, ProtocolError> {
  const { intent, constraints } = declaration;

  if (typeof intent.goal !== 'string' || intent.goal.trim() === '') {
    return invalid('Intent is missing a goal');
  }
  if (!Array.isArray(intent.requested_actions) || intent.requested_actions.length === 0) {
    return invalid('Intent is missing requested_actions');
  }
  for (const requested of intent.requested_actions) {
    if (typeof requested !== 'object' || requested === null) {
      return invalid('Every requested action must be an object');
    }
    if (typeof requested.action !== 'string' || requested.action === '') {
      return invalid('Every requested action needs an action name');
    }
  }
  if (constraints.risk_tolerance === 'none' && constraints.human_approval_required !== true) {
    return invalid('risk_tolerance "none" requires human_approval_required');
  }
  return { ok: true, value: declaration };
}

/** Validate and store the intent of a session still in the intent phase */
export function recordIntent(
  entry: SessionEntry,
  declaration: IntentDeclaration,
): Result<Readonly<IntentDeclaration>, ProtocolError> {
  if (entry.intent) {
    return invalid(`Session ${entry.id} already has an intent`);
  }
  if (entry.phase !== 'intent') {
    return invalid(`Intent cannot be declared in phase ${entry.phase}`);
  }
  const checked = validateIntent(declaration);
  if (!checked.ok) return checked;

  const intent = frozenCopy(checked.value);
  entry.intent = intent;
  return { ok: true, value: intent };
}

/** Action names the intent asks for */
export function requestedActionNames(declaration: IntentDeclaration): string[] {
  return declaration.intent.requested_actions.map(r => r.action);
}
