/**
 * Engine configuration. Every field has a default; callers pass a Partial.
 */

import type { Actor, TokenLimits } from './types.js';
import type { CircuitBreakerConfig } from './collaborator.js';

export interface EngineConfig {
  /** Version written into outgoing envelopes */
  icnpVersion: string;
  /** Identity the engine uses as sender of replies and as token issuer */
  engineActor: Actor;
  /** Lifetime of a session while it is still negotiating (intent → contract) */
  negotiationTtlMs: number;
  /** Validity window of issued execution tokens */
  tokenTtlMs: number;
  defaultLimits: TokenLimits;
  /** Upper bound for every collaborator call (signing, hashing, rollback, execution) */
  collaboratorTimeoutMs: number;
  circuitBreaker: CircuitBreakerConfig;
  /** Issue the execution token as soon as every executor has signed the contract */
  autoIssueToken: boolean;
  clock: () => Date;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  icnpVersion: '1.0.0',
  engineActor: { id: 'icnp-engine', role: 'orchestrator' },
  negotiationTtlMs: 15 * 60_000,
  tokenTtlMs: 10 * 60_000,
  defaultLimits: { max_invocations_per_actor: 3, max_invocations_total: 20 },
  collaboratorTimeoutMs: 5_000,
  circuitBreaker: { failureThreshold: 5, resetTimeoutMs: 30_000, halfOpenMaxAttempts: 1 },
  autoIssueToken: true,
  clock: () => new Date(),
};

export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  if (config.negotiationTtlMs <= 0) throw new Error('negotiationTtlMs must be positive');
  if (config.tokenTtlMs <= 0) throw new Error('tokenTtlMs must be positive');
  if (config.collaboratorTimeoutMs <= 0) throw new Error('collaboratorTimeoutMs must be positive');
  if (config.defaultLimits.max_invocations_per_actor < 1) {
    throw new Error('defaultLimits.max_invocations_per_actor must be at least 1');
  }
  return config;
}
