import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, resolveConfig } from '../src/core/config.js';

describe('resolveConfig', () => {
  it('fills every field from the defaults', () => {
    const config = resolveConfig();
    expect(config.negotiationTtlMs).toBe(15 * 60_000);
    expect(config.tokenTtlMs).toBe(10 * 60_000);
    expect(config.defaultLimits).toEqual({ max_invocations_per_actor: 3, max_invocations_total: 20 });
    expect(config.autoIssueToken).toBe(true);
    expect(config.engineActor).toEqual(DEFAULT_ENGINE_CONFIG.engineActor);
  });

  it('applies overrides', () => {
    const config = resolveConfig({ tokenTtlMs: 1000, autoIssueToken: false });
    expect(config.tokenTtlMs).toBe(1000);
    expect(config.autoIssueToken).toBe(false);
    expect(config.negotiationTtlMs).toBe(DEFAULT_ENGINE_CONFIG.negotiationTtlMs);
  });

  it('rejects non-positive durations and empty budgets', () => {
    expect(() => resolveConfig({ negotiationTtlMs: 0 })).toThrow('negotiationTtlMs must be positive');
    expect(() => resolveConfig({ tokenTtlMs: -1 })).toThrow('tokenTtlMs must be positive');
    expect(() => resolveConfig({ collaboratorTimeoutMs: 0 })).toThrow('collaboratorTimeoutMs must be positive');
    expect(() => resolveConfig({ defaultLimits: { max_invocations_per_actor: 0 } }))
      .toThrow('defaultLimits.max_invocations_per_actor must be at least 1');
  });
});
