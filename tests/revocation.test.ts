import { describe, it, expect } from 'vitest';
import { InMemoryRevocationList, createRevocationEntry } from '../src/core/revocation.js';
import { generateKeypair } from '../src/core/crypto.js';

const NOW = new Date('2026-01-01T00:05:00.000Z');

describe('InMemoryRevocationList', () => {
  it('records a signed revocation', () => {
    const revoker = generateKeypair();
    const list = new InMemoryRevocationList();
    const entry = createRevocationEntry(revoker, 'tok-1', 'key compromised', NOW);

    expect(entry.revoked_by).toBe(revoker.publicKey);
    expect(entry.revoked_at).toBe('2026-01-01T00:05:00.000Z');
    expect(list.add(entry)).toEqual({ ok: true, value: undefined });
    expect(list.isRevoked('tok-1')).toBe(true);
    expect(list.isRevoked('tok-2')).toBe(false);
    expect(list.get('tok-1')).toEqual(entry);
  });

  it('refuses entries whose signature does not verify', () => {
    const list = new InMemoryRevocationList();
    const entry = createRevocationEntry(generateKeypair(), 'tok-1', 'key compromised', NOW);
    expect(list.add({ ...entry, reason: 'changed' })).toEqual({ ok: false, error: 'Invalid revocation signature' });
    expect(list.add({ ...entry, revoked_by: generateKeypair().publicKey })).toEqual({ ok: false, error: 'Invalid revocation signature' });
    expect(list.isRevoked('tok-1')).toBe(false);
  });

  it('keeps the first revocation of a token', () => {
    const revoker = generateKeypair();
    const list = new InMemoryRevocationList();
    const first = createRevocationEntry(revoker, 'tok-1', 'first', NOW);
    list.add(first);
    list.add(createRevocationEntry(revoker, 'tok-1', 'second', NOW));
    expect(list.list()).toEqual([first]);
  });

  it('reloads from JSON and checks every signature again', () => {
    const revoker = generateKeypair();
    const list = new InMemoryRevocationList();
    list.add(createRevocationEntry(revoker, 'tok-1', 'rotated', NOW));
    list.add(createRevocationEntry(revoker, 'tok-2', 'rotated', NOW));

    const reloaded = InMemoryRevocationList.fromJSON(list.toJSON());
    expect(reloaded.ok).toBe(true);
    if (reloaded.ok) expect(reloaded.value.list().map(e => e.token_id)).toEqual(['tok-1', 'tok-2']);

    const [entry] = list.list();
    const tampered = JSON.stringify([{ ...entry, token_id: 'tok-9' }]);
    expect(InMemoryRevocationList.fromJSON(tampered)).toEqual({ ok: false, error: 'Invalid revocation signature for token tok-9' });
    expect(InMemoryRevocationList.fromJSON('{}')).toEqual({ ok: false, error: 'Revocation list must be a JSON array' });
    expect(InMemoryRevocationList.fromJSON('[{"token_id":"tok-1"}]')).toEqual({ ok: false, error: 'Malformed revocation entry' });
  });
});
