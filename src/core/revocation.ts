/**
 * Revocation List — signed, in-memory record of revoked execution tokens.
 */

import type { Result } from './types.js';
import type { Keypair } from './crypto.js';
import { signObject, verifyObjectSignature } from './crypto.js';

export interface RevocationEntry {
  token_id: string;
  /** Base64url Ed25519 public key of the revoker */
  revoked_by: string;
  revoked_at: string;
  reason: string;
  signature: string;
}

export interface RevocationListInterface {
  isRevoked(tokenId: string): boolean;
  add(entry: RevocationEntry): Result<void, string>;
  list(): RevocationEntry[];
}

export class InMemoryRevocationList implements RevocationListInterface {
  private entries: Map<string, RevocationEntry> = new Map();

  isRevoked(tokenId: string): boolean {
    return this.entries.has(tokenId);
  }

  /** Add a revocation entry after checking the revoker's signature */
  add(entry: RevocationEntry): Result<void, string> {
    const { signature, ...toVerify } = entry;
    if (!verifyObjectSignature(entry.revoked_by, toVerify, signature)) {
      return { ok: false, error: 'Invalid revocation signature' };
    }
    // First revocation of a token wins; later ones are redundant
    if (!this.entries.has(entry.token_id)) {
      this.entries.set(entry.token_id, entry);
    }
    return { ok: true, value: undefined };
  }

  get(tokenId: string): RevocationEntry | undefined {
    return this.entries.get(tokenId);
  }

  list(): RevocationEntry[] {
    return Array.from(this.entries.values());
  }

  toJSON(): string {
    return JSON.stringify(this.list());
  }

  /** Load from JSON; every entry's signature is checked again */
  static fromJSON(json: string): Result<InMemoryRevocationList, string> {
    const list = new InMemoryRevocationList();
    const parsed: unknown = JSON.parse(json);
    if (!Array.isArray(parsed)) return { ok: false, error: 'Revocation list must be a JSON array' };
    for (const item of parsed) {
      if (!isRevocationEntry(item)) return { ok: false, error: 'Malformed revocation entry' };
      const added = list.add(item);
      if (!added.ok) return { ok: false, error: `${added.error} for token ${item.token_id}` };
    }
    return { ok: true, value: list };
  }
}

function isRevocationEntry(value: unknown): value is RevocationEntry {
  if (typeof value !== 'object' || value === null) return false;
  const fields = ['token_id', 'revoked_by', 'revoked_at', 'reason', 'signature'];
  return fields.every(f => typeof Reflect.get(value, f) === 'string');
}

/**
 * Create a signed revocation entry.
 * @param signer - Keypair of the revoker
 * @param tokenId - The execution token to revoke
 */
export function createRevocationEntry(signer: Keypair, tokenId: string, reason: string, now: Date = new Date()): RevocationEntry {
  const entry: RevocationEntry = {
    token_id: tokenId,
    revoked_by: signer.publicKey,
    revoked_at: now.toISOString(),
    reason,
    signature: '',
  };
  const { signature: _, ...toSign } = entry;
  entry.signature = signObject(signer.privateKey, toSign);
  return entry;
}
