/**
 * Cryptographic utilities and collaborator strategies.
 * Uses @noble/ed25519 for signing, blakejs for hashing and canonicalize for RFC 8785 JSON.
 *
 * The engine only talks to the `Signer`, `Verifier` and `Canonicalizer`
 * interfaces; the Ed25519 / JCS implementations below are replaceable defaults.
 */

import * as ed from '@noble/ed25519';
import { blake2b } from 'blakejs';
import canonicalizeJson from 'canonicalize';
import { sha512 } from '@noble/hashes/sha2.js';
import type { BindingHash } from './types.js';

// ed25519 v2 requires setting the sha512 hash
ed.etc.sha512Sync = (...m: Uint8Array[]) => {
  const h = sha512.create();
  for (const msg of m) h.update(msg);
  return h.digest();
};

const encoder = new TextEncoder();

// ── Encoding ──

/** Base64url encode (no padding) */
export function toBase64url(bytes: Uint8Array): string {
  let binary = '';
  for (let i = 0; i < bytes.length; i++) {
    binary += String.fromCharCode(bytes[i]);
  }
  return btoa(binary).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/** Base64url decode */
export function fromBase64url(str: string): Uint8Array {
  const padded = str.replace(/-/g, '+').replace(/_/g, '/');
  const binary = atob(padded);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

// ── Canonicalization ──

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

/** Produces deterministic bytes for equivalent JSON documents */
export interface Canonicalizer {
  canonicalize(document: unknown): Uint8Array;
}

export class JcsCanonicalizer implements Canonicalizer {
  canonicalize(document: unknown): Uint8Array {
    return encoder.encode(canonicalize(document));
  }
}

// ── Hashing ──

/** BLAKE2b-256 hash */
export function blake2b256(data: Uint8Array): Uint8Array {
  return blake2b(data, undefined, 32);
}

export const BINDING_HASH_ALG = 'blake2b-256';

/** Binding hash of a document: canonical bytes → BLAKE2b-256 → hex */
export function bindingHash(document: unknown, canonicalizer: Canonicalizer): BindingHash {
  return { alg: BINDING_HASH_ALG, value: toHex(blake2b256(canonicalizer.canonicalize(document))) };
}

// ── Keys ──

export interface Keypair {
  /** Base64url-encoded Ed25519 public key */
  publicKey: string;
  privateKey: Uint8Array;
}

/** Generate an Ed25519 keypair */
export function generateKeypair(): Keypair {
  const privateKey = ed.utils.randomPrivateKey();
  return { publicKey: toBase64url(ed.getPublicKey(privateKey)), privateKey };
}

/** Sign a canonical JSON object: canonicalize → BLAKE2b → Ed25519 sign */
export function signObject(privateKey: Uint8Array, obj: unknown): string {
  const hash = blake2b256(encoder.encode(canonicalize(obj)));
  return toBase64url(ed.sign(hash, privateKey));
}

/** Verify signature over a canonical JSON object */
export function verifyObjectSignature(publicKeyB64: string, obj: unknown, signatureB64: string): boolean {
  try {
    const hash = blake2b256(encoder.encode(canonicalize(obj)));
    return ed.verify(fromBase64url(signatureB64), hash, fromBase64url(publicKeyB64));
  } catch {
    return false;
  }
}

// ── Signing Strategies ──

export interface Signer {
  readonly alg: string;
  /** Key reference recorded next to every signature */
  readonly keyId: string;
  sign(bytes: Uint8Array): Promise<string>;
}

export interface Verifier {
  verify(bytes: Uint8Array, signature: string, keyRef: string): Promise<boolean>;
}

export class Ed25519Signer implements Signer {
  readonly alg = 'ed25519';
  readonly keyId: string;

  constructor(private keypair: Keypair, keyId?: string) {
    this.keyId = keyId ?? keypair.publicKey;
  }

  async sign(bytes: Uint8Array): Promise<string> {
    return toBase64url(ed.sign(blake2b256(bytes), this.keypair.privateKey));
  }
}

/**
 * Verifies Ed25519 signatures. `keyRef` is looked up in the directory first
 * (participant id → public key) and otherwise treated as the public key itself.
 */
export class Ed25519Verifier implements Verifier {
  private directory: Map<string, string>;

  constructor(directory: Record<string, string> = {}) {
    this.directory = new Map(Object.entries(directory));
  }

  /** Register the public key of a participant */
  register(keyRef: string, publicKey: string): void {
    this.directory.set(keyRef, publicKey);
  }

  async verify(bytes: Uint8Array, signature: string, keyRef: string): Promise<boolean> {
    const publicKey = this.directory.get(keyRef) ?? keyRef;
    try {
      return ed.verify(fromBase64url(signature), blake2b256(bytes), fromBase64url(publicKey));
    } catch {
      return false;
    }
  }
}

// ── IDs ──

export function generateId(): string {
  return crypto.randomUUID();
}
