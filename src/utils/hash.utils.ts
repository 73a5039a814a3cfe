/**
 * Hashing Utilities
 *
 * We use THREE kinds of hashing:
 *
 * 1. PASSWORD HASHING (bcrypt)
 *    - Slow by design, salted
 *    - Used ONLY for passwords
 *
 * 2. GENERAL HASHING (SHA-256)
 *    - Deterministic, used for audit identifiers, session tokens and the audit chain
 *
 * 3. CONTENT DIGESTS (configurable algorithm, sha256 by default)
 *    - Identity of a sample's bytes; must stay the same for the lifetime of a deployment
 */

import bcrypt from 'bcryptjs';
import crypto from 'crypto';

// 12 is a good balance for production; tests lower it through config
export const DEFAULT_SALT_ROUNDS = 12;

/**
 * Hash a password using bcrypt
 */
export async function hashPassword(password: string, rounds: number = DEFAULT_SALT_ROUNDS): Promise<string> {
  return bcrypt.hash(password, rounds);
}

/**
 * Verify a password against a hash
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

/**
 * Create a SHA-256 hash (for audit logs, non-password data)
 * @returns Hex-encoded SHA-256 hash
 */
export function sha256Hash(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/**
 * Digest of a blob's full byte content
 * @returns Lowercase hex digest
 */
export function digestBytes(bytes: Buffer, algorithm: string): string {
  return crypto.createHash(algorithm).update(bytes).digest('hex');
}

export function isSupportedDigestAlgorithm(algorithm: string): boolean {
  return crypto.getHashes().includes(algorithm);
}

/**
 * JSON with object keys sorted at every level, so the same value always
 * serializes to the same string (jsonb does not preserve key order).
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
}
