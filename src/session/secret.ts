import { randomBytes } from 'crypto';
import { hashesEqual, sha256 } from '../crypto/index.js';

export const SECRET_BYTES = 32;

export type SecretFragments = [string, string, string];

/** 32 random bytes, base64url encoded (43 characters). */
export function generateSecret(): string {
  return randomBytes(SECRET_BYTES).toString('base64url');
}

/**
 * Splits the secret into three contiguous pieces for separate custodians; the last piece
 * takes the remainder. This is plain concatenation, not threshold secret sharing: every
 * fragment is needed to unlock, and each one held narrows the search for the rest.
 */
export function splitSecret(secret: string): SecretFragments {
  const part = Math.floor(secret.length / 3);
  return [secret.slice(0, part), secret.slice(part, 2 * part), secret.slice(2 * part)];
}

export function hashSecret(secret: string): string {
  return sha256(secret);
}

export function verifySecret(provided: string, storedHash: string): boolean {
  return hashesEqual(hashSecret(provided), storedHash);
}
