import { createHash, timingSafeEqual } from 'crypto';

export const FEATURE_HASH_VERSION = 'fg-features-v1';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Maps a token key to [0, 1) in steps of 1/1000. Versioned and seeded so the
 * classifier sees the same inputs on every process and platform.
 */
export function featureHash(key: string): number {
  const digest = createHash('sha256').update(`${FEATURE_HASH_VERSION}:${key}`).digest();
  return (digest.readUInt32BE(0) % 1000) / 1000;
}

export function hashesEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'hex');
  const right = Buffer.from(b, 'hex');
  if (left.length !== right.length || left.length === 0) return false;
  return timingSafeEqual(left, right);
}

// Hash chain for tamper-evident log: each record carries the hash of the line before it
export class HashChain {
  private prevHash: string;

  constructor(genesisHash?: string) {
    this.prevHash = genesisHash || sha256('focus-gate-genesis-' + Date.now());
  }

  // Advance past a serialized record; returns the hash that record carried
  addLine(line: string): string {
    const prevHash = this.prevHash;
    this.prevHash = sha256(line);
    return prevHash;
  }

  getCurrentHash(): string {
    return this.prevHash;
  }
}
