import type { Verdict } from '../types/index.js';

export const DEFAULT_CACHE_TTL_MS = 300_000;

interface CacheEntry {
  verdict: Verdict;
  storedAt: number;
}

// Keyed by the raw URL string; a mission change does not invalidate entries
export class DecisionCache {
  private entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number = DEFAULT_CACHE_TTL_MS, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(url: string): Verdict | undefined {
    const entry = this.entries.get(url);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt < this.ttlMs) {
      return entry.verdict;
    }

    this.entries.delete(url);
    return undefined;
  }

  put(url: string, verdict: Verdict): void {
    this.entries.set(url, { verdict, storedAt: this.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
