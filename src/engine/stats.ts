import { writeFileSync, mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type { Logger } from 'pino';
import { describeError } from '../errors.js';

export interface StatisticsCounters {
  totalDecisions: number;
  cacheHits: number;
  fastPathDecisions: number;
  slowPathDecisions: number;
  feedbackCount: number;
  correctDecisions: number;
}

export interface StatisticsSnapshot extends StatisticsCounters {
  accuracy: number;
  cacheHitRate: number;
  fastPathRate: number;
}

export const DEFAULT_FLUSH_EVERY = 100;

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

/**
 * Process-wide decision counters. Written to disk every `flushEvery` feedback events
 * rather than on each update.
 */
export class Statistics {
  private counters: StatisticsCounters = {
    totalDecisions: 0,
    cacheHits: 0,
    fastPathDecisions: 0,
    slowPathDecisions: 0,
    feedbackCount: 0,
    correctDecisions: 0
  };

  constructor(
    private readonly logger: Logger,
    private readonly snapshotPath?: string,
    private readonly flushEvery: number = DEFAULT_FLUSH_EVERY
  ) {}

  recordFastPath(): void {
    this.counters.totalDecisions++;
    this.counters.fastPathDecisions++;
  }

  recordSlowPath(): void {
    this.counters.totalDecisions++;
    this.counters.slowPathDecisions++;
  }

  recordCacheHit(): void {
    this.counters.cacheHits++;
  }

  recordFeedback(correct: boolean): void {
    this.counters.feedbackCount++;
    if (correct) this.counters.correctDecisions++;

    if (this.counters.feedbackCount % this.flushEvery === 0) {
      this.flush();
    }
  }

  snapshot(): StatisticsSnapshot {
    const c = this.counters;
    return {
      ...c,
      accuracy: ratio(c.correctDecisions, c.feedbackCount),
      cacheHitRate: ratio(c.cacheHits, c.totalDecisions),
      fastPathRate: ratio(c.fastPathDecisions, c.totalDecisions)
    };
  }

  flush(): boolean {
    if (!this.snapshotPath) return false;

    try {
      const dir = dirname(this.snapshotPath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      writeFileSync(
        this.snapshotPath,
        JSON.stringify({ ...this.snapshot(), savedAt: new Date().toISOString() }, null, 2)
      );
      return true;
    } catch (err) {
      this.logger.error({ path: this.snapshotPath, err: describeError(err) }, 'Failed to save statistics');
      return false;
    }
  }
}
