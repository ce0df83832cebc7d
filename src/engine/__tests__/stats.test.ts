import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { Statistics } from '../stats.js';
import { silentLogger, tempDir } from '../../__tests__/helpers.js';

describe('Statistics', () => {
  it('derives rates from the counters', () => {
    const stats = new Statistics(silentLogger);
    stats.recordFastPath();
    stats.recordFastPath();
    stats.recordFastPath();
    stats.recordSlowPath();
    stats.recordCacheHit();
    stats.recordFeedback(true);
    stats.recordFeedback(false);

    expect(stats.snapshot()).toEqual({
      totalDecisions: 4,
      cacheHits: 1,
      fastPathDecisions: 3,
      slowPathDecisions: 1,
      feedbackCount: 2,
      correctDecisions: 1,
      accuracy: 0.5,
      cacheHitRate: 0.25,
      fastPathRate: 0.75
    });
  });

  it('reports zero rates before any decision', () => {
    expect(new Statistics(silentLogger).snapshot()).toMatchObject({ accuracy: 0, cacheHitRate: 0, fastPathRate: 0 });
  });

  it('writes a snapshot every flushEvery feedback events', () => {
    const path = join(tempDir(), 'nested', 'stats.json');
    const stats = new Statistics(silentLogger, path, 2);

    stats.recordFeedback(true);
    expect(existsSync(path)).toBe(false);

    stats.recordFeedback(true);
    const saved = JSON.parse(readFileSync(path, 'utf-8'));
    expect(saved.feedbackCount).toBe(2);
    expect(saved.accuracy).toBe(1);
  });

  it('does not flush without a snapshot path', () => {
    expect(new Statistics(silentLogger).flush()).toBe(false);
  });
});
