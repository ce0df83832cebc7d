import { describe, it, expect } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { SessionAuditLog } from '../audit-log.js';
import { HashChain, featureHash, hashesEqual, sha256 } from '../hasher.js';
import { VERSION } from '../../version.js';
import { tempDir } from '../../__tests__/helpers.js';

function readLines(path: string): string[] {
  return readFileSync(path, 'utf-8').split('\n').filter(Boolean);
}

describe('SessionAuditLog', () => {
  it('chains each record to the line before it', () => {
    const path = join(tempDir(), 'logs', 'sessions.jsonl');
    const log = new SessionAuditLog(path);

    log.log({ event: 'SESSION_STARTED', session_id: 's-1', detail: '1h: write docs' });
    const second = log.log({ event: 'UNLOCK_FAILED', session_id: 's-1' });

    const lines = readLines(path);
    expect(second.prev_record_hash).toBe(sha256(lines[0]));
    expect(second.focus_gate_version).toBe(VERSION);
    expect(log.verify()).toEqual({ valid: true, errors: [] });
  });

  it('continues the chain after reopening the file', () => {
    const path = join(tempDir(), 'sessions.jsonl');
    new SessionAuditLog(path).log({ event: 'SESSION_STARTED', session_id: 's-1' });

    const reopened = new SessionAuditLog(path);
    reopened.log({ event: 'SESSION_COMPLETED', session_id: 's-1' });

    expect(reopened.verify().valid).toBe(true);
    expect(reopened.records().map(r => r.event)).toEqual(['SESSION_STARTED', 'SESSION_COMPLETED']);
  });

  it('detects an edited record', () => {
    const path = join(tempDir(), 'sessions.jsonl');
    const log = new SessionAuditLog(path);
    log.log({ event: 'SESSION_STARTED', session_id: 's-1' });
    log.log({ event: 'UNLOCK_FAILED', session_id: 's-1' });
    log.log({ event: 'SESSION_UNLOCKED', session_id: 's-1' });

    const lines = readLines(path);
    lines[1] = lines[1].replace('UNLOCK_FAILED', 'SESSION_RESUMED');
    writeFileSync(path, lines.join('\n') + '\n');

    const result = log.verify();
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Record 2: Chain broken/);
  });
});

describe('hasher', () => {
  it('maps feature keys into [0, 1) in thousandths', () => {
    const value = featureHash('url_0_example com');
    expect(value).toBe(featureHash('url_0_example com'));
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  });

  it('compares hex digests', () => {
    expect(hashesEqual(sha256('a'), sha256('a'))).toBe(true);
    expect(hashesEqual(sha256('a'), sha256('b'))).toBe(false);
    expect(hashesEqual(sha256('a'), '')).toBe(false);
  });

  it('advances the chain line by line', () => {
    const chain = new HashChain('genesis');
    expect(chain.addLine('first')).toBe('genesis');
    expect(chain.getCurrentHash()).toBe(sha256('first'));
  });
});
