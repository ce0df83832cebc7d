import { appendFileSync, readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { SessionAuditRecord } from '../types/index.js';
import { HashChain, sha256 } from './hasher.js';
import { VERSION } from '../version.js';

export class SessionAuditLog {
  private logPath: string;
  private chain: HashChain;

  constructor(logPath: string) {
    this.logPath = logPath;

    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    this.chain = new HashChain(this.getLastLineHash());
  }

  private readLines(): string[] {
    if (!existsSync(this.logPath)) return [];
    return readFileSync(this.logPath, 'utf-8').split('\n').filter(Boolean);
  }

  private getLastLineHash(): string | undefined {
    const lines = this.readLines();
    if (lines.length === 0) return undefined;
    return sha256(lines[lines.length - 1]);
  }

  log(params: {
    event: SessionAuditRecord['event'];
    session_id: string;
    detail?: string;
  }): SessionAuditRecord {
    const record: SessionAuditRecord = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      event: params.event,
      session_id: params.session_id,
      detail: params.detail,
      prev_record_hash: this.chain.getCurrentHash(),
      focus_gate_version: VERSION
    };

    const line = JSON.stringify(record);
    appendFileSync(this.logPath, line + '\n');
    this.chain.addLine(line);

    return record;
  }

  records(): SessionAuditRecord[] {
    const parsed: SessionAuditRecord[] = [];
    for (const line of this.readLines()) {
      try {
        parsed.push(JSON.parse(line) as SessionAuditRecord);
      } catch {
        // Unparseable lines are reported by verify()
        continue;
      }
    }
    return parsed;
  }

  verify(): { valid: boolean; errors: string[] } {
    const lines = this.readLines();
    const errors: string[] = [];

    let prevHash: string | null = null;

    for (let i = 0; i < lines.length; i++) {
      try {
        const record = JSON.parse(lines[i]) as SessionAuditRecord;

        // Verify chain continuity
        if (i > 0 && record.prev_record_hash !== prevHash) {
          errors.push(`Record ${i}: Chain broken - expected prev_hash ${prevHash}, got ${record.prev_record_hash}`);
        }
      } catch {
        errors.push(`Record ${i}: Invalid JSON`);
      }

      prevHash = sha256(lines[i]);
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
