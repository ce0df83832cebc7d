import Database from 'better-sqlite3';
import type { Action, DecisionRecord } from '../types/index.js';
import { PersistenceError, describeError } from '../errors.js';

interface DecisionRow {
  id: number;
  url: string;
  mission: string;
  features: Buffer;
  action: number;
  confidence: number;
  timestamp: number;
  user_feedback: number | null;
  reward: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS decisions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    url TEXT NOT NULL,
    mission TEXT NOT NULL,
    features BLOB NOT NULL,
    action INTEGER NOT NULL,
    confidence REAL NOT NULL,
    timestamp REAL NOT NULL,
    user_feedback INTEGER DEFAULT NULL,
    reward REAL DEFAULT 0.0
  );
  CREATE INDEX IF NOT EXISTS decisions_url_mission ON decisions (url, mission, id);
`;

function toRecord(row: DecisionRow): DecisionRecord {
  // Copy out of the driver's buffer so the float view starts on an aligned offset
  const bytes = Uint8Array.from(row.features);
  const action: Action = row.action === 1 ? 'allow' : 'block';
  const record: DecisionRecord = {
    id: row.id,
    url: row.url,
    mission: row.mission,
    features: new Float32Array(bytes.buffer),
    action,
    confidence: row.confidence,
    timestamp: row.timestamp
  };
  if (row.user_feedback !== null) {
    record.correct = row.user_feedback === 1;
    record.reward = row.reward;
  }
  return record;
}

/**
 * Append-only record of slow-path decisions. The only mutation is attaching feedback,
 * once, to a row that has none.
 */
export class DecisionStore {
  private db: Database.Database;

  constructor(path: string) {
    try {
      this.db = new Database(path);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (err) {
      throw new PersistenceError(`Cannot open decision store at ${path}: ${describeError(err)}`, { cause: err });
    }
  }

  private run<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new PersistenceError(`Decision store ${what} failed: ${describeError(err)}`, { cause: err });
    }
  }

  record(decision: DecisionRecord): number {
    return this.run('insert', () => {
      const features = Buffer.from(
        decision.features.buffer,
        decision.features.byteOffset,
        decision.features.byteLength
      );
      const result = this.db
        .prepare(
          `INSERT INTO decisions (url, mission, features, action, confidence, timestamp)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(
          decision.url,
          decision.mission,
          features,
          decision.action === 'allow' ? 1 : 0,
          decision.confidence,
          decision.timestamp
        );
      return Number(result.lastInsertRowid);
    });
  }

  /** Attaches feedback to the newest decision for (url, mission) that has none yet. */
  attachFeedback(url: string, mission: string, correct: boolean): DecisionRecord | undefined {
    return this.run('feedback', () =>
      this.db.transaction(() => {
        const row = this.db
          .prepare<[string, string], DecisionRow>(
            `SELECT * FROM decisions
             WHERE url = ? AND mission = ? AND user_feedback IS NULL
             ORDER BY timestamp DESC, id DESC
             LIMIT 1`
          )
          .get(url, mission);
        if (!row) return undefined;

        const reward = correct ? 1 : -1;
        this.db
          .prepare('UPDATE decisions SET user_feedback = ?, reward = ? WHERE id = ?')
          .run(correct ? 1 : 0, reward, row.id);

        return toRecord({ ...row, user_feedback: correct ? 1 : 0, reward });
      })()
    );
  }

  get(id: number): DecisionRecord | undefined {
    return this.run('lookup', () => {
      const row = this.db.prepare<[number], DecisionRow>('SELECT * FROM decisions WHERE id = ?').get(id);
      return row ? toRecord(row) : undefined;
    });
  }

  recent(limit = 50): DecisionRecord[] {
    return this.run('listing', () =>
      this.db
        .prepare<[number], DecisionRow>('SELECT * FROM decisions ORDER BY timestamp DESC, id DESC LIMIT ?')
        .all(limit)
        .map(toRecord)
    );
  }

  count(): number {
    return this.run('count', () => {
      const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM decisions').get();
      return row?.n ?? 0;
    });
  }

  close(): void {
    this.db.close();
  }
}
