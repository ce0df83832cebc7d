import { readFileSync, writeFileSync, existsSync, mkdirSync, rmSync } from 'fs';
import { resolve } from 'path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Mission, SessionRecord } from '../types/index.js';
import { missionSchema } from '../types/index.js';
import { PersistenceError, describeError } from '../errors.js';

const sessionRecordSchema = z.object({
  session_id: z.string(),
  task: z.string(),
  start_time: z.string().datetime(),
  end_time: z.string().datetime(),
  duration_hours: z.number().positive(),
  secret_hash: z.string().regex(/^[0-9a-f]{64}$/)
});

export const SESSION_FILE = 'active_session.json';
export const MISSION_FILE = 'mission.json';

/** Session record and mission document on disk, under the data directory. */
export class SessionStore {
  private readonly sessionPath: string;
  private readonly missionPath: string;

  constructor(dataDir: string, private readonly logger: Logger) {
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
    this.sessionPath = resolve(dataDir, SESSION_FILE);
    this.missionPath = resolve(dataDir, MISSION_FILE);
  }

  save(record: SessionRecord): void {
    try {
      writeFileSync(this.sessionPath, JSON.stringify(record, null, 2), { mode: 0o600 });
    } catch (err) {
      throw new PersistenceError(`Failed to write session record: ${describeError(err)}`, { cause: err });
    }
  }

  load(): SessionRecord | undefined {
    if (!existsSync(this.sessionPath)) return undefined;

    try {
      return sessionRecordSchema.parse(JSON.parse(readFileSync(this.sessionPath, 'utf-8')));
    } catch (err) {
      this.logger.error({ path: this.sessionPath, err: describeError(err) }, 'Session record unreadable, discarding it');
      this.clear();
      return undefined;
    }
  }

  clear(): void {
    try {
      rmSync(this.sessionPath, { force: true });
    } catch (err) {
      this.logger.error({ path: this.sessionPath, err: describeError(err) }, 'Failed to remove session record');
    }
  }

  /** The mission document written by the mission editor, if there is a valid one. */
  loadMission(): Mission | undefined {
    if (!existsSync(this.missionPath)) return undefined;

    try {
      const mission = missionSchema.parse(JSON.parse(readFileSync(this.missionPath, 'utf-8')));
      return mission.missionText.trim() ? mission : undefined;
    } catch (err) {
      this.logger.warn({ path: this.missionPath, err: describeError(err) }, 'Mission document unreadable');
      return undefined;
    }
  }

  saveMission(mission: Mission): void {
    try {
      writeFileSync(this.missionPath, JSON.stringify(mission, null, 2));
    } catch (err) {
      throw new PersistenceError(`Failed to write mission document: ${describeError(err)}`, { cause: err });
    }
  }
}
