import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { SessionSupervisor, type StateTransition } from '../supervisor.js';
import { SESSION_FILE, SessionStore } from '../store.js';
import { hashSecret } from '../secret.js';
import { SessionAuditLog } from '../../crypto/index.js';
import type { DecisionEngine } from '../../engine/engine.js';
import type { SessionState } from '../../types/index.js';
import { FakeLauncher, createTestEngine, silentLogger, tempDir } from '../../__tests__/helpers.js';

const HOUR_MS = 3_600_000;

function waitForState(supervisor: SessionSupervisor, state: SessionState): Promise<StateTransition> {
  return new Promise(resolve => {
    const listener = (transition: StateTransition) => {
      if (transition.to === state) {
        supervisor.off('transition', listener);
        resolve(transition);
      }
    };
    supervisor.on('transition', listener);
  });
}

describe('SessionSupervisor', () => {
  let dir: string;
  let clock: number;
  let launcher: FakeLauncher;
  let store: SessionStore;
  let audit: SessionAuditLog;
  let engine: DecisionEngine;
  let supervisor: SessionSupervisor;
  let transitions: SessionState[];

  function createSupervisor(): SessionSupervisor {
    const created = new SessionSupervisor({
      engine,
      launcher,
      store,
      audit,
      logger: silentLogger,
      options: { checkIntervalMs: 5, expiryIntervalMs: 5, maxRestartAttempts: 2, killTimeoutMs: 50 },
      now: () => clock
    });
    created.on('transition', (t: StateTransition) => transitions.push(t.to));
    return created;
  }

  function auditEvents(): string[] {
    return audit.records().map(r => r.event);
  }

  beforeEach(() => {
    dir = tempDir();
    clock = Date.parse('2026-01-05T09:00:00.000Z');
    launcher = new FakeLauncher();
    store = new SessionStore(dir, silentLogger);
    audit = new SessionAuditLog(join(dir, 'logs', 'sessions.jsonl'));
    engine = createTestEngine().engine;
    transitions = [];
    supervisor = createSupervisor();
  });

  afterEach(async () => {
    await supervisor.shutdown();
  });

  describe('startSession', () => {
    it('starts enforcement and hands out the secret in three fragments', async () => {
      const result = await supervisor.startSession(2, 'learn rust ownership');
      if (!result.ok) throw new Error(result.reason);

      expect(result.fragments.join('')).toBe(result.secret);
      expect(result.endsAt).toBe('2026-01-05T11:00:00.000Z');
      expect(launcher.launches).toBe(1);
      expect(supervisor.status()).toEqual({
        state: 'ACTIVE',
        active: true,
        task: 'learn rust ownership',
        endsAt: '2026-01-05T11:00:00.000Z',
        remainingMs: 2 * HOUR_MS,
        lastOutcome: undefined
      });
      expect(engine.currentMission()?.missionText).toBe('learn rust ownership');
      expect(auditEvents()).toEqual(['SESSION_STARTED']);
    });

    it('persists only the hash of the secret', async () => {
      const result = await supervisor.startSession(1, 'write docs');
      if (!result.ok) throw new Error(result.reason);

      const persisted = readFileSync(join(dir, SESSION_FILE), 'utf-8');
      expect(persisted).not.toContain(result.secret);
      expect(store.load()?.secret_hash).toBe(hashSecret(result.secret));
      expect(readFileSync(join(dir, 'logs', 'sessions.jsonl'), 'utf-8')).not.toContain(result.secret);
    });

    it('installs the mission document when there is one', async () => {
      store.saveMission({ missionText: 'Study rust', allowedDomains: ['docs.rs'], allowedKeywords: ['borrow'] });
      await supervisor.startSession(1, 'anything');

      expect(engine.currentMission()).toEqual({
        missionText: 'Study rust',
        allowedDomains: ['docs.rs'],
        allowedKeywords: ['borrow']
      });
    });

    it('refuses a second session while one is active', async () => {
      await supervisor.startSession(1, 'first');
      expect(await supervisor.startSession(1, 'second')).toMatchObject({ ok: false, code: 'SESSION_ACTIVE' });
      expect(launcher.launches).toBe(1);
    });

    it('rejects a non-positive duration', async () => {
      expect(await supervisor.startSession(0, 'nothing')).toMatchObject({ ok: false, code: 'INVALID_DURATION' });
      expect(launcher.launches).toBe(0);
    });

    it('rolls back when enforcement cannot start', async () => {
      launcher.fail = true;

      expect(await supervisor.startSession(1, 'write docs')).toEqual({
        ok: false,
        code: 'SPAWN_FAILED',
        reason: 'proxy binary missing'
      });
      expect(store.load()).toBeUndefined();
      expect(supervisor.status().state).toBe('IDLE');
      expect(engine.currentMission()).toBeUndefined();
    });
  });

  describe('endSession', () => {
    it('keeps the session running on a wrong secret', async () => {
      await supervisor.startSession(1, 'write docs');

      expect(await supervisor.endSession('test-secret')).toBe(false);
      expect(supervisor.status().active).toBe(true);
      expect(launcher.handles[0].stopped).toBe(false);
      expect(auditEvents()).toEqual(['SESSION_STARTED', 'UNLOCK_FAILED']);
    });

    it('unlocks with the reassembled secret and tears everything down', async () => {
      const result = await supervisor.startSession(1, 'write docs');
      if (!result.ok) throw new Error(result.reason);
      engine.decide('https://github.com/org/repo');

      expect(await supervisor.endSession(result.fragments.join(''))).toBe(true);

      expect(supervisor.status()).toMatchObject({ state: 'IDLE', active: false, lastOutcome: 'UNLOCKED', remainingMs: 0 });
      expect(transitions).toEqual(['ACTIVE', 'UNLOCKED', 'IDLE']);
      expect(launcher.handles[0].stopped).toBe(true);
      expect(store.load()).toBeUndefined();
      expect(engine.currentMission()).toBeUndefined();
      expect(engine.stats().cacheSize).toBe(0);
      expect(auditEvents()).toEqual(['SESSION_STARTED', 'SESSION_UNLOCKED']);
    });

    it('returns false when no session is active', async () => {
      expect(await supervisor.endSession('test-secret')).toBe(false);
    });

    it('allows a new session after the previous one ended', async () => {
      const first = await supervisor.startSession(1, 'first');
      if (!first.ok) throw new Error(first.reason);
      await supervisor.endSession(first.secret);

      expect(await supervisor.startSession(1, 'second')).toMatchObject({ ok: true });
    });
  });

  describe('monitors', () => {
    it('completes the session when it expires', async () => {
      await supervisor.startSession(1, 'write docs');
      const completed = waitForState(supervisor, 'COMPLETED');

      clock += HOUR_MS;
      await completed;

      expect(supervisor.status()).toMatchObject({ state: 'IDLE', lastOutcome: 'COMPLETED' });
      expect(launcher.handles[0].stopped).toBe(true);
      expect(store.load()).toBeUndefined();
      expect(auditEvents()).toEqual(['SESSION_STARTED', 'SESSION_COMPLETED']);
    });

    it('restarts enforcement when it dies', async () => {
      await supervisor.startSession(1, 'write docs');
      launcher.handles[0].alive = false;

      await vi.waitFor(() => expect(launcher.launches).toBe(2));

      expect(supervisor.status().active).toBe(true);
      await vi.waitFor(() => expect(auditEvents()).toContain('PROCESS_RESTARTED'));
    });

    it('terminates the session when restarts keep failing', async () => {
      await supervisor.startSession(1, 'write docs');
      const terminated = waitForState(supervisor, 'EMERGENCY_TERMINATED');

      launcher.fail = true;
      launcher.handles[0].alive = false;
      await terminated;

      // The first launch plus two failed restarts
      expect(launcher.launches).toBe(3);
      expect(supervisor.status()).toMatchObject({ state: 'IDLE', lastOutcome: 'EMERGENCY_TERMINATED' });
      expect(store.load()).toBeUndefined();
      expect(auditEvents().at(-1)).toBe('EMERGENCY_TERMINATED');
    });

    it('does not restart enforcement after an unlock', async () => {
      const result = await supervisor.startSession(1, 'write docs');
      if (!result.ok) throw new Error(result.reason);

      await supervisor.endSession(result.secret);
      await new Promise(resolve => setTimeout(resolve, 30));

      expect(launcher.launches).toBe(1);
    });
  });

  describe('resume', () => {
    it('picks up a persisted session', async () => {
      store.save({
        session_id: 'session-1',
        task: 'write docs',
        start_time: new Date(clock - HOUR_MS).toISOString(),
        end_time: new Date(clock + HOUR_MS).toISOString(),
        duration_hours: 2,
        secret_hash: hashSecret('test-secret')
      });

      expect(await supervisor.resume()).toBe(true);
      expect(supervisor.status()).toMatchObject({ state: 'ACTIVE', task: 'write docs', remainingMs: HOUR_MS });
      expect(engine.currentMission()?.missionText).toBe('write docs');
      expect(auditEvents()).toEqual(['SESSION_RESUMED']);

      expect(await supervisor.endSession('test-secret')).toBe(true);
    });

    it('discards a session that expired while the daemon was down', async () => {
      store.save({
        session_id: 'session-1',
        task: 'write docs',
        start_time: new Date(clock - 2 * HOUR_MS).toISOString(),
        end_time: new Date(clock - HOUR_MS).toISOString(),
        duration_hours: 1,
        secret_hash: hashSecret('test-secret')
      });

      expect(await supervisor.resume()).toBe(false);
      expect(store.load()).toBeUndefined();
      expect(launcher.launches).toBe(0);
    });

    it('does nothing without a persisted session', async () => {
      expect(await supervisor.resume()).toBe(false);
    });
  });

  describe('shutdown', () => {
    it('stops enforcement but keeps the session for the next start', async () => {
      await supervisor.startSession(1, 'write docs');
      await supervisor.shutdown();

      expect(launcher.handles[0].stopped).toBe(true);
      expect(store.load()?.task).toBe('write docs');

      const next = createSupervisor();
      expect(await next.resume()).toBe(true);
      await next.shutdown();
    });
  });
});
