import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import Bottleneck from 'bottleneck';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type {
  Mission,
  SessionAuditRecord,
  SessionRecord,
  SessionState,
  SessionStatus,
  StartSessionResult,
  TerminalState
} from '../types/index.js';
import { missionFromTask } from '../types/index.js';
import type { SessionAuditLog } from '../crypto/index.js';
import { describeError } from '../errors.js';
import type { DecisionEngine } from '../engine/engine.js';
import type { EnforcementHandle, EnforcementLauncher } from './enforcement.js';
import { generateSecret, hashSecret, splitSecret, verifySecret } from './secret.js';
import type { SessionStore } from './store.js';

export interface SupervisorOptions {
  /** Health check period for the enforcement process. */
  checkIntervalMs: number;
  /** Expiry poll period. */
  expiryIntervalMs: number;
  /** Failed restarts tolerated before the session is terminated. */
  maxRestartAttempts: number;
  killTimeoutMs: number;
}

export interface SupervisorDeps {
  engine: DecisionEngine;
  launcher: EnforcementLauncher;
  store: SessionStore;
  audit: SessionAuditLog;
  logger: Logger;
  options: SupervisorOptions;
  now?: () => number;
}

export interface StateTransition {
  from: SessionState;
  to: SessionState;
  sessionId?: string;
}

interface Monitors {
  controller: AbortController;
  done: Promise<unknown>;
}

const HOUR_MS = 3_600_000;

const AUDIT_EVENTS: Record<TerminalState, SessionAuditRecord['event']> = {
  COMPLETED: 'SESSION_COMPLETED',
  UNLOCKED: 'SESSION_UNLOCKED',
  EMERGENCY_TERMINATED: 'EMERGENCY_TERMINATED'
};

/** Resolves false instead of throwing when the signal aborts the wait. */
async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal.aborted) return false;
    throw err;
  }
}

/**
 * Owns the focus session lifecycle: IDLE, ACTIVE, then one terminal outcome and back to IDLE.
 *
 * Every mutation of session state runs through a single-slot limiter so that an unlock, an
 * expiry and a watchdog restart never interleave. Monitors are aborted and awaited before the
 * enforcement process is stopped, so no loop can respawn it after teardown began.
 *
 * Emits `transition` with a {@link StateTransition} on every state change.
 */
export class SessionSupervisor extends EventEmitter {
  private state: SessionState = 'IDLE';
  private session?: SessionRecord;
  private handle?: EnforcementHandle;
  private monitors?: Monitors;
  private lastOutcome?: TerminalState;
  private ending = false;
  private pendingTeardown: Promise<void> = Promise.resolve();

  private readonly lock = new Bottleneck({ maxConcurrent: 1 });
  private readonly logger: Logger;
  private readonly options: SupervisorOptions;
  private readonly now: () => number;

  constructor(private readonly deps: SupervisorDeps) {
    super();
    this.logger = deps.logger;
    this.options = deps.options;
    this.now = deps.now ?? Date.now;
  }

  async startSession(durationHours: number, task: string): Promise<StartSessionResult> {
    return this.lock.schedule(async (): Promise<StartSessionResult> => {
      if (this.state !== 'IDLE' || this.ending) {
        return { ok: false, code: 'SESSION_ACTIVE', reason: 'A focus session is already active' };
      }
      if (!Number.isFinite(durationHours) || durationHours <= 0) {
        return { ok: false, code: 'INVALID_DURATION', reason: 'Duration must be a positive number of hours' };
      }

      const secret = generateSecret();
      const start = this.now();
      const record: SessionRecord = {
        session_id: uuidv4(),
        task,
        start_time: new Date(start).toISOString(),
        end_time: new Date(start + durationHours * HOUR_MS).toISOString(),
        duration_hours: durationHours,
        secret_hash: hashSecret(secret)
      };

      try {
        this.deps.store.save(record);
      } catch (err) {
        this.logger.error({ err: describeError(err) }, 'Could not persist session record');
        return { ok: false, code: 'PERSISTENCE_FAILED', reason: describeError(err) };
      }

      try {
        this.handle = await this.deps.launcher.launch();
      } catch (err) {
        this.deps.store.clear();
        this.logger.error({ err: describeError(err) }, 'Enforcement process failed to start, session rolled back');
        return { ok: false, code: 'SPAWN_FAILED', reason: describeError(err) };
      }

      this.activate(record);
      this.audit('SESSION_STARTED', record.session_id, `${durationHours}h: ${task}`);
      this.logger.info(
        { session_id: record.session_id, task, ends_at: record.end_time },
        'Focus session started'
      );

      return { ok: true, secret, fragments: splitSecret(secret), endsAt: record.end_time };
    });
  }

  /** True when the secret matched and the session was unlocked. A mismatch leaves it running. */
  async endSession(secret: string): Promise<boolean> {
    const verified = await this.lock.schedule(async () => {
      const session = this.session;
      if (this.state !== 'ACTIVE' || this.ending || !session) return false;

      if (!verifySecret(secret, session.secret_hash)) {
        this.audit('UNLOCK_FAILED', session.session_id);
        this.logger.warn({ session_id: session.session_id }, 'Unlock attempt with wrong secret');
        return false;
      }

      this.ending = true;
      return true;
    });

    if (!verified) return false;
    await this.beginTeardown('UNLOCKED');
    return true;
  }

  /** Picks up a persisted session after a restart of the daemon. */
  async resume(): Promise<boolean> {
    return this.lock.schedule(async () => {
      if (this.state !== 'IDLE') return false;

      const record = this.deps.store.load();
      if (!record) return false;

      if (Date.parse(record.end_time) <= this.now()) {
        this.logger.info({ session_id: record.session_id }, 'Persisted session already expired, discarding it');
        this.deps.store.clear();
        return false;
      }

      try {
        this.handle = await this.deps.launcher.launch();
      } catch (err) {
        // The health monitor keeps retrying
        this.handle = undefined;
        this.logger.error({ err: describeError(err) }, 'Enforcement process failed to start on resume');
      }

      this.activate(record);
      this.audit('SESSION_RESUMED', record.session_id);
      this.logger.info({ session_id: record.session_id, ends_at: record.end_time }, 'Focus session resumed');
      return true;
    });
  }

  status(): SessionStatus {
    const session = this.session;
    return {
      state: this.state,
      active: this.state === 'ACTIVE',
      task: session?.task,
      endsAt: session?.end_time,
      remainingMs: session ? Math.max(0, Date.parse(session.end_time) - this.now()) : 0,
      lastOutcome: this.lastOutcome
    };
  }

  /**
   * Stops monitors and the enforcement process for daemon exit. The persisted record stays,
   * so an active session resumes on the next start.
   */
  async shutdown(): Promise<void> {
    await this.stopMonitors();
    await this.pendingTeardown;
    await this.lock.schedule(() => this.stopProcess());
    this.session = undefined;
    this.transition('IDLE');
  }

  private activate(record: SessionRecord): void {
    this.session = record;
    this.deps.engine.setMission(this.missionFor(record));
    this.transition('ACTIVE', record.session_id);
    this.startMonitors();
  }

  private missionFor(record: SessionRecord): Mission {
    return this.deps.store.loadMission() ?? missionFromTask(record.task);
  }

  private startMonitors(): void {
    const controller = new AbortController();
    const loops = [this.expiryLoop(controller.signal), this.healthLoop(controller.signal)];
    this.monitors = { controller, done: Promise.allSettled(loops) };

    for (const loop of loops) {
      void loop
        .then(outcome => (outcome ? this.finishFromMonitor(outcome) : undefined))
        .catch(err => this.logger.error({ err: describeError(err) }, 'Session monitor failed'));
    }
  }

  private async stopMonitors(): Promise<void> {
    const monitors = this.monitors;
    if (!monitors) return;
    this.monitors = undefined;
    monitors.controller.abort();
    await monitors.done;
  }

  private async expiryLoop(signal: AbortSignal): Promise<TerminalState | undefined> {
    while (!signal.aborted) {
      const session = this.session;
      if (session && this.now() >= Date.parse(session.end_time)) {
        return 'COMPLETED';
      }
      if (!(await pause(this.options.expiryIntervalMs, signal))) break;
    }
    return undefined;
  }

  private async healthLoop(signal: AbortSignal): Promise<TerminalState | undefined> {
    let failedRestarts = 0;

    while (await pause(this.options.checkIntervalMs, signal)) {
      if (this.handle?.isAlive()) continue;

      if (failedRestarts >= this.options.maxRestartAttempts) {
        this.logger.fatal(
          { attempts: failedRestarts },
          'Enforcement process could not be restarted, terminating session'
        );
        return 'EMERGENCY_TERMINATED';
      }

      this.logger.warn({ attempt: failedRestarts + 1 }, 'Enforcement process is down, restarting');
      const restarted = await this.lock.schedule(() => this.restartProcess(signal));
      if (restarted === 'aborted') break;
      failedRestarts = restarted ? 0 : failedRestarts + 1;
    }
    return undefined;
  }

  private async restartProcess(signal: AbortSignal): Promise<boolean | 'aborted'> {
    if (signal.aborted || this.ending) return 'aborted';

    let handle: EnforcementHandle;
    try {
      handle = await this.deps.launcher.launch();
    } catch (err) {
      this.logger.error({ err: describeError(err) }, 'Enforcement restart failed');
      return false;
    }

    this.handle = handle;
    if (this.session) {
      this.audit('PROCESS_RESTARTED', this.session.session_id, `pid ${handle.pid ?? 'unknown'}`);
    }
    return true;
  }

  private async finishFromMonitor(outcome: TerminalState): Promise<void> {
    const proceed = await this.lock.schedule(async () => {
      if (this.state !== 'ACTIVE' || this.ending) return false;
      this.ending = true;
      return true;
    });
    if (proceed) await this.beginTeardown(outcome);
  }

  private beginTeardown(outcome: TerminalState): Promise<void> {
    this.pendingTeardown = this.teardown(outcome);
    return this.pendingTeardown;
  }

  private async teardown(outcome: TerminalState): Promise<void> {
    await this.stopMonitors();

    await this.lock.schedule(async () => {
      const session = this.session;
      try {
        await this.stopProcess();
      } finally {
        this.deps.store.clear();
        this.deps.engine.clearMission();
        this.deps.engine.clearCache();

        if (session) {
          this.audit(AUDIT_EVENTS[outcome], session.session_id);
        }
        this.logger.info({ session_id: session?.session_id, outcome }, 'Focus session ended');

        this.session = undefined;
        this.lastOutcome = outcome;
        this.transition(outcome, session?.session_id);
        this.transition('IDLE', session?.session_id);
        this.ending = false;
      }
    });
  }

  private async stopProcess(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    if (handle) {
      await handle.stop(this.options.killTimeoutMs);
    }
  }

  private audit(event: SessionAuditRecord['event'], sessionId: string, detail?: string): void {
    try {
      this.deps.audit.log({ event, session_id: sessionId, detail });
    } catch (err) {
      this.logger.error({ event, err: describeError(err) }, 'Failed to append session audit record');
    }
  }

  private transition(to: SessionState, sessionId?: string): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.logger.debug({ from, to }, 'Session state change');
    this.emit('transition', { from, to, sessionId } satisfies StateTransition);
  }
}
