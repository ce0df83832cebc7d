export type SessionState = 'IDLE' | 'ACTIVE' | 'COMPLETED' | 'UNLOCKED' | 'EMERGENCY_TERMINATED';

export type TerminalState = Exclude<SessionState, 'IDLE' | 'ACTIVE'>;

export interface SessionRecord {
  session_id: string;
  task: string;
  start_time: string;
  end_time: string;
  duration_hours: number;
  secret_hash: string;
}

export interface SessionStatus {
  state: SessionState;
  active: boolean;
  task?: string;
  endsAt?: string;
  remainingMs: number;
  lastOutcome?: TerminalState;
}

export type StartSessionResult =
  | { ok: true; secret: string; fragments: [string, string, string]; endsAt: string }
  | { ok: false; code: 'SESSION_ACTIVE' | 'INVALID_DURATION' | 'PERSISTENCE_FAILED' | 'SPAWN_FAILED'; reason: string };

export interface SessionAuditRecord {
  event_id: string;
  timestamp: string;
  event:
    | 'SESSION_STARTED'
    | 'SESSION_RESUMED'
    | 'UNLOCK_FAILED'
    | 'SESSION_UNLOCKED'
    | 'SESSION_COMPLETED'
    | 'EMERGENCY_TERMINATED'
    | 'PROCESS_RESTARTED';
  session_id: string;
  detail?: string;
  prev_record_hash: string;
  focus_gate_version: string;
}
