export class FocusGateError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ExtractionError extends FocusGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options);
  }
}

export class ModelLoadError extends FocusGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MODEL_LOAD_FAILED', message, options);
  }
}

export class FetchTimeoutError extends FocusGateError {
  constructor(url: string, timeoutMs: number) {
    super('FETCH_TIMEOUT', `Metadata fetch for ${url} exceeded ${timeoutMs}ms`);
  }
}

export class PersistenceError extends FocusGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', message, options);
  }
}

export class SecretMismatchError extends FocusGateError {
  constructor() {
    super('SECRET_MISMATCH', 'Provided secret does not match the active session');
  }
}

export class ProcessSpawnError extends FocusGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SPAWN_FAILED', message, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
