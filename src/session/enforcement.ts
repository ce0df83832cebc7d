import { spawn, type ChildProcess } from 'child_process';
import type { Logger } from 'pino';
import { ProcessSpawnError, describeError } from '../errors.js';

/** A running enforcement process (the intercepting proxy). */
export interface EnforcementHandle {
  readonly pid?: number;
  isAlive(): boolean;
  /** SIGTERM, then SIGKILL once `killTimeoutMs` passes without an exit. */
  stop(killTimeoutMs: number): Promise<void>;
}

export interface EnforcementLauncher {
  /** Rejects with {@link ProcessSpawnError} when the process does not come up. */
  launch(): Promise<EnforcementHandle>;
}

export interface ChildProcessLauncherOptions {
  command: string;
  args: string[];
  port: number;
  startupGraceMs: number;
}

class ChildProcessHandle implements EnforcementHandle {
  private exited = false;
  private readonly exit: Promise<void>;

  constructor(private readonly child: ChildProcess, logger: Logger) {
    this.exit = new Promise(resolve => {
      child.once('exit', (code, signal) => {
        this.exited = true;
        logger.info({ pid: child.pid, code, signal }, 'Enforcement process exited');
        resolve();
      });
    });
    child.on('error', err => logger.error({ pid: child.pid, err: err.message }, 'Enforcement process error'));
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  async stop(killTimeoutMs: number): Promise<void> {
    if (!this.isAlive()) return;

    this.child.kill('SIGTERM');
    const timer = setTimeout(() => {
      if (this.isAlive()) this.child.kill('SIGKILL');
    }, killTimeoutMs);

    try {
      await this.exit;
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Spawns the proxy command; `{port}` in the arguments is replaced with the configured port. */
export class ChildProcessLauncher implements EnforcementLauncher {
  constructor(
    private readonly options: ChildProcessLauncherOptions,
    private readonly logger: Logger
  ) {}

  launch(): Promise<EnforcementHandle> {
    const { command, port, startupGraceMs } = this.options;
    const args = this.options.args.map(arg => arg.replaceAll('{port}', String(port)));

    this.logger.info({ command, args }, 'Starting enforcement process');

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'ignore' });

      const cleanup = () => {
        clearTimeout(timer);
        child.off('error', onError);
        child.off('exit', onExit);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new ProcessSpawnError(`Failed to start ${command}: ${describeError(err)}`, { cause: err }));
      };
      const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
        cleanup();
        reject(new ProcessSpawnError(`${command} exited during startup (${code ?? signal})`));
      };

      // Alive after the grace period counts as started
      const timer = setTimeout(() => {
        cleanup();
        this.logger.info({ pid: child.pid }, 'Enforcement process started');
        resolve(new ChildProcessHandle(child, this.logger));
      }, startupGraceMs);

      child.once('error', onError);
      child.once('exit', onExit);
    });
  }
}
