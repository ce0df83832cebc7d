#!/usr/bin/env node
import pino from 'pino';
import { loadConfig, dataPath } from './config.js';
import { createDecisionContext } from './context.js';
import { SessionAuditLog } from './crypto/index.js';
import { ChildProcessLauncher, SessionStore, SessionSupervisor } from './session/index.js';
import { buildApp } from './app.js';
import { describeError } from './errors.js';

async function main() {
  const config = loadConfig();

  const logger = pino({
    level: process.env.LOG_LEVEL || config.logging.level,
    ...(config.logging.pretty && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true }
      }
    })
  });

  logger.info('Focus Gate starting...');

  const context = createDecisionContext(config, logger);
  const audit = new SessionAuditLog(dataPath(config, 'logs', 'sessions.jsonl'));
  const supervisor = new SessionSupervisor({
    engine: context.engine,
    launcher: new ChildProcessLauncher(
      {
        command: config.enforcement.command,
        args: config.enforcement.args,
        port: config.enforcement.port,
        startupGraceMs: config.session.startup_grace_ms
      },
      logger.child({ component: 'enforcement' })
    ),
    store: new SessionStore(config.data_dir, logger.child({ component: 'session-store' })),
    audit,
    logger: logger.child({ component: 'supervisor' }),
    options: {
      checkIntervalMs: config.session.check_interval_ms,
      expiryIntervalMs: config.session.expiry_interval_ms,
      maxRestartAttempts: config.session.max_restart_attempts,
      killTimeoutMs: config.session.kill_timeout_ms
    }
  });

  if (await supervisor.resume()) {
    logger.info(supervisor.status(), 'Resumed focus session from previous run');
  }

  const app = await buildApp({ context, supervisor, audit, logger: logger.child({ component: 'http' }) });

  let stopping = false;
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');

    try {
      await app.close();
      await supervisor.shutdown();
      await context.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err: describeError(err) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.once('SIGINT', signal => void stop(signal));
  process.once('SIGTERM', signal => void stop(signal));

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Focus Gate listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
