import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import { z } from 'zod';
import { pageMetadataSchema } from './types/index.js';
import type { DecisionContext } from './context.js';
import type { SessionAuditLog } from './crypto/index.js';
import type { SessionSupervisor } from './session/index.js';
import { SecretMismatchError } from './errors.js';
import { VERSION } from './version.js';

const urlBody = z.object({ url: z.string().min(1) });
const metadataBody = z.object({ metadata: pageMetadataSchema });
const feedbackBody = z.object({ url: z.string().min(1), correct: z.boolean() });
const startBody = z.object({
  duration_hours: z.number().positive(),
  task: z.string().trim().min(1)
});
const endBody = z.object({ secret: z.string().min(1) });

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, reply: FastifyReply): z.infer<T> | undefined {
  const parsed = schema.safeParse(body);
  if (parsed.success) return parsed.data;

  void reply.status(400).send({ error: 'INVALID_REQUEST', issues: parsed.error.issues });
  return undefined;
}

export interface AppDeps {
  context: DecisionContext;
  supervisor: SessionSupervisor;
  audit: SessionAuditLog;
  logger: Logger;
}

export async function buildApp({ context, supervisor, audit, logger }: AppDeps): Promise<FastifyInstance> {
  const { config, engine } = context;
  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.auth.allowed_origins,
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  app.get('/api/health', async () => {
    const auditVerification = audit.verify();
    return {
      status: 'healthy',
      version: VERSION,
      classifier_trained: context.classifier.trained,
      audit_log_valid: auditVerification.valid
    };
  });

  app.post('/api/decide', async (request, reply) => {
    const body = parseBody(urlBody, request.body, reply);
    if (!body) return reply;
    return engine.decide(body.url);
  });

  app.post('/api/decide/metadata', async (request, reply) => {
    const body = parseBody(metadataBody, request.body, reply);
    if (!body) return reply;
    return engine.decideWithMetadata(body.metadata);
  });

  app.post('/api/decide/fetch', async (request, reply) => {
    const body = parseBody(urlBody, request.body, reply);
    if (!body) return reply;
    return engine.decideFetched(body.url);
  });

  app.post('/api/feedback', async (request, reply) => {
    const body = parseBody(feedbackBody, request.body, reply);
    if (!body) return reply;
    return { updated: engine.submitFeedback(body.url, body.correct) };
  });

  app.post('/api/session/start', async (request, reply) => {
    const body = parseBody(startBody, request.body, reply);
    if (!body) return reply;

    const result = await supervisor.startSession(body.duration_hours, body.task);
    if (!result.ok) {
      const status = result.code === 'SESSION_ACTIVE' ? 409
        : result.code === 'INVALID_DURATION' ? 400
        : 503;
      reply.status(status);
      return { error: result.code, reason: result.reason };
    }

    return { secret: result.secret, fragments: result.fragments, ends_at: result.endsAt };
  });

  app.post('/api/session/end', async (request, reply) => {
    const body = parseBody(endBody, request.body, reply);
    if (!body) return reply;

    if (!supervisor.status().active) {
      reply.status(409);
      return { error: 'NO_ACTIVE_SESSION', ended: false };
    }

    const ended = await supervisor.endSession(body.secret);
    if (!ended) {
      const mismatch = new SecretMismatchError();
      reply.status(403);
      return { error: mismatch.code, reason: mismatch.message, ended: false };
    }

    return { ended: true };
  });

  app.get('/api/session/status', async () => {
    const status = supervisor.status();
    return {
      state: status.state,
      active: status.active,
      task: status.task ?? null,
      ends_at: status.endsAt ?? null,
      remaining_ms: status.remainingMs,
      last_outcome: status.lastOutcome ?? null
    };
  });

  app.get('/api/stats', async () => engine.stats());

  app.post('/api/cache/clear', async () => {
    engine.clearCache();
    return { cleared: true };
  });

  app.setErrorHandler((error, request, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 500) {
      logger.error({ url: request.url, err: error.message }, 'Request failed');
    }
    void reply.status(status).send({
      error: status >= 500 ? 'INTERNAL_ERROR' : error.code,
      reason: error.message
    });
  });

  return app;
}
