import { fastify, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import type { Logger } from '@autosel/config';
import { ErrorCode, OrchestratorError, isOrchestratorError, safeErrorMessage, type CrawlJobPayload } from '@autosel/core';
import type { Orchestrator } from '@autosel/engine';
import { ADMIN_TOKEN_HEADER, createAdminPreHandler } from './auth.js';

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;

const NonEmpty = z.string().trim().min(1);

const LocatorMapSchema = z.object({
  title: NonEmpty,
  body: NonEmpty,
  date: NonEmpty,
  url: NonEmpty.optional(),
});

const ProcessBodySchema = z.object({
  sourceId: NonEmpty,
  document: z.string().min(1),
  url: z.string().url().optional(),
});

const CrawlBodySchema = z.object({
  sourceId: NonEmpty,
  url: z.string().url(),
  runId: NonEmpty.optional(),
});

const ApproveBodySchema = z
  .object({
    locators: LocatorMapSchema.optional(),
    sourceType: z.enum(['ssr', 'spa']).optional(),
  })
  .default({});

const ListQuerySchema = z.object({
  sourceId: NonEmpty.optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
});

const IdParamsSchema = z.object({ id: NonEmpty });
const SourceParamsSchema = z.object({ sourceId: NonEmpty });

export interface ServerDeps {
  orchestrator: Pick<Orchestrator, 'process' | 'approve' | 'registry' | 'decisions'>;
  enqueueCrawl: (payload: CrawlJobPayload) => Promise<string>;
  logger: Logger;
  adminToken?: string;
  nodeEnv?: string;
  /** Browser origins allowed by CORS; requests without an Origin are always allowed */
  corsOrigins?: string[];
  /** Store connectivity for /health; the endpoint reports only liveness without it */
  checkHealth?: () => Promise<boolean>;
}

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || what}: ${issue.message}`);
    throw new OrchestratorError(ErrorCode.INVALID_INPUT, `Invalid ${what}: ${issues.join('; ')}`);
  }
  return result.data;
}

function statusFor(code: string): number {
  switch (code) {
    case ErrorCode.NOT_FOUND:
      return 404;
    case ErrorCode.INVALID_INPUT:
    case ErrorCode.CONFIG_INVALID:
      return 400;
    default:
      return 500;
  }
}

function notFound(reply: FastifyReply, message: string): FastifyReply {
  return reply.code(404).send({ error: ErrorCode.NOT_FOUND, message });
}

export async function buildServer(deps: ServerDeps) {
  const { orchestrator, logger } = deps;
  const allowedOrigins = deps.corsOrigins ?? [];

  const app = fastify({ logger });

  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin || allowedOrigins.includes(origin)) {
        cb(null, true);
        return;
      }
      logger.warn({ event: 'cors.rejected', origin }, 'CORS request rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', ADMIN_TOKEN_HEADER],
    credentials: false,
  });

  app.setErrorHandler((error: Error, request, reply) => {
    if (isOrchestratorError(error)) {
      const status = statusFor(error.code);
      if (status === 500) {
        request.log.error({ event: 'api.request.failed', code: error.code, error: safeErrorMessage(error) }, 'Request failed');
      }
      return reply.code(status).send({ error: error.code, message: error.message });
    }
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode < 500) {
      return reply.code(400).send({ error: 'BAD_REQUEST', message: error.message });
    }
    request.log.error({ event: 'api.request.failed', error: safeErrorMessage(error) }, 'Unhandled error');
    return reply.code(500).send({ error: 'INTERNAL', message: 'Internal server error' });
  });

  app.setNotFoundHandler((request, reply) => {
    return notFound(reply, `Route ${request.method} ${request.url} not found`);
  });

  const admin = { preHandler: createAdminPreHandler({ token: deps.adminToken, nodeEnv: deps.nodeEnv, logger }) };

  app.get('/health', async (_request, reply) => {
    const timestamp = new Date().toISOString();
    if (!deps.checkHealth) {
      return { ok: true, timestamp };
    }
    const up = await deps.checkHealth();
    return reply.status(up ? 200 : 503).send({ ok: up, redis: up ? 'up' : 'down', timestamp });
  });

  app.post('/process', admin, async (request, reply) => {
    const body = parse(ProcessBodySchema, request.body, 'body');
    const result = await orchestrator.process(body.sourceId, body.document, { url: body.url });
    if (result.status === 'error') {
      const code = result.error?.code ?? 'INTERNAL';
      return reply.code(statusFor(code)).send({ error: code, message: result.error?.message ?? 'Processing failed', result });
    }
    return result;
  });

  app.post('/crawl', admin, async (request, reply) => {
    const body = parse(CrawlBodySchema, request.body, 'body');
    const jobId = await deps.enqueueCrawl({ ...body, requestedAt: new Date().toISOString() });
    return reply.code(202).send({ jobId });
  });

  app.get('/rules', admin, async () => {
    return { rules: await orchestrator.registry.list() };
  });

  app.get('/rules/:sourceId', admin, async (request, reply) => {
    const { sourceId } = parse(SourceParamsSchema, request.params, 'params');
    const rule = await orchestrator.registry.get(sourceId);
    return rule ?? notFound(reply, `Rule not found: ${sourceId}`);
  });

  app.get('/decisions', admin, async (request) => {
    const query = parse(ListQuerySchema, request.query, 'query');
    const decisions = query.sourceId
      ? await orchestrator.decisions.listBySource(query.sourceId, query.limit)
      : await orchestrator.decisions.listRecent(query.limit);
    return { decisions };
  });

  app.get('/decisions/:id', admin, async (request, reply) => {
    const { id } = parse(IdParamsSchema, request.params, 'params');
    const record = await orchestrator.decisions.get(id);
    return record ?? notFound(reply, `Decision not found: ${id}`);
  });

  app.get('/reviews', admin, async (request) => {
    const { limit } = parse(ListQuerySchema, request.query, 'query');
    return { reviews: await orchestrator.decisions.listPendingReviews(limit) };
  });

  app.post('/reviews/:id/approve', admin, async (request) => {
    const { id } = parse(IdParamsSchema, request.params, 'params');
    const body = parse(ApproveBodySchema, request.body, 'body');
    return orchestrator.approve(id, body);
  });

  return app;
}

export type ApiServer = Awaited<ReturnType<typeof buildServer>>;
