import { Worker } from 'bullmq';
import { Redis } from 'ioredis';
import {
  createLogger,
  getEnvDiagnostics,
  initEnv,
  loadSettings,
  readIntEnv,
  validateRequiredEnv,
} from '@autosel/config';
import { QUEUE_NAME, redactUrl, safeErrorMessage, type CrawlJobPayload } from '@autosel/core';
import { RedisDecisionStore, RedisRuleStore, disconnectRedis, getRedisClient } from '@autosel/db';
import { Orchestrator } from '@autosel/engine';
import { createAgentsFromEnv } from '@autosel/llm';
import { createHttpFetcher } from './fetcher.js';
import { processCrawlJob } from './process-job.js';

const REQUIRED_KEYS = ['REDIS_URL', 'PROPOSER_API_KEY', 'VALIDATOR_API_KEY'];
const REPORTED_KEYS = [...REQUIRED_KEYS, 'FALLBACK_PROPOSER_API_KEY', 'PROPOSER_PROVIDER', 'VALIDATOR_PROVIDER'];

const envResult = initEnv();
const logger = createLogger('worker');

let worker: Worker<CrawlJobPayload> | null = null;
let workerConnection: Redis | null = null;

function logEnvDiagnostics(): void {
  const diagnostics = getEnvDiagnostics(REPORTED_KEYS);
  logger.info(
    {
      event: 'worker.env',
      envFilePath: envResult.envFilePath,
      loaded: envResult.loaded,
      keysLoaded: envResult.keysLoaded.length,
      keys: diagnostics.keys.map((k) => ({ key: k.key, present: k.present, source: k.source })),
    },
    'Environment loaded'
  );
  for (const warning of diagnostics.warnings) {
    logger.warn({ event: 'worker.env.warning', warning }, warning);
  }
}

async function startWorker(): Promise<void> {
  logEnvDiagnostics();

  const { valid, missing } = validateRequiredEnv(REQUIRED_KEYS);
  if (!valid) {
    logger.fatal({ event: 'worker.env.missing', missing }, `Missing required environment variables: ${missing.join(', ')}`);
    process.exit(1);
  }

  const settings = loadSettings();
  const agents = createAgentsFromEnv({ timeoutMs: settings.agentTimeoutMs });
  const redis = getRedisClient();
  const orchestrator = new Orchestrator({
    rules: new RedisRuleStore(redis),
    decisions: new RedisDecisionStore(redis),
    proposer: agents.proposer,
    validator: agents.validator,
    settings,
  });
  const fetcher = createHttpFetcher({ timeoutMs: readIntEnv('FETCH_TIMEOUT_MS', 15000, { min: 1000 }) });

  const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379';
  const concurrency = readIntEnv('WORKER_CONCURRENCY', 1, { min: 1 });
  const lockDuration = readIntEnv('WORKER_LOCK_DURATION_MS', 300000, { min: 1000 });
  const stalledInterval = readIntEnv('WORKER_STALLED_INTERVAL_MS', 30000, { min: 1000 });
  const maxStalledCount = readIntEnv('WORKER_MAX_STALLED_COUNT', 1, { min: 1 });

  logger.info(
    {
      event: 'worker.config',
      queueName: QUEUE_NAME,
      redisUrl: redactUrl(redisUrl),
      concurrency,
      lockDuration,
      stalledInterval,
      maxStalledCount,
      reuseThreshold: settings.reuseThreshold,
      maxRetries: settings.maxRetries,
    },
    'Worker configuration'
  );

  // BullMQ blocks on its own connection; stores share the other one
  workerConnection = new Redis(redisUrl, { maxRetriesPerRequest: null });

  worker = new Worker<CrawlJobPayload>(
    QUEUE_NAME,
    async (job) => processCrawlJob(job.data, { fetcher, orchestrator, logger: logger.child({ jobId: job.id }) }),
    {
      connection: workerConnection,
      concurrency,
      lockDuration,
      stalledInterval,
      maxStalledCount,
    }
  );

  worker.on('active', (job) => {
    logger.info({ event: 'worker.job.active', jobId: job.id, sourceId: job.data.sourceId }, 'Job became active');
  });

  worker.on('completed', (job) => {
    logger.info(
      {
        event: 'worker.job.completed',
        jobId: job.id,
        sourceId: job.data.sourceId,
        duration: job.finishedOn && job.processedOn ? job.finishedOn - job.processedOn : undefined,
      },
      'Job completed'
    );
  });

  worker.on('failed', (job, err) => {
    logger.error(
      {
        event: 'worker.job.failed',
        jobId: job?.id,
        sourceId: job?.data.sourceId,
        error: safeErrorMessage(err),
        attemptsMade: job?.attemptsMade,
      },
      'Job failed'
    );
  });

  worker.on('stalled', (jobId) => {
    logger.warn({ event: 'worker.job.stalled', jobId }, 'Job stalled');
  });

  worker.on('error', (err) => {
    logger.error({ event: 'worker.error', error: safeErrorMessage(err) }, 'Worker error');
  });

  logger.info({ event: 'worker.started', queueName: QUEUE_NAME }, `Listening for jobs on queue: ${QUEUE_NAME}`);
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ event: 'worker.shutdown', signal }, 'Shutting down worker gracefully...');
  try {
    if (worker) {
      await worker.close();
    }
    if (workerConnection) {
      await workerConnection.quit();
    }
    await disconnectRedis();
    process.exit(0);
  } catch (err) {
    logger.error({ event: 'worker.shutdown.failed', error: safeErrorMessage(err) }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

startWorker().catch((err: unknown) => {
  logger.fatal({ event: 'worker.start.failed', error: safeErrorMessage(err) }, 'Fatal error starting worker');
  process.exit(1);
});
