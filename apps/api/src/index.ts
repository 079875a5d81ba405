import { createLogger, getEnvDiagnostics, initEnv, loadSettings, validateRequiredEnv } from '@autosel/config';
import { safeErrorMessage } from '@autosel/core';
import { RedisDecisionStore, RedisRuleStore, checkRedisConnection, disconnectRedis, getRedisClient } from '@autosel/db';
import { Orchestrator } from '@autosel/engine';
import { createAgentsFromEnv } from '@autosel/llm';
import { closeQueue, enqueueCrawlJob, initializeQueue } from './queue.js';
import { buildServer } from './server.js';

const REQUIRED_KEYS = ['REDIS_URL', 'PROPOSER_API_KEY', 'VALIDATOR_API_KEY'];
const OPTIONAL_KEYS = ['ADMIN_TOKEN', 'CORS_ORIGINS', 'FALLBACK_PROPOSER_API_KEY', 'LOG_LEVEL', 'PORT', 'HOST'];

const envResult = initEnv();
const logger = createLogger('api');

function validateEnv(): void {
  const diagnostics = getEnvDiagnostics([...REQUIRED_KEYS, ...OPTIONAL_KEYS]);
  logger.info(
    {
      event: 'api.env',
      nodeVersion: process.version,
      environment: process.env.NODE_ENV || 'development',
      envFilePath: envResult.envFilePath,
      loaded: envResult.loaded,
      keys: diagnostics.keys.map((k) => ({ key: k.key, present: k.present, maskedValue: k.maskedValue, source: k.source })),
    },
    'API environment diagnostics'
  );
  for (const warning of diagnostics.warnings) {
    logger.warn({ event: 'api.env.warning', warning }, warning);
  }

  const validation = validateRequiredEnv(REQUIRED_KEYS);
  if (!validation.valid) {
    logger.fatal(
      { event: 'api.env.missing', missing: validation.missing },
      `Missing required environment variables: ${validation.missing.join(', ')}`
    );
    process.exit(1);
  }
}

function readCorsOrigins(isProduction: boolean): string[] {
  const configured = (process.env.CORS_ORIGINS ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  if (configured.length > 0) {
    return configured;
  }
  if (isProduction) {
    throw new Error('CORS configuration error: CORS_ORIGINS must be set in production');
  }
  return ['http://localhost:3000', 'http://127.0.0.1:3000'];
}

async function startServer(): Promise<void> {
  validateEnv();

  const isProduction = process.env.NODE_ENV === 'production';
  const port = Number.parseInt(process.env.PORT || '3000', 10);
  const host = process.env.HOST || '0.0.0.0';

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

  initializeQueue();

  const app = await buildServer({
    orchestrator,
    enqueueCrawl: enqueueCrawlJob,
    logger,
    adminToken: process.env.ADMIN_TOKEN?.trim() || undefined,
    nodeEnv: process.env.NODE_ENV || 'development',
    corsOrigins: readCorsOrigins(isProduction),
    checkHealth: checkRedisConnection,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ event: 'api.shutdown', signal }, 'Shutting down gracefully...');
    try {
      await app.close();
      await closeQueue();
      await disconnectRedis();
      process.exit(0);
    } catch (err) {
      logger.error({ event: 'api.shutdown.failed', error: safeErrorMessage(err) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port, host });
  logger.info({ event: 'api.started', host, port }, `API listening on http://${host}:${port}`);
}

startServer().catch((err: unknown) => {
  logger.fatal({ event: 'api.start.failed', error: safeErrorMessage(err) }, 'Fatal error starting server');
  process.exit(1);
});
