import { Redis } from 'ioredis';
import { createLogger } from '@autosel/config';
import { redactUrl } from '@autosel/core';

// .env loading is handled by initEnv() in @autosel/config; call it before
// the first getRedisClient()

const logger = createLogger('db');

let redisInstance: Redis | null = null;

function createRedisClient(): Redis {
  const redisUrl = process.env.REDIS_URL || 'redis://localhost:6379';
  logger.info({ event: 'redis.init', url: redactUrl(redisUrl) }, 'Initializing Redis client');

  // bullmq requires maxRetriesPerRequest: null on shared connections
  const client = new Redis(redisUrl, { maxRetriesPerRequest: null });

  client.on('error', (error: Error) => {
    logger.error({ event: 'redis.error', error: error.message }, 'Redis error');
  });

  return client;
}

/**
 * Lazily created shared connection
 */
export function getRedisClient(): Redis {
  if (!redisInstance) {
    redisInstance = createRedisClient();
  }
  return redisInstance;
}

export async function checkRedisConnection(): Promise<boolean> {
  try {
    return (await getRedisClient().ping()) === 'PONG';
  } catch (error) {
    logger.error(
      { event: 'redis.ping_failed', error: error instanceof Error ? error.message : String(error) },
      'Redis connection check failed'
    );
    return false;
  }
}

export async function disconnectRedis(): Promise<void> {
  if (redisInstance) {
    await redisInstance.quit();
    redisInstance = null;
    logger.info({ event: 'redis.disconnected' }, 'Redis client disconnected');
  }
}
