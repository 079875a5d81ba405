import { Queue } from 'bullmq';
import { Redis } from 'ioredis';
import { createLogger } from '@autosel/config';
import { JOB_NAME, QUEUE_NAME, buildCrawlJobId, redactUrl, safeErrorMessage, type CrawlJobPayload } from '@autosel/core';

const logger = createLogger('queue');

let redisConnection: Redis | null = null;
let crawlQueue: Queue<CrawlJobPayload> | null = null;

/**
 * Initialize Redis connection and BullMQ queue
 */
export function initializeQueue(): void {
  const redisUrl = process.env.REDIS_URL;
  if (!redisUrl) {
    throw new Error('REDIS_URL environment variable is required');
  }

  redisConnection = new Redis(redisUrl, {
    maxRetriesPerRequest: null, // Required for BullMQ
  });

  crawlQueue = new Queue<CrawlJobPayload>(QUEUE_NAME, {
    connection: redisConnection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: 'exponential',
        delay: 2000,
      },
      removeOnComplete: {
        count: 100,
      },
      removeOnFail: {
        count: 100,
      },
    },
  });

  logger.info(
    { event: 'queue.init.success', queueName: QUEUE_NAME, redisUrl: redactUrl(redisUrl) },
    'Queue initialized'
  );
}

/**
 * Must call initializeQueue() first
 */
export function getQueue(): Queue<CrawlJobPayload> {
  if (!crawlQueue) {
    throw new Error('Queue not initialized. Call initializeQueue() first.');
  }
  return crawlQueue;
}

/**
 * Enqueue a crawl job. A job with the same id that is still pending or done
 * is reused; a failed one is removed and added again.
 */
export async function enqueueCrawlJob(payload: CrawlJobPayload): Promise<string> {
  const queue = getQueue();
  const jobId = buildCrawlJobId(payload);

  try {
    const existingJob = await queue.getJob(jobId);
    if (existingJob) {
      const state = await existingJob.getState();
      if (state === 'failed') {
        logger.info({ event: 'queue.enqueue.retry', jobId }, 'Removing failed job and re-enqueueing');
        await existingJob.remove();
      } else {
        logger.info({ event: 'queue.enqueue.duplicate', jobId, state }, 'Job already exists in queue, skipping enqueue');
        return jobId;
      }
    }

    const job = await queue.add(JOB_NAME, payload, { jobId });
    const actualJobId = job.id ?? jobId;
    logger.info(
      { event: 'queue.enqueued', queueName: QUEUE_NAME, jobId: actualJobId, sourceId: payload.sourceId },
      'Job enqueued'
    );
    return actualJobId;
  } catch (error: unknown) {
    logger.error(
      { event: 'queue.enqueue.failed', jobId, sourceId: payload.sourceId, error: safeErrorMessage(error) },
      'Failed to enqueue job'
    );
    throw error;
  }
}

/**
 * Close queue and Redis connections gracefully
 */
export async function closeQueue(): Promise<void> {
  if (crawlQueue) {
    await crawlQueue.close();
    crawlQueue = null;
  }
  if (redisConnection) {
    await redisConnection.quit();
    redisConnection = null;
  }
  logger.info({ event: 'queue.close.success' }, 'Queue connections closed');
}
