/**
 * Shared queue types and utilities
 */

import { createHash } from 'crypto';

export interface CrawlJobPayload {
  sourceId: string;
  url: string;
  requestedAt?: string;
  runId?: string; // If present, included in jobId for uniqueness per run
}

export const QUEUE_NAME = 'autosel-crawl';
export const JOB_NAME = 'crawl-source';

/**
 * Build a unique job ID for a crawl job
 * Format: ${sourceId}__${urlHash}[__${runId}]
 * Uses double underscore (__) as separator; BullMQ rejects colons in custom ids
 */
export function buildCrawlJobId(payload: CrawlJobPayload): string {
  const urlHash = createHash('sha256').update(payload.url).digest('hex').substring(0, 16);
  const base = `${payload.sourceId.replace(/:/g, '_')}__${urlHash}`;
  if (payload.runId) {
    return `${base}__${payload.runId}`;
  }
  return base;
}
