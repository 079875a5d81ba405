import { UnrecoverableError } from 'bullmq';
import { z } from 'zod';
import {
  ErrorCode,
  OrchestratorError,
  isOrchestratorError,
  safeErrorMessage,
  type CrawlJobPayload,
  type DocumentFetcher,
  type ExtractionResult,
} from '@autosel/core';
import type { Logger } from '@autosel/config';
import type { Orchestrator } from '@autosel/engine';

const CrawlJobPayloadSchema = z.object({
  sourceId: z.string().trim().min(1),
  url: z.string().url(),
  requestedAt: z.string().optional(),
  runId: z.string().optional(),
});

export interface CrawlJobDeps {
  fetcher: DocumentFetcher;
  orchestrator: Pick<Orchestrator, 'process'>;
  logger: Logger;
}

export interface CrawlJobSummary {
  sourceId: string;
  status: ExtractionResult['status'];
  route: ExtractionResult['route'];
  score: number;
  retryCount: number;
  decisionId: string | null;
}

/**
 * Fetch the page and run it through the router. Non-retryable failures are
 * raised as UnrecoverableError so BullMQ does not spend attempts on them.
 */
export async function processCrawlJob(data: unknown, deps: CrawlJobDeps): Promise<CrawlJobSummary> {
  const parsed = CrawlJobPayloadSchema.safeParse(data);
  if (!parsed.success) {
    throw new UnrecoverableError(`Invalid crawl job payload: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  const payload: CrawlJobPayload = parsed.data;
  const { logger } = deps;

  let document: string;
  try {
    document = await deps.fetcher.fetch(payload.sourceId, payload.url);
  } catch (error: unknown) {
    logger.warn(
      { event: 'worker.fetch.failed', sourceId: payload.sourceId, error: safeErrorMessage(error) },
      'Document fetch failed'
    );
    if (isOrchestratorError(error) && !error.retryable) {
      throw new UnrecoverableError(error.message);
    }
    throw error;
  }

  const result = await deps.orchestrator.process(payload.sourceId, document, { url: payload.url });

  if (result.status === 'error') {
    const message = result.error?.message ?? 'unknown error';
    throw new OrchestratorError(ErrorCode.STORE_FAILURE, `Processing failed: ${message}`, true, {
      sourceId: payload.sourceId,
      code: result.error?.code,
    });
  }

  logger.info(
    {
      event: 'worker.process.completed',
      sourceId: result.sourceId,
      status: result.status,
      route: result.route,
      score: result.score,
      retryCount: result.retryCount,
      decisionId: result.decisionId,
    },
    `Processed ${result.sourceId}: ${result.status}`
  );

  return {
    sourceId: result.sourceId,
    status: result.status,
    route: result.route,
    score: result.score,
    retryCount: result.retryCount,
    decisionId: result.decisionId,
  };
}
