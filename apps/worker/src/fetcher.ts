/**
 * Static HTTP document fetcher. Pages that need a browser to render are
 * out of its reach.
 */

import {
  ErrorCode,
  OrchestratorError,
  RETRYABLE_HTTP_STATUSES,
  TimeoutError,
  safeErrorMessage,
  withTimeout,
  type DocumentFetcher,
} from '@autosel/core';

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = 'autosel-crawler/0.1';

export function createHttpFetcher(options: HttpFetcherOptions): DocumentFetcher {
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  return {
    async fetch(sourceId: string, url: string): Promise<string> {
      let response: Response;
      try {
        response = await withTimeout(
          (signal) =>
            fetch(url, {
              headers: { 'User-Agent': userAgent, Accept: 'text/html,application/xhtml+xml' },
              redirect: 'follow',
              signal,
            }),
          options.timeoutMs,
          `fetch ${sourceId}`
        );
      } catch (error: unknown) {
        const timedOut = error instanceof TimeoutError;
        throw new OrchestratorError(
          ErrorCode.FETCH_FAILED,
          timedOut ? `Fetch timed out after ${options.timeoutMs}ms` : `Fetch failed: ${safeErrorMessage(error)}`,
          true,
          { sourceId, url }
        );
      }

      if (!response.ok) {
        // Release the connection; the error page itself is never read
        await response.body?.cancel();
        throw new OrchestratorError(
          ErrorCode.FETCH_FAILED,
          `Fetch returned ${response.status} ${response.statusText}`,
          RETRYABLE_HTTP_STATUSES.has(response.status),
          { sourceId, url, statusCode: response.status }
        );
      }

      const body = await response.text();
      if (!body.trim()) {
        throw new OrchestratorError(ErrorCode.FETCH_FAILED, 'Fetched document is empty', false, { sourceId, url });
      }
      return body;
    },
  };
}
