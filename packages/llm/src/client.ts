/**
 * Provider HTTP client for proposer and validator agents
 *
 * OpenAI-compatible chat completions (JSON response mode) and Anthropic
 * messages. Retries 429 (honouring Retry-After), 5xx, timeouts and network
 * failures; 401/403 and other 4xx fail at once.
 */

import { z } from 'zod';
import { createLogger } from '@autosel/config';
import { ErrorCode, OrchestratorError, isOrchestratorError, safeErrorMessage, sleep } from '@autosel/core';
import type { CompletionRequest, CompletionResponse, LlmClient, LlmClientConfig, LlmProvider } from './types.js';

const logger = createLogger('llm');

const MAX_RETRY_WAIT_MS = 10000;
const ANTHROPIC_VERSION = '2023-06-01';

const PROVIDER_DEFAULTS: Record<LlmProvider, { baseUrl: string; model?: string; path: string }> = {
  OPENAI: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o-mini', path: '/chat/completions' },
  ANTHROPIC: { baseUrl: 'https://api.anthropic.com/v1', path: '/messages' },
};

const OpenAiResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

const AnthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

type RetryReason = 'rate_limit' | 'server_error' | 'timeout' | 'network';

type AttemptOutcome =
  | { kind: 'ok'; data: unknown }
  | { kind: 'retry'; reason: RetryReason; waitMs: number; error: OrchestratorError };

async function drain(response: Response): Promise<void> {
  await response.text().catch(() => '');
}

function resolveModel(config: LlmClientConfig): string {
  const model = config.model?.trim() || PROVIDER_DEFAULTS[config.provider].model;
  if (!model) {
    throw new OrchestratorError(ErrorCode.CONFIG_INVALID, `A model is required for provider ${config.provider}`);
  }
  return model;
}

/**
 * Create LLM client
 */
export function createLlmClient(config: LlmClientConfig): LlmClient {
  const defaults = PROVIDER_DEFAULTS[config.provider];
  const {
    provider,
    apiKey,
    baseUrl = defaults.baseUrl,
    timeout = 120000,
    maxRetries = 3,
    retryBaseMs = 1000,
    maxTokens = 2000,
    temperature = 0.2,
  } = config;

  const model = resolveModel(config);

  function backoff(attempt: number): number {
    return Math.min(retryBaseMs * 2 ** attempt, MAX_RETRY_WAIT_MS);
  }

  function headers(): Record<string, string> {
    if (provider === 'ANTHROPIC') {
      return { 'x-api-key': apiKey, 'anthropic-version': ANTHROPIC_VERSION, 'Content-Type': 'application/json' };
    }
    return { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' };
  }

  async function attemptOnce(url: string, body: unknown, attempt: number, signal?: AbortSignal): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: headers(),
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (response.status === 429) {
        await drain(response);
        const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
        return {
          kind: 'retry',
          reason: 'rate_limit',
          waitMs: Number.isNaN(retryAfter) ? backoff(attempt) : retryAfter * 1000,
          error: new OrchestratorError(ErrorCode.AGENT_TRANSPORT, 'LLM API rate limited: 429', true, { statusCode: 429 }),
        };
      }

      if (response.status >= 500 && response.status < 600) {
        await drain(response);
        return {
          kind: 'retry',
          reason: 'server_error',
          waitMs: backoff(attempt),
          error: new OrchestratorError(
            ErrorCode.AGENT_TRANSPORT,
            `LLM API error: ${response.status} ${response.statusText}`,
            true,
            { statusCode: response.status }
          ),
        };
      }

      if (response.status === 401 || response.status === 403) {
        await drain(response);
        throw new OrchestratorError(
          ErrorCode.AGENT_TRANSPORT,
          `LLM API authentication error: ${response.status} ${response.statusText}`,
          false,
          { statusCode: response.status }
        );
      }

      if (!response.ok) {
        await drain(response);
        throw new OrchestratorError(
          ErrorCode.AGENT_TRANSPORT,
          `LLM API error: ${response.status} ${response.statusText}`,
          false,
          { statusCode: response.status }
        );
      }

      const data: unknown = await response.json();
      return { kind: 'ok', data };
    } catch (error: unknown) {
      if (isOrchestratorError(error)) {
        throw error;
      }
      if (signal?.aborted) {
        throw new OrchestratorError(ErrorCode.AGENT_TRANSPORT, 'LLM API request cancelled');
      }
      if (timedOut) {
        return {
          kind: 'retry',
          reason: 'timeout',
          waitMs: 0,
          error: new OrchestratorError(ErrorCode.AGENT_TIMEOUT, `LLM API request timeout after ${timeout}ms`, true),
        };
      }
      if (error instanceof SyntaxError) {
        throw new OrchestratorError(ErrorCode.AGENT_MALFORMED, 'LLM API returned a body that is not JSON');
      }
      return {
        kind: 'retry',
        reason: 'network',
        waitMs: backoff(attempt),
        error: new OrchestratorError(ErrorCode.AGENT_TRANSPORT, `LLM API network error: ${safeErrorMessage(error)}`, true),
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * POST with retry logic and structured logging
   */
  async function request(body: unknown, signal?: AbortSignal): Promise<unknown> {
    const url = `${baseUrl}${defaults.path}`;
    const startTime = Date.now();
    let lastError = new OrchestratorError(ErrorCode.AGENT_TRANSPORT, 'LLM API request failed after retries', true);

    logger.info(
      { event: 'llm.request.start', provider, model, timeoutMs: timeout, path: defaults.path },
      'Starting LLM API request'
    );

    try {
      for (let attempt = 0; attempt <= maxRetries; attempt++) {
        if (signal?.aborted) {
          throw new OrchestratorError(ErrorCode.AGENT_TRANSPORT, 'LLM API request cancelled');
        }

        const outcome = await attemptOnce(url, body, attempt, signal);
        if (outcome.kind === 'ok') {
          logger.info(
            { event: 'llm.request.success', provider, durationMs: Date.now() - startTime, attempt: attempt + 1 },
            'LLM API request succeeded'
          );
          return outcome.data;
        }

        lastError = outcome.error;
        if (attempt < maxRetries) {
          logger.info(
            { event: 'llm.request.retry', attempt: attempt + 1, reason: outcome.reason, waitMs: outcome.waitMs },
            `LLM API ${outcome.reason}, retrying in ${outcome.waitMs}ms`
          );
          await sleep(outcome.waitMs);
        }
      }
      throw lastError;
    } catch (error: unknown) {
      logger.error(
        {
          event: 'llm.request.fail',
          provider,
          durationMs: Date.now() - startTime,
          code: isOrchestratorError(error) ? error.code : undefined,
          error: safeErrorMessage(error),
        },
        'LLM API request failed'
      );
      throw error;
    }
  }

  function malformed(detail: string): OrchestratorError {
    return new OrchestratorError(ErrorCode.AGENT_MALFORMED, `Unexpected ${provider} response: ${detail}`);
  }

  async function completeOpenAi({ system, prompt, signal }: CompletionRequest): Promise<CompletionResponse> {
    const raw = await request(
      {
        model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        response_format: { type: 'json_object' },
        temperature,
        max_tokens: maxTokens,
      },
      signal
    );
    const parsed = OpenAiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw malformed(parsed.error.issues[0]?.message ?? 'invalid shape');
    }
    const content = parsed.data.choices[0]?.message.content;
    if (!content) {
      throw malformed('empty message content');
    }
    return { content, tokens: parsed.data.usage?.total_tokens, model: parsed.data.model ?? model };
  }

  async function completeAnthropic({ system, prompt, signal }: CompletionRequest): Promise<CompletionResponse> {
    const raw = await request(
      {
        model,
        system,
        messages: [{ role: 'user', content: prompt }],
        temperature,
        max_tokens: maxTokens,
      },
      signal
    );
    const parsed = AnthropicResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw malformed(parsed.error.issues[0]?.message ?? 'invalid shape');
    }
    const content = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
    if (!content) {
      throw malformed('empty message content');
    }
    const usage = parsed.data.usage;
    return {
      content,
      tokens: usage ? usage.input_tokens + usage.output_tokens : undefined,
      model: parsed.data.model ?? model,
    };
  }

  return {
    provider,
    model,
    complete(request: CompletionRequest): Promise<CompletionResponse> {
      return provider === 'ANTHROPIC' ? completeAnthropic(request) : completeOpenAi(request);
    },
  };
}
