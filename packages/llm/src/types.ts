/**
 * Types for provider clients and inference agents
 */

import type { AgentRole } from '@autosel/core';

export type LlmProvider = 'OPENAI' | 'ANTHROPIC';

export interface LlmClientConfig {
  provider: LlmProvider;
  apiKey: string;
  baseUrl?: string;
  /** Required for ANTHROPIC; OPENAI defaults to gpt-4o-mini */
  model?: string;
  /** Per-request timeout in ms */
  timeout?: number;
  maxRetries?: number;
  /** First retry delay for 429/5xx without Retry-After; doubles per attempt up to 10s */
  retryBaseMs?: number;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  /** Aborts the in-flight request and stops further retries */
  signal?: AbortSignal;
}

export interface CompletionResponse {
  content: string;
  tokens?: number;
  model: string;
}

export interface LlmClient {
  readonly provider: LlmProvider;
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface AgentPrompt {
  system: string;
  user: string;
}

export interface AgentCallContext {
  role: AgentRole;
  sourceId: string;
  attempt: number;
  signal: AbortSignal;
}

export interface AgentReply {
  text: string;
  tokens?: number;
}

/**
 * The call/response contract the engines depend on. Any provider, or a
 * scripted fake, can sit behind it.
 */
export interface InferenceAgent {
  readonly name: string;
  invoke(prompt: AgentPrompt, context: AgentCallContext): Promise<AgentReply>;
}
