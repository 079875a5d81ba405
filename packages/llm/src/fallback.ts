/**
 * Primary → fallback agent invocation
 *
 * The primary agent gets up to `primaryAttempts` tries on timeout or
 * transport failure; a malformed reply moves straight to the fallback.
 * The fallback is called once. Every failed call is reported back so the
 * engine can record it.
 */

import { createLogger } from '@autosel/config';
import {
  ErrorCode,
  TimeoutError,
  isOrchestratorError,
  safeErrorMessage,
  withTimeout,
  type AgentFailure,
  type AgentFailureReason,
  type AgentRole,
} from '@autosel/core';
import type { AgentPrompt, InferenceAgent } from './types.js';

const logger = createLogger('llm');

export interface AgentChain {
  primary: InferenceAgent;
  fallback?: InferenceAgent;
}

export interface InvokeOptions<T> {
  chain: AgentChain;
  prompt: AgentPrompt;
  role: AgentRole;
  sourceId: string;
  /** Engine cycle number, 1-based */
  attempt: number;
  timeoutMs: number;
  primaryAttempts: number;
  /** Turns the reply text into a value; throws AGENT_MALFORMED on bad shape */
  parse: (text: string) => T;
}

export type InvocationResult<T> =
  | { ok: true; value: T; agent: string; tokens?: number; failures: AgentFailure[] }
  | { ok: false; failures: AgentFailure[] };

export function classifyAgentError(error: unknown): AgentFailureReason {
  if (error instanceof TimeoutError || isOrchestratorError(error, ErrorCode.AGENT_TIMEOUT)) {
    return 'timeout';
  }
  if (isOrchestratorError(error, ErrorCode.AGENT_MALFORMED)) {
    return 'malformed';
  }
  return 'transport';
}

type CallOutcome<T> = { ok: true; value: T; tokens?: number } | { ok: false; failure: AgentFailure };

async function callAgent<T>(agent: InferenceAgent, options: InvokeOptions<T>): Promise<CallOutcome<T>> {
  const { role, sourceId, attempt, prompt, timeoutMs } = options;
  try {
    const reply = await withTimeout(
      (signal) => agent.invoke(prompt, { role, sourceId, attempt, signal }),
      timeoutMs,
      `${role} agent ${agent.name}`
    );
    return { ok: true, value: options.parse(reply.text), tokens: reply.tokens };
  } catch (error: unknown) {
    const failure: AgentFailure = {
      kind: 'failure',
      agent: agent.name,
      role,
      attempt,
      reason: classifyAgentError(error),
      message: safeErrorMessage(error),
    };
    logger.warn(
      { event: 'agent.call.failed', sourceId, role, agent: agent.name, attempt, reason: failure.reason },
      `${role} agent ${agent.name} failed: ${failure.message}`
    );
    return { ok: false, failure };
  }
}

export async function invokeWithFallback<T>(options: InvokeOptions<T>): Promise<InvocationResult<T>> {
  const { chain } = options;
  const failures: AgentFailure[] = [];

  for (let i = 0; i < Math.max(1, options.primaryAttempts); i++) {
    const outcome = await callAgent(chain.primary, options);
    if (outcome.ok) {
      return { ok: true, value: outcome.value, agent: chain.primary.name, tokens: outcome.tokens, failures };
    }
    failures.push(outcome.failure);
    if (outcome.failure.reason === 'malformed') {
      break;
    }
  }

  if (!chain.fallback) {
    return { ok: false, failures };
  }

  logger.info(
    { event: 'agent.fallback.used', sourceId: options.sourceId, role: options.role, agent: chain.fallback.name },
    'Switching to fallback agent'
  );
  const outcome = await callAgent(chain.fallback, options);
  if (outcome.ok) {
    return { ok: true, value: outcome.value, agent: chain.fallback.name, tokens: outcome.tokens, failures };
  }
  failures.push(outcome.failure);
  return { ok: false, failures };
}
