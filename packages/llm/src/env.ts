/**
 * Agent wiring from environment variables
 *
 *   PROPOSER_*            primary proposer (required)
 *   FALLBACK_PROPOSER_*   secondary proposer (optional, enabled by its API key)
 *   VALIDATOR_*           validator (required)
 *
 * Each prefix takes PROVIDER, API_KEY, MODEL and BASE_URL.
 */

import { z } from 'zod';
import { createLogger, requireEnv } from '@autosel/config';
import { ErrorCode, OrchestratorError } from '@autosel/core';
import { createLlmClient } from './client.js';
import { createProviderAgent } from './agent.js';
import type { AgentChain } from './fallback.js';
import type { InferenceAgent, LlmProvider } from './types.js';

const logger = createLogger('llm');

const ProviderSchema = z.enum(['OPENAI', 'ANTHROPIC']);

export interface AgentEnvOptions {
  /** Per-request HTTP timeout; the engine applies its own per-call deadline on top */
  timeoutMs: number;
  maxRetries?: number;
}

export interface ConfiguredAgents {
  proposer: AgentChain;
  validator: AgentChain;
}

function readProvider(env: NodeJS.ProcessEnv, prefix: string): LlmProvider {
  const raw = env[`${prefix}_PROVIDER`]?.trim().toUpperCase() || 'OPENAI';
  const parsed = ProviderSchema.safeParse(raw);
  if (!parsed.success) {
    throw new OrchestratorError(
      ErrorCode.CONFIG_INVALID,
      `${prefix}_PROVIDER must be OPENAI or ANTHROPIC, got "${raw}"`
    );
  }
  return parsed.data;
}

function agentFromEnv(env: NodeJS.ProcessEnv, prefix: string, name: string, options: AgentEnvOptions): InferenceAgent {
  const provider = readProvider(env, prefix);
  const client = createLlmClient({
    provider,
    apiKey: requireEnv(`${prefix}_API_KEY`, env),
    model: env[`${prefix}_MODEL`]?.trim() || undefined,
    baseUrl: env[`${prefix}_BASE_URL`]?.trim() || undefined,
    timeout: options.timeoutMs,
    maxRetries: options.maxRetries ?? 2,
  });
  logger.info({ event: 'llm.agent.configured', agent: name, provider, model: client.model }, 'Inference agent configured');
  return createProviderAgent(name, client);
}

export function createAgentsFromEnv(options: AgentEnvOptions, env: NodeJS.ProcessEnv = process.env): ConfiguredAgents {
  const proposer: AgentChain = { primary: agentFromEnv(env, 'PROPOSER', 'proposer', options) };
  if (env.FALLBACK_PROPOSER_API_KEY?.trim()) {
    proposer.fallback = agentFromEnv(env, 'FALLBACK_PROPOSER', 'fallback-proposer', options);
  } else {
    logger.warn({ event: 'llm.agent.no_fallback' }, 'FALLBACK_PROPOSER_API_KEY not set; proposer has no fallback');
  }

  return {
    proposer,
    validator: { primary: agentFromEnv(env, 'VALIDATOR', 'validator', options) },
  };
}
