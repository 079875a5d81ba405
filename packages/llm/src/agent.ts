import type { AgentCallContext, AgentPrompt, AgentReply, InferenceAgent, LlmClient } from './types.js';

/**
 * Inference agent backed by a provider client
 */
export function createProviderAgent(name: string, client: LlmClient): InferenceAgent {
  return {
    name,
    async invoke(prompt: AgentPrompt, context: AgentCallContext): Promise<AgentReply> {
      const response = await client.complete({ system: prompt.system, prompt: prompt.user, signal: context.signal });
      return { text: response.content, tokens: response.tokens };
    },
  };
}
