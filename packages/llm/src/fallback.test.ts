import { describe, it, expect } from 'vitest';
import { ErrorCode, OrchestratorError, TimeoutError } from '@autosel/core';
import { classifyAgentError, invokeWithFallback, type AgentChain } from './fallback.js';
import type { AgentReply, InferenceAgent } from './types.js';

function scripted(name: string, replies: Array<AgentReply | Error | 'hang'>): InferenceAgent & { calls: number } {
  const agent = {
    name,
    calls: 0,
    async invoke(): Promise<AgentReply> {
      const next = replies[agent.calls] ?? replies[replies.length - 1];
      agent.calls += 1;
      if (next === 'hang') {
        return new Promise<AgentReply>(() => undefined);
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    },
  };
  return agent;
}

const parseNumber = (text: string): number => {
  const value = Number(text);
  if (Number.isNaN(value)) {
    throw new OrchestratorError(ErrorCode.AGENT_MALFORMED, 'not a number');
  }
  return value;
};

function options(chain: AgentChain) {
  return {
    chain,
    prompt: { system: 's', user: 'u' },
    role: 'proposer' as const,
    sourceId: 'news',
    attempt: 1,
    timeoutMs: 20,
    primaryAttempts: 2,
    parse: parseNumber,
  };
}

describe('classifyAgentError', () => {
  it('maps errors to failure reasons', () => {
    expect(classifyAgentError(new TimeoutError('x', 5))).toBe('timeout');
    expect(classifyAgentError(new OrchestratorError(ErrorCode.AGENT_TIMEOUT, 'slow'))).toBe('timeout');
    expect(classifyAgentError(new OrchestratorError(ErrorCode.AGENT_MALFORMED, 'bad'))).toBe('malformed');
    expect(classifyAgentError(new Error('socket hang up'))).toBe('transport');
  });
});

describe('invokeWithFallback', () => {
  it('returns the primary reply when it works', async () => {
    const primary = scripted('primary', [{ text: '0.7', tokens: 12 }]);
    const result = await invokeWithFallback(options({ primary }));

    expect(result).toEqual({ ok: true, value: 0.7, agent: 'primary', tokens: 12, failures: [] });
  });

  it('retries a timed-out primary, then uses the fallback once', async () => {
    const primary = scripted('primary', ['hang']);
    const fallback = scripted('fallback', [{ text: '0.8' }]);

    const result = await invokeWithFallback(options({ primary, fallback }));

    expect(primary.calls).toBe(2);
    expect(fallback.calls).toBe(1);
    expect(result.ok).toBe(true);
    expect(result.failures.map((f) => [f.agent, f.reason])).toEqual([
      ['primary', 'timeout'],
      ['primary', 'timeout'],
    ]);
  });

  it('goes straight to the fallback on a malformed reply', async () => {
    const primary = scripted('primary', [{ text: 'not json' }]);
    const fallback = scripted('fallback', [{ text: '0.5' }]);

    const result = await invokeWithFallback(options({ primary, fallback }));

    expect(primary.calls).toBe(1);
    expect(result).toMatchObject({ ok: true, value: 0.5, agent: 'fallback' });
  });

  it('reports every failure when both agents fail', async () => {
    const primary = scripted('primary', [new Error('connection refused')]);
    const fallback = scripted('fallback', [new Error('connection reset')]);

    const result = await invokeWithFallback(options({ primary, fallback }));

    expect(result.ok).toBe(false);
    expect(result.failures).toEqual([
      { kind: 'failure', agent: 'primary', role: 'proposer', attempt: 1, reason: 'transport', message: 'connection refused' },
      { kind: 'failure', agent: 'primary', role: 'proposer', attempt: 1, reason: 'transport', message: 'connection refused' },
      { kind: 'failure', agent: 'fallback', role: 'proposer', attempt: 1, reason: 'transport', message: 'connection reset' },
    ]);
  });
});
