import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ErrorCode, isOrchestratorError } from '@autosel/core';
import { createLlmClient } from './client.js';

const mockFetch = vi.fn<typeof fetch>();

function json(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), init);
}

function openAiBody(content: string) {
  return { model: 'gpt-4o-mini', choices: [{ message: { content } }], usage: { total_tokens: 42 } };
}

function requestInit(call: number): RequestInit | undefined {
  return mockFetch.mock.calls[call]?.[1];
}

describe('createLlmClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('calls chat completions in JSON mode and reports tokens', async () => {
    mockFetch.mockResolvedValueOnce(json(openAiBody('{"confidence":0.9}')));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key' });

    const result = await client.complete({ system: 'sys', prompt: 'hello' });

    expect(result).toEqual({ content: '{"confidence":0.9}', tokens: 42, model: 'gpt-4o-mini' });
    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(new Headers(requestInit(0)?.headers).get('authorization')).toBe('Bearer test-key');
    const body: unknown = JSON.parse(String(requestInit(0)?.body));
    expect(body).toMatchObject({
      model: 'gpt-4o-mini',
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hello' },
      ],
    });
  });

  it('retries server errors', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
      .mockResolvedValueOnce(json(openAiBody('{}')));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', retryBaseMs: 0 });

    await expect(client.complete({ system: 's', prompt: 'p' })).resolves.toMatchObject({ content: '{}' });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('honours Retry-After on 429', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('', { status: 429, headers: { 'Retry-After': '0' } }))
      .mockResolvedValueOnce(json(openAiBody('{}')));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key' });

    await expect(client.complete({ system: 's', prompt: 'p' })).resolves.toMatchObject({ tokens: 42 });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry authentication errors', async () => {
    mockFetch.mockResolvedValue(new Response('', { status: 401, statusText: 'Unauthorized' }));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', retryBaseMs: 0 });

    await expect(client.complete({ system: 's', prompt: 'p' })).rejects.toThrow(
      'LLM API authentication error: 401 Unauthorized'
    );
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries', async () => {
    mockFetch.mockImplementation(async () => new Response('', { status: 500, statusText: 'Internal Server Error' }));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', maxRetries: 1, retryBaseMs: 0 });

    await expect(client.complete({ system: 's', prompt: 'p' })).rejects.toThrow(
      'LLM API error: 500 Internal Server Error'
    );
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('times out a hanging request', async () => {
    mockFetch.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', timeout: 20, maxRetries: 0 });

    const error = await client.complete({ system: 's', prompt: 'p' }).catch((e: unknown) => e);
    expect(isOrchestratorError(error, ErrorCode.AGENT_TIMEOUT)).toBe(true);
    expect(error).toHaveProperty('message', 'LLM API request timeout after 20ms');
  });

  it('flags a response without choices as malformed', async () => {
    mockFetch.mockResolvedValueOnce(json({ choices: [] }));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key' });

    const error = await client.complete({ system: 's', prompt: 'p' }).catch((e: unknown) => e);
    expect(isOrchestratorError(error, ErrorCode.AGENT_MALFORMED)).toBe(true);
  });

  it('speaks the Anthropic messages API', async () => {
    mockFetch.mockResolvedValueOnce(
      json({
        model: 'messages-test-model',
        content: [{ type: 'text', text: '{"ok":true}' }],
        usage: { input_tokens: 10, output_tokens: 5 },
      })
    );
    const client = createLlmClient({ provider: 'ANTHROPIC', apiKey: 'test-key', model: 'messages-test-model' });

    const result = await client.complete({ system: 'sys', prompt: 'hello' });

    expect(result).toEqual({ content: '{"ok":true}', tokens: 15, model: 'messages-test-model' });
    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://api.anthropic.com/v1/messages');
    expect(new Headers(requestInit(0)?.headers).get('x-api-key')).toBe('test-key');
    expect(JSON.parse(String(requestInit(0)?.body))).toMatchObject({ system: 'sys', model: 'messages-test-model' });
  });

  it('requires a model for Anthropic', () => {
    expect(() => createLlmClient({ provider: 'ANTHROPIC', apiKey: 'test-key' })).toThrow(
      'A model is required for provider ANTHROPIC'
    );
  });
});
