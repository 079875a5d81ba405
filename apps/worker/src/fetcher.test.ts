import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ErrorCode, isOrchestratorError } from '@autosel/core';
import { createHttpFetcher } from './fetcher.js';

const mockFetch = vi.fn<typeof fetch>();

describe('createHttpFetcher', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the page body and sends the user agent', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html><h1>Hi</h1></html>', { status: 200 }));
    const fetcher = createHttpFetcher({ timeoutMs: 1000, userAgent: 'test-agent' });

    await expect(fetcher.fetch('gazette', 'https://gazette.example.com/a')).resolves.toBe('<html><h1>Hi</h1></html>');
    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://gazette.example.com/a');
    expect(new Headers(mockFetch.mock.calls[0]?.[1]?.headers).get('user-agent')).toBe('test-agent');
  });

  it.each([
    [503, 'Service Unavailable', true],
    [429, 'Too Many Requests', true],
    [404, 'Not Found', false],
  ])('maps status %i to FETCH_FAILED (retryable: %s)', async (status, statusText, retryable) => {
    mockFetch.mockResolvedValueOnce(new Response('nope', { status, statusText }));
    const fetcher = createHttpFetcher({ timeoutMs: 1000 });

    const error = await fetcher.fetch('gazette', 'https://gazette.example.com/a').catch((e: unknown) => e);

    expect(isOrchestratorError(error, ErrorCode.FETCH_FAILED)).toBe(true);
    expect(error).toHaveProperty('message', `Fetch returned ${status} ${statusText}`);
    expect(error).toHaveProperty('retryable', retryable);
  });

  it('cancels the body of an error response', async () => {
    const cancel = vi.fn();
    mockFetch.mockResolvedValueOnce(new Response(new ReadableStream({ cancel }), { status: 404, statusText: 'Not Found' }));
    const fetcher = createHttpFetcher({ timeoutMs: 1000 });

    await expect(fetcher.fetch('gazette', 'https://gazette.example.com/a')).rejects.toThrow('Fetch returned 404 Not Found');
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('rejects an empty page', async () => {
    mockFetch.mockResolvedValueOnce(new Response('   ', { status: 200 }));
    const fetcher = createHttpFetcher({ timeoutMs: 1000 });

    await expect(fetcher.fetch('gazette', 'https://gazette.example.com/a')).rejects.toMatchObject({
      code: ErrorCode.FETCH_FAILED,
      message: 'Fetched document is empty',
      retryable: false,
    });
  });

  it('wraps network failures as retryable', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const fetcher = createHttpFetcher({ timeoutMs: 1000 });

    await expect(fetcher.fetch('gazette', 'https://gazette.example.com/a')).rejects.toMatchObject({
      code: ErrorCode.FETCH_FAILED,
      message: 'Fetch failed: fetch failed',
      retryable: true,
    });
  });
});
