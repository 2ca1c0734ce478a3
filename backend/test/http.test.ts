import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  calculateBackoffDelayMs,
  fetchWithRetry,
  HttpError,
  type RetryOptions,
} from '../src/util/http.js';

const fast: RetryOptions = { retries: 2, backoffFactor: 2, baseDelayMs: 0, timeoutMs: 1_000 };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('calculateBackoffDelayMs', () => {
  it('doubles per attempt', () => {
    const opts = { retries: 5, backoffFactor: 2, baseDelayMs: 1_000, timeoutMs: 1 };
    expect([1, 2, 3, 4, 5].map((a) => calculateBackoffDelayMs(a, opts))).toEqual([
      1_000, 2_000, 4_000, 8_000, 16_000,
    ]);
  });
});

describe('fetchWithRetry', () => {
  it('retries 429 and 5xx answers', async () => {
    const fetchMock = vi
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(new Response('oops', { status: 503 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    const res = await fetchWithRetry('https://example.test/a', {}, fast);
    expect(await res.text()).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('retries network errors', async () => {
    const fetchMock = vi
      .spyOn(global, 'fetch')
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    await fetchWithRetry('https://example.test/b', {}, fast);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not retry other client errors', async () => {
    const fetchMock = vi
      .spyOn(global, 'fetch')
      .mockResolvedValue(new Response('missing', { status: 404 }));
    await expect(fetchWithRetry('https://example.test/c', {}, fast)).rejects.toBeInstanceOf(HttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured retries', async () => {
    const fetchMock = vi
      .spyOn(global, 'fetch')
      .mockImplementation(async () => new Response('busy', { status: 500 }));
    await expect(fetchWithRetry('https://example.test/d', {}, fast)).rejects.toThrow(
      'request to https://example.test/d failed: 500 busy',
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});
