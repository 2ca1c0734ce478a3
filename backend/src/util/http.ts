import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import type { z } from 'zod';

export interface RetryOptions {
  retries: number;
  backoffFactor: number;
  baseDelayMs: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  retries: 5,
  backoffFactor: 2,
  baseDelayMs: 1_000,
  timeoutMs: 10_000,
};

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Delay before retry number `attempt` (1-based). */
export function calculateBackoffDelayMs(
  attempt: number,
  opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
): number {
  const exponent = Math.max(0, attempt - 1);
  return opts.baseDelayMs * opts.backoffFactor ** exponent;
}

/**
 * Retries network errors and 429/5xx answers with exponential backoff. Any
 * other non-2xx status, or exhausting the retries, throws.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
  log?: FastifyBaseLogger,
): Promise<Response> {
  for (let attempt = 0; ; attempt++) {
    let retryReason: string;
    try {
      const res = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(opts.timeoutMs),
      });
      if (res.ok) return res;
      const body = await res.text();
      if (!RETRYABLE_STATUSES.has(res.status) || attempt >= opts.retries) {
        throw new HttpError(
          res.status,
          `request to ${url} failed: ${res.status} ${body}`,
        );
      }
      retryReason = `status ${res.status}`;
    } catch (err) {
      if (err instanceof HttpError || attempt >= opts.retries) throw err;
      retryReason = err instanceof Error ? err.message : String(err);
    }
    const delayMs = calculateBackoffDelayMs(attempt + 1, opts);
    log?.warn(
      { url, attempt: attempt + 1, delayMs, reason: retryReason },
      'retrying request',
    );
    await sleep(delayMs);
  }
}

export async function fetchJson<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
  log?: FastifyBaseLogger,
): Promise<z.infer<T>> {
  const res = await fetchWithRetry(url, {}, opts, log);
  const json: unknown = await res.json();
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new Error(
      `unexpected response from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
    );
  }
  return parsed.data;
}
