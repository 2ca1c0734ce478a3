import type { FastifyBaseLogger } from 'fastify';
import googleTrends from 'google-trends-api';
import NodeCache from 'node-cache';
import { z } from 'zod';

import { env } from '../util/env.js';
import { DEFAULT_RETRY_OPTIONS, fetchJson, type RetryOptions } from '../util/http.js';
import type { FearGreedIndex, SentimentProvider } from './sentiment.types.js';

const FEAR_GREED_TTL_SECONDS = 10 * 60;
const PUBLIC_INTEREST_TTL_SECONDS = 6 * 60 * 60;
const INTEREST_WINDOW_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

const fearGreedCache = new NodeCache({
  stdTTL: FEAR_GREED_TTL_SECONDS,
  checkperiod: 0,
});
const interestCache = new NodeCache({
  stdTTL: PUBLIC_INTEREST_TTL_SECONDS,
  checkperiod: 0,
});

export function clearSentimentCache(): void {
  fearGreedCache.flushAll();
  interestCache.flushAll();
}

const fearGreedResponseSchema = z.object({
  data: z
    .array(
      z.object({
        value: z.coerce.number(),
        value_classification: z.string().optional(),
      }),
    )
    .default([]),
});

const trendsResponseSchema = z.object({
  default: z.object({
    timelineData: z.array(
      z.object({
        value: z.array(z.number()),
      }),
    ),
  }),
});

export async function fetchFearGreedIndex(
  url = env.FEAR_GREED_API_URL,
  retry: RetryOptions = DEFAULT_RETRY_OPTIONS,
  log?: FastifyBaseLogger,
): Promise<FearGreedIndex> {
  const json = await fetchJson(`${url}?limit=1`, fearGreedResponseSchema, retry, log);
  const latest = json.data[0];
  if (!latest || !Number.isFinite(latest.value)) {
    return { score: null, category: null };
  }
  return { score: latest.value, category: latest.value_classification ?? null };
}

/** Mean of the last seven points of the keyword's 7-day interest timeline. */
export async function fetchPublicInterest(
  keyword: string,
  now = new Date(),
): Promise<number | null> {
  const raw = await googleTrends.interestOverTime({
    keyword,
    startTime: new Date(now.getTime() - INTEREST_WINDOW_DAYS * DAY_MS),
    endTime: now,
  });
  const parsed = trendsResponseSchema.parse(JSON.parse(raw));
  const values = parsed.default.timelineData
    .map((point) => point.value[0])
    .filter((v): v is number => typeof v === 'number');
  const recent = values.slice(-INTEREST_WINDOW_DAYS);
  if (!recent.length) return null;
  return recent.reduce((sum, v) => sum + v, 0) / recent.length;
}

export interface SentimentProviderOptions {
  log: FastifyBaseLogger;
  fearGreedUrl?: string;
  retry?: RetryOptions;
}

export function createSentimentProvider(
  opts: SentimentProviderOptions,
): SentimentProvider {
  const { log } = opts;
  const url = opts.fearGreedUrl ?? env.FEAR_GREED_API_URL;
  const retry = opts.retry ?? DEFAULT_RETRY_OPTIONS;

  return {
    async getFearGreed() {
      const cached = fearGreedCache.get<FearGreedIndex>('latest');
      if (cached) return cached;
      try {
        const index = await fetchFearGreedIndex(url, retry, log);
        if (index.score !== null) fearGreedCache.set('latest', index);
        return index;
      } catch (err) {
        log.error({ err }, 'failed to fetch fear & greed index');
        return { score: null, category: null };
      }
    },

    async getPublicInterest(keyword) {
      const cached = interestCache.get<number>(keyword);
      if (cached !== undefined) return cached;
      try {
        const interest = await fetchPublicInterest(keyword);
        if (interest !== null) interestCache.set(keyword, interest);
        return interest;
      } catch (err) {
        log.error({ err, keyword }, 'failed to fetch public interest');
        return null;
      }
    },
  };
}
