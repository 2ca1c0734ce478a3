import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import NodeCache from 'node-cache';
import { z } from 'zod';

import {
  DEFAULT_RETRY_OPTIONS,
  fetchJson,
  type RetryOptions,
} from '../util/http.js';
import type { PriceSeries } from './indicators.types.js';
import type {
  MarketDataProvider,
  PriceChange24h,
} from './market-data.types.js';

const ATH_CACHE_TTL_SECONDS = 60 * 60;
const DOMINANCE_CACHE_TTL_SECONDS = 10 * 60;

const athCache = new NodeCache({
  stdTTL: ATH_CACHE_TTL_SECONDS,
  checkperiod: 0,
});
const dominanceCache = new NodeCache({
  stdTTL: DOMINANCE_CACHE_TTL_SECONDS,
  checkperiod: 0,
});

export function clearMarketDataCache(): void {
  athCache.flushAll();
  dominanceCache.flushAll();
}

const pointSchema = z.tuple([z.number(), z.number()]);

const marketChartSchema = z.object({
  prices: z.array(pointSchema),
  total_volumes: z.array(pointSchema),
});

const simplePriceSchema = z.record(
  z.object({
    usd: z.number(),
    usd_24h_change: z.number().nullish(),
    usd_market_cap: z.number().nullish(),
  }),
);

const coinSchema = z.object({
  market_data: z.object({
    ath: z.object({ usd: z.number() }),
  }),
});

const globalSchema = z.object({
  data: z.object({
    total_market_cap: z.object({ usd: z.number() }),
  }),
});

export interface CoinGeckoProviderOptions {
  baseUrl: string;
  log: FastifyBaseLogger;
  retry?: RetryOptions;
  /** Minimum spacing between history, ATH and dominance calls. */
  slowCallDelayMs?: number;
  /** Minimum spacing between simple-price calls. */
  fastCallDelayMs?: number;
}

type Lane = 'slow' | 'fast';

/** Joins prices and volumes on timestamp, last duplicate wins, ascending. */
export function toPriceSeries(
  prices: [number, number][],
  volumes: [number, number][],
): PriceSeries {
  const volumeByTs = new Map<number, number>();
  for (const [ts, volume] of volumes) volumeByTs.set(ts, volume);
  const byTs = new Map<number, { price: number; volume: number }>();
  for (const [ts, price] of prices) {
    const volume = volumeByTs.get(ts);
    if (volume === undefined) continue;
    byTs.set(ts, { price, volume });
  }
  return [...byTs.entries()]
    .sort(([a], [b]) => a - b)
    .map(([timestamp, { price, volume }]) => ({ timestamp, price, volume }));
}

export function createCoinGeckoProvider(
  opts: CoinGeckoProviderOptions,
): MarketDataProvider {
  const { baseUrl, log } = opts;
  const retry = opts.retry ?? DEFAULT_RETRY_OPTIONS;
  const spacing: Record<Lane, number> = {
    slow: opts.slowCallDelayMs ?? 6_000,
    fast: opts.fastCallDelayMs ?? 1_000,
  };
  const lastCallAt: Record<Lane, number> = { slow: 0, fast: 0 };

  async function pace(lane: Lane): Promise<void> {
    const waitMs = lastCallAt[lane] + spacing[lane] - Date.now();
    if (waitMs > 0) await sleep(waitMs);
    lastCallAt[lane] = Date.now();
  }

  async function get<T extends z.ZodTypeAny>(
    lane: Lane,
    path: string,
    params: Record<string, string>,
    schema: T,
  ): Promise<z.infer<T>> {
    await pace(lane);
    const qs = new URLSearchParams(params).toString();
    const url = `${baseUrl}${path}${qs ? `?${qs}` : ''}`;
    return fetchJson(url, schema, retry, log);
  }

  async function simplePrice(
    assetId: string,
    extra: Record<string, string>,
  ): Promise<z.infer<typeof simplePriceSchema>[string] | null> {
    const data = await get(
      'fast',
      '/simple/price',
      { ids: assetId, vs_currencies: 'usd', ...extra },
      simplePriceSchema,
    );
    return data[assetId] ?? null;
  }

  return {
    async getSeries(assetId, lookbackDays) {
      try {
        const data = await get(
          'slow',
          `/coins/${encodeURIComponent(assetId)}/market_chart`,
          { vs_currency: 'usd', days: String(lookbackDays), interval: 'daily' },
          marketChartSchema,
        );
        return toPriceSeries(data.prices, data.total_volumes);
      } catch (err) {
        log.error({ err, assetId }, 'failed to fetch price history');
        return [];
      }
    },

    async getCurrentPrice(assetId) {
      try {
        const quote = await simplePrice(assetId, {});
        return quote?.usd ?? null;
      } catch (err) {
        log.error({ err, assetId }, 'failed to fetch current price');
        return null;
      }
    },

    async getHistoricalAth(assetId) {
      const cached = athCache.get<number>(assetId);
      if (cached !== undefined) return cached;
      try {
        const data = await get(
          'slow',
          `/coins/${encodeURIComponent(assetId)}`,
          {
            localization: 'false',
            tickers: 'false',
            community_data: 'false',
            developer_data: 'false',
          },
          coinSchema,
        );
        const ath = data.market_data.ath.usd;
        athCache.set(assetId, ath);
        return ath;
      } catch (err) {
        log.error({ err, assetId }, 'failed to fetch all-time high');
        return null;
      }
    },

    async getPriceChange24h(assetId): Promise<PriceChange24h | null> {
      try {
        const quote = await simplePrice(assetId, {
          include_24hr_change: 'true',
        });
        if (!quote || quote.usd_24h_change == null) return null;
        return { price: quote.usd, change24hPct: quote.usd_24h_change };
      } catch (err) {
        log.error({ err, assetId }, 'failed to fetch 24h change');
        return null;
      }
    },

    async getDominance(referenceAssetId) {
      const cached = dominanceCache.get<number>(referenceAssetId);
      if (cached !== undefined) return cached;
      try {
        const quote = await simplePrice(referenceAssetId, {
          include_market_cap: 'true',
        });
        const global = await get('slow', '/global', {}, globalSchema);
        const total = global.data.total_market_cap.usd;
        const cap = quote?.usd_market_cap;
        if (cap == null || total <= 0) return null;
        const dominance = (cap / total) * 100;
        dominanceCache.set(referenceAssetId, dominance);
        return dominance;
      } catch (err) {
        log.error({ err, referenceAssetId }, 'failed to fetch dominance');
        return null;
      }
    },
  };
}
