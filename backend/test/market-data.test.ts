import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  clearMarketDataCache,
  createCoinGeckoProvider,
  toPriceSeries,
} from '../src/services/market-data.js';
import { mockLogger } from './helpers.js';

const BASE = 'https://coingecko.test/api/v3';

function provider() {
  return createCoinGeckoProvider({
    baseUrl: BASE,
    log: mockLogger(),
    retry: { retries: 1, backoffFactor: 2, baseDelayMs: 0, timeoutMs: 1_000 },
    slowCallDelayMs: 0,
    fastCallDelayMs: 0,
  });
}

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

beforeEach(() => {
  clearMarketDataCache();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('toPriceSeries', () => {
  it('joins on timestamp, keeps the last duplicate and sorts ascending', () => {
    expect(
      toPriceSeries(
        [
          [3, 30],
          [1, 10],
          [2, 20],
          [3, 31],
          [4, 40],
        ],
        [
          [1, 100],
          [2, 200],
          [3, 300],
        ],
      ),
    ).toEqual([
      { timestamp: 1, price: 10, volume: 100 },
      { timestamp: 2, price: 20, volume: 200 },
      { timestamp: 3, price: 31, volume: 300 },
    ]);
  });
});

describe('coingecko provider', () => {
  it('requests daily history for the lookback window', async () => {
    const fetchMock = vi.spyOn(global, 'fetch').mockResolvedValue(
      json({ prices: [[1, 5], [2, 6]], total_volumes: [[1, 50], [2, 60]] }),
    );
    const series = await provider().getSeries('solana', 250);
    expect(series).toEqual([
      { timestamp: 1, price: 5, volume: 50 },
      { timestamp: 2, price: 6, volume: 60 },
    ]);
    expect(String(fetchMock.mock.calls[0][0])).toBe(
      `${BASE}/coins/solana/market_chart?vs_currency=usd&days=250&interval=daily`,
    );
  });

  it('returns an empty series after persistent failure', async () => {
    vi.spyOn(global, 'fetch').mockImplementation(async () => json({}, 503));
    expect(await provider().getSeries('solana', 250)).toEqual([]);
  });

  it('reads the current price and the 24h change', async () => {
    vi.spyOn(global, 'fetch')
      .mockResolvedValueOnce(json({ sui: { usd: 3.5 } }))
      .mockResolvedValueOnce(json({ sui: { usd: 3.6, usd_24h_change: -4.2 } }));
    const p = provider();
    expect(await p.getCurrentPrice('sui')).toBe(3.5);
    expect(await p.getPriceChange24h('sui')).toEqual({ price: 3.6, change24hPct: -4.2 });
  });

  it('returns null for an asset missing from the answer', async () => {
    vi.spyOn(global, 'fetch').mockResolvedValue(json({}));
    expect(await provider().getCurrentPrice('unknown-coin')).toBeNull();
  });

  it('caches the historical all-time high', async () => {
    const fetchMock = vi
      .spyOn(global, 'fetch')
      .mockImplementation(async () => json({ market_data: { ath: { usd: 73_000 } } }));
    const p = provider();
    expect(await p.getHistoricalAth('bitcoin')).toBe(73_000);
    expect(await p.getHistoricalAth('bitcoin')).toBe(73_000);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('computes dominance from market caps', async () => {
    vi.spyOn(global, 'fetch')
      .mockResolvedValueOnce(json({ bitcoin: { usd: 70_000, usd_market_cap: 1_400 } }))
      .mockResolvedValueOnce(json({ data: { total_market_cap: { usd: 2_800 } } }));
    expect(await provider().getDominance('bitcoin')).toBe(50);
  });
});
