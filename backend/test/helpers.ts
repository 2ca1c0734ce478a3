import { vi } from 'vitest';
import type { FastifyBaseLogger } from 'fastify';

import type {
  CooldownEntries,
  CooldownLedgerStore,
} from '../src/repos/cooldown-ledger.types.js';
import type {
  DetectorStateMap,
  DetectorStateStore,
} from '../src/repos/detector-state.types.js';
import type {
  IndicatorSnapshot,
  PriceSeries,
} from '../src/services/indicators.types.js';
import type { MarketDataProvider } from '../src/services/market-data.types.js';
import type {
  NotificationMessage,
  Notifier,
} from '../src/services/notifier.types.js';
import type {
  SentimentProvider,
  SentimentSnapshot,
} from '../src/services/sentiment.types.js';

export function mockLogger(): FastifyBaseLogger {
  const log = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: () => log,
  } as unknown as FastifyBaseLogger;
  return log;
}

export function indicators(
  overrides: Partial<IndicatorSnapshot> = {},
): IndicatorSnapshot {
  return {
    price: null,
    volume: null,
    rsi14: null,
    ema20: null,
    ema50: null,
    ema200: null,
    bollinger: null,
    change7dPct: null,
    change30dPct: null,
    volumeHistory: [],
    ...overrides,
  };
}

export function sentiment(
  overrides: Partial<SentimentSnapshot> = {},
): SentimentSnapshot {
  return {
    fearGreedScore: null,
    fearGreedCategory: null,
    publicInterest: null,
    ...overrides,
  };
}

export interface MemoryStores {
  detectorStore: DetectorStateStore & { state: DetectorStateMap };
  ledgerStore: CooldownLedgerStore & { entries: CooldownEntries };
}

export function memoryStores(
  initial: { detector?: DetectorStateMap; cooldowns?: CooldownEntries } = {},
): MemoryStores {
  const detectorStore: MemoryStores['detectorStore'] = {
    state: structuredClone(initial.detector ?? {}),
    async load() {
      return structuredClone(detectorStore.state);
    },
    async save(state: DetectorStateMap) {
      detectorStore.state = structuredClone(state);
    },
  };
  const ledgerStore: MemoryStores['ledgerStore'] = {
    entries: { ...initial.cooldowns },
    async load() {
      return { ...ledgerStore.entries };
    },
    async save(entries: CooldownEntries) {
      ledgerStore.entries = { ...entries };
    },
  };
  return { detectorStore, ledgerStore };
}

export function fakeMarket(
  overrides: Partial<MarketDataProvider> = {},
): MarketDataProvider {
  return {
    getSeries: async () => [],
    getCurrentPrice: async () => null,
    getHistoricalAth: async () => null,
    getPriceChange24h: async () => null,
    getDominance: async () => null,
    ...overrides,
  };
}

export function fakeSentiment(
  overrides: Partial<SentimentProvider> = {},
): SentimentProvider {
  return {
    getFearGreed: async () => ({ score: null, category: null }),
    getPublicInterest: async () => null,
    ...overrides,
  };
}

/** Notifier that records every message and reports delivery as `delivered`. */
export function recordingNotifier(delivered = true) {
  const sent: NotificationMessage[] = [];
  const notifier: Notifier = {
    async send(message) {
      sent.push(message);
      return delivered;
    },
  };
  return { notifier, sent };
}

/** Daily series: flat at `base`, then `rampDays` compounding at `dailyGrowth`. */
export function rampSeries(
  totalDays: number,
  rampDays: number,
  dailyGrowth: number,
  base = 100,
): PriceSeries {
  const start = Date.UTC(2025, 0, 1);
  const flatDays = totalDays - rampDays;
  return Array.from({ length: totalDays }, (_, i) => ({
    timestamp: start + i * 86_400_000,
    price: i < flatDays ? base : base * dailyGrowth ** (i - flatDays + 1),
    volume: 1_000,
  }));
}
