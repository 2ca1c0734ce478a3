import * as path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';

import { createFileCooldownLedgerStore } from '../repos/cooldown-ledger.js';
import type { CooldownLedgerStore } from '../repos/cooldown-ledger.types.js';
import { createFileDetectorStateStore } from '../repos/detector-state.js';
import type {
  DetectorStateMap,
  DetectorStateStore,
} from '../repos/detector-state.types.js';
import { CooldownLedger } from '../services/alert-gate.js';
import type { AlertDispatchContext } from '../services/alerts.js';
import { createCoinGeckoProvider } from '../services/market-data.js';
import type { MarketDataProvider } from '../services/market-data.types.js';
import { createDiscordNotifier } from '../services/notifier.js';
import type { Notifier } from '../services/notifier.types.js';
import { createSentimentProvider } from '../services/sentiment.js';
import type { SentimentProvider } from '../services/sentiment.types.js';
import type { AgentConfig } from '../util/agent-config.js';
import { env } from '../util/env.js';

export interface CycleRuns {
  signalAnalysis: Date | null;
  priceMonitor: Date | null;
}

/** Everything a cycle reads or mutates, passed explicitly to each job. */
export interface AgentContext {
  config: AgentConfig;
  market: MarketDataProvider;
  sentiment: SentimentProvider;
  notifier: Notifier;
  ledger: CooldownLedger;
  ledgerStore: CooldownLedgerStore;
  detectorStore: DetectorStateStore;
  detectorState: DetectorStateMap;
  signalLogPath: string;
  latestPrices: Record<string, number>;
  lastRuns: CycleRuns;
  now: () => Date;
}

export interface AgentContextDeps {
  config: AgentConfig;
  market: MarketDataProvider;
  sentiment: SentimentProvider;
  notifier: Notifier;
  ledgerStore: CooldownLedgerStore;
  detectorStore: DetectorStateStore;
  signalLogPath: string;
  now?: () => Date;
}

/** Loads persisted detector state and cooldowns into a fresh context. */
export async function createAgentContext(
  deps: AgentContextDeps,
): Promise<AgentContext> {
  const [detectorState, ledgerEntries] = await Promise.all([
    deps.detectorStore.load(),
    deps.ledgerStore.load(),
  ]);
  return {
    config: deps.config,
    market: deps.market,
    sentiment: deps.sentiment,
    notifier: deps.notifier,
    ledgerStore: deps.ledgerStore,
    detectorStore: deps.detectorStore,
    signalLogPath: deps.signalLogPath,
    ledger: new CooldownLedger(ledgerEntries),
    detectorState,
    latestPrices: {},
    lastRuns: { signalAnalysis: null, priceMonitor: null },
    now: deps.now ?? (() => new Date()),
  };
}

/** Production wiring: CoinGecko, alternative.me, Google Trends, Discord, JSON files. */
export function createDefaultAgentContext(
  config: AgentConfig,
  log: FastifyBaseLogger,
): Promise<AgentContext> {
  const dataDir = path.resolve(env.DATA_DIR);
  return createAgentContext({
    config,
    market: createCoinGeckoProvider({ baseUrl: env.COINGECKO_API_BASE_URL, log }),
    sentiment: createSentimentProvider({ log }),
    notifier: createDiscordNotifier(env.DISCORD_WEBHOOK_URL, log),
    ledgerStore: createFileCooldownLedgerStore(
      path.join(dataDir, 'cooldowns.json'),
      log,
    ),
    detectorStore: createFileDetectorStateStore(
      path.join(dataDir, 'detector-state.json'),
      log,
    ),
    signalLogPath: path.join(dataDir, 'signal-log.jsonl'),
  });
}

export function dispatchContext(
  ctx: AgentContext,
  log: FastifyBaseLogger,
): AlertDispatchContext {
  return {
    ledger: ctx.ledger,
    ledgerStore: ctx.ledgerStore,
    notifier: ctx.notifier,
    log,
  };
}
