import type { FastifyBaseLogger } from 'fastify';

import { appendSignalLog } from '../repos/signal-log.js';
import { alertKeys } from '../services/alert-gate.js';
import {
  buildDipBuyAlert,
  buildProfitTakingAlert,
  buildSignalAlert,
  buildTopAlert,
  buildTrailingStopAlert,
  dispatchGated,
  type AlertDispatchContext,
} from '../services/alerts.js';
import { detectDipBuy } from '../services/dip-buy.js';
import { buildIndicatorSnapshot } from '../services/indicators.js';
import type { IndicatorSnapshot } from '../services/indicators.types.js';
import type { MacroSnapshot, ReferenceAssetQuote } from '../services/market-data.types.js';
import type { NotificationMessage } from '../services/notifier.types.js';
import {
  buildPortfolioAlert,
  evaluatePortfolioAlert,
  trackPortfolioPerformance,
} from '../services/portfolio.js';
import type { FearGreedIndex, SentimentSnapshot } from '../services/sentiment.types.js';
import { scoreSignalDetailed } from '../services/signal-scoring.js';
import { detectTop } from '../services/top-detection.js';
import { evaluateTrailingStop } from '../services/trailing-stop.js';
import { publicInterestKeyword } from '../util/agent-config.js';
import { dispatchContext, type AgentContext } from './agent-context.js';

let running = false;

export function isSignalAnalysisRunning(): boolean {
  return running;
}

/**
 * Comprehensive cycle. Assets are processed one at a time; a tick arriving
 * while a previous run is still in progress is skipped. Resolves false when
 * skipped.
 */
export default async function runSignalAnalysis(
  ctx: AgentContext,
  log: FastifyBaseLogger,
): Promise<boolean> {
  if (running) {
    log.warn('signal analysis still running, skipping tick');
    return false;
  }
  running = true;
  try {
    await analyzeAll(ctx, log);
    return true;
  } finally {
    running = false;
  }
}

async function analyzeAll(ctx: AgentContext, log: FastifyBaseLogger) {
  const startedAt = ctx.now();
  log.info({ assets: ctx.config.trackedAssets.length }, 'signal analysis started');

  const macro = await fetchMacroSnapshot(ctx);
  const fearGreed = await ctx.sentiment.getFearGreed();

  for (const asset of ctx.config.trackedAssets) {
    const assetLog = log.child({ asset });
    try {
      await analyzeAsset(ctx, asset, macro, fearGreed, assetLog);
    } catch (err) {
      assetLog.error({ err }, 'asset analysis failed');
    }
  }

  try {
    await checkPortfolio(ctx, log);
  } catch (err) {
    log.error({ err }, 'portfolio check failed');
  }

  try {
    await ctx.detectorStore.save(ctx.detectorState);
  } catch (err) {
    log.error({ err }, 'failed to persist detector state');
  }

  ctx.lastRuns.signalAnalysis = startedAt;
  log.info(
    { durationMs: ctx.now().getTime() - startedAt.getTime() },
    'signal analysis finished',
  );
}

export async function fetchMacroSnapshot(
  ctx: AgentContext,
): Promise<MacroSnapshot> {
  const references: ReferenceAssetQuote[] = [];
  for (const assetId of ctx.config.referenceAssets) {
    const price = await ctx.market.getCurrentPrice(assetId);
    const ath = await ctx.market.getHistoricalAth(assetId);
    references.push({ assetId, price, ath });
  }
  const [primary] = ctx.config.referenceAssets;
  const dominance = primary ? await ctx.market.getDominance(primary) : null;
  return { references, dominance };
}

export async function analyzeAsset(
  ctx: AgentContext,
  asset: string,
  macro: MacroSnapshot,
  fearGreed: FearGreedIndex,
  log: FastifyBaseLogger,
): Promise<void> {
  const { config } = ctx;
  const series = await ctx.market.getSeries(asset, config.historyLookbackDays);
  const ind = buildIndicatorSnapshot(series);
  const price = ind.price;
  if (price === null) {
    log.warn({ samples: series.length }, 'no price data, skipping asset');
    return;
  }
  ctx.latestPrices[asset] = price;

  const sentiment: SentimentSnapshot = {
    fearGreedScore: fearGreed.score,
    fearGreedCategory: fearGreed.category,
    publicInterest: await ctx.sentiment.getPublicInterest(
      publicInterestKeyword(config, asset),
    ),
  };

  const now = ctx.now();
  const dispatch = dispatchContext(ctx, log);
  const sent: string[] = [];
  const send = (key: string, hours: number, message: NotificationMessage) =>
    sendRecorded(dispatch, sent, key, hours, message, now);

  const top = detectTop(ind, sentiment);
  if (top.fired) {
    await send(
      alertKeys.top(asset),
      config.cooldownHours.signal,
      buildTopAlert(asset, ind, top, now),
    );
  }

  const dip = detectDipBuy(ind, sentiment);
  if (dip.fired) {
    await send(
      alertKeys.dip(asset),
      config.cooldownHours.signal,
      buildDipBuyAlert(asset, ind, dip, now),
    );
  }

  await checkProfitTargets(ctx, asset, price, dispatch, now, sent, log);
  await checkTrailingStop(ctx, asset, ind, dispatch, now, sent);

  const breakdown = scoreSignalDetailed(ind, sentiment, macro, config.scoringWeights, {
    volumeSpikeMultiplier: config.volumeSpikeMultiplier,
    volumeFallbackThreshold: config.volumeFallbackThreshold,
  });
  if (breakdown.score >= config.alertScoreThreshold) {
    await send(
      alertKeys.signal(asset),
      config.cooldownHours.signal,
      buildSignalAlert(asset, breakdown.score, ind, sentiment, now),
    );
  }
  log.info(
    { score: breakdown.score, top: top.fired, dip: dip.fired, alerts: sent },
    'asset analyzed',
  );

  await appendSignalLog(ctx.signalLogPath, {
    timestamp: now.toISOString(),
    asset,
    score: breakdown.score,
    price,
    rsi14: ind.rsi14,
    ema20: ind.ema20,
    ema50: ind.ema50,
    ema200: ind.ema200,
    change7dPct: ind.change7dPct,
    change30dPct: ind.change30dPct,
    fearGreed: sentiment.fearGreedScore,
    publicInterest: sentiment.publicInterest,
    dominance: macro.dominance,
    contributions: breakdown.contributions,
    topFired: top.fired,
    dipBuyFired: dip.fired,
    alerts: sent,
  });
}

/** Dispatches through the gate and notes the key when delivered. */
async function sendRecorded(
  dispatch: AlertDispatchContext,
  sent: string[],
  key: string,
  cooldownHours: number,
  message: NotificationMessage,
  now: Date,
): Promise<void> {
  if (await dispatchGated(dispatch, key, cooldownHours, message, now)) {
    sent.push(key);
  }
}

async function checkProfitTargets(
  ctx: AgentContext,
  asset: string,
  price: number,
  dispatch: AlertDispatchContext,
  now: Date,
  sent: string[],
  log: FastifyBaseLogger,
) {
  const targets = ctx.config.profitTakingAlerts[asset] ?? [];
  if (!targets.length) return;
  const quantity = ctx.config.portfolioHoldings[asset]?.quantity ?? 0;
  if (quantity <= 0) {
    log.info('profit targets configured but nothing held');
    return;
  }
  for (const target of targets) {
    if (price < target.targetPrice) continue;
    await sendRecorded(
      dispatch,
      sent,
      alertKeys.profitTaking(asset, target.targetPrice),
      ctx.config.cooldownHours.profitTaking,
      buildProfitTakingAlert(asset, price, target, quantity, now),
      now,
    );
  }
}

async function checkTrailingStop(
  ctx: AgentContext,
  asset: string,
  ind: IndicatorSnapshot,
  dispatch: AlertDispatchContext,
  now: Date,
  sent: string[],
) {
  const settings = ctx.config.trailingStopAlerts[asset];
  const price = ind.price;
  if (!settings || price === null) return;
  const { detections, state } = evaluateTrailingStop(
    { price, ema50: ind.ema50 },
    ctx.detectorState[asset],
    settings,
  );
  ctx.detectorState[asset] = state;

  for (const detection of detections) {
    const key =
      detection.kind === 'ATH_DROP'
        ? alertKeys.athDrop(asset, detection.threshold)
        : alertKeys.ema50Cross(asset);
    await sendRecorded(
      dispatch,
      sent,
      key,
      ctx.config.cooldownHours.trailingStop,
      buildTrailingStopAlert(asset, price, detection, now),
      now,
    );
  }
}

async function checkPortfolio(ctx: AgentContext, log: FastifyBaseLogger) {
  const summary = await trackPortfolioPerformance(
    ctx.config.portfolioHoldings,
    ctx.market,
    log,
  );
  if (!summary) return;
  const reasons = evaluatePortfolioAlert(summary, ctx.config.portfolioAlertThresholds);
  if (!reasons.length) return;
  const now = ctx.now();
  await dispatchGated(
    dispatchContext(ctx, log),
    alertKeys.portfolio(),
    ctx.config.cooldownHours.portfolio,
    buildPortfolioAlert(summary, reasons, now),
    now,
  );
}
