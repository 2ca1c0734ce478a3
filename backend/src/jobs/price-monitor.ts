import type { FastifyBaseLogger } from 'fastify';

import { alertKeys } from '../services/alert-gate.js';
import { buildPriceAlert, dispatchGated, type PriceTargetSide } from '../services/alerts.js';
import type { PriceChange24h } from '../services/market-data.types.js';
import { trackPortfolioPerformance } from '../services/portfolio.js';
import { buildDailySummary, isSummaryDue } from '../services/summary-report.js';
import type { PriceTargets } from '../util/agent-config.js';
import { dispatchContext, type AgentContext } from '../workflows/agent-context.js';

/** The summary's calendar-day rule does the real gating; this only guards overlap. */
const SUMMARY_MIN_INTERVAL_HOURS = 1;

let running = false;

export function priceTargetHit(
  price: number,
  targets: PriceTargets,
): { side: PriceTargetSide; target: number } | null {
  if (targets.buy != null && price <= targets.buy) {
    return { side: 'BUY', target: targets.buy };
  }
  if (targets.sell != null && price >= targets.sell) {
    return { side: 'SELL', target: targets.sell };
  }
  return null;
}

/** Fast cycle: refresh latest prices, check price targets, send the daily summary when due. */
export default async function runPriceMonitor(
  ctx: AgentContext,
  log: FastifyBaseLogger,
): Promise<boolean> {
  if (running) {
    log.warn('price monitor still running, skipping tick');
    return false;
  }
  running = true;
  try {
    for (const asset of ctx.config.trackedAssets) {
      try {
        await checkAssetPrice(ctx, asset, log.child({ asset }));
      } catch (err) {
        log.error({ err, asset }, 'price check failed');
      }
    }
    try {
      await sendDailySummaryIfDue(ctx, log);
    } catch (err) {
      log.error({ err }, 'daily summary failed');
    }
    ctx.lastRuns.priceMonitor = ctx.now();
    return true;
  } finally {
    running = false;
  }
}

async function checkAssetPrice(
  ctx: AgentContext,
  asset: string,
  log: FastifyBaseLogger,
) {
  const price = await ctx.market.getCurrentPrice(asset);
  if (price === null) {
    log.warn('no current price');
    return;
  }
  ctx.latestPrices[asset] = price;

  const targets = ctx.config.priceAlerts[asset];
  if (!targets) return;
  const hit = priceTargetHit(price, targets);
  if (!hit) return;
  const now = ctx.now();
  await dispatchGated(
    dispatchContext(ctx, log),
    alertKeys.price(asset),
    ctx.config.cooldownHours.price,
    buildPriceAlert(asset, price, hit.side, hit.target, now),
    now,
  );
}

export async function sendDailySummaryIfDue(
  ctx: AgentContext,
  log: FastifyBaseLogger,
): Promise<boolean> {
  const now = ctx.now();
  const key = alertKeys.dailySummary();
  if (!isSummaryDue(now, ctx.config.summaryReportTime, ctx.ledger.lastFiredAt(key))) {
    return false;
  }
  log.info('building daily summary');

  const portfolio = await trackPortfolioPerformance(
    ctx.config.portfolioHoldings,
    ctx.market,
    log,
  );
  const fearGreed = await ctx.sentiment.getFearGreed();
  const tracked: Record<string, PriceChange24h> = {};
  for (const asset of ctx.config.trackedAssets) {
    const quote = await ctx.market.getPriceChange24h(asset);
    if (quote) tracked[asset] = quote;
  }

  return dispatchGated(
    dispatchContext(ctx, log),
    key,
    SUMMARY_MIN_INTERVAL_HOURS,
    buildDailySummary({ portfolio, fearGreed, tracked }, now),
    now,
  );
}
