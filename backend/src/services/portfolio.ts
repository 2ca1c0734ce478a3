import type { FastifyBaseLogger } from 'fastify';

import type { AgentConfig } from '../util/agent-config.js';
import { displayName, formatSignedPct, formatUsd, formatUtc } from '../util/format.js';
import type { MarketDataProvider } from './market-data.types.js';
import { ALERT_COLORS } from './notifier.js';
import type { NotificationMessage } from './notifier.types.js';
import type {
  HoldingPerformance,
  PortfolioAlertThresholds,
  PortfolioSummary,
} from './portfolio.types.js';

export function summarizePortfolio(
  holdings: HoldingPerformance[],
): PortfolioSummary {
  const totalValue = holdings.reduce((sum, h) => sum + h.value, 0);
  let totalChange24hPct = 0;
  if (totalValue > 0) {
    for (const h of holdings) {
      totalChange24hPct += (h.value / totalValue) * h.change24hPct;
    }
  }
  return { totalValue, totalChange24hPct, holdings };
}

/**
 * Prices every holding with a positive quantity. Holdings whose quote is
 * unavailable are left out. Null when nothing is held.
 */
export async function trackPortfolioPerformance(
  holdings: AgentConfig['portfolioHoldings'],
  market: MarketDataProvider,
  log: FastifyBaseLogger,
): Promise<PortfolioSummary | null> {
  const held = Object.entries(holdings).filter(([, h]) => h.quantity > 0);
  if (!held.length) return null;

  const performance: HoldingPerformance[] = [];
  for (const [assetId, { quantity }] of held) {
    const quote = await market.getPriceChange24h(assetId);
    if (!quote) {
      log.warn({ assetId }, 'no 24h quote for holding');
      continue;
    }
    performance.push({
      assetId,
      quantity,
      price: quote.price,
      value: quote.price * quantity,
      change24hPct: quote.change24hPct,
    });
  }
  const summary = summarizePortfolio(performance);
  log.info(
    {
      totalValue: summary.totalValue,
      totalChange24hPct: summary.totalChange24hPct,
      holdings: performance.length,
    },
    'portfolio tracked',
  );
  return summary;
}

/** Reasons the portfolio alert should fire; empty when no threshold is crossed. */
export function evaluatePortfolioAlert(
  summary: PortfolioSummary,
  thresholds: PortfolioAlertThresholds,
): string[] {
  const reasons: string[] = [];
  const total = thresholds.totalPortfolioPercentChange;
  if (total != null && Math.abs(summary.totalChange24hPct) >= total) {
    reasons.push(
      `Total portfolio changed **${formatSignedPct(summary.totalChange24hPct)}** in 24h (threshold: ${total}%)`,
    );
  }
  const individual = thresholds.individualAssetPercentChange;
  if (individual != null) {
    for (const h of summary.holdings) {
      if (Math.abs(h.change24hPct) >= individual) {
        reasons.push(
          `${displayName(h.assetId)} changed **${formatSignedPct(h.change24hPct)}** in 24h (threshold: ${individual}%)`,
        );
      }
    }
  }
  return reasons;
}

export function buildPortfolioAlert(
  summary: PortfolioSummary,
  reasons: string[],
  now: Date,
): NotificationMessage {
  return {
    title: 'Portfolio Performance Alert',
    description: reasons.join('\n'),
    color:
      summary.totalChange24hPct >= 0
        ? ALERT_COLORS.portfolioUp
        : ALERT_COLORS.portfolioDown,
    fields: [
      { name: 'Total Portfolio Value', value: formatUsd(summary.totalValue), inline: true },
      {
        name: 'Total 24h Change',
        value: formatSignedPct(summary.totalChange24hPct),
        inline: true,
      },
    ],
    footer: `Portfolio alert generated at ${formatUtc(now)}`,
  };
}
