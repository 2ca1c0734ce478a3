import { displayName, formatSignedPct, formatUsd, formatUtc } from '../util/format.js';
import type { PriceChange24h } from './market-data.types.js';
import { ALERT_COLORS } from './notifier.js';
import type { EmbedField, NotificationMessage } from './notifier.types.js';
import type { PortfolioSummary } from './portfolio.types.js';
import type { FearGreedIndex } from './sentiment.types.js';

export interface SummaryReportInputs {
  portfolio: PortfolioSummary | null;
  fearGreed: FearGreedIndex;
  /** 24h quotes for tracked assets, keyed by asset id. */
  tracked: Record<string, PriceChange24h>;
}

function sameUtcDay(a: Date, b: Date): boolean {
  return a.toISOString().slice(0, 10) === b.toISOString().slice(0, 10);
}

/**
 * Due once per UTC day, during the configured hour once its minute has been
 * reached.
 */
export function isSummaryDue(
  now: Date,
  summaryTime: string | null,
  lastSentAt: Date | null,
): boolean {
  if (!summaryTime) return false;
  if (lastSentAt && sameUtcDay(lastSentAt, now)) return false;
  const [hour, minute] = summaryTime.split(':').map(Number);
  return now.getUTCHours() === hour && now.getUTCMinutes() >= minute;
}

function quoteLine(assetId: string, price: number, changePct: number): string {
  return `**${displayName(assetId)}**: ${formatUsd(price)} (${formatSignedPct(changePct)})`;
}

export function buildDailySummary(
  inputs: SummaryReportInputs,
  now: Date,
): NotificationMessage {
  const { portfolio, fearGreed, tracked } = inputs;
  const fields: EmbedField[] = [];

  if (portfolio && portfolio.totalValue > 0) {
    fields.push({
      name: 'Portfolio Overview',
      value: `Total Value: **${formatUsd(portfolio.totalValue)}**\n24h Change: **${formatSignedPct(portfolio.totalChange24hPct)}**`,
      inline: false,
    });
    if (portfolio.holdings.length) {
      fields.push({
        name: 'Individual Holdings (24h Change)',
        value: portfolio.holdings
          .map((h) => quoteLine(h.assetId, h.price, h.change24hPct))
          .join('\n'),
        inline: false,
      });
    }
  } else {
    fields.push({
      name: 'Portfolio Overview',
      value: 'No portfolio holdings configured or data unavailable.',
      inline: false,
    });
  }

  if (fearGreed.score !== null) {
    fields.push({
      name: 'Market Sentiment (Fear & Greed)',
      value: `Score: **${fearGreed.score.toFixed(1)}** (${fearGreed.category ?? 'unknown'})`,
      inline: false,
    });
  }

  const held = new Set(portfolio?.holdings.map((h) => h.assetId) ?? []);
  const others = Object.entries(tracked)
    .filter(([assetId]) => !held.has(assetId))
    .map(([assetId, q]) => quoteLine(assetId, q.price, q.change24hPct));
  if (others.length) {
    fields.push({
      name: 'Other Tracked Assets (24h Change)',
      value: others.join('\n'),
      inline: false,
    });
  }

  return {
    title: `Daily Summary: ${now.toISOString().slice(0, 10)}`,
    description: 'End-of-day overview of the market and the portfolio.',
    color: ALERT_COLORS.summary,
    fields,
    footer: `Report generated at ${formatUtc(now)}`,
  };
}
