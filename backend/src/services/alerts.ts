import type { FastifyBaseLogger } from 'fastify';

import type { CooldownLedgerStore } from '../repos/cooldown-ledger.types.js';
import type { ProfitTarget } from '../util/agent-config.js';
import {
  displayName,
  formatFixed,
  NOT_AVAILABLE,
  formatSignedPct,
  formatUsd,
  formatUtc,
} from '../util/format.js';
import type { CooldownLedger } from './alert-gate.js';
import type {
  DipBuyDetection,
  TopDetection,
  TrailingStopDetection,
} from './detectors.types.js';
import type { IndicatorSnapshot } from './indicators.types.js';
import { ALERT_COLORS } from './notifier.js';
import type {
  EmbedField,
  NotificationMessage,
  Notifier,
} from './notifier.types.js';
import type { SentimentSnapshot } from './sentiment.types.js';

export interface AlertDispatchContext {
  ledger: CooldownLedger;
  ledgerStore: CooldownLedgerStore;
  notifier: Notifier;
  log: FastifyBaseLogger;
}

/**
 * Gate, send, then record. The ledger entry is written and flushed only after
 * the notifier confirms delivery; a failed send leaves the key eligible.
 */
export async function dispatchGated(
  ctx: AlertDispatchContext,
  key: string,
  cooldownHours: number,
  message: NotificationMessage,
  now: Date = new Date(),
): Promise<boolean> {
  const { ledger, log } = ctx;
  if (!ledger.tryFire(key, now, cooldownHours)) {
    log.info(
      { key, lastFiredAt: ledger.lastFiredAt(key)?.toISOString(), cooldownHours },
      'alert on cooldown',
    );
    return false;
  }
  if (!ledger.begin(key)) {
    log.info({ key }, 'alert dispatch already in flight');
    return false;
  }
  try {
    const sent = await ctx.notifier.send(message);
    if (!sent) {
      log.warn({ key }, 'alert not delivered');
      return false;
    }
    ledger.record(key, now);
    try {
      await ctx.ledgerStore.save(ledger.toEntries());
    } catch (err) {
      log.error({ err, key }, 'failed to persist cooldown ledger');
    }
    log.info({ key }, 'alert sent');
    return true;
  } finally {
    ledger.end(key);
  }
}

function field(name: string, value: string, inline = true): EmbedField {
  return { name, value, inline };
}

export function buildSignalAlert(
  asset: string,
  score: number,
  ind: IndicatorSnapshot,
  sentiment: SentimentSnapshot,
  now: Date,
): NotificationMessage {
  const name = displayName(asset);
  const fields = [
    field('Signal Score', `${score.toFixed(2)}/100`),
    field('Current Price', formatUsd(ind.price)),
    field('24h Volume', formatUsd(ind.volume, 0)),
    field('RSI (14)', formatFixed(ind.rsi14)),
    field('EMA20', formatFixed(ind.ema20)),
    field('EMA50', formatFixed(ind.ema50)),
  ];
  if (ind.bollinger) {
    fields.push(
      field('BB Upper', formatFixed(ind.bollinger.upper)),
      field('BB Middle', formatFixed(ind.bollinger.middle)),
      field('BB Lower', formatFixed(ind.bollinger.lower)),
    );
  }
  if (sentiment.fearGreedScore !== null) {
    fields.push(
      field(
        'Fear & Greed',
        `${sentiment.fearGreedScore.toFixed(1)} (${sentiment.fearGreedCategory ?? 'unknown'})`,
      ),
    );
  }
  if (sentiment.publicInterest !== null) {
    fields.push(field('Public Interest', sentiment.publicInterest.toFixed(1)));
  }
  return {
    title: `Signal Alert: ${name}`,
    description: `Strong composite signal for ${name}.`,
    color: ALERT_COLORS.signal,
    fields,
    footer: `Signal alert generated at ${formatUtc(now)}`,
  };
}

export type PriceTargetSide = 'BUY' | 'SELL';

export function buildPriceAlert(
  asset: string,
  price: number,
  side: PriceTargetSide,
  target: number,
  now: Date,
): NotificationMessage {
  const name = displayName(asset);
  return {
    title: `Price Alert: ${name}`,
    description: `**${side} target reached**`,
    color: side === 'BUY' ? ALERT_COLORS.buy : ALERT_COLORS.sell,
    fields: [
      field('Asset', name),
      field('Current Price', formatUsd(price)),
      field(`${side} Target`, formatUsd(target)),
    ],
    footer: `Price alert generated at ${formatUtc(now)}`,
  };
}

export function buildTopAlert(
  asset: string,
  ind: IndicatorSnapshot,
  detection: TopDetection,
  now: Date,
): NotificationMessage {
  const stretch =
    ind.price !== null && ind.ema200 !== null && ind.ema200 > 0
      ? ind.price / ind.ema200
      : null;
  const fields = [
    field('Current Price', formatUsd(ind.price)),
    field('RSI (14)', formatFixed(ind.rsi14)),
    field('200D EMA', formatFixed(ind.ema200)),
    field('Price / EMA200', stretch === null ? NOT_AVAILABLE : `${stretch.toFixed(2)}x`),
    field('Intensity', detection.intensity.toFixed(2)),
  ];
  if (detection.greedConfirmed) {
    fields.push(field('Sentiment', 'Extreme greed confirms the move'));
  }
  fields.push(field('Recommendation', 'Consider taking profits.', false));
  return {
    title: `Top Detection: ${displayName(asset)}`,
    description: '**Potential profit-taking opportunity.** Overbought with a parabolic move.',
    color: ALERT_COLORS.top,
    fields,
    footer: `Top detection alert generated at ${formatUtc(now)}`,
  };
}

export function buildDipBuyAlert(
  asset: string,
  ind: IndicatorSnapshot,
  detection: DipBuyDetection,
  now: Date,
): NotificationMessage {
  const met = Object.entries(detection.conditions)
    .filter(([, held]) => held)
    .map(([name]) => name)
    .join(', ');
  return {
    title: `Dip Buy: ${displayName(asset)}`,
    description: '**Potential buying opportunity.** Healthy retracement detected.',
    color: ALERT_COLORS.dip,
    fields: [
      field('Current Price', formatUsd(ind.price)),
      field('RSI (14)', formatFixed(ind.rsi14)),
      field('EMA20', formatFixed(ind.ema20)),
      field('BB Lower', formatFixed(ind.bollinger?.lower ?? null)),
      field('7D Change', formatSignedPct(ind.change7dPct)),
      field('Conditions', `${detection.conditionsMet}/5: ${met}`, false),
      field('Recommendation', 'Consider accumulating.', false),
    ],
    footer: `Dip buy alert generated at ${formatUtc(now)}`,
  };
}

export function buildProfitTakingAlert(
  asset: string,
  price: number,
  target: ProfitTarget,
  heldQuantity: number,
  now: Date,
): NotificationMessage {
  const sellQuantity = (target.sellPercentage / 100) * heldQuantity;
  const sellValue = sellQuantity * price;
  return {
    title: `Profit-Taking: ${displayName(asset)}`,
    description: '**Target price hit.** Consider taking profits.',
    color: ALERT_COLORS.profitTaking,
    fields: [
      field('Current Price', formatUsd(price)),
      field('Target Price', formatUsd(target.targetPrice)),
      field('Recommendation', `Sell **${target.sellPercentage.toFixed(0)}%** of holdings`),
      field(
        'Estimated Quantity',
        `${sellQuantity.toLocaleString('en-US', { minimumFractionDigits: 4, maximumFractionDigits: 4 })} ${asset.toUpperCase()}`,
      ),
      field('Estimated Value', formatUsd(sellValue)),
    ],
    footer: `Profit-taking alert generated at ${formatUtc(now)}`,
  };
}

export function buildTrailingStopAlert(
  asset: string,
  price: number,
  detection: TrailingStopDetection,
  now: Date,
): NotificationMessage {
  const fields = [field('Current Price', formatUsd(price))];
  if (detection.kind === 'ATH_DROP') {
    fields.push(
      field('Drop from High', `${detection.dropPct.toFixed(2)}%`),
      field('Tracked High', formatUsd(detection.dynamicAth)),
      field('Threshold', `${detection.threshold}%`),
    );
  } else {
    fields.push(
      field('50D EMA', formatUsd(detection.ema50)),
      field('Condition', 'Closed below 50D EMA'),
    );
  }
  fields.push(field('Recommendation', 'Consider re-evaluating the position.', false));
  return {
    title: `Trailing Stop: ${displayName(asset)}`,
    description: '**Potential exit signal.** Trend reversal or significant pullback.',
    color: ALERT_COLORS.trailingStop,
    fields,
    footer: `Trailing stop alert generated at ${formatUtc(now)}`,
  };
}
