import { describe, expect, it } from 'vitest';

import {
  buildDipBuyAlert,
  buildPriceAlert,
  buildProfitTakingAlert,
  buildSignalAlert,
  buildTopAlert,
  buildTrailingStopAlert,
} from '../src/services/alerts.js';
import { displayName, formatSignedPct, formatUsd } from '../src/util/format.js';
import { indicators, sentiment } from './helpers.js';

const now = new Date('2026-03-01T06:00:00Z');

describe('formatting', () => {
  it('renders asset names and numbers for embeds', () => {
    expect(displayName('sei-network')).toBe('Sei Network');
    expect(formatUsd(1234.5)).toBe('$1,234.50');
    expect(formatUsd(null)).toBe('N/A');
    expect(formatSignedPct(3)).toBe('+3.00%');
    expect(formatSignedPct(-0.5)).toBe('-0.50%');
  });
});

describe('alert messages', () => {
  it('recommends a share of the holding at a profit target', () => {
    const message = buildProfitTakingAlert(
      'solana',
      300,
      { targetPrice: 280, sellPercentage: 25 },
      10,
      now,
    );
    expect(message.color).toBe(16744448);
    expect(message.fields).toEqual([
      { name: 'Current Price', value: '$300.00', inline: true },
      { name: 'Target Price', value: '$280.00', inline: true },
      { name: 'Recommendation', value: 'Sell **25%** of holdings', inline: true },
      { name: 'Estimated Quantity', value: '2.5000 SOLANA', inline: true },
      { name: 'Estimated Value', value: '$750.00', inline: true },
    ]);
    expect(message.footer).toBe('Profit-taking alert generated at 2026-03-01 06:00:00 UTC');
  });

  it('colors price alerts by side', () => {
    const buy = buildPriceAlert('sui', 2.4, 'BUY', 2.5, now);
    expect(buy.color).toBe(3447003);
    expect(buy.description).toBe('**BUY target reached**');
    expect(buy.fields[2]).toEqual({ name: 'BUY Target', value: '$2.50', inline: true });
    expect(buildPriceAlert('sui', 5, 'SELL', 4.5, now).color).toBe(15158332);
  });

  it('describes each trailing-stop kind', () => {
    const drop = buildTrailingStopAlert(
      'solana',
      200,
      { kind: 'ATH_DROP', dropPct: 25.5, dynamicAth: 270, threshold: 25 },
      now,
    );
    expect(drop.fields.map((f) => f.value)).toEqual([
      '$200.00',
      '25.50%',
      '$270.00',
      '25%',
      'Consider re-evaluating the position.',
    ]);
    const cross = buildTrailingStopAlert('solana', 95, { kind: 'CLOSE_BELOW_EMA50', ema50: 100 }, now);
    expect(cross.fields[2]).toEqual({ name: 'Condition', value: 'Closed below 50D EMA', inline: true });
    expect(cross.color).toBe(10038562);
  });

  it('includes bands and sentiment in signal alerts when present', () => {
    const message = buildSignalAlert(
      'chainlink',
      82.5,
      indicators({ price: 20, bollinger: { upper: 22, middle: 20, lower: 18 } }),
      sentiment({ fearGreedScore: 15, fearGreedCategory: 'Extreme Fear' }),
      now,
    );
    expect(message.title).toBe('Signal Alert: Chainlink');
    expect(message.fields.map((f) => f.name)).toEqual([
      'Signal Score',
      'Current Price',
      '24h Volume',
      'RSI (14)',
      'EMA20',
      'EMA50',
      'BB Upper',
      'BB Middle',
      'BB Lower',
      'Fear & Greed',
    ]);
    expect(message.fields[0].value).toBe('82.50/100');
    expect(message.fields[9].value).toBe('15.0 (Extreme Fear)');
  });

  it('notes greed confirmation on top alerts and met conditions on dip alerts', () => {
    const top = buildTopAlert(
      'solana',
      indicators({ price: 250, rsi14: 88, ema200: 100 }),
      { fired: true, intensity: 0.9, greedConfirmed: true },
      now,
    );
    expect(top.fields.find((f) => f.name === 'Price / EMA200')?.value).toBe('2.50x');
    expect(top.fields.some((f) => f.name === 'Sentiment')).toBe(true);

    const dip = buildDipBuyAlert(
      'sui',
      indicators({ price: 2 }),
      {
        fired: true,
        conditionsMet: 3,
        conditions: {
          rsiOversold: true,
          nearEmas: false,
          nearLowerBand: true,
          recentDip: false,
          fearful: true,
        },
      },
      now,
    );
    expect(dip.fields.find((f) => f.name === 'Conditions')?.value).toBe(
      '3/5: rsiOversold, nearLowerBand, fearful',
    );
  });
});
