import type { IndicatorSnapshot } from './indicators.types.js';
import type { SentimentSnapshot } from './sentiment.types.js';
import type { DipBuyConditions, DipBuyDetection } from './detectors.types.js';

export const DIP_BUY_MIN_CONDITIONS = 3;

function withinPct(value: number, reference: number, pct: number): boolean {
  return value >= reference * (1 - pct) && value <= reference * (1 + pct);
}

export function evaluateDipConditions(
  ind: IndicatorSnapshot,
  sentiment: SentimentSnapshot,
): DipBuyConditions {
  const { price, rsi14, ema20, ema50, bollinger, change7dPct } = ind;
  const fgi = sentiment.fearGreedScore;

  let nearEmas = false;
  if (price !== null && ema20 !== null && ema50 !== null) {
    nearEmas =
      withinPct(price, ema20, 0.05) ||
      withinPct(price, ema50, 0.05) ||
      (price < ema20 && price < ema50);
  }

  const lower = bollinger?.lower ?? null;

  return {
    rsiOversold: rsi14 !== null && rsi14 < 40,
    nearEmas,
    nearLowerBand:
      price !== null && lower !== null && lower > 0 && price <= lower * 1.02,
    recentDip: change7dPct !== null && change7dPct < 0 && change7dPct > -20,
    fearful: fgi !== null && fgi <= 40,
  };
}

/** Fires when at least three of the five dip conditions hold. */
export function detectDipBuy(
  ind: IndicatorSnapshot,
  sentiment: SentimentSnapshot,
): DipBuyDetection {
  const conditions = evaluateDipConditions(ind, sentiment);
  const conditionsMet = Object.values(conditions).filter(Boolean).length;
  return {
    fired: conditionsMet >= DIP_BUY_MIN_CONDITIONS,
    conditionsMet,
    conditions,
  };
}
