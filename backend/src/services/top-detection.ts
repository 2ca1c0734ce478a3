import type { IndicatorSnapshot } from './indicators.types.js';
import type { SentimentSnapshot } from './sentiment.types.js';
import type { TopDetection } from './detectors.types.js';

const RSI_OVERBOUGHT = 80;
const EMA200_STRETCH = 1.5;
const PARABOLIC_7D_PCT = 50;
const PARABOLIC_30D_PCT = 100;
const EXTREME_GREED = 80;

export function detectTop(
  ind: IndicatorSnapshot,
  sentiment: SentimentSnapshot,
): TopDetection {
  const { price, rsi14, ema200, change7dPct, change30dPct } = ind;

  const overbought = rsi14 !== null && rsi14 > RSI_OVERBOUGHT;
  const stretched =
    price !== null &&
    ema200 !== null &&
    ema200 > 0 &&
    price / ema200 >= EMA200_STRETCH;
  if (
    !overbought ||
    !stretched ||
    change7dPct === null ||
    change30dPct === null ||
    change7dPct <= PARABOLIC_7D_PCT ||
    change30dPct <= PARABOLIC_30D_PCT
  ) {
    return { fired: false, intensity: 0, greedConfirmed: false };
  }

  return {
    fired: true,
    intensity: (change7dPct + change30dPct) / 200,
    greedConfirmed:
      sentiment.fearGreedScore !== null &&
      sentiment.fearGreedScore >= EXTREME_GREED,
  };
}
