import type { ScoringWeights } from '../util/agent-config.js';
import { VOLUME_HISTORY_LENGTH } from './indicators.js';
import type { IndicatorSnapshot } from './indicators.types.js';
import type { MacroSnapshot } from './market-data.types.js';
import type { SentimentSnapshot } from './sentiment.types.js';
import type {
  ScoreBreakdown,
  ScoreOptions,
  ScoringFactor,
} from './signal-scoring.types.js';

export const NEUTRAL_SCORE = 50;

export const DEFAULT_SCORE_OPTIONS: ScoreOptions = {
  volumeSpikeMultiplier: 1.5,
  volumeFallbackThreshold: 1_000_000_000,
};

export const SCORING_FACTORS: readonly ScoringFactor[] = [
  'rsi',
  'emaCrossover',
  'emaPricePosition',
  'bollingerBands',
  'volumeSpike',
  'fearGreed',
  'publicInterest',
  'referenceAthProximity',
  'dominance',
];

const RSI_MAX_POINTS = 15;
const BAND_EDGE_FRACTION = 0.1;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function rsiPoints(rsi: number | null): number {
  if (rsi === null) return 0;
  return clamp((50 - rsi) * 0.5, -RSI_MAX_POINTS, RSI_MAX_POINTS);
}

function crossoverPoints(ind: IndicatorSnapshot): number {
  if (ind.ema20 === null || ind.ema50 === null) return 0;
  if (ind.ema20 > ind.ema50) return 15;
  if (ind.ema20 < ind.ema50) return -15;
  return 0;
}

function pricePositionPoints(ind: IndicatorSnapshot): number {
  const { price, ema20, ema50 } = ind;
  if (price === null || ema20 === null || ema50 === null) return 0;
  if (price > ema20 && price > ema50) return 10;
  if (price < ema20 && price < ema50) return -10;
  return 0;
}

function bollingerPoints(ind: IndicatorSnapshot): number {
  const { price, bollinger } = ind;
  if (price === null || bollinger === null) return 0;
  const range = bollinger.upper - bollinger.lower;
  if (!(range > 0)) return 0;
  if ((price - bollinger.lower) / range < BAND_EDGE_FRACTION) return 15;
  if ((bollinger.upper - price) / range < BAND_EDGE_FRACTION) return -15;
  return 0;
}

function volumePoints(ind: IndicatorSnapshot, opts: ScoreOptions): number {
  const { volume, volumeHistory } = ind;
  if (volume === null) return 0;
  if (volumeHistory.length) {
    const recent = volumeHistory.slice(-VOLUME_HISTORY_LENGTH);
    const avg = recent.reduce((sum, v) => sum + v, 0) / recent.length;
    if (avg > 0 && volume > avg * opts.volumeSpikeMultiplier) return 10;
    return 0;
  }
  return volume > opts.volumeFallbackThreshold ? 5 : 0;
}

function fearGreedPoints(score: number | null): number {
  if (score === null) return 0;
  if (score <= 20) return 15;
  if (score <= 40) return 5;
  if (score >= 80) return -15;
  if (score >= 60) return -5;
  return 0;
}

function publicInterestPoints(interest: number | null): number {
  if (interest === null) return 0;
  if (interest >= 70) return 10;
  if (interest >= 50) return 5;
  if (interest <= 30) return -5;
  return 0;
}

function athProximityPoints(macro: MacroSnapshot): number {
  let points = 0;
  for (const ref of macro.references) {
    if (ref.price === null || ref.ath === null || !(ref.ath > 0)) continue;
    const proximity = (ref.price / ref.ath) * 100;
    if (proximity >= 98) points += 10;
    else if (proximity >= 90) points += 5;
  }
  return points;
}

function dominancePoints(dominance: number | null): number {
  if (dominance === null) return 0;
  if (dominance < 50) return 10;
  if (dominance > 60) return -10;
  return 0;
}

/**
 * Weighted composite in [0, 100]; 50 is neutral. Each factor contributes
 * `points * weight` and is skipped (0) when its inputs are missing.
 */
export function scoreSignalDetailed(
  indicators: IndicatorSnapshot,
  sentiment: SentimentSnapshot,
  macro: MacroSnapshot,
  weights: ScoringWeights,
  options: ScoreOptions = DEFAULT_SCORE_OPTIONS,
): ScoreBreakdown {
  const points: Record<ScoringFactor, number> = {
    rsi: rsiPoints(indicators.rsi14),
    emaCrossover: crossoverPoints(indicators),
    emaPricePosition: pricePositionPoints(indicators),
    bollingerBands: bollingerPoints(indicators),
    volumeSpike: volumePoints(indicators, options),
    fearGreed: fearGreedPoints(sentiment.fearGreedScore),
    publicInterest: publicInterestPoints(sentiment.publicInterest),
    referenceAthProximity: athProximityPoints(macro),
    dominance: dominancePoints(macro.dominance),
  };

  const contributions: Record<ScoringFactor, number> = { ...points };
  let score = NEUTRAL_SCORE;
  for (const factor of SCORING_FACTORS) {
    contributions[factor] = points[factor] * weights[factor];
    score += contributions[factor];
  }

  return { score: clamp(score, 0, 100), contributions };
}

export function scoreSignal(
  indicators: IndicatorSnapshot,
  sentiment: SentimentSnapshot,
  macro: MacroSnapshot,
  weights: ScoringWeights,
  options: ScoreOptions = DEFAULT_SCORE_OPTIONS,
): number {
  return scoreSignalDetailed(indicators, sentiment, macro, weights, options)
    .score;
}
