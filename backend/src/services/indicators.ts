import type {
  BollingerBands,
  IndicatorSnapshot,
  PriceSeries,
} from './indicators.types.js';

export const RSI_PERIOD = 14;
export const BOLLINGER_PERIOD = 20;
export const BOLLINGER_STD_DEVS = 2;
export const VOLUME_HISTORY_LENGTH = 20;

function sliceMean(arr: number[]): number {
  if (!arr.length) return 0;
  return arr.reduce((sum, value) => sum + value, 0) / arr.length;
}

export function calcSma(series: number[], period: number): number | null {
  if (period <= 0 || series.length < period) return null;
  return sliceMean(series.slice(series.length - period));
}

/**
 * Wilder-style RSI: gains and losses are smoothed with alpha = 1/period
 * (center of mass period - 1), starting from a zero first sample.
 */
export function calcRsi(closes: number[], period = RSI_PERIOD): number | null {
  if (period <= 0 || closes.length < period + 1) return null;
  const alpha = 1 / period;
  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i < closes.length; i++) {
    const diff = closes[i] - closes[i - 1];
    const gain = diff > 0 ? diff : 0;
    const loss = diff < 0 ? -diff : 0;
    avgGain = (1 - alpha) * avgGain + alpha * gain;
    avgLoss = (1 - alpha) * avgLoss + alpha * loss;
  }
  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/** Recursive EMA seeded with the first value, alpha = 2 / (period + 1). */
export function calcEma(series: number[], period: number): number | null {
  if (period <= 0 || series.length < period) return null;
  const alpha = 2 / (period + 1);
  let ema = series[0];
  for (let i = 1; i < series.length; i++) {
    ema = alpha * series[i] + (1 - alpha) * ema;
  }
  return ema;
}

function sampleStddev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = sliceMean(values);
  const sq = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return Math.sqrt(sq / (values.length - 1));
}

export function calcBollinger(
  closes: number[],
  period = BOLLINGER_PERIOD,
  stdDevs = BOLLINGER_STD_DEVS,
): BollingerBands | null {
  if (period <= 0 || closes.length < period) return null;
  const window = closes.slice(closes.length - period);
  const middle = sliceMean(window);
  const std = sampleStddev(window);
  return {
    upper: middle + std * stdDevs,
    middle,
    lower: middle - std * stdDevs,
  };
}

/**
 * Percent change of the latest value against the `periods`-th value counted
 * back from (and including) the latest one.
 */
export function calcPercentChange(
  series: number[],
  periods: number,
): number | null {
  if (periods <= 0 || series.length < periods) return null;
  const base = series[series.length - periods];
  if (!(base > 0)) return null;
  const latest = series[series.length - 1];
  return ((latest - base) / base) * 100;
}

export function buildIndicatorSnapshot(series: PriceSeries): IndicatorSnapshot {
  const closes = series.map((s) => s.price);
  const volumes = series.map((s) => s.volume);
  const last = series[series.length - 1];
  return {
    price: last ? last.price : null,
    volume: last ? last.volume : null,
    rsi14: calcRsi(closes),
    ema20: calcEma(closes, 20),
    ema50: calcEma(closes, 50),
    ema200: calcEma(closes, 200),
    bollinger: calcBollinger(closes),
    change7dPct: calcPercentChange(closes, 7),
    change30dPct: calcPercentChange(closes, 30),
    volumeHistory: volumes.slice(-VOLUME_HISTORY_LENGTH),
  };
}
