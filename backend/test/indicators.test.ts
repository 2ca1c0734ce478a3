import { describe, it, expect } from 'vitest';

import {
  buildIndicatorSnapshot,
  calcBollinger,
  calcEma,
  calcPercentChange,
  calcRsi,
  calcSma,
} from '../src/services/indicators.js';
import type { PriceSeries } from '../src/services/indicators.types.js';

function series(prices: number[], volume = 1_000): PriceSeries {
  return prices.map((price, i) => ({
    timestamp: Date.UTC(2026, 0, 1) + i * 86_400_000,
    price,
    volume: volume + i,
  }));
}

describe('calcRsi', () => {
  it('returns null with fewer than period + 1 samples', () => {
    expect(calcRsi([1, 2, 3], 3)).toBeNull();
    expect(calcRsi(Array.from({ length: 14 }, (_, i) => i + 1))).toBeNull();
  });

  it('smooths gains and losses from a zero seed', () => {
    // gains [0, 1, 0] -> avgGain 0.25; losses [0, 0, 1] -> avgLoss 0.5
    expect(calcRsi([10, 11, 10], 2)).toBeCloseTo(33.3333, 3);
  });

  it('is 100 when there are no losses', () => {
    const rising = Array.from({ length: 30 }, (_, i) => 100 + i);
    expect(calcRsi(rising)).toBe(100);
  });

  it('stays within 0..100 for mixed input', () => {
    const prices = [44, 44.3, 44.1, 43.6, 44.3, 44.8, 45.1, 45.4, 45.8, 46.1, 45.9, 46.2, 45.6, 46.3, 46.3, 46];
    const rsi = calcRsi(prices);
    expect(rsi).not.toBeNull();
    expect(rsi).toBeGreaterThan(0);
    expect(rsi).toBeLessThan(100);
  });
});

describe('calcEma', () => {
  it('is seeded with the first value', () => {
    // alpha 0.5: 1 -> 1.5 -> 2.25
    expect(calcEma([1, 2, 3], 3)).toBeCloseTo(2.25, 10);
  });

  it('returns null when the series is shorter than the window', () => {
    expect(calcEma([1, 2], 3)).toBeNull();
  });

  it('equals the value of a constant series', () => {
    expect(calcEma(Array(50).fill(7), 20)).toBeCloseTo(7, 10);
  });
});

describe('calcBollinger', () => {
  it('uses the sample standard deviation of the last window', () => {
    const bands = calcBollinger([1, 2, 3, 4, 5], 5, 2);
    const width = 2 * Math.sqrt(2.5);
    expect(bands?.middle).toBeCloseTo(3, 10);
    expect(bands?.upper).toBeCloseTo(3 + width, 10);
    expect(bands?.lower).toBeCloseTo(3 - width, 10);
  });

  it('ignores samples before the window', () => {
    const bands = calcBollinger([100, 1, 2, 3, 4, 5], 5, 2);
    expect(bands?.middle).toBeCloseTo(3, 10);
    expect(bands?.upper).toBeCloseTo(3 + 2 * Math.sqrt(2.5), 10);
  });

  it('returns null when too short', () => {
    expect(calcBollinger([1, 2, 3])).toBeNull();
  });
});

describe('calcPercentChange', () => {
  it('compares against the n-th sample counted back from the latest', () => {
    // base = series[len - 7] = 100
    const prices = [90, 100, 101, 102, 103, 104, 105, 110];
    expect(calcPercentChange(prices, 7)).toBeCloseTo(10, 10);
  });

  it('is null when the base is not positive or missing', () => {
    expect(calcPercentChange([0, 1, 2], 3)).toBeNull();
    expect(calcPercentChange([1, 2], 3)).toBeNull();
  });
});

describe('calcSma', () => {
  it('averages the trailing window', () => {
    expect(calcSma([1, 2, 3, 4], 2)).toBe(3.5);
    expect(calcSma([1], 2)).toBeNull();
  });
});

describe('buildIndicatorSnapshot', () => {
  it('yields all-null indicators for an empty series', () => {
    expect(buildIndicatorSnapshot([])).toEqual({
      price: null,
      volume: null,
      rsi14: null,
      ema20: null,
      ema50: null,
      ema200: null,
      bollinger: null,
      change7dPct: null,
      change30dPct: null,
      volumeHistory: [],
    });
  });

  it('leaves long-window indicators absent for short histories', () => {
    const snap = buildIndicatorSnapshot(series(Array.from({ length: 25 }, (_, i) => 10 + i)));
    expect(snap.price).toBe(34);
    expect(snap.volume).toBe(1_024);
    expect(snap.rsi14).toBe(100);
    expect(snap.ema20).not.toBeNull();
    expect(snap.ema50).toBeNull();
    expect(snap.ema200).toBeNull();
    expect(snap.bollinger).not.toBeNull();
    expect(snap.change7dPct).toBeCloseTo(((34 - 28) / 28) * 100, 10);
    expect(snap.change30dPct).toBeNull();
    expect(snap.volumeHistory).toHaveLength(20);
    expect(snap.volumeHistory[19]).toBe(1_024);
  });
});
