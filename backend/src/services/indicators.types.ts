export interface PriceSample {
  /** Unix epoch milliseconds (UTC day boundary for daily samples). */
  timestamp: number;
  price: number;
  volume: number;
}

/** Ascending by timestamp, no duplicate timestamps. */
export type PriceSeries = PriceSample[];

export interface BollingerBands {
  upper: number;
  middle: number;
  lower: number;
}

export interface IndicatorSnapshot {
  price: number | null;
  volume: number | null;
  rsi14: number | null;
  ema20: number | null;
  ema50: number | null;
  ema200: number | null;
  bollinger: BollingerBands | null;
  change7dPct: number | null;
  change30dPct: number | null;
  /** Daily volumes ending with the latest sample; feeds the volume-spike factor. */
  volumeHistory: number[];
}
