import type { DetectorRecord } from '../repos/detector-state.types.js';

export interface TopDetection {
  fired: boolean;
  /** (7d% + 30d%) / 200 when fired, otherwise 0. */
  intensity: number;
  /** Extreme greed alongside the top; informational only. */
  greedConfirmed: boolean;
}

export interface DipBuyConditions {
  rsiOversold: boolean;
  nearEmas: boolean;
  nearLowerBand: boolean;
  recentDip: boolean;
  fearful: boolean;
}

export interface DipBuyDetection {
  fired: boolean;
  conditionsMet: number;
  conditions: DipBuyConditions;
}

export type TrailingStopDetection =
  | { kind: 'ATH_DROP'; dropPct: number; dynamicAth: number; threshold: number }
  | { kind: 'CLOSE_BELOW_EMA50'; ema50: number };

export interface TrailingStopInput {
  price: number | null;
  ema50: number | null;
}

export interface TrailingStopResult {
  detections: TrailingStopDetection[];
  state: DetectorRecord;
}
