import type { ScoringFactor } from '../services/signal-scoring.types.js';

export interface SignalLogEntry {
  /** ISO-8601 UTC */
  timestamp: string;
  asset: string;
  score: number;
  price: number | null;
  rsi14: number | null;
  ema20: number | null;
  ema50: number | null;
  ema200: number | null;
  change7dPct: number | null;
  change30dPct: number | null;
  fearGreed: number | null;
  publicInterest: number | null;
  dominance: number | null;
  contributions: Record<ScoringFactor, number>;
  topFired: boolean;
  dipBuyFired: boolean;
  /** Keys of the alerts actually dispatched for this asset in the cycle. */
  alerts: string[];
}
