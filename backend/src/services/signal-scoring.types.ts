import type { ScoringWeights } from '../util/agent-config.js';

export type ScoringFactor = keyof ScoringWeights;

export interface ScoreOptions {
  volumeSpikeMultiplier: number;
  /** Absolute volume bonus threshold used when no volume history is available. */
  volumeFallbackThreshold: number;
}

export interface ScoreBreakdown {
  score: number;
  contributions: Record<ScoringFactor, number>;
}
