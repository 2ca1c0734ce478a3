import type { PriceSeries } from './indicators.types.js';

export interface PriceChange24h {
  price: number;
  change24hPct: number;
}

export interface ReferenceAssetQuote {
  assetId: string;
  price: number | null;
  ath: number | null;
}

export interface MacroSnapshot {
  references: ReferenceAssetQuote[];
  /** First reference asset's share of total market cap, in percent. */
  dominance: number | null;
}

/**
 * Implementations retry on their own and report persistent failure as an
 * empty series or null, never by throwing.
 */
export interface MarketDataProvider {
  getSeries(assetId: string, lookbackDays: number): Promise<PriceSeries>;
  getCurrentPrice(assetId: string): Promise<number | null>;
  /** Provider's historical all-time high, unrelated to the tracked dynamic ATH. */
  getHistoricalAth(assetId: string): Promise<number | null>;
  getPriceChange24h(assetId: string): Promise<PriceChange24h | null>;
  getDominance(referenceAssetId: string): Promise<number | null>;
}
