export interface HoldingPerformance {
  assetId: string;
  quantity: number;
  price: number;
  value: number;
  change24hPct: number;
}

export interface PortfolioSummary {
  totalValue: number;
  /** Value-weighted average of the holdings' 24h changes. */
  totalChange24hPct: number;
  holdings: HoldingPerformance[];
}

export interface PortfolioAlertThresholds {
  totalPortfolioPercentChange?: number | null;
  individualAssetPercentChange?: number | null;
}
