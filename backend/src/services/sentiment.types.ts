export interface FearGreedIndex {
  score: number | null;
  category: string | null;
}

export interface SentimentSnapshot {
  fearGreedScore: number | null;
  fearGreedCategory: string | null;
  publicInterest: number | null;
}

export interface SentimentProvider {
  /** Market-wide; shared by every asset in a cycle. */
  getFearGreed(): Promise<FearGreedIndex>;
  getPublicInterest(keyword: string): Promise<number | null>;
}
