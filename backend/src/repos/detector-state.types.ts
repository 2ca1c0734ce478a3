export type Ema50Position = 'above' | 'below';

export interface DetectorRecord {
  /**
   * Highest price observed since tracking began for this asset. This is a
   * tracked high-water mark, not the provider's historical all-time high.
   */
  dynamicAth: number | null;
  /** Last known relation of price to EMA50. */
  ema50Position: Ema50Position | null;
}

/** Keyed by asset id. */
export type DetectorStateMap = Record<string, DetectorRecord>;

export interface DetectorStateStore {
  load(): Promise<DetectorStateMap>;
  save(state: DetectorStateMap): Promise<void>;
}
