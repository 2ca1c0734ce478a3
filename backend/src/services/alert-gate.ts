import type { CooldownEntries } from '../repos/cooldown-ledger.types.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Key builders. Every category owns its own prefix so key spaces never
 * overlap; per-target and per-threshold alerts carry their identifier so they
 * cool down independently.
 */
export const alertKeys = {
  signal: (asset: string) => `signal:${asset}`,
  price: (asset: string) => `price:${asset}`,
  top: (asset: string) => `top:${asset}`,
  dip: (asset: string) => `dip:${asset}`,
  profitTaking: (asset: string, targetPrice: number) =>
    `profit:${asset}:${targetPrice}`,
  athDrop: (asset: string, threshold: number) =>
    `trailing:${asset}:ATH_DROP:${threshold}`,
  ema50Cross: (asset: string) => `trailing:${asset}:CLOSE_BELOW_EMA50`,
  portfolio: () => 'portfolio',
  dailySummary: () => 'summary:daily',
};

/**
 * Last-fired ledger. `tryFire` only answers whether a key may fire; the
 * dispatcher calls `record` after a confirmed send.
 */
export class CooldownLedger {
  private readonly lastFired = new Map<string, number>();
  private readonly inFlight = new Set<string>();

  constructor(entries: CooldownEntries = {}) {
    for (const [key, iso] of Object.entries(entries)) {
      const ts = Date.parse(iso);
      if (Number.isFinite(ts)) this.lastFired.set(key, ts);
    }
  }

  tryFire(key: string, now: Date, minIntervalHours: number): boolean {
    const last = this.lastFired.get(key);
    if (last === undefined) return true;
    return now.getTime() - last >= minIntervalHours * HOUR_MS;
  }

  lastFiredAt(key: string): Date | null {
    const last = this.lastFired.get(key);
    return last === undefined ? null : new Date(last);
  }

  record(key: string, at: Date): void {
    this.lastFired.set(key, at.getTime());
  }

  /** Marks a key as being dispatched; false if a dispatch is already running. */
  begin(key: string): boolean {
    if (this.inFlight.has(key)) return false;
    this.inFlight.add(key);
    return true;
  }

  end(key: string): void {
    this.inFlight.delete(key);
  }

  toEntries(): CooldownEntries {
    const entries: CooldownEntries = {};
    for (const [key, ts] of this.lastFired) {
      entries[key] = new Date(ts).toISOString();
    }
    return entries;
  }
}
