/** Alert key to ISO timestamp of its last successful dispatch. */
export type CooldownEntries = Record<string, string>;

export interface CooldownLedgerStore {
  load(): Promise<CooldownEntries>;
  save(entries: CooldownEntries): Promise<void>;
}
