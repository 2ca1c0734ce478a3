import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { readJsonFile, writeJsonFileAtomic } from '../util/json-file.js';
import type {
  CooldownEntries,
  CooldownLedgerStore,
} from './cooldown-ledger.types.js';

const cooldownEntriesSchema = z.record(z.string().datetime());

export function createFileCooldownLedgerStore(
  path: string,
  log: FastifyBaseLogger,
): CooldownLedgerStore {
  return {
    async load(): Promise<CooldownEntries> {
      try {
        return (await readJsonFile(path, cooldownEntriesSchema)) ?? {};
      } catch (err) {
        log.error({ err, path }, 'cooldown ledger unreadable, starting empty');
        return {};
      }
    },
    async save(entries: CooldownEntries): Promise<void> {
      await writeJsonFileAtomic(path, entries);
    },
  };
}
