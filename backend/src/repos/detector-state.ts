import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { readJsonFile, writeJsonFileAtomic } from '../util/json-file.js';
import type {
  DetectorStateMap,
  DetectorStateStore,
} from './detector-state.types.js';

const detectorRecordSchema = z.object({
  dynamicAth: z.number().nullable(),
  ema50Position: z.enum(['above', 'below']).nullable(),
});

const detectorStateSchema = z.record(detectorRecordSchema);

export function createFileDetectorStateStore(
  path: string,
  log: FastifyBaseLogger,
): DetectorStateStore {
  return {
    async load(): Promise<DetectorStateMap> {
      try {
        return (await readJsonFile(path, detectorStateSchema)) ?? {};
      } catch (err) {
        log.error({ err, path }, 'detector state unreadable, starting empty');
        return {};
      }
    },
    async save(state: DetectorStateMap): Promise<void> {
      await writeJsonFileAtomic(path, state);
    },
  };
}
