import { appendFile, mkdir, open, readFile, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { isMissingFileError } from '../util/json-file.js';
import type { SignalLogEntry } from './signal-log.types.js';

const nullableNumber = z.number().nullable();

const signalLogEntrySchema = z.object({
  timestamp: z.string(),
  asset: z.string(),
  score: z.number(),
  price: nullableNumber,
  rsi14: nullableNumber,
  ema20: nullableNumber,
  ema50: nullableNumber,
  ema200: nullableNumber,
  change7dPct: nullableNumber,
  change30dPct: nullableNumber,
  fearGreed: nullableNumber,
  publicInterest: nullableNumber,
  dominance: nullableNumber,
  contributions: z.object({
    rsi: z.number(),
    emaCrossover: z.number(),
    emaPricePosition: z.number(),
    bollingerBands: z.number(),
    volumeSpike: z.number(),
    fearGreed: z.number(),
    publicInterest: z.number(),
    referenceAthProximity: z.number(),
    dominance: z.number(),
  }),
  topFired: z.boolean(),
  dipBuyFired: z.boolean(),
  alerts: z.array(z.string()),
});

async function endsWithNewline(path: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    if (isMissingFileError(err)) return true;
    throw err;
  }
  try {
    const { size } = await handle.stat();
    if (size === 0) return true;
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] === 0x0a;
  } finally {
    await handle.close();
  }
}

/**
 * Appends one JSON line; earlier lines are never rewritten. A torn last line
 * is terminated first so the new record starts on its own line.
 */
export async function appendSignalLog(
  path: string,
  entry: SignalLogEntry,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const prefix = (await endsWithNewline(path)) ? '' : '\n';
  await appendFile(path, `${prefix}${JSON.stringify(entry)}\n`, 'utf8');
}

/** Newest first. Lines that fail to parse are skipped. */
export async function readSignalLog(
  path: string,
  limit: number,
  log: FastifyBaseLogger,
): Promise<SignalLogEntry[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFileError(err)) return [];
    throw err;
  }

  const entries: SignalLogEntry[] = [];
  let skipped = 0;
  const lines = raw.split('\n');
  for (let i = lines.length - 1; i >= 0 && entries.length < limit; i--) {
    const line = lines[i].trim();
    if (!line) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      skipped++;
      continue;
    }
    const result = signalLogEntrySchema.safeParse(parsed);
    if (result.success) entries.push(result.data);
    else skipped++;
  }
  if (skipped) log.warn({ path, skipped }, 'skipped corrupt signal log lines');
  return entries;
}
