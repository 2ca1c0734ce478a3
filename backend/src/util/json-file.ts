import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads and validates a JSON document. Resolves to null when the file does
 * not exist; throws when it exists but is not valid JSON for `schema`.
 */
export async function readJsonFile<T extends z.ZodTypeAny>(
  path: string,
  schema: T,
): Promise<z.infer<T> | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `invalid contents in ${path}: ${result.error.issues
        .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}

async function replaceFile(path: string, body: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${randomUUID()}.tmp`;
  await writeFile(tmp, body, 'utf8');
  try {
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

/** Tail of the write queue per target path. */
const pendingWrites = new Map<string, Promise<void>>();

/**
 * Whole-document replace through a sibling temp file and a rename. Writes to
 * the same path run one at a time in call order, so the last call wins. The
 * document is serialized when called, not when its turn comes.
 */
export function writeJsonFileAtomic(path: string, data: unknown): Promise<void> {
  const body = `${JSON.stringify(data, null, 2)}\n`;
  const previous = pendingWrites.get(path) ?? Promise.resolve();
  const run = async () => {
    try {
      await replaceFile(path, body);
    } finally {
      if (pendingWrites.get(path) === current) pendingWrites.delete(path);
    }
  };
  // a failed earlier write must not block the ones queued behind it
  const current = previous.then(run, run);
  pendingWrites.set(path, current);
  return current;
}
