/**
 * Whole-document writes.
 *
 * Content goes to a temporary sibling first and is renamed over the target,
 * so a failed write never leaves a truncated document behind.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { WriteError } from '../errors/index.js';

/**
 * Write `content` to `filePath`, replacing any existing file.
 *
 * @throws WriteError when the document could not be written completely
 */
export async function writeDocument(filePath: string, content: string): Promise<void> {
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${process.pid}.tmp`);
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      throw new WriteError(tempPath, cleanupErr);
    });
    throw new WriteError(filePath, err);
  }
}

/**
 * Outcome of writing one document in a batch.
 */
export type WriteOutcome =
  | { ok: true; path: string }
  | { ok: false; path: string; error: WriteError };

/**
 * Write a document, capturing a failure instead of throwing.
 */
export async function tryWriteDocument(filePath: string, content: string): Promise<WriteOutcome> {
  try {
    await writeDocument(filePath, content);
    return { ok: true, path: filePath };
  } catch (err) {
    const error = err instanceof WriteError ? err : new WriteError(filePath, err);
    return { ok: false, path: filePath, error };
  }
}
