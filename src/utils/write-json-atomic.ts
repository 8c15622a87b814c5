/**
 * Atomic JSON File Writing
 *
 * The store is replaced by renaming a finished temp file over it, so a
 * reader sees either the old map or the new one.
 */

import { chmod, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { isNotFoundError, toErrorMessage } from './errors.js';

/**
 * 2-space indented, newline-terminated.
 */
function formatJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Hidden sibling of the target. Rename is only atomic within one filesystem.
 */
function tempPathFor(filepath: string): string {
  return path.join(path.dirname(filepath), `.${path.basename(filepath)}.${process.pid}.${Date.now()}.tmp`);
}

async function discardTempFile(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (e) {
    if (!isNotFoundError(e)) {
      console.warn(`Warning: Could not remove temp file ${tempPath}: ${toErrorMessage(e)}`);
    }
  }
}

/**
 * Write `data` to `filepath` atomically with the given file mode.
 * The parent directory must already exist.
 */
export async function writeJsonAtomic(filepath: string, data: unknown, mode: number): Promise<void> {
  const content = formatJson(data);
  const tempPath = tempPathFor(filepath);

  try {
    await writeFile(tempPath, content, { encoding: 'utf-8', mode });
    // writeFile's mode is filtered by the umask
    await chmod(tempPath, mode);
    await rename(tempPath, filepath);
  } catch (e) {
    await discardTempFile(tempPath);
    throw e;
  }
}
