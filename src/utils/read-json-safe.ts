/**
 * Safe JSON File Reading
 *
 * Reads a JSON file and reports which of the four outcomes happened,
 * so callers can tell "never written" apart from "written but unusable".
 */

import { readFile } from 'fs/promises';
import { isNotFoundError, toErrorMessage } from './errors.js';

export type JsonReadOutcome =
  | { status: 'missing' }
  | { status: 'parsed'; value: unknown }
  | { status: 'unreadable'; message: string; cause: unknown }
  | { status: 'corrupted'; message: string };

/**
 * Read and parse a JSON file without throwing.
 *
 * - File doesn't exist: `missing`
 * - File exists but can't be read (permissions, is a directory): `unreadable`
 * - File is empty or invalid JSON: `corrupted`
 * - Otherwise: `parsed`, with the value left unvalidated
 */
export async function readJsonSafe(filepath: string): Promise<JsonReadOutcome> {
  let data: string;
  try {
    data = await readFile(filepath, 'utf-8');
  } catch (e) {
    if (isNotFoundError(e)) {
      return { status: 'missing' };
    }
    return { status: 'unreadable', message: `Could not read ${filepath}: ${toErrorMessage(e)}`, cause: e };
  }

  // A BOM is legal in files written by Windows PowerShell
  const text = data.replace(/^\uFEFF/, '');

  if (!text.trim()) {
    return { status: 'corrupted', message: `Corrupted JSON file (empty): ${filepath}` };
  }

  try {
    const value: unknown = JSON.parse(text);
    return { status: 'parsed', value };
  } catch (parseError) {
    return { status: 'corrupted', message: `Corrupted JSON file: ${filepath} - ${toErrorMessage(parseError)}` };
  }
}
