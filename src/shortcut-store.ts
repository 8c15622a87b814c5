/**
 * Shortcut Store
 *
 * Owns the name -> path map: loading and validating the JSON file,
 * persisting it, and the case-insensitive add/edit/remove primitives.
 *
 * There is no locking between processes. Two invocations that load,
 * mutate and save concurrently race, and the later save wins.
 */

import { config } from './config.js';
import { getConfigFilePath } from './config-locator.js';
import { generateDefaultShortcuts } from './default-shortcuts.js';
import type { HostEnvironment, Result, ShortcutError, ShortcutMap, ShortcutName, ShortcutPath } from './types.js';
import { reportShortcutError, shortcutError, toErrorMessage } from './utils/errors.js';
import { readJsonSafe } from './utils/read-json-safe.js';
import { writeJsonAtomic } from './utils/write-json-atomic.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isValidShortcutName(name: string): boolean {
  return config.shortcutNamePattern.test(name);
}

/**
 * Convert parsed JSON into a ShortcutMap, or list why it can't be one.
 */
export function parseShortcutMap(value: unknown): Result<ShortcutMap, string[]> {
  if (!isRecord(value)) {
    const kind = value === null ? 'null' : Array.isArray(value) ? 'an array' : `a ${typeof value}`;
    return { ok: false, error: [`expected an object of name/path pairs, found ${kind}`] };
  }

  const errors: string[] = [];
  const shortcuts: ShortcutMap = new Map();
  const seen = new Map<string, string>();

  for (const [name, target] of Object.entries(value)) {
    if (!isValidShortcutName(name)) {
      errors.push(`"${name}" is not a valid shortcut name`);
      continue;
    }
    if (typeof target !== 'string' || target.length === 0) {
      errors.push(`"${name}" must map to a non-empty path string`);
      continue;
    }

    const previous = seen.get(name.toLowerCase());
    if (previous !== undefined) {
      errors.push(`"${name}" duplicates "${previous}" (names are case-insensitive)`);
      continue;
    }

    seen.set(name.toLowerCase(), name);
    shortcuts.set(name, target);
  }

  if (errors.length > 0) {
    return { ok: false, error: errors };
  }
  return { ok: true, value: shortcuts };
}

/**
 * Persist the map as a flat JSON object. Returns the file written.
 */
export async function saveShortcuts(
  shortcuts: ShortcutMap,
  host: HostEnvironment
): Promise<Result<string, ShortcutError>> {
  const filePath = await getConfigFilePath(host);

  try {
    await writeJsonAtomic(filePath, Object.fromEntries(shortcuts), config.security.storeFileMode);
  } catch (e) {
    return {
      ok: false,
      error: shortcutError('ConfigWriteError', `Could not save shortcuts to ${filePath}: ${toErrorMessage(e)}`, e),
    };
  }

  return { ok: true, value: filePath };
}

export type StoreLoad =
  | { status: 'loaded' | 'created'; shortcuts: ShortcutMap }
  | { status: 'recovered'; shortcuts: ShortcutMap; error: ShortcutError };

function recovered(error: ShortcutError): StoreLoad {
  return { status: 'recovered', shortcuts: new Map(), error: reportShortcutError(error) };
}

/**
 * Read the store, saying how the map was obtained.
 *
 * - No file yet: generate the defaults, save them and return them (`created`).
 * - Unreadable or malformed file: report it and return an empty map
 *   (`recovered`). The file itself is left alone.
 */
export async function readShortcutStore(host: HostEnvironment): Promise<StoreLoad> {
  const filePath = await getConfigFilePath(host);
  const outcome = await readJsonSafe(filePath);

  switch (outcome.status) {
    case 'missing': {
      const defaults = generateDefaultShortcuts(host);
      const saved = await saveShortcuts(defaults, host);
      if (!saved.ok) {
        reportShortcutError(saved.error);
      }
      return { status: 'created', shortcuts: defaults };
    }

    case 'unreadable':
      return recovered(shortcutError('ConfigUnreadable', outcome.message, outcome.cause));

    case 'corrupted':
      return recovered(shortcutError('ConfigMalformed', outcome.message));

    case 'parsed': {
      const parsed = parseShortcutMap(outcome.value);
      if (!parsed.ok) {
        return recovered(
          shortcutError('ConfigMalformed', `Invalid shortcuts in ${filePath}:\n- ${parsed.error.join('\n- ')}`)
        );
      }
      return { status: 'loaded', shortcuts: parsed.value };
    }
  }
}

/**
 * Load the map from disk. Never rejects for store problems; see readShortcutStore.
 */
export async function loadShortcuts(host: HostEnvironment): Promise<ShortcutMap> {
  const { shortcuts } = await readShortcutStore(host);
  return shortcuts;
}

/**
 * Case-insensitive lookup. Returns the name as stored, or null.
 */
export function findShortcutName(shortcuts: ShortcutMap, name: string): ShortcutName | null {
  const wanted = name.toLowerCase();
  for (const stored of shortcuts.keys()) {
    if (stored.toLowerCase() === wanted) return stored;
  }
  return null;
}

export function addShortcutEntry(
  shortcuts: ShortcutMap,
  name: string,
  target: ShortcutPath
): Result<ShortcutName, ShortcutError> {
  if (!isValidShortcutName(name)) {
    return {
      ok: false,
      error: shortcutError('InvalidName', `"${name}" is not a valid shortcut name (letters, digits, "_" and "-" only)`),
    };
  }

  const existing = findShortcutName(shortcuts, name);
  if (existing !== null) {
    return {
      ok: false,
      error: shortcutError('DuplicateName', `Shortcut "${existing}" already exists: ${shortcuts.get(existing) ?? ''}`),
    };
  }

  shortcuts.set(name, target);
  return { ok: true, value: name };
}

export function editShortcutEntry(
  shortcuts: ShortcutMap,
  name: string,
  target: ShortcutPath
): Result<ShortcutName, ShortcutError> {
  const existing = findShortcutName(shortcuts, name);
  if (existing === null) {
    return { ok: false, error: shortcutError('UnknownName', `Shortcut "${name}" does not exist`) };
  }

  shortcuts.set(existing, target);
  return { ok: true, value: existing };
}

export function removeShortcutEntry(shortcuts: ShortcutMap, name: string): Result<ShortcutName, ShortcutError> {
  const existing = findShortcutName(shortcuts, name);
  if (existing === null) {
    return { ok: false, error: shortcutError('UnknownName', `Shortcut "${name}" does not exist`) };
  }

  shortcuts.delete(existing);
  return { ok: true, value: existing };
}
