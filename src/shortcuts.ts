/**
 * Shortcuts API
 *
 * The operations the CLI (or a shell profile) calls. Every failure comes
 * back as a Result and is reported once, at the severity configured for
 * its type; none of these reject for store or lookup problems.
 */

import { existsSync } from 'fs';
import { stat } from 'fs/promises';
import { generateDefaultShortcuts } from './default-shortcuts.js';
import { getHostEnvironment } from './host.js';
import { pathFor } from './paths.js';
import {
  addShortcutEntry,
  editShortcutEntry,
  findShortcutName,
  isValidShortcutName,
  loadShortcuts,
  readShortcutStore,
  removeShortcutEntry,
  saveShortcuts,
} from './shortcut-store.js';
import type { HostEnvironment, Result, ShortcutError, ShortcutMap, ShortcutName, ShortcutPath } from './types.js';
import { reportShortcutError, shortcutError, toErrorMessage } from './utils/errors.js';

export type ShortcutResult<T> = Result<T, ShortcutError>;

function fail(error: ShortcutError): { ok: false; error: ShortcutError } {
  return { ok: false, error: reportShortcutError(error) };
}

/**
 * Turn user input into an absolute path: `~` expands to home, relative
 * paths resolve against the host's working directory. The target must exist.
 */
export async function resolveTargetPath(input: string, host: HostEnvironment): Promise<ShortcutResult<ShortcutPath>> {
  const p = pathFor(host.platform);
  const trimmed = input.trim();

  if (!trimmed) {
    return { ok: false, error: shortcutError('InvalidPath', 'A path is required') };
  }

  const expanded = /^~(?=$|[\\/])/.test(trimmed) ? p.join(host.homeDir, trimmed.slice(1)) : trimmed;
  const absolute = p.resolve(host.cwd, expanded);

  try {
    await stat(absolute);
  } catch (e) {
    return {
      ok: false,
      error: shortcutError('InvalidPath', `Path "${input}" does not exist (${toErrorMessage(e)})`, e),
    };
  }

  return { ok: true, value: absolute };
}

/**
 * Load for modification. A recovered (empty) map is never saved back,
 * so a damaged file stays on disk until it is fixed or reset.
 */
async function loadForUpdate(host: HostEnvironment): Promise<ShortcutResult<ShortcutMap>> {
  const store = await readShortcutStore(host);
  if (store.status === 'recovered') {
    // Already reported by the store
    return { ok: false, error: store.error };
  }
  return { ok: true, value: store.shortcuts };
}

async function persist(shortcuts: ShortcutMap, host: HostEnvironment): Promise<ShortcutResult<ShortcutMap>> {
  const saved = await saveShortcuts(shortcuts, host);
  if (!saved.ok) {
    return fail(saved.error);
  }
  return { ok: true, value: shortcuts };
}

/**
 * Current shortcuts, creating the defaults on first use.
 */
export async function getShortcuts(host: HostEnvironment = getHostEnvironment()): Promise<ShortcutMap> {
  return loadShortcuts(host);
}

/**
 * Regenerate the defaults and overwrite the store unconditionally.
 * Returns the new map only when `passThru` is set.
 */
export async function createDefaults(
  options: { passThru?: boolean } = {},
  host: HostEnvironment = getHostEnvironment()
): Promise<ShortcutMap | null> {
  const defaults = generateDefaultShortcuts(host);
  const saved = await saveShortcuts(defaults, host);

  if (saved.ok) {
    console.log(`Created ${defaults.size} default shortcuts in ${saved.value}`);
  } else {
    reportShortcutError(saved.error);
  }

  return options.passThru ? defaults : null;
}

export async function addShortcut(
  name: string,
  target: string,
  host: HostEnvironment = getHostEnvironment()
): Promise<ShortcutResult<ShortcutMap>> {
  if (!isValidShortcutName(name)) {
    return fail(
      shortcutError('InvalidName', `"${name}" is not a valid shortcut name (letters, digits, "_" and "-" only)`)
    );
  }

  const resolved = await resolveTargetPath(target, host);
  if (!resolved.ok) return fail(resolved.error);

  const loaded = await loadForUpdate(host);
  if (!loaded.ok) return loaded;

  const shortcuts = loaded.value;
  const added = addShortcutEntry(shortcuts, name, resolved.value);
  if (!added.ok) return fail(added.error);

  return persist(shortcuts, host);
}

export async function editShortcut(
  name: string,
  target: string,
  host: HostEnvironment = getHostEnvironment()
): Promise<ShortcutResult<ShortcutMap>> {
  const resolved = await resolveTargetPath(target, host);
  if (!resolved.ok) return fail(resolved.error);

  const loaded = await loadForUpdate(host);
  if (!loaded.ok) return loaded;

  const shortcuts = loaded.value;
  const edited = editShortcutEntry(shortcuts, name, resolved.value);
  if (!edited.ok) return fail(edited.error);

  return persist(shortcuts, host);
}

export async function removeShortcut(
  name: string,
  host: HostEnvironment = getHostEnvironment()
): Promise<ShortcutResult<ShortcutMap>> {
  const loaded = await loadForUpdate(host);
  if (!loaded.ok) return loaded;

  const shortcuts = loaded.value;
  const removed = removeShortcutEntry(shortcuts, name);
  if (!removed.ok) return fail(removed.error);

  return persist(shortcuts, host);
}

/**
 * Path to change into for `name`. Never modifies existing entries; on
 * first use the load still writes the defaults.
 */
export async function navigateTo(
  name: ShortcutName,
  host: HostEnvironment = getHostEnvironment()
): Promise<ShortcutResult<ShortcutPath>> {
  const shortcuts = await loadShortcuts(host);
  const stored = findShortcutName(shortcuts, name);
  const target = stored === null ? undefined : shortcuts.get(stored);

  if (stored === null || target === undefined) {
    return fail(shortcutError('UnknownShortcut', `Shortcut "${name}" does not exist`));
  }
  if (!existsSync(target)) {
    return fail(shortcutError('TargetMissing', `Shortcut "${stored}" points to ${target}, which no longer exists`));
  }

  return { ok: true, value: target };
}
