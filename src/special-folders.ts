/**
 * Special Folder Resolution
 *
 * Resolves Documents, Downloads and friends through the host's
 * indirection store, falling back to a conventional subpath of home.
 */

import { existsSync } from 'fs';
import { pathFor } from './paths.js';
import type { HostEnvironment } from './types.js';
import { reportShortcutError, shortcutError, toErrorMessage } from './utils/errors.js';

/**
 * Expand `%NAME%` references. Windows matches names case-insensitively;
 * unknown names stay as written, as ExpandEnvironmentStrings does.
 */
export function expandEnvironmentVariables(
  value: string,
  vars: Readonly<Record<string, string | undefined>>,
  platform: NodeJS.Platform
): string {
  return value.replace(/%([^%]+)%/g, (reference: string, name: string) => {
    const direct = vars[name];
    if (direct !== undefined) return direct;

    if (platform === 'win32') {
      const wanted = name.toLowerCase();
      for (const [key, candidate] of Object.entries(vars)) {
        if (key.toLowerCase() === wanted && candidate !== undefined) return candidate;
      }
    }

    return reference;
  });
}

function lookupFailed(message: string, cause?: unknown): null {
  reportShortcutError(shortcutError('IndirectionLookupFailed', message, cause));
  return null;
}

function lookupRedirectedFolder(key: string, host: HostEnvironment): string | null {
  if (!host.indirection) return null;

  let raw: string | null;
  try {
    raw = host.indirection.lookup(key);
  } catch (e) {
    return lookupFailed(`Indirection lookup for "${key}" threw: ${toErrorMessage(e)}`, e);
  }
  if (!raw) return null;

  const expanded = expandEnvironmentVariables(raw, host.vars, host.platform);
  if (!pathFor(host.platform).isAbsolute(expanded)) {
    return lookupFailed(`Ignoring "${key}" -> ${expanded}: not an absolute path`);
  }
  if (!existsSync(expanded)) {
    return lookupFailed(`Ignoring "${key}" -> ${expanded}: path does not exist`);
  }

  return expanded;
}

/**
 * Resolve a special folder to an absolute path.
 *
 * Uses the indirection value for `indirectionKey` when it expands to an
 * existing absolute path; otherwise `home/fallbackRelativePath`. A failed
 * lookup is never an error.
 */
export function resolveSpecialFolder(
  indirectionKey: string | undefined,
  fallbackRelativePath: string,
  host: HostEnvironment
): string {
  if (indirectionKey) {
    const redirected = lookupRedirectedFolder(indirectionKey, host);
    if (redirected) return redirected;
  }

  return pathFor(host.platform).join(host.homeDir, fallbackRelativePath);
}
