/**
 * Config File Location
 *
 * The store lives at <documents>/PowerShell/LocationShortcuts.json. Folder
 * redirection is honoured only when it points into OneDrive.
 */

import { mkdir } from 'fs/promises';
import { config } from './config.js';
import { pathFor } from './paths.js';
import { resolveSpecialFolder } from './special-folders.js';
import type { HostEnvironment } from './types.js';
import { reportShortcutError, shortcutError, toErrorMessage } from './utils/errors.js';

export interface ConfigBaseDir {
  baseDir: string;
  /** Documents path as resolved through the indirection store */
  documentsDir: string;
  redirected: boolean;
}

export function isCloudRedirected(documentsDir: string): boolean {
  return config.cloudRedirectPattern.test(documentsDir);
}

/**
 * Pick the directory the store file goes under. Any non-OneDrive
 * redirection is ignored in favour of home/Documents.
 */
export function resolveConfigBaseDir(host: HostEnvironment): ConfigBaseDir {
  const documentsDir = resolveSpecialFolder(config.folderKeys.documents, 'Documents', host);

  if (isCloudRedirected(documentsDir)) {
    return { baseDir: documentsDir, documentsDir, redirected: true };
  }

  return {
    baseDir: pathFor(host.platform).join(host.homeDir, 'Documents'),
    documentsDir,
    redirected: false,
  };
}

/**
 * Absolute path of the store file. Recomputed on every call; creates the
 * containing directory, warning (not failing) when that is impossible.
 */
export async function getConfigFilePath(host: HostEnvironment): Promise<string> {
  const p = pathFor(host.platform);
  const { baseDir } = resolveConfigBaseDir(host);
  const dir = p.join(baseDir, config.storeDirectory);
  const filePath = p.join(dir, config.storeFileName);

  try {
    await mkdir(dir, { recursive: true });
  } catch (e) {
    reportShortcutError(shortcutError('ConfigDirCreateFailed', `Could not create ${dir}: ${toErrorMessage(e)}`, e));
  }

  return filePath;
}
