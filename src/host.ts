/**
 * Host Environment
 *
 * Snapshot of everything host-dependent the shortcut store reads:
 * platform, home/temp/working directories, environment variables and
 * the special-folder indirection store.
 */

import os from 'node:os';
import { createRegistryIndirection } from './integrations/registry.js';
import type { HostEnvironment } from './types.js';
import { HomeDirectoryUnavailableError } from './utils/errors.js';

function getHomeDirectory(): string {
  let home: string;
  try {
    home = os.homedir();
  } catch (e) {
    throw new HomeDirectoryUnavailableError(e);
  }
  if (!home) {
    throw new HomeDirectoryUnavailableError();
  }
  return home;
}

/**
 * Build the environment for the current process.
 * Throws HomeDirectoryUnavailableError when there is no home directory.
 */
export function getHostEnvironment(): HostEnvironment {
  return {
    platform: process.platform,
    homeDir: getHomeDirectory(),
    tempDir: os.tmpdir(),
    cwd: process.cwd(),
    vars: { ...process.env },
    indirection: createRegistryIndirection(process.platform),
  };
}
