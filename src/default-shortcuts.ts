/**
 * Default Shortcuts
 *
 * Catalogue of user and system folders offered on first run. Only
 * candidates whose target exists on this host make it into the map.
 */

import { existsSync } from 'fs';
import { config } from './config.js';
import { pathFor } from './paths.js';
import { resolveSpecialFolder } from './special-folders.js';
import type { HostEnvironment, ShortcutMap, SpecialFolderCandidate, StaticFolderCandidate } from './types.js';

export const FOLDER_CANDIDATES: readonly SpecialFolderCandidate[] = [
  { name: 'Downloads', indirectionKey: config.folderKeys.downloads, fallback: 'Downloads' },
  { name: 'Documents', indirectionKey: config.folderKeys.documents, fallback: 'Documents' },
  { name: 'Pictures', indirectionKey: config.folderKeys.pictures, fallback: 'Pictures' },
  { name: 'Music', indirectionKey: config.folderKeys.music, fallback: 'Music' },
  { name: 'Videos', indirectionKey: config.folderKeys.videos, fallback: 'Videos' },
  { name: 'Scripts', fallback: 'Scripts' },
  { name: 'Projects', fallback: 'Projects' },
];

function isWindows(host: HostEnvironment): boolean {
  return host.platform === 'win32';
}

function systemDrive(host: HostEnvironment): string {
  return host.vars.SystemDrive ?? 'C:';
}

function programFilesX86(host: HostEnvironment): string | null {
  return isWindows(host) ? (host.vars['ProgramFiles(x86)'] ?? null) : null;
}

export const STATIC_CANDIDATES: readonly StaticFolderCandidate[] = [
  { name: 'Home', resolve: (host) => host.homeDir },
  {
    name: 'System',
    resolve: (host) =>
      isWindows(host) ? pathFor('win32').join(host.vars.SystemRoot ?? 'C:\\Windows', 'System32') : '/usr/bin',
  },
  { name: 'Programs', resolve: (host) => (isWindows(host) ? (host.vars.ProgramFiles ?? null) : null) },
  { name: 'Programs32', resolve: programFilesX86 },
  { name: 'ProgramData', resolve: (host) => (isWindows(host) ? (host.vars.ProgramData ?? null) : null) },
  {
    name: 'Steam',
    resolve: (host) => {
      const base = programFilesX86(host);
      return base ? pathFor('win32').join(base, 'Steam', 'steamapps', 'common') : null;
    },
  },
  { name: 'Temp', resolve: (host) => host.tempDir },
  { name: 'CTemp', resolve: (host) => (isWindows(host) ? `${systemDrive(host)}\\Temp` : null) },
  { name: 'Root', resolve: (host) => (isWindows(host) ? `${systemDrive(host)}\\` : '/') },
];

/**
 * Build the default map for this host. Nonexistent targets are dropped
 * silently, so the result varies from machine to machine.
 */
export function generateDefaultShortcuts(host: HostEnvironment): ShortcutMap {
  const shortcuts: ShortcutMap = new Map();

  for (const candidate of FOLDER_CANDIDATES) {
    const target = resolveSpecialFolder(candidate.indirectionKey, candidate.fallback, host);
    if (existsSync(target)) {
      shortcuts.set(candidate.name, target);
    }
  }

  for (const candidate of STATIC_CANDIDATES) {
    const target = candidate.resolve(host);
    if (target && existsSync(target)) {
      shortcuts.set(candidate.name, target);
    }
  }

  return shortcuts;
}
