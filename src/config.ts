/**
 * Application Configuration
 *
 * Centralized configuration with typed defaults.
 */

import type { AppConfig } from './types.js';

export const config: AppConfig = {
  // Store location under the documents directory. Shared with the PowerShell
  // profile folder so existing LocationShortcuts.json files keep working.
  storeDirectory: 'PowerShell',
  storeFileName: 'LocationShortcuts.json',

  shortcutNamePattern: /^[A-Za-z0-9_-]+$/,

  // Matches "\OneDrive\", "\OneDrive - Tenant" and a trailing "\OneDrive"
  cloudRedirectPattern: /[\\/]OneDrive(?:[\\/]| - |$)/i,

  registry: {
    // Under HKEY_CURRENT_USER
    shellFoldersKey: 'Software\\Microsoft\\Windows\\CurrentVersion\\Explorer\\User Shell Folders',
    timeout: 5000,
  },

  // Value names under the shell folders key
  folderKeys: {
    documents: 'Personal',
    downloads: '{374DE290-123F-4565-9164-39C4925E467B}',
    pictures: 'My Pictures',
    music: 'My Music',
    videos: 'My Video',
  },

  security: {
    storeFileMode: 0o644,
  },

  errorSeverity: {
    IndirectionLookupFailed: 'silent',
    ConfigDirCreateFailed: 'warning',
    ConfigUnreadable: 'error',
    ConfigMalformed: 'error',
    ConfigWriteError: 'error',
    InvalidName: 'error',
    DuplicateName: 'warning',
    UnknownName: 'warning',
    UnknownShortcut: 'warning',
    InvalidPath: 'error',
    TargetMissing: 'warning',
  },
};

// Freeze config to prevent accidental mutation
Object.freeze(config);
Object.freeze(config.registry);
Object.freeze(config.folderKeys);
Object.freeze(config.security);
Object.freeze(config.errorSeverity);
