/**
 * Type Definitions for Location Shortcuts
 *
 * Shapes shared by the resolver, the store and the CLI.
 */

// ============================================
// Generic Result Type
// ============================================

export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E };

export interface AppError {
  type: string;
  message: string;
  cause?: unknown;
}

export type ShortcutErrorType =
  | 'IndirectionLookupFailed'
  | 'ConfigDirCreateFailed'
  | 'ConfigUnreadable'
  | 'ConfigMalformed'
  | 'ConfigWriteError'
  | 'InvalidName'
  | 'DuplicateName'
  | 'UnknownName'
  | 'UnknownShortcut'
  | 'InvalidPath'
  | 'TargetMissing';

export interface ShortcutError extends AppError {
  type: ShortcutErrorType;
}

export type ErrorSeverity = 'silent' | 'warning' | 'error';

// ============================================
// Shortcuts
// ============================================

/** Name matching `config.shortcutNamePattern`; compared case-insensitively. */
export type ShortcutName = string;

/** Absolute, OS-native filesystem path. */
export type ShortcutPath = string;

export type ShortcutMap = Map<ShortcutName, ShortcutPath>;

// ============================================
// Host Environment
// ============================================

/**
 * OS-level key/value store used to discover redirected special folders
 * (the "User Shell Folders" registry key on Windows).
 */
export interface FolderIndirection {
  lookup(key: string): string | null;
}

export interface HostEnvironment {
  platform: NodeJS.Platform;
  homeDir: string;
  tempDir: string;
  cwd: string;
  vars: Readonly<Record<string, string | undefined>>;
  /** null when the platform has no indirection store */
  indirection: FolderIndirection | null;
}

// ============================================
// Default Shortcut Catalogue
// ============================================

export interface SpecialFolderCandidate {
  name: ShortcutName;
  indirectionKey?: string;
  /** Path relative to the home directory */
  fallback: string;
}

export interface StaticFolderCandidate {
  name: ShortcutName;
  resolve(host: HostEnvironment): ShortcutPath | null;
}

// ============================================
// Application Config
// ============================================

export interface AppConfig {
  storeDirectory: string;
  storeFileName: string;
  shortcutNamePattern: RegExp;
  cloudRedirectPattern: RegExp;
  registry: {
    shellFoldersKey: string;
    timeout: number;
  };
  folderKeys: {
    documents: string;
    downloads: string;
    pictures: string;
    music: string;
    videos: string;
  };
  security: {
    storeFileMode: number;
  };
  errorSeverity: Record<ShortcutErrorType, ErrorSeverity>;
}
