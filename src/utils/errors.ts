/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (e: unknown)`, plus construction and
 * reporting of the non-throwing shortcut error values.
 */

import { config } from '../config.js';
import { debugLog } from '../env.js';
import type { ShortcutError, ShortcutErrorType } from '../types.js';

/**
 * Check if a value is a Node.js ErrnoException
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Extract a human-readable error message from an unknown error.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === 'string') {
    return e;
  }
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

/**
 * Check if an error has a specific code (common for Node.js errors)
 */
export function hasErrorCode(e: unknown, code: string): boolean {
  return isNodeError(e) && e.code === code;
}

/**
 * The path does not exist. ENOTDIR counts: a file sits where a parent
 * directory should be, so nothing can exist below it.
 */
export function isNotFoundError(e: unknown): boolean {
  return hasErrorCode(e, 'ENOENT') || hasErrorCode(e, 'ENOTDIR');
}

export function shortcutError(type: ShortcutErrorType, message: string, cause?: unknown): ShortcutError {
  return cause === undefined ? { type, message } : { type, message, cause };
}

/**
 * Print an error at its configured severity and pass it through.
 */
export function reportShortcutError(error: ShortcutError): ShortcutError {
  switch (config.errorSeverity[error.type]) {
    case 'error':
      console.error(`Error: ${error.message}`);
      break;
    case 'warning':
      console.warn(`Warning: ${error.message}`);
      break;
    case 'silent':
      debugLog(error.message);
      break;
  }
  return error;
}

/**
 * Raised when the user's home directory cannot be determined.
 * The only failure the shortcut operations do not recover from.
 */
export class HomeDirectoryUnavailableError extends Error {
  constructor(cause?: unknown) {
    super(
      cause === undefined
        ? 'Could not determine the home directory'
        : `Could not determine the home directory: ${toErrorMessage(cause)}`
    );
    this.name = 'HomeDirectoryUnavailableError';
  }
}
