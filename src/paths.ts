/**
 * Centralized Path Management
 *
 * Repository-relative paths, plus the path flavour helpers used
 * whenever a path is built for a host platform.
 */

import path from 'path';
import { fileURLToPath } from 'url';

// Get the directory containing this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Repository root directory (parent of src/ or dist/)
 */
export const REPO_ROOT = path.resolve(__dirname, '..');

/**
 * .env file path
 */
export const ENV_FILE = path.join(REPO_ROOT, '.env');

/**
 * Path module matching the host platform's separators and absolute-path rules.
 * Lets Windows paths be composed and checked on any machine.
 */
export function pathFor(platform: NodeJS.Platform): path.PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}
