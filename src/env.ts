/**
 * Environment Configuration
 *
 * Loads environment variables from .env file.
 * Must be imported before any other modules that need env vars.
 */

import dotenv from 'dotenv';
import { ENV_FILE } from './paths.js';

// Load .env file
dotenv.config({ path: ENV_FILE });

// Export typed environment access
export const env = {
  get DEBUG(): boolean {
    return process.env.DEBUG === 'true' || process.env.DEBUG === '1';
  },
};

/**
 * Log a diagnostic line when DEBUG is enabled.
 */
export function debugLog(message: string): void {
  if (env.DEBUG) {
    console.log(`[debug] ${message}`);
  }
}
