/**
 * Registry Shell Folders
 *
 * Reads redirected special-folder locations from the Windows
 * "User Shell Folders" registry key.
 *
 * `reg.exe` writes to a pipe in the console's OEM code page, so folder
 * names outside ASCII come back garbled. The value is read through
 * PowerShell instead, with its output forced to UTF-8.
 */

import { execFileSync } from 'node:child_process';
import { config } from '../config.js';
import type { FolderIndirection } from '../types.js';
import { reportShortcutError, shortcutError, toErrorMessage } from '../utils/errors.js';

const KEY_VARIABLE = 'LOCATION_SHORTCUTS_REGISTRY_KEY';
const VALUE_VARIABLE = 'LOCATION_SHORTCUTS_REGISTRY_VALUE';

// Key and value name arrive through the environment, so nothing is quoted into the script.
// REG_EXPAND_SZ data is returned unexpanded; %VAR% references are expanded by the caller.
export const READ_SHELL_FOLDER_SCRIPT = [
  "$ErrorActionPreference = 'Stop'",
  '[Console]::OutputEncoding = New-Object System.Text.UTF8Encoding $false',
  `$key = [Microsoft.Win32.Registry]::CurrentUser.OpenSubKey($env:${KEY_VARIABLE})`,
  'if ($null -ne $key) {',
  `  $value = $key.GetValue($env:${VALUE_VARIABLE}, $null, 'DoNotExpandEnvironmentNames')`,
  '  if ($null -ne $value) { [Console]::Out.Write([string]$value) }',
  '}',
].join('\n');

/**
 * The folder path printed by the script, or null when nothing was printed.
 */
export function parseShellFolderOutput(output: string): string | null {
  const value = output.replace(/^\uFEFF/, '').trim();
  return value.length > 0 ? value : null;
}

function queryShellFolder(valueName: string): string | null {
  try {
    const output = execFileSync(
      'powershell.exe',
      [
        '-NoProfile',
        '-NonInteractive',
        '-EncodedCommand',
        Buffer.from(READ_SHELL_FOLDER_SCRIPT, 'utf16le').toString('base64'),
      ],
      {
        encoding: 'utf8',
        timeout: config.registry.timeout,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        env: { ...process.env, [KEY_VARIABLE]: config.registry.shellFoldersKey, [VALUE_VARIABLE]: valueName },
      }
    );
    return parseShellFolderOutput(output);
  } catch (e) {
    reportShortcutError(
      shortcutError('IndirectionLookupFailed', `Registry lookup for "${valueName}" failed: ${toErrorMessage(e)}`, e)
    );
    return null;
  }
}

/**
 * Indirection store for the given platform, or null where none exists.
 */
export function createRegistryIndirection(platform: NodeJS.Platform = process.platform): FolderIndirection | null {
  if (platform !== 'win32') return null;
  return { lookup: queryShellFolder };
}
