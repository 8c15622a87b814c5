import { execFileSync } from 'node:child_process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createRegistryIndirection,
  parseShellFolderOutput,
  READ_SHELL_FOLDER_SCRIPT,
} from '../../src/integrations/registry.js';

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(),
}));

const SHELL_FOLDERS = 'Software\\Microsoft\\Windows\\CurrentVersion\\Explorer\\User Shell Folders';

describe('parseShellFolderOutput', () => {
  it('returns the printed path unexpanded', () => {
    expect(parseShellFolderOutput('%USERPROFILE%\\OneDrive\\Documents')).toBe('%USERPROFILE%\\OneDrive\\Documents');
  });

  it('keeps non-ASCII folder names intact', () => {
    expect(parseShellFolderOutput('C:\\Users\\test\\OneDrive - Société\\Documents\r\n')).toBe(
      'C:\\Users\\test\\OneDrive - Société\\Documents'
    );
  });

  it('drops a leading byte order mark', () => {
    expect(parseShellFolderOutput('\uFEFFD:\\Dokumente\\Müller')).toBe('D:\\Dokumente\\Müller');
  });

  it('returns null when nothing was printed', () => {
    expect(parseShellFolderOutput('')).toBeNull();
    expect(parseShellFolderOutput('\r\n')).toBeNull();
  });
});

describe('READ_SHELL_FOLDER_SCRIPT', () => {
  it('forces UTF-8 output and reads the value without expanding it', () => {
    expect(READ_SHELL_FOLDER_SCRIPT).toContain('[Console]::OutputEncoding = New-Object System.Text.UTF8Encoding $false');
    expect(READ_SHELL_FOLDER_SCRIPT).toContain("'DoNotExpandEnvironmentNames'");
  });
});

describe('createRegistryIndirection', () => {
  const mockExecFileSync = vi.mocked(execFileSync);

  beforeEach(() => {
    vi.resetAllMocks();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('has no store outside Windows', () => {
    expect(createRegistryIndirection('linux')).toBeNull();
    expect(createRegistryIndirection('darwin')).toBeNull();
  });

  it('reads the shell folders key through PowerShell on Windows', () => {
    mockExecFileSync.mockReturnValue('C:\\Users\\test\\OneDrive - Société\\Documents');

    const indirection = createRegistryIndirection('win32');

    expect(indirection?.lookup('Personal')).toBe('C:\\Users\\test\\OneDrive - Société\\Documents');
    expect(mockExecFileSync).toHaveBeenCalledWith(
      'powershell.exe',
      [
        '-NoProfile',
        '-NonInteractive',
        '-EncodedCommand',
        Buffer.from(READ_SHELL_FOLDER_SCRIPT, 'utf16le').toString('base64'),
      ],
      expect.objectContaining({
        encoding: 'utf8',
        timeout: 5000,
        env: expect.objectContaining({
          LOCATION_SHORTCUTS_REGISTRY_KEY: SHELL_FOLDERS,
          LOCATION_SHORTCUTS_REGISTRY_VALUE: 'Personal',
        }),
      })
    );
  });

  it('returns null when the value is not set', () => {
    mockExecFileSync.mockReturnValue('');

    expect(createRegistryIndirection('win32')?.lookup('My Music')).toBeNull();
  });

  it('returns null and logs under DEBUG when PowerShell fails', () => {
    vi.stubEnv('DEBUG', '1');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    mockExecFileSync.mockImplementation(() => {
      throw new Error('spawnSync powershell.exe ETIMEDOUT');
    });

    expect(createRegistryIndirection('win32')?.lookup('Personal')).toBeNull();
    expect(logSpy).toHaveBeenCalledWith(
      '[debug] Registry lookup for "Personal" failed: spawnSync powershell.exe ETIMEDOUT'
    );
  });
});
