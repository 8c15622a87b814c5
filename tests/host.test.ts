import os from 'node:os';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { getHostEnvironment } from '../src/host.js';
import { HomeDirectoryUnavailableError } from '../src/utils/errors.js';

describe('getHostEnvironment', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('captures the current process', () => {
    const host = getHostEnvironment();

    expect(host.platform).toBe(process.platform);
    expect(host.homeDir).toBe(os.homedir());
    expect(host.tempDir).toBe(os.tmpdir());
    expect(host.cwd).toBe(process.cwd());
    expect(host.vars.PATH).toBe(process.env.PATH);
  });

  it('throws when the home directory is empty', () => {
    vi.spyOn(os, 'homedir').mockReturnValue('');

    expect(() => getHostEnvironment()).toThrow(HomeDirectoryUnavailableError);
    expect(() => getHostEnvironment()).toThrow('Could not determine the home directory');
  });

  it('wraps a failing home directory lookup', () => {
    vi.spyOn(os, 'homedir').mockImplementation(() => {
      throw new Error('ENOENT: no such user');
    });

    expect(() => getHostEnvironment()).toThrow('Could not determine the home directory: ENOENT: no such user');
  });
});
