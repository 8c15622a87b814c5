import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { expandEnvironmentVariables, resolveSpecialFolder } from '../src/special-folders.js';
import { createTestHost, makeDir, stubIndirection, withTempHome } from './helpers/host.js';

describe('resolveSpecialFolder', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('returns home/fallback when the host has no indirection store', async () => {
    await withTempHome(async (home) => {
      const host = createTestHost(home);
      expect(resolveSpecialFolder('Personal', 'Documents', host)).toBe(path.join(home, 'Documents'));
    });
  });

  it('does not consult the store when no key is given', async () => {
    await withTempHome(async (home) => {
      const lookup = vi.fn(() => '/somewhere');
      const host = createTestHost(home, { indirection: { lookup } });

      expect(resolveSpecialFolder(undefined, 'Scripts', host)).toBe(path.join(home, 'Scripts'));
      expect(lookup).not.toHaveBeenCalled();
    });
  });

  it('uses the redirected location when it exists', async () => {
    await withTempHome(async (home) => {
      const pictures = await makeDir(home, 'elsewhere/pics');
      const host = createTestHost(home, { indirection: stubIndirection({ 'My Pictures': pictures }) });

      expect(resolveSpecialFolder('My Pictures', 'Pictures', host)).toBe(pictures);
    });
  });

  it('expands environment references in the stored value', async () => {
    await withTempHome(async (home) => {
      await makeDir(home, 'Redirected');
      const host = createTestHost(home, {
        vars: { DOCROOT: home },
        indirection: stubIndirection({ Personal: '%DOCROOT%/Redirected' }),
      });

      expect(resolveSpecialFolder('Personal', 'Documents', host)).toBe(`${home}/Redirected`);
    });
  });

  it('falls back when the stored value is relative', async () => {
    await withTempHome(async (home) => {
      await makeDir(home, 'relative');
      const host = createTestHost(home, { cwd: home, indirection: stubIndirection({ Personal: 'relative' }) });

      expect(resolveSpecialFolder('Personal', 'Documents', host)).toBe(path.join(home, 'Documents'));
    });
  });

  it('falls back when the stored value does not exist', async () => {
    await withTempHome(async (home) => {
      const host = createTestHost(home, {
        indirection: stubIndirection({ 'My Music': path.join(home, 'gone') }),
      });

      expect(resolveSpecialFolder('My Music', 'Music', host)).toBe(path.join(home, 'Music'));
    });
  });

  it('falls back when the lookup throws', async () => {
    await withTempHome(async (home) => {
      const host = createTestHost(home, {
        indirection: {
          lookup: () => {
            throw new Error('access denied');
          },
        },
      });

      expect(resolveSpecialFolder('My Video', 'Videos', host)).toBe(path.join(home, 'Videos'));
    });
  });

  it('reports a failed lookup as a debug line only', async () => {
    await withTempHome(async (home) => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const gone = path.join(home, 'gone');
      const host = createTestHost(home, { indirection: stubIndirection({ 'My Music': gone }) });

      vi.stubEnv('DEBUG', '0');
      resolveSpecialFolder('My Music', 'Music', host);
      expect(logSpy).not.toHaveBeenCalled();

      vi.stubEnv('DEBUG', '1');
      resolveSpecialFolder('My Music', 'Music', host);
      expect(logSpy).toHaveBeenCalledWith(`[debug] Ignoring "My Music" -> ${gone}: path does not exist`);
      expect(warnSpy).not.toHaveBeenCalled();
    });
  });

  it('joins Windows fallbacks with backslashes', () => {
    const host = createTestHost('C:\\Users\\test', { platform: 'win32' });
    expect(resolveSpecialFolder('Personal', 'Documents', host)).toBe('C:\\Users\\test\\Documents');
  });
});

describe('expandEnvironmentVariables', () => {
  it('matches names case-insensitively on Windows', () => {
    const vars = { USERPROFILE: 'C:\\Users\\test' };
    expect(expandEnvironmentVariables('%userprofile%\\OneDrive\\Documents', vars, 'win32')).toBe(
      'C:\\Users\\test\\OneDrive\\Documents'
    );
  });

  it('matches names exactly elsewhere', () => {
    const vars = { USERPROFILE: '/home/test' };
    expect(expandEnvironmentVariables('%userprofile%/Documents', vars, 'linux')).toBe('%userprofile%/Documents');
    expect(expandEnvironmentVariables('%USERPROFILE%/Documents', vars, 'linux')).toBe('/home/test/Documents');
  });

  it('leaves unknown references as written', () => {
    expect(expandEnvironmentVariables('%NOPE%\\Docs', {}, 'win32')).toBe('%NOPE%\\Docs');
  });

  it('expands several references in one value', () => {
    const vars = { SystemDrive: 'D:', USERNAME: 'test' };
    expect(expandEnvironmentVariables('%SystemDrive%\\Users\\%USERNAME%', vars, 'win32')).toBe('D:\\Users\\test');
  });
});
