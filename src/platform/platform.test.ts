import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';

import { createPlatformProfile, detectPlatform, PosixPlatform, WindowsPlatform } from './index.js';
import { makeTempDir, removeTempDir, testConfig, touch, touchExecutable } from '../test-support/fakes.js';

describe('detectPlatform', () => {
  it('maps Node platform names', () => {
    expect(detectPlatform('win32')).toBe('windows');
    expect(detectPlatform('darwin')).toBe('macos');
    expect(detectPlatform('linux')).toBe('linux');
    expect(detectPlatform('freebsd')).toBe('linux');
  });

  it('creates the matching profile', () => {
    expect(createPlatformProfile('windows', {})).toBeInstanceOf(WindowsPlatform);
    expect(createPlatformProfile('macos', {}).shortcutFormat).toBe('command-script');
    expect(createPlatformProfile('linux', {}).shortcutFormat).toBe('desktop-entry');
  });
});

describe('WindowsPlatform', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('lays the environment out under Scripts', () => {
    const platform = new WindowsPlatform({});
    const env = platform.environmentLayout(testConfig(root));

    expect(env.root).toBe(join(root, '.venv'));
    expect(env.launcherPath).toBe(join(root, '.venv', 'Scripts', 'pythonw.exe'));
    expect(env.interpreterPath).toBe(join(root, '.venv', 'Scripts', 'python.exe'));
    expect(env.markerPath).toBe(join(root, '.venv', '.applaunch-provisioning.json'));
    expect(env.lockPath).toBe(`${join(root, '.venv')}.lock`);
  });

  it('orders launchers: environment, py -3, pythonw on PATH', () => {
    const bin = join(root, 'bin');
    touch(join(bin, 'py.exe'));
    touch(join(bin, 'pythonw.exe'));
    const platform = new WindowsPlatform({ PATH: bin, PATHEXT: '.EXE' });

    const candidates = platform.launcherCandidates(platform.environmentLayout(testConfig(root)));

    expect(candidates.map(c => c.id)).toEqual(['environment-windowed', 'version-selector', 'system-windowed']);
    expect(candidates.map(c => c.isAvailable())).toEqual([false, true, true]);
    expect(candidates[1].command).toBe(join(bin, 'py.exe'));
    expect(candidates[1].args).toEqual(['-3']);
    expect(candidates[2].command).toBe(join(bin, 'pythonw.exe'));
  });

  it('reads a PATH variable spelled "Path"', () => {
    touch(join(root, 'python.exe'));
    const platform = new WindowsPlatform({ Path: root, PATHEXT: '.EXE' });

    const [, system] = platform.baseRuntimeCandidates();

    expect(system.isAvailable()).toBe(true);
    expect(system.command).toBe(join(root, 'python.exe'));
  });

  it('resolves desktop and start menu from the user profile', () => {
    const platform = new WindowsPlatform({ USERPROFILE: 'C:/Users/pat', APPDATA: 'C:/Users/pat/AppData/Roaming' });

    expect(platform.desktopPath()).toBe(join('C:/Users/pat', 'Desktop'));
    expect(platform.startMenuPath()).toBe(
      join('C:/Users/pat/AppData/Roaming', 'Microsoft', 'Windows', 'Start Menu', 'Programs')
    );
    expect(new WindowsPlatform({}).desktopPath()).toBeUndefined();
  });
});

describe('PosixPlatform', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('uses bin/python as both launcher and interpreter', () => {
    const platform = new PosixPlatform('linux', {});
    const env = platform.environmentLayout(testConfig(root));

    expect(env.launcherPath).toBe(join(root, '.venv', 'bin', 'python'));
    expect(env.interpreterPath).toBe(env.launcherPath);
  });

  it('orders launchers: environment, py -3, python3 on PATH', () => {
    const bin = join(root, 'bin');
    touchExecutable(join(bin, 'python3'));
    const platform = new PosixPlatform('linux', { PATH: bin });

    const candidates = platform.launcherCandidates(platform.environmentLayout(testConfig(root)));

    expect(candidates.map(c => c.id)).toEqual(['environment-windowed', 'version-selector', 'system-interpreter']);
    expect(candidates.map(c => c.isAvailable())).toEqual([false, false, true]);
  });

  it('prefers XDG locations on Linux', () => {
    const platform = new PosixPlatform('linux', {
      HOME: '/home/pat',
      XDG_DESKTOP_DIR: '/home/pat/Schreibtisch',
      XDG_DATA_HOME: '/home/pat/.data'
    });

    expect(platform.desktopPath()).toBe('/home/pat/Schreibtisch');
    expect(platform.startMenuPath()).toBe(join('/home/pat/.data', 'applications'));
  });

  it('has no start menu on macOS', () => {
    const platform = new PosixPlatform('macos', { HOME: '/Users/pat' });

    expect(platform.desktopPath()).toBe(join('/Users/pat', 'Desktop'));
    expect(platform.startMenuPath()).toBeUndefined();
    expect(platform.shortcutExtension).toBe('.command');
  });
});
