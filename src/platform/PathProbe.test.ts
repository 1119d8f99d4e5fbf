import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';

import { fileExists, findOnPath, parsePathExt } from './PathProbe.js';
import { makeTempDir, removeTempDir, touch, touchExecutable } from '../test-support/fakes.js';

describe('PathProbe', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('fileExists', () => {
    it('is true for a regular file only', () => {
      touch(join(root, 'a.txt'));

      expect(fileExists(join(root, 'a.txt'))).toBe(true);
      expect(fileExists(root)).toBe(false);
      expect(fileExists(join(root, 'missing'))).toBe(false);
    });
  });

  describe('parsePathExt', () => {
    it('lowercases and drops empty entries', () => {
      expect(parsePathExt('.COM;.EXE;;.Bat')).toEqual(['.com', '.exe', '.bat']);
    });

    it('falls back to the Windows defaults when unset', () => {
      expect(parsePathExt(undefined)).toEqual(['.com', '.exe', '.bat', '.cmd']);
    });
  });

  describe('findOnPath with Windows rules', () => {
    it('appends PATHEXT extensions and honours PATH order', () => {
      const first = join(root, 'first');
      const second = join(root, 'second');
      touch(join(second, 'py.exe'));
      touch(join(first, 'py.bat'));

      const found = findOnPath('py', {
        pathValue: `${first};${second}`,
        delimiter: ';',
        extensions: ['.exe', '.bat'],
        requireExecutable: false
      });

      expect(found).toBe(join(first, 'py.bat'));
    });

    it('accepts a name that already carries an extension', () => {
      touch(join(root, 'pythonw.exe'));

      const found = findOnPath('pythonw.exe', {
        pathValue: root,
        delimiter: ';',
        extensions: ['.exe'],
        requireExecutable: false
      });

      expect(found).toBe(join(root, 'pythonw.exe'));
    });

    it('strips quotes around PATH entries', () => {
      touch(join(root, 'py.exe'));

      const found = findOnPath('py', {
        pathValue: `"${root}"`,
        delimiter: ';',
        extensions: ['.exe'],
        requireExecutable: false
      });

      expect(found).toBe(join(root, 'py.exe'));
    });
  });

  describe('findOnPath with POSIX rules', () => {
    it('skips files without the execute bit', () => {
      const plain = join(root, 'plain');
      const runnable = join(root, 'runnable');
      touch(join(plain, 'python3'));
      touchExecutable(join(runnable, 'python3'));

      const found = findOnPath('python3', {
        pathValue: `${plain}:${runnable}`,
        delimiter: ':',
        extensions: [],
        requireExecutable: true
      });

      expect(found).toBe(join(runnable, 'python3'));
    });

    it('returns undefined for an empty or missing PATH', () => {
      const options = { delimiter: ':', extensions: [], requireExecutable: true };

      expect(findOnPath('python3', { ...options, pathValue: undefined })).toBeUndefined();
      expect(findOnPath('python3', { ...options, pathValue: '' })).toBeUndefined();
    });
  });
});
