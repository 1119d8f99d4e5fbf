import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';

import {
  DependencyInstallError,
  EnvironmentCreationError,
  NoBaseRuntimeError
} from '../core/errors.js';
import type { DependencyPolicy, ExecutionEnvironment } from '../core/types.js';
import { WindowsPlatform } from '../platform/WindowsPlatform.js';
import { ProvisioningLock } from './ProvisioningLock.js';
import { EnvironmentProvisioner } from './EnvironmentProvisioner.js';
import {
  FakeCommandRunner,
  exitedWith,
  makeTempDir,
  pythonResponder,
  removeTempDir,
  testConfig,
  timedOut,
  touch
} from '../test-support/fakes.js';

describe('EnvironmentProvisioner', () => {
  let root: string;
  let systemBin: string;
  let environment: ExecutionEnvironment;
  let runner: FakeCommandRunner;

  function provisioner(options: { policy?: DependencyPolicy; pathValue?: string; lockWaitMs?: number } = {}) {
    const platform = new WindowsPlatform({ PATH: options.pathValue ?? systemBin, PATHEXT: '.EXE' });
    return new EnvironmentProvisioner({
      platform,
      runner,
      dependencyPolicy: options.policy ?? 'best-effort',
      timeouts: { createMs: 120_000, installMs: 600_000, lockWaitMs: options.lockWaitMs ?? 1_000 }
    });
  }

  beforeEach(() => {
    root = makeTempDir();
    systemBin = join(root, 'system');
    touch(join(systemBin, 'py.exe'));
    environment = new WindowsPlatform({}).environmentLayout(testConfig(join(root, 'app')));
    runner = new FakeCommandRunner(pythonResponder(environment));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTempDir(root);
  });

  describe('when the environment exists', () => {
    it('returns already-present without running or writing anything', async () => {
      touch(environment.launcherPath);
      const before = readdirSync(join(root, 'app'));

      const result = await provisioner().ensure(environment);

      expect(result).toEqual({ status: 'already-present' });
      expect(runner.calls).toHaveLength(0);
      expect(readdirSync(join(root, 'app'))).toEqual(before);
      expect(existsSync(environment.lockPath)).toBe(false);
    });

    it('is idempotent across two calls', async () => {
      touch(join(root, 'app', 'requirements.txt'), 'requests\n');
      const subject = provisioner();

      const first = await subject.ensure(environment);
      const callsAfterFirst = runner.calls.length;
      const listing = readdirSync(environment.root);
      const second = await subject.ensure(environment);

      expect(first.status).toBe('created-and-populated');
      expect(second).toEqual({ status: 'already-present' });
      expect(runner.calls).toHaveLength(callsAfterFirst);
      expect(readdirSync(environment.root)).toEqual(listing);
    });
  });

  describe('first run', () => {
    it('creates the environment, upgrades pip and installs the manifest', async () => {
      touch(environment.manifestPath, 'requests\n');

      const result = await provisioner().ensure(environment);

      expect(result).toEqual({ status: 'created-and-populated', dependencies: 'installed', warnings: [] });
      expect(runner.calls.map(c => [c.command, ...c.args])).toEqual([
        [join(systemBin, 'py.exe'), '-3', '-m', 'venv', environment.root],
        [environment.interpreterPath, '-m', 'pip', 'install', '--upgrade', 'pip'],
        [environment.interpreterPath, '-m', 'pip', 'install', '-r', environment.manifestPath]
      ]);
      expect(runner.calls[0].options.timeoutMs).toBe(120_000);
      expect(runner.calls[2].options.timeoutMs).toBe(600_000);
      expect(existsSync(environment.markerPath)).toBe(false);
      expect(existsSync(environment.lockPath)).toBe(false);
      expect(provisioner().isPresent(environment)).toBe(true);
    });

    it('skips dependency installation when there is no manifest', async () => {
      const result = await provisioner().ensure(environment);

      expect(result).toEqual({ status: 'created-and-populated', dependencies: 'skipped-no-manifest', warnings: [] });
      expect(runner.calls).toHaveLength(2);
      expect(runner.calls.some(c => c.args.includes('-r'))).toBe(false);
    });

    it('falls back to python on PATH when the py launcher is missing', async () => {
      const otherBin = join(root, 'other');
      touch(join(otherBin, 'python.exe'));

      await provisioner({ pathValue: otherBin }).ensure(environment);

      expect(runner.calls[0].command).toBe(join(otherBin, 'python.exe'));
      expect(runner.calls[0].args).toEqual(['-m', 'venv', environment.root]);
    });

    it('fails with NoBaseRuntime when no interpreter exists', async () => {
      const result = await provisioner({ pathValue: join(root, 'empty') }).ensure(environment);

      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error).toBeInstanceOf(NoBaseRuntimeError);
        expect(result.error.message).toBe(
          'Python 3 is not installed: none of py launcher (py -3), python on PATH was found.'
        );
        expect(result.error.exitCode).toBe(2);
      }
      expect(runner.calls).toHaveLength(0);
      expect(existsSync(environment.root)).toBe(false);
    });

    it('reports environment creation failure without touching pip', async () => {
      runner.respond = pythonResponder(environment, { create: exitedWith(1, 'Error: [WinError 5] Access is denied\n') });

      const result = await provisioner().ensure(environment);

      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error).toBeInstanceOf(EnvironmentCreationError);
        expect(result.error.message).toBe(
          `Could not create the environment at ${environment.root}: exit code 1: Error: [WinError 5] Access is denied`
        );
        expect(result.error.exitCode).toBe(3);
      }
      expect(runner.calls).toHaveLength(1);
      expect(existsSync(environment.markerPath)).toBe(true);
      expect(existsSync(environment.lockPath)).toBe(false);
    });

    it('reports a creation timeout', async () => {
      runner.respond = pythonResponder(environment, { create: timedOut() });

      const result = await provisioner().ensure(environment);

      expect(result.status === 'failed' && result.error.message).toBe(
        `Could not create the environment at ${environment.root}: timed out after 120s`
      );
    });

    it('warns when the created environment has no windowed launcher', async () => {
      runner.respond = pythonResponder(environment, { withoutLauncher: true });

      const result = await provisioner().ensure(environment);

      expect(result).toEqual({
        status: 'created-and-populated',
        dependencies: 'skipped-no-manifest',
        warnings: [`Environment has no launcher at ${environment.launcherPath}`]
      });
    });
  });

  describe('dependency failures', () => {
    beforeEach(() => {
      touch(environment.manifestPath, 'not-a-real-package==0\n');
      runner.respond = pythonResponder(environment, {
        install: exitedWith(1, 'Collecting not-a-real-package==0\nERROR: No matching distribution found\n')
      });
    });

    it('keeps the environment under best-effort', async () => {
      const subject = provisioner({ policy: 'best-effort' });

      const result = await subject.ensure(environment);

      expect(result).toEqual({
        status: 'created-and-populated',
        dependencies: 'failed',
        warnings: ['Dependency step "install-manifest" failed: exit code 1: ERROR: No matching distribution found']
      });
      expect(subject.isPresent(environment)).toBe(true);
    });

    it('fails and leaves the environment for repair under fail-fast', async () => {
      const subject = provisioner({ policy: 'fail-fast' });

      const result = await subject.ensure(environment);

      expect(result.status).toBe('failed');
      if (result.status === 'failed') {
        expect(result.error).toBeInstanceOf(DependencyInstallError);
        expect(result.error.exitCode).toBe(4);
      }
      expect(subject.isPresent(environment)).toBe(false);

      // Next launch rebuilds from scratch
      runner.respond = pythonResponder(environment);
      runner.calls.length = 0;
      const retry = await subject.ensure(environment);

      expect(retry).toEqual({ status: 'created-and-populated', dependencies: 'installed', warnings: [] });
      expect(runner.calls[0].args).toContain('venv');
    });

    it('records a failed pip upgrade as a warning and still installs', async () => {
      runner.respond = pythonResponder(environment, { upgrade: exitedWith(2, 'network unreachable') });

      const result = await provisioner().ensure(environment);

      expect(result).toEqual({
        status: 'created-and-populated',
        dependencies: 'failed',
        warnings: ['Dependency step "upgrade-pip" failed: exit code 2: network unreachable']
      });
      expect(runner.calls).toHaveLength(3);
    });
  });

  describe('interrupted and concurrent provisioning', () => {
    it('rebuilds an environment left behind with a provisioning marker', async () => {
      touch(environment.launcherPath);
      touch(environment.markerPath, '{}');
      touch(join(environment.root, 'Lib', 'half-installed.py'));

      const subject = provisioner();
      expect(subject.isPresent(environment)).toBe(false);

      const result = await subject.ensure(environment);

      expect(result.status).toBe('created-and-populated');
      expect(existsSync(join(environment.root, 'Lib', 'half-installed.py'))).toBe(false);
      expect(subject.isPresent(environment)).toBe(true);
    });

    it('refuses to wipe a directory that is not an environment', async () => {
      touch(join(environment.root, 'notes.txt'), 'keep me');

      const result = await provisioner().ensure(environment);

      expect(result.status === 'failed' && result.error.message).toBe(
        `Could not create the environment at ${environment.root}: the directory exists but is not an environment created by applaunch`
      );
      expect(readFileSync(join(environment.root, 'notes.txt'), 'utf-8')).toBe('keep me');
      expect(runner.calls).toHaveLength(0);
    });

    it('keeps the install root when it is configured as the environment', async () => {
      touch(join(root, 'app', 'main.py'), 'print("hi")\n');
      const layout = new WindowsPlatform({}).environmentLayout(
        testConfig(join(root, 'app'), { environmentDir: join(root, 'app') })
      );

      const result = await provisioner().ensure(layout);

      expect(result.status).toBe('failed');
      expect(existsSync(join(root, 'app', 'main.py'))).toBe(true);
    });

    it('rebuilds a virtual environment that lost its launcher', async () => {
      touch(join(environment.root, 'pyvenv.cfg'));
      touch(join(environment.root, 'Lib', 'stale.py'));

      const result = await provisioner().ensure(environment);

      expect(result.status).toBe('created-and-populated');
      expect(existsSync(join(environment.root, 'Lib', 'stale.py'))).toBe(false);
    });

    it('fails when another launch keeps the lock', async () => {
      const other = new ProvisioningLock(environment.lockPath);
      touch(join(root, 'app', 'main.py'));
      await other.acquire({ waitMs: 100, staleMs: 60_000 });

      const result = await provisioner({ lockWaitMs: 50 }).ensure(environment);

      expect(result.status === 'failed' && result.error.message).toBe(
        `Could not create the environment at ${environment.root}: another launch is still setting up the environment`
      );
      expect(runner.calls).toHaveLength(0);
      await other.release();
    });

    it('uses the environment another launch finished while waiting', async () => {
      const other = new ProvisioningLock(environment.lockPath);
      touch(join(root, 'app', 'main.py'));
      await other.acquire({ waitMs: 100, staleMs: 60_000 });

      const pending = provisioner({ lockWaitMs: 5_000 }).ensure(environment);
      setTimeout(() => {
        touch(environment.launcherPath);
        void other.release();
      }, 50);

      expect(await pending).toEqual({ status: 'already-present' });
      expect(runner.calls).toHaveLength(0);
    });
  });
});
