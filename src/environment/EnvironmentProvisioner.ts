/**
 * EnvironmentProvisioner
 *
 * Creates the isolated environment on first run and installs the declared
 * dependencies into it.
 *
 * The environment counts as present when its launcher exists and no
 * provisioning marker is left in it. The marker is written before the
 * environment is created and removed only once provisioning finished, so
 * an interrupted attempt is rebuilt on the next launch instead of trusted.
 * Creation runs under an exclusive lock file so concurrent first launches
 * provision once.
 */

import { existsSync } from 'fs';
import { mkdir, readdir, rm, unlink, writeFile } from 'fs/promises';
import { dirname, join } from 'path';

import {
  DependencyInstallError,
  EnvironmentCreationError,
  NoBaseRuntimeError,
  describeError
} from '../core/errors.js';
import type {
  BootstrapResult,
  DependencyOutcome,
  DependencyPolicy,
  ExecutionEnvironment,
  LaunchTimeouts
} from '../core/types.js';
import { fileExists } from '../platform/PathProbe.js';
import type { PlatformProfile } from '../platform/types.js';
import { describeFailure, succeeded, type CommandRunner } from '../process/CommandRunner.js';
import { RuntimeLocator } from '../runtime/RuntimeLocator.js';
import { ProvisioningLock } from './ProvisioningLock.js';

export interface ProvisionerOptions {
  platform: PlatformProfile;
  runner: CommandRunner;
  dependencyPolicy: DependencyPolicy;
  timeouts: LaunchTimeouts;
  locator?: RuntimeLocator;
}

/** Extra time on top of the subprocess timeouts before a lock counts as abandoned */
const LOCK_STALE_SLACK_MS = 60_000;

/** Written by `-m venv` into every environment root */
const VENV_CONFIG = 'pyvenv.cfg';

/**
 * Only an empty directory, an unfinished provisioning or a virtual
 * environment may be wiped and rebuilt
 */
async function isDisposable(environment: ExecutionEnvironment): Promise<boolean> {
  const entries = await readdir(environment.root);
  return (
    entries.length === 0 ||
    existsSync(environment.markerPath) ||
    existsSync(join(environment.root, VENV_CONFIG))
  );
}

export class EnvironmentProvisioner {
  private readonly platform: PlatformProfile;
  private readonly runner: CommandRunner;
  private readonly dependencyPolicy: DependencyPolicy;
  private readonly timeouts: LaunchTimeouts;
  private readonly locator: RuntimeLocator;

  constructor(options: ProvisionerOptions) {
    this.platform = options.platform;
    this.runner = options.runner;
    this.dependencyPolicy = options.dependencyPolicy;
    this.timeouts = options.timeouts;
    this.locator = options.locator ?? new RuntimeLocator();
  }

  /**
   * Launcher exists and no unfinished provisioning is recorded
   */
  isPresent(environment: ExecutionEnvironment): boolean {
    return fileExists(environment.launcherPath) && !existsSync(environment.markerPath);
  }

  /**
   * Make sure the environment exists, provisioning it when it does not.
   * Never throws for expected failures; they come back as `failed`.
   */
  async ensure(environment: ExecutionEnvironment): Promise<BootstrapResult> {
    if (this.isPresent(environment)) {
      console.log(`[Provisioner] Environment present at ${environment.root}`);
      return { status: 'already-present' };
    }

    const lock = new ProvisioningLock(environment.lockPath);
    let acquired: boolean;
    try {
      await mkdir(dirname(environment.lockPath), { recursive: true });
      acquired = await lock.acquire({
        waitMs: this.timeouts.lockWaitMs,
        staleMs: this.timeouts.createMs + 2 * this.timeouts.installMs + LOCK_STALE_SLACK_MS
      });
    } catch (error) {
      return this.fail(new EnvironmentCreationError(environment.root, `cannot lock: ${describeError(error)}`));
    }

    if (!acquired) {
      if (this.isPresent(environment)) {
        return { status: 'already-present' };
      }
      return this.fail(
        new EnvironmentCreationError(environment.root, 'another launch is still setting up the environment')
      );
    }

    try {
      // Another launch may have finished while we waited
      if (this.isPresent(environment)) {
        console.log('[Provisioner] Environment was provisioned by another launch');
        return { status: 'already-present' };
      }
      return await this.provision(environment);
    } catch (error) {
      return this.fail(new EnvironmentCreationError(environment.root, describeError(error)));
    } finally {
      await lock.release();
    }
  }

  private async provision(environment: ExecutionEnvironment): Promise<BootstrapResult> {
    const candidates = this.platform.baseRuntimeCandidates();
    const base = this.locator.locate(candidates);
    if (!base || !base.command) {
      return this.fail(
        new NoBaseRuntimeError(
          this.platform.runtime.name,
          this.platform.runtime.installUrl,
          candidates.map(c => c.label)
        )
      );
    }

    if (existsSync(environment.root)) {
      if (!(await isDisposable(environment))) {
        return this.fail(
          new EnvironmentCreationError(
            environment.root,
            'the directory exists but is not an environment created by applaunch'
          )
        );
      }
      console.warn(`[Provisioner] Removing incomplete environment at ${environment.root}`);
      await rm(environment.root, { recursive: true, force: true });
    }

    await mkdir(environment.root, { recursive: true });
    await writeFile(
      environment.markerPath,
      JSON.stringify({ pid: process.pid, startedAt: new Date().toISOString() }, null, 2)
    );

    console.log(`[Provisioner] Creating environment with ${base.label}`);
    const created = await this.runner.run(base.command, [...base.args, '-m', 'venv', environment.root], {
      cwd: dirname(environment.root),
      timeoutMs: this.timeouts.createMs
    });

    if (!succeeded(created)) {
      return this.fail(new EnvironmentCreationError(environment.root, describeFailure(created, this.timeouts.createMs)));
    }
    if (!fileExists(environment.interpreterPath)) {
      return this.fail(
        new EnvironmentCreationError(environment.root, `interpreter missing after creation: ${environment.interpreterPath}`)
      );
    }

    const warnings: string[] = [];
    let anyFailed = false;

    // Launch falls back to the system launchers; the next auto-setup rebuilds
    if (!fileExists(environment.launcherPath)) {
      warnings.push(`Environment has no launcher at ${environment.launcherPath}`);
      console.warn(`[Provisioner] ${warnings[0]}`);
    }

    const upgrade = await this.pip(environment, ['install', '--upgrade', 'pip']);
    if (!succeeded(upgrade)) {
      const error = new DependencyInstallError('upgrade-pip', describeFailure(upgrade, this.timeouts.installMs));
      if (this.dependencyPolicy === 'fail-fast') return this.fail(error);
      anyFailed = true;
      warnings.push(error.message);
      console.warn(`[Provisioner] ${error.message}`);
    }

    let dependencies: DependencyOutcome;
    if (fileExists(environment.manifestPath)) {
      console.log(`[Provisioner] Installing dependencies from ${environment.manifestPath}`);
      const install = await this.pip(environment, ['install', '-r', environment.manifestPath]);
      if (!succeeded(install)) {
        const error = new DependencyInstallError(
          'install-manifest',
          describeFailure(install, this.timeouts.installMs),
          environment.manifestPath
        );
        if (this.dependencyPolicy === 'fail-fast') return this.fail(error);
        anyFailed = true;
        warnings.push(error.message);
        console.warn(`[Provisioner] ${error.message}`);
      }
      dependencies = anyFailed ? 'failed' : 'installed';
    } else {
      console.log(`[Provisioner] No dependency manifest at ${environment.manifestPath}, skipping install`);
      dependencies = anyFailed ? 'failed' : 'skipped-no-manifest';
    }

    await unlink(environment.markerPath);
    console.log(`[Provisioner] Environment ready at ${environment.root}`);
    return { status: 'created-and-populated', dependencies, warnings };
  }

  private pip(environment: ExecutionEnvironment, args: readonly string[]) {
    return this.runner.run(environment.interpreterPath, ['-m', 'pip', ...args], {
      cwd: dirname(environment.root),
      timeoutMs: this.timeouts.installMs
    });
  }

  private fail(error: DependencyInstallError | EnvironmentCreationError | NoBaseRuntimeError): BootstrapResult {
    console.error(`[Provisioner] ${error.message}`);
    return { status: 'failed', error };
  }
}
