/**
 * LaunchOrchestrator
 *
 * Single pass from start to hand-off:
 *
 *   start -> (provisioning) -> locating -> launching | failed
 *
 * Provisioning only runs in auto-setup mode and only when the environment
 * is not already usable. Nothing is retried; every failure ends the pass
 * with a diagnostic and a non-zero exit code.
 */

import {
  EntryNotFoundError,
  LaunchSpawnError,
  RuntimeUnavailableError,
  describeError,
  type LaunchError
} from '../core/errors.js';
import type { BootstrapResult, LaunchConfig, LaunchOutcome, LaunchState } from '../core/types.js';
import type { EnvironmentProvisioner } from '../environment/EnvironmentProvisioner.js';
import { fileExists } from '../platform/PathProbe.js';
import type { PlatformProfile } from '../platform/types.js';
import type { ProcessLauncher } from '../process/ProcessLauncher.js';
import { RuntimeLocator } from '../runtime/RuntimeLocator.js';
import { formatDiagnostic } from './diagnostics.js';

export interface OrchestratorDependencies {
  platform: PlatformProfile;
  provisioner: EnvironmentProvisioner;
  launcher: ProcessLauncher;
  locator?: RuntimeLocator;
}

export interface RunOptions {
  /** Stay attached to the launched program and report its exit code */
  wait?: boolean;
}

export class LaunchOrchestrator {
  private readonly platform: PlatformProfile;
  private readonly provisioner: EnvironmentProvisioner;
  private readonly launcher: ProcessLauncher;
  private readonly locator: RuntimeLocator;

  constructor(deps: OrchestratorDependencies) {
    this.platform = deps.platform;
    this.provisioner = deps.provisioner;
    this.launcher = deps.launcher;
    this.locator = deps.locator ?? new RuntimeLocator();
  }

  async run(config: LaunchConfig, options: RunOptions = {}): Promise<LaunchOutcome> {
    const transitions: LaunchState[] = ['start'];
    const environment = this.platform.environmentLayout(config);
    let bootstrap: BootstrapResult | undefined;

    if (config.autoSetup && !this.provisioner.isPresent(environment)) {
      transitions.push('provisioning');
      bootstrap = await this.provisioner.ensure(environment);
      if (bootstrap.status === 'failed') {
        return this.failed(config, bootstrap.error, transitions, bootstrap);
      }
    }

    transitions.push('locating');
    const candidates = this.platform.launcherCandidates(environment);
    const candidate = this.locator.locate(candidates);
    if (!candidate || !candidate.command) {
      const error = new RuntimeUnavailableError(
        this.platform.runtime.name,
        this.platform.runtime.installUrl,
        candidates.map(c => c.label)
      );
      return this.failed(config, error, transitions, bootstrap);
    }

    if (!fileExists(config.entryPath)) {
      return this.failed(config, new EntryNotFoundError(config.entryPath), transitions, bootstrap);
    }

    transitions.push('launching');
    try {
      const handoff = await this.launcher.launch({
        command: candidate.command,
        args: [...candidate.args, config.entryPath],
        cwd: config.installRoot,
        wait: options.wait ?? false
      });
      console.log(`[Launch] Started ${config.appName} (pid ${handoff.pid ?? 'unknown'}) with ${candidate.label}`);
      return { state: 'launching', exitCode: handoff.exitCode, candidate, bootstrap, transitions };
    } catch (error) {
      const spawnError = new LaunchSpawnError(candidate.command, describeError(error));
      return this.failed(config, spawnError, transitions, bootstrap);
    }
  }

  private failed(
    config: LaunchConfig,
    error: LaunchError,
    transitions: LaunchState[],
    bootstrap: BootstrapResult | undefined
  ): LaunchOutcome {
    transitions.push('failed');
    return {
      state: 'failed',
      exitCode: error.exitCode,
      error,
      diagnostic: formatDiagnostic(error, config.appName),
      bootstrap,
      transitions
    };
  }
}
