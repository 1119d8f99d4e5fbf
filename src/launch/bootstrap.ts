/**
 * Bootstrap
 *
 * Shared initialization for all commands: loads the configuration once
 * and wires the platform profile, subprocess runner and components that
 * receive it.
 */

import { ConfigLoader, type ConfigOverrides } from '../config/ConfigLoader.js';
import type { ExecutionEnvironment, LaunchConfig } from '../core/types.js';
import { EnvironmentProvisioner } from '../environment/EnvironmentProvisioner.js';
import { createPlatformProfile, detectPlatform } from '../platform/index.js';
import type { PlatformId, PlatformProfile } from '../platform/types.js';
import { ChildProcessRunner, type CommandRunner } from '../process/CommandRunner.js';
import { DetachedProcessLauncher, type ProcessLauncher } from '../process/ProcessLauncher.js';
import { RuntimeLocator } from '../runtime/RuntimeLocator.js';
import { ShortcutInstaller } from '../shortcut/ShortcutInstaller.js';
import { LaunchOrchestrator } from './LaunchOrchestrator.js';

export interface BootstrapOptions {
  /** Install root of the application */
  appDir: string;
  overrides?: ConfigOverrides;
  /** Defaults to process.env; read once here and nowhere else */
  env?: NodeJS.ProcessEnv;
  platform?: PlatformId;
  runner?: CommandRunner;
  launcher?: ProcessLauncher;
}

export interface LaunchContext {
  config: LaunchConfig;
  platform: PlatformProfile;
  environment: ExecutionEnvironment;
  locator: RuntimeLocator;
  provisioner: EnvironmentProvisioner;
  orchestrator: LaunchOrchestrator;
  shortcuts: ShortcutInstaller;
}

/**
 * Build every component for one invocation
 *
 * @throws ConfigError when the configuration is invalid
 */
export function bootstrap(options: BootstrapOptions): LaunchContext {
  const env = options.env ?? process.env;
  const config = new ConfigLoader(env).load(options.appDir, options.overrides);
  const platform = createPlatformProfile(options.platform ?? detectPlatform(), env);
  const runner = options.runner ?? new ChildProcessRunner();
  const locator = new RuntimeLocator();

  const provisioner = new EnvironmentProvisioner({
    platform,
    runner,
    locator,
    dependencyPolicy: config.dependencyPolicy,
    timeouts: config.timeouts
  });

  const orchestrator = new LaunchOrchestrator({
    platform,
    provisioner,
    locator,
    launcher: options.launcher ?? new DetachedProcessLauncher()
  });

  return {
    config,
    platform,
    environment: platform.environmentLayout(config),
    locator,
    provisioner,
    orchestrator,
    shortcuts: new ShortcutInstaller({ platform, runner })
  };
}

/**
 * Print startup banner
 */
export function printBanner(service: string): void {
  console.log('');
  console.log('╔════════════════════════════════════════╗');
  console.log(`║  applaunch: ${service.padEnd(27)}║`);
  console.log('╚════════════════════════════════════════╝');
  console.log('');
}
