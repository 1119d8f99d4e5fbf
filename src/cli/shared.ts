/**
 * Options and error reporting shared by the commands.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';

import type { ConfigOverrides } from '../config/ConfigLoader.js';
import { LaunchError, describeError } from '../core/errors.js';
import type { DependencyPolicy } from '../core/types.js';
import type { BootstrapOptions } from '../launch/bootstrap.js';

/**
 * What a command hands to bootstrap besides the install root and flags.
 * Empty in the CLI; tests pass fixtures.
 */
export type CommandDependencies = Pick<BootstrapOptions, 'env' | 'platform' | 'runner' | 'launcher'>;

export interface ConfigFlags {
  entry?: string;
  envDir?: string;
  manifest?: string;
  icon?: string;
  name?: string;
  autoSetup?: boolean;
  dependencyPolicy?: DependencyPolicy;
  createTimeout?: number;
  installTimeout?: number;
  lockWait?: number;
}

export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return parsed;
}

/**
 * Flags that override the .env / environment configuration
 */
export function withConfigOptions(command: Command): Command {
  return command
    .option('-e, --entry <file>', 'Application entry file (default: main.py)')
    .option('--env-dir <dir>', 'Isolated environment directory (default: .venv)')
    .option('-m, --manifest <file>', 'Dependency manifest (default: requirements.txt)')
    .option('--icon <file>', 'Icon file (default: app.ico)')
    .option('-n, --name <name>', 'Application name shown to users')
    .addOption(
      new Option('--dependency-policy <policy>', 'What a failed dependency install means')
        .choices(['best-effort', 'fail-fast'])
    )
    .option('--create-timeout <ms>', 'Timeout for environment creation', parseMilliseconds)
    .option('--install-timeout <ms>', 'Timeout for each package install step', parseMilliseconds)
    .option('--lock-wait <ms>', 'How long to wait for another launch that is provisioning', parseMilliseconds);
}

export function toOverrides(flags: ConfigFlags): ConfigOverrides {
  return {
    entryPath: flags.entry,
    environmentDir: flags.envDir,
    manifestPath: flags.manifest,
    iconPath: flags.icon,
    appName: flags.name,
    autoSetup: flags.autoSetup,
    dependencyPolicy: flags.dependencyPolicy,
    timeouts: {
      createMs: flags.createTimeout,
      installMs: flags.installTimeout,
      lockWaitMs: flags.lockWait
    }
  };
}

/**
 * The same flags as a command line, for commands that re-invoke the CLI
 */
export function toArgs(flags: ConfigFlags): string[] {
  const args: string[] = [];
  const add = (flag: string, value: string | number | undefined) => {
    if (value !== undefined) args.push(flag, String(value));
  };

  add('--entry', flags.entry);
  add('--env-dir', flags.envDir);
  add('--manifest', flags.manifest);
  add('--icon', flags.icon);
  add('--name', flags.name);
  add('--dependency-policy', flags.dependencyPolicy);
  add('--create-timeout', flags.createTimeout);
  add('--install-timeout', flags.installTimeout);
  add('--lock-wait', flags.lockWait);
  return args;
}

/**
 * Print a failure for the user and return the exit code to terminate with
 */
export function reportFailure(error: unknown): number {
  if (error instanceof LaunchError) {
    console.error(chalk.red(error.message));
    console.error(chalk.yellow(error.remediation));
    return error.exitCode;
  }
  console.error(chalk.red(describeError(error)));
  return 1;
}

export function printDiagnostic(diagnostic: string): void {
  const [headline, ...rest] = diagnostic.split('\n');
  console.error(chalk.red.bold(headline));
  for (const line of rest) {
    console.error(line);
  }
}
