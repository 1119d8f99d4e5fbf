/**
 * Setup Command
 *
 * Create the isolated environment and install dependencies now,
 * regardless of the auto-setup setting.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { bootstrap, printBanner } from '../../launch/bootstrap.js';
import { formatDiagnostic } from '../../launch/diagnostics.js';
import {
  printDiagnostic,
  reportFailure,
  toOverrides,
  withConfigOptions,
  type CommandDependencies,
  type ConfigFlags
} from '../shared.js';

export function createSetupCommand(deps: CommandDependencies = {}): Command {
  return withConfigOptions(
    new Command('setup')
      .description('Create the isolated environment and install its dependencies')
      .argument('[appDir]', 'Install root of the application', '.')
  ).action(async (appDir: string, flags: ConfigFlags) => {
    try {
      const context = bootstrap({ ...deps, appDir, overrides: toOverrides(flags) });
      printBanner(`setup ${context.config.appName}`);

      const spinner = ora(`Preparing environment at ${context.environment.root}...`).start();
      const result = await context.provisioner.ensure(context.environment);

      switch (result.status) {
        case 'already-present':
          spinner.info('Environment already present, nothing to do');
          break;

        case 'created-and-populated':
          if (result.dependencies === 'failed') {
            spinner.warn(chalk.yellow('Environment created, but some dependencies failed to install'));
            for (const warning of result.warnings) {
              console.warn(chalk.yellow(`  ${warning}`));
            }
          } else if (result.dependencies === 'skipped-no-manifest') {
            spinner.succeed(chalk.green('Environment created (no dependency manifest found)'));
          } else {
            spinner.succeed(chalk.green('Environment created and dependencies installed'));
          }
          break;

        case 'failed':
          spinner.fail(chalk.red('Setup failed'));
          printDiagnostic(formatDiagnostic(result.error, context.config.appName));
          process.exitCode = result.error.exitCode;
          return;
      }

      console.log();
      console.log(chalk.dim('Environment:'), context.environment.root);
      console.log(chalk.dim('Launcher:'), context.environment.launcherPath);
    } catch (error) {
      process.exitCode = reportFailure(error);
    }
  });
}

export const setupCommand = createSetupCommand();
