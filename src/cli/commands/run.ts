/**
 * Run Command
 *
 * Provision the environment when auto-setup is on, pick a launcher and
 * hand the application off to it.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import { bootstrap } from '../../launch/bootstrap.js';
import {
  printDiagnostic,
  reportFailure,
  toOverrides,
  withConfigOptions,
  type CommandDependencies,
  type ConfigFlags
} from '../shared.js';

interface RunFlags extends ConfigFlags {
  wait?: boolean;
}

export function createRunCommand(deps: CommandDependencies = {}): Command {
  return withConfigOptions(
    new Command('run')
      .description('Launch the application, creating its environment first when auto-setup is on')
      .argument('[appDir]', 'Install root of the application', '.')
      .option('-s, --auto-setup', 'Create the environment and install dependencies on first run')
      .option('--no-auto-setup', 'Never provision; launch with whatever runtime is present')
      .option('-w, --wait', 'Stay attached and exit with the application\'s exit code', false)
  ).action(async (appDir: string, flags: RunFlags) => {
    try {
      const context = bootstrap({ ...deps, appDir, overrides: toOverrides(flags) });
      const outcome = await context.orchestrator.run(context.config, { wait: flags.wait });

      if (outcome.bootstrap?.status === 'created-and-populated') {
        for (const warning of outcome.bootstrap.warnings) {
          console.warn(chalk.yellow(`Warning: ${warning}`));
        }
      }

      if (outcome.state === 'failed') {
        printDiagnostic(outcome.diagnostic);
      }
      process.exitCode = outcome.exitCode;
    } catch (error) {
      process.exitCode = reportFailure(error);
    }
  });
}

export const runCommand = createRunCommand();
