/**
 * Shortcut Command
 *
 * Create a desktop shortcut (and a start-menu entry) that runs
 * `applaunch run --auto-setup <appDir>` with the same configuration flags.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { bootstrap } from '../../launch/bootstrap.js';
import type { ShortcutLocation } from '../../shortcut/ShortcutInstaller.js';
import {
  reportFailure,
  toArgs,
  toOverrides,
  withConfigOptions,
  type CommandDependencies,
  type ConfigFlags
} from '../shared.js';
import { resolveSelfLaunch, type SelfLaunch } from '../self-launch.js';

interface ShortcutFlags extends ConfigFlags {
  description?: string;
  desktopDir?: string;
  startMenu: boolean;
}

export interface ShortcutCommandDependencies extends CommandDependencies {
  /** How the shortcut starts this CLI; defaults to the running process */
  self?: SelfLaunch;
}

export function createShortcutCommand(deps: ShortcutCommandDependencies = {}): Command {
  const { self: selfLaunch, ...bootstrapDeps } = deps;

  return withConfigOptions(
    new Command('shortcut')
      .description('Install a desktop shortcut that launches the application')
      .argument('[appDir]', 'Install root of the application', '.')
      .option('-d, --description <text>', 'Shortcut description')
      .option('--desktop-dir <dir>', 'Write the desktop shortcut into this folder')
      .option('--no-start-menu', 'Do not add a start-menu entry')
  ).action(async (appDir: string, flags: ShortcutFlags) => {
    const spinner = ora('Creating shortcut...').start();

    try {
      const { config, shortcuts } = bootstrap({ ...bootstrapDeps, appDir, overrides: toOverrides(flags) });
      const self = selfLaunch ?? resolveSelfLaunch();
      const locations: ShortcutLocation[] = flags.startMenu ? ['desktop', 'start-menu'] : ['desktop'];

      const result = await shortcuts.install({
        name: config.appName,
        description: flags.description ?? `Launch ${config.appName}`,
        targetPath: self.command,
        args: [...self.args, 'run', '--auto-setup', ...toArgs(flags), config.installRoot],
        workingDir: config.installRoot,
        iconPath: config.iconPath,
        locations,
        desktopDir: flags.desktopDir
      });

      spinner.succeed(chalk.green(`Shortcut installed for ${config.appName}`));
      for (const written of result.written) {
        console.log(chalk.dim('  wrote'), written);
      }
      for (const skipped of result.skipped) {
        console.log(chalk.dim(`  skipped ${skipped.location}: ${skipped.reason}`));
      }
    } catch (error) {
      spinner.fail(chalk.red('Shortcut installation failed'));
      process.exitCode = reportFailure(error);
    }
  });
}

export const shortcutCommand = createShortcutCommand();
