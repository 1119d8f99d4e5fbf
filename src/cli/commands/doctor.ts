/**
 * Doctor Command
 *
 * Show the resolved configuration and every launcher candidate in
 * priority order, marking the one a launch would use. Read-only.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { LauncherCandidate } from '../../core/types.js';
import { bootstrap } from '../../launch/bootstrap.js';
import { fileExists } from '../../platform/PathProbe.js';
import type { CandidateReport } from '../../runtime/RuntimeLocator.js';
import {
  reportFailure,
  toOverrides,
  withConfigOptions,
  type CommandDependencies,
  type ConfigFlags
} from '../shared.js';

function describeCandidate(candidate: LauncherCandidate): string {
  const args = candidate.args.length > 0 ? ` ${candidate.args.join(' ')}` : '';
  return candidate.command ? `${candidate.command}${args}` : 'not found';
}

function printReports(title: string, reports: CandidateReport[]): boolean {
  const pick = reports.find(report => report.available);

  console.log(chalk.cyan(title));
  console.log(chalk.dim('─'.repeat(40)));
  reports.forEach((report, index) => {
    const mark = report === pick ? chalk.green('→') : ' ';
    const status = report.available ? chalk.green('✓') : chalk.red('✗');
    console.log(`${mark} ${index + 1}. ${status} ${report.candidate.label}`);
    console.log(chalk.dim(`       ${describeCandidate(report.candidate)}`));
  });
  console.log();
  return pick !== undefined;
}

function toJson(reports: CandidateReport[]) {
  const pick = reports.find(report => report.available);
  return reports.map(report => ({
    id: report.candidate.id,
    label: report.candidate.label,
    command: report.candidate.command ?? null,
    args: report.candidate.args,
    available: report.available,
    selected: report === pick
  }));
}

export function createDoctorCommand(deps: CommandDependencies = {}): Command {
  return withConfigOptions(
    new Command('doctor')
      .description('Report which launchers and base runtimes are available')
      .argument('[appDir]', 'Install root of the application', '.')
      .option('-o, --output <format>', 'Output format (json, text)', 'text')
  ).action((appDir: string, flags: ConfigFlags & { output: string }) => {
    try {
      const { config, platform, environment, locator, provisioner } = bootstrap({
        ...deps,
        appDir,
        overrides: toOverrides(flags)
      });

      const launchers = locator.survey(platform.launcherCandidates(environment));
      const baseRuntimes = locator.survey(platform.baseRuntimeCandidates());

      if (flags.output === 'json') {
        console.log(JSON.stringify({
          platform: platform.id,
          config,
          environmentPresent: provisioner.isPresent(environment),
          entryPresent: fileExists(config.entryPath),
          launchers: toJson(launchers),
          baseRuntimes: toJson(baseRuntimes)
        }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.cyan(`${config.appName} on ${platform.id}`));
      console.log(chalk.dim('─'.repeat(40)));
      console.log(chalk.dim('Install root:'), config.installRoot);
      console.log(chalk.dim('Entry file:'), config.entryPath, fileExists(config.entryPath) ? chalk.green('✓') : chalk.red('missing'));
      console.log(chalk.dim('Manifest:'), config.manifestPath, fileExists(config.manifestPath) ? chalk.green('✓') : chalk.dim('none'));
      console.log(chalk.dim('Environment:'), environment.root, provisioner.isPresent(environment) ? chalk.green('present') : chalk.yellow('not provisioned'));
      console.log(chalk.dim('Auto-setup:'), config.autoSetup ? 'on' : 'off');
      console.log(chalk.dim('Dependency policy:'), config.dependencyPolicy);
      console.log();

      const canLaunch = printReports('Launchers', launchers);
      printReports('Base runtimes (environment creation)', baseRuntimes);

      if (!canLaunch) {
        console.log(chalk.yellow(`Install ${platform.runtime.name} from ${platform.runtime.installUrl}`));
      }
    } catch (error) {
      process.exitCode = reportFailure(error);
    }
  });
}

export const doctorCommand = createDoctorCommand();
