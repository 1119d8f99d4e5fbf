#!/usr/bin/env node
/**
 * applaunch CLI
 *
 * Bootstrap and launch a local application.
 */

import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { setupCommand } from './commands/setup.js';
import { doctorCommand } from './commands/doctor.js';
import { shortcutCommand } from './commands/shortcut.js';

const program = new Command();

program
  .name('applaunch')
  .description('Provision an isolated runtime environment and launch a local application')
  .version('0.1.0');

program.addCommand(runCommand, { isDefault: true });
program.addCommand(setupCommand);
program.addCommand(doctorCommand);
program.addCommand(shortcutCommand);

await program.parseAsync();
