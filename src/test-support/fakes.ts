/**
 * In-process stand-ins for subprocesses, plus temporary install roots.
 */

import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

import type { ExecutionEnvironment, LaunchConfig } from '../core/types.js';
import type { CommandOptions, CommandResult, CommandRunner } from '../process/CommandRunner.js';
import type { LaunchHandoff, LaunchRequest, ProcessLauncher } from '../process/ProcessLauncher.js';

export interface RecordedCommand {
  command: string;
  args: readonly string[];
  options: CommandOptions;
}

export type CommandResponder = (call: RecordedCommand) => CommandResult;

export function ok(stdout = ''): CommandResult {
  return { exitCode: 0, timedOut: false, stdout, stderr: '' };
}

export function exitedWith(exitCode: number, stderr: string): CommandResult {
  return { exitCode, timedOut: false, stdout: '', stderr };
}

export function timedOut(): CommandResult {
  return { exitCode: null, timedOut: true, stdout: '', stderr: '' };
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  respond: CommandResponder;

  constructor(respond: CommandResponder = () => ok()) {
    this.respond = respond;
  }

  async run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult> {
    const call = { command, args: [...args], options };
    this.calls.push(call);
    return this.respond(call);
  }
}

export interface VenvBehaviour {
  /** Result of `-m venv`; the environment is only written when it succeeds */
  create?: CommandResult;
  upgrade?: CommandResult;
  install?: CommandResult;
  /** Leave the windowed launcher out of the created environment */
  withoutLauncher?: boolean;
}

/**
 * Responder that behaves like a Python installation: `-m venv` writes
 * pyvenv.cfg and the environment's binaries, `-m pip` answers per step.
 */
export function pythonResponder(environment: ExecutionEnvironment, behaviour: VenvBehaviour = {}): CommandResponder {
  return (call) => {
    if (call.args.includes('venv')) {
      const result = behaviour.create ?? ok();
      if (result.exitCode === 0 && !result.timedOut) {
        touch(join(environment.root, 'pyvenv.cfg'), 'include-system-site-packages = false\n');
        touch(environment.interpreterPath);
        if (!behaviour.withoutLauncher) touch(environment.launcherPath);
      }
      return result;
    }
    if (call.args.includes('--upgrade')) return behaviour.upgrade ?? ok();
    if (call.args.includes('-r')) return behaviour.install ?? ok();
    return ok();
  };
}

export class FakeLauncher implements ProcessLauncher {
  readonly requests: LaunchRequest[] = [];
  exitCode = 0;
  failWith: Error | null = null;

  async launch(request: LaunchRequest): Promise<LaunchHandoff> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    return { pid: 4242, exitCode: request.wait ? this.exitCode : 0 };
  }
}

export function touch(filePath: string, content = ''): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

export function touchExecutable(filePath: string): void {
  touch(filePath, '#!/bin/sh\n');
  chmodSync(filePath, 0o755);
}

export function makeTempDir(prefix = 'applaunch-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * LaunchConfig rooted at `installRoot` with the default file names
 */
export function testConfig(installRoot: string, overrides: Partial<LaunchConfig> = {}): LaunchConfig {
  return {
    installRoot,
    environmentDir: join(installRoot, '.venv'),
    manifestPath: join(installRoot, 'requirements.txt'),
    entryPath: join(installRoot, 'main.py'),
    iconPath: join(installRoot, 'app.ico'),
    appName: 'Daily Reports',
    autoSetup: true,
    dependencyPolicy: 'best-effort',
    timeouts: { createMs: 120_000, installMs: 600_000, lockWaitMs: 1_000 },
    ...overrides
  };
}
