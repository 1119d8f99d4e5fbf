/**
 * CommandRunner
 *
 * Runs installer subprocesses to completion with a timeout. A timed out
 * child gets SIGTERM, then SIGKILL after a short grace period.
 */

import { spawn } from 'child_process';

export interface CommandOptions {
  cwd?: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  /** null when the process was killed by a signal or never started */
  exitCode: number | null;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned at all */
  spawnError?: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult>;
}

const KILL_GRACE_MS = 5000;
const MAX_CAPTURE = 64 * 1024;

/**
 * Keep the tail of a stream; installers put the useful error last
 */
function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
}

export class ChildProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true
      });

      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
      }, options.timeoutMs);

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => { stdout = appendCapped(stdout, chunk); });
      child.stderr.on('data', (chunk: string) => { stderr = appendCapped(stderr, chunk); });

      child.on('error', (err) => {
        finish({ exitCode: null, timedOut, stdout, stderr, spawnError: err.message });
      });

      child.on('close', (code) => {
        finish({ exitCode: code, timedOut, stdout, stderr });
      });
    });
  }
}

/**
 * One-line reason for a failed command, for error messages
 */
export function describeFailure(result: CommandResult, timeoutMs: number): string {
  if (result.spawnError) return result.spawnError;
  if (result.timedOut) return `timed out after ${Math.round(timeoutMs / 1000)}s`;

  const output = (result.stderr.trim() || result.stdout.trim())
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0);
  const last = output.length > 0 ? output[output.length - 1].trim() : '';
  const status = result.exitCode === null ? 'terminated by signal' : `exit code ${result.exitCode}`;
  return last ? `${status}: ${last}` : status;
}

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.timedOut && !result.spawnError;
}
