/**
 * ProcessLauncher
 *
 * Hands the target program to its launcher. By default the child is
 * detached with no console and no inherited stdio, and the launcher
 * returns as soon as the child has spawned.
 */

import { spawn } from 'child_process';

export interface LaunchRequest {
  command: string;
  args: readonly string[];
  cwd: string;
  /** Stay attached and resolve with the child's exit code */
  wait: boolean;
}

export interface LaunchHandoff {
  pid: number | undefined;
  /** 0 at handoff; the child's own exit code when waiting */
  exitCode: number;
}

export interface ProcessLauncher {
  launch(request: LaunchRequest): Promise<LaunchHandoff>;
}

export class DetachedProcessLauncher implements ProcessLauncher {
  launch(request: LaunchRequest): Promise<LaunchHandoff> {
    return new Promise<LaunchHandoff>((resolve, reject) => {
      const child = spawn(request.command, [...request.args], {
        cwd: request.cwd,
        detached: !request.wait,
        stdio: request.wait ? 'inherit' : 'ignore',
        windowsHide: true
      });

      child.once('error', reject);

      if (request.wait) {
        child.once('close', (code, signal) => {
          resolve({ pid: child.pid, exitCode: code ?? (signal ? 1 : 0) });
        });
        return;
      }

      child.once('spawn', () => {
        child.unref();
        resolve({ pid: child.pid, exitCode: 0 });
      });
    });
  }
}
