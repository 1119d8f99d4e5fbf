/**
 * ShortcutInstaller
 *
 * Writes a desktop shortcut (and a start-menu entry where the platform has
 * one) that points back at the launcher. Re-running overwrites the same
 * files. Invoked by the operator, never by the launch path.
 */

import { chmod, mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

import { ShortcutLocationError } from '../core/errors.js';
import { fileExists } from '../platform/PathProbe.js';
import type { PlatformProfile } from '../platform/types.js';
import { describeFailure, succeeded, type CommandRunner } from '../process/CommandRunner.js';
import {
  encodePowerShell,
  renderCommandScript,
  renderDesktopEntry,
  renderLnkScript,
  type ShortcutContent
} from './formats.js';

export type ShortcutLocation = 'desktop' | 'start-menu';

export interface ShortcutSpec {
  name: string;
  description: string;
  targetPath: string;
  args: readonly string[];
  workingDir: string;
  iconPath?: string;
  locations: readonly ShortcutLocation[];
  /** Write the desktop shortcut here instead of the platform's desktop */
  desktopDir?: string;
}

export interface ShortcutInstallResult {
  written: string[];
  skipped: Array<{ location: ShortcutLocation; reason: string }>;
}

export interface ShortcutInstallerOptions {
  platform: PlatformProfile;
  runner: CommandRunner;
  powershell?: string;
  timeoutMs?: number;
}

/**
 * Strip characters no desktop file system accepts in a file name
 */
export function shortcutFileName(name: string, extension: string): string {
  const cleaned = name.replace(/[<>:"/\\|?*\x00-\x1f]/g, '').trim();
  return `${cleaned || 'Application'}${extension}`;
}

export class ShortcutInstaller {
  private readonly platform: PlatformProfile;
  private readonly runner: CommandRunner;
  private readonly powershell: string;
  private readonly timeoutMs: number;

  constructor(options: ShortcutInstallerOptions) {
    this.platform = options.platform;
    this.runner = options.runner;
    this.powershell = options.powershell ?? 'powershell.exe';
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async install(spec: ShortcutSpec): Promise<ShortcutInstallResult> {
    const result: ShortcutInstallResult = { written: [], skipped: [] };
    const content: ShortcutContent = {
      name: spec.name,
      description: spec.description,
      targetPath: spec.targetPath,
      args: spec.args,
      workingDir: spec.workingDir,
      iconPath: spec.iconPath && fileExists(spec.iconPath) ? spec.iconPath : undefined
    };
    const fileName = shortcutFileName(spec.name, this.platform.shortcutExtension);

    for (const location of spec.locations) {
      const dir = location === 'desktop'
        ? spec.desktopDir ?? this.platform.desktopPath()
        : this.platform.startMenuPath();

      if (!dir) {
        if (location === 'desktop') {
          throw new ShortcutLocationError('no desktop folder could be resolved for this user');
        }
        result.skipped.push({ location, reason: `no start menu on ${this.platform.id}` });
        continue;
      }

      await mkdir(dir, { recursive: true });
      const shortcutPath = join(dir, fileName);
      await this.write(shortcutPath, content);
      console.log(`[Shortcut] Wrote ${shortcutPath}`);
      result.written.push(shortcutPath);
    }

    return result;
  }

  private async write(shortcutPath: string, content: ShortcutContent): Promise<void> {
    switch (this.platform.shortcutFormat) {
      case 'desktop-entry':
        await writeFile(shortcutPath, renderDesktopEntry(content), 'utf-8');
        await chmod(shortcutPath, 0o755);
        return;

      case 'command-script':
        await writeFile(shortcutPath, renderCommandScript(content), 'utf-8');
        await chmod(shortcutPath, 0o755);
        return;

      case 'lnk': {
        const script = renderLnkScript(content, shortcutPath);
        const run = await this.runner.run(
          this.powershell,
          ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-EncodedCommand', encodePowerShell(script)],
          { timeoutMs: this.timeoutMs }
        );
        if (!succeeded(run)) {
          throw new ShortcutLocationError(`${shortcutPath}: ${describeFailure(run, this.timeoutMs)}`);
        }
        return;
      }
    }
  }
}
