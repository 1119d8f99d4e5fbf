/**
 * WindowsPlatform
 *
 * Python virtual environments under Windows: Scripts\pythonw.exe inside the
 * environment, the `py` version selector, then pythonw.exe on PATH.
 */

import { join } from 'path';

import type { ExecutionEnvironment, LaunchConfig, LauncherCandidate } from '../core/types.js';
import { FileCandidate, SearchPathCandidate } from '../runtime/candidates.js';
import { parsePathExt, type SearchPathOptions } from './PathProbe.js';
import type { PlatformProfile, RuntimeDescriptor } from './types.js';
import { PROVISIONING_MARKER, PYTHON_RUNTIME } from './constants.js';

export class WindowsPlatform implements PlatformProfile {
  readonly id = 'windows';
  readonly runtime: RuntimeDescriptor = PYTHON_RUNTIME;
  readonly shortcutFormat = 'lnk';
  readonly shortcutExtension = '.lnk';
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv) {
    this.env = env;
  }

  environmentLayout(config: LaunchConfig): ExecutionEnvironment {
    const binDir = join(config.environmentDir, 'Scripts');
    return {
      root: config.environmentDir,
      binDir,
      launcherPath: join(binDir, 'pythonw.exe'),
      interpreterPath: join(binDir, 'python.exe'),
      markerPath: join(config.environmentDir, PROVISIONING_MARKER),
      lockPath: `${config.environmentDir}.lock`,
      manifestPath: config.manifestPath
    };
  }

  launcherCandidates(environment: ExecutionEnvironment): LauncherCandidate[] {
    const search = this.searchPath();
    return [
      new FileCandidate('environment-windowed', 'environment pythonw.exe', environment.launcherPath),
      new SearchPathCandidate('version-selector', 'py launcher (py -3)', 'py', search, ['-3']),
      new SearchPathCandidate('system-windowed', 'pythonw on PATH', 'pythonw', search)
    ];
  }

  baseRuntimeCandidates(): LauncherCandidate[] {
    const search = this.searchPath();
    return [
      new SearchPathCandidate('version-selector', 'py launcher (py -3)', 'py', search, ['-3']),
      new SearchPathCandidate('system-interpreter', 'python on PATH', 'python', search)
    ];
  }

  desktopPath(): string | undefined {
    const profile = this.env.USERPROFILE;
    return profile ? join(profile, 'Desktop') : undefined;
  }

  startMenuPath(): string | undefined {
    const appData = this.env.APPDATA;
    return appData ? join(appData, 'Microsoft', 'Windows', 'Start Menu', 'Programs') : undefined;
  }

  private searchPath(): SearchPathOptions {
    return {
      // Windows environment blocks are case-insensitive; Node keeps the original casing
      pathValue: this.env.PATH ?? this.env.Path,
      delimiter: ';',
      extensions: parsePathExt(this.env.PATHEXT),
      requireExecutable: false
    };
  }
}
