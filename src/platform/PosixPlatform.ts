/**
 * PosixPlatform
 *
 * Linux and macOS. There is no separate windowed interpreter, so the
 * environment's bin/python is the preferred launcher; the process is
 * started detached with no terminal instead.
 */

import { join } from 'path';

import type { ExecutionEnvironment, LaunchConfig, LauncherCandidate } from '../core/types.js';
import { FileCandidate, SearchPathCandidate } from '../runtime/candidates.js';
import type { SearchPathOptions } from './PathProbe.js';
import type { PlatformProfile, RuntimeDescriptor, ShortcutFormat } from './types.js';
import { PROVISIONING_MARKER, PYTHON_RUNTIME } from './constants.js';

export class PosixPlatform implements PlatformProfile {
  readonly id: 'linux' | 'macos';
  readonly runtime: RuntimeDescriptor = PYTHON_RUNTIME;
  readonly shortcutFormat: ShortcutFormat;
  readonly shortcutExtension: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(id: 'linux' | 'macos', env: NodeJS.ProcessEnv) {
    this.id = id;
    this.env = env;
    this.shortcutFormat = id === 'macos' ? 'command-script' : 'desktop-entry';
    this.shortcutExtension = id === 'macos' ? '.command' : '.desktop';
  }

  environmentLayout(config: LaunchConfig): ExecutionEnvironment {
    const binDir = join(config.environmentDir, 'bin');
    const python = join(binDir, 'python');
    return {
      root: config.environmentDir,
      binDir,
      launcherPath: python,
      interpreterPath: python,
      markerPath: join(config.environmentDir, PROVISIONING_MARKER),
      lockPath: `${config.environmentDir}.lock`,
      manifestPath: config.manifestPath
    };
  }

  launcherCandidates(environment: ExecutionEnvironment): LauncherCandidate[] {
    const search = this.searchPath();
    return [
      new FileCandidate('environment-windowed', 'environment bin/python', environment.launcherPath),
      new SearchPathCandidate('version-selector', 'py launcher (py -3)', 'py', search, ['-3']),
      new SearchPathCandidate('system-interpreter', 'python3 on PATH', 'python3', search)
    ];
  }

  baseRuntimeCandidates(): LauncherCandidate[] {
    const search = this.searchPath();
    return [
      new SearchPathCandidate('version-selector', 'py launcher (py -3)', 'py', search, ['-3']),
      new SearchPathCandidate('system-interpreter', 'python3 on PATH', 'python3', search)
    ];
  }

  desktopPath(): string | undefined {
    if (this.id === 'linux' && this.env.XDG_DESKTOP_DIR) {
      return this.env.XDG_DESKTOP_DIR;
    }
    const home = this.env.HOME;
    return home ? join(home, 'Desktop') : undefined;
  }

  startMenuPath(): string | undefined {
    if (this.id === 'macos') return undefined;

    if (this.env.XDG_DATA_HOME) {
      return join(this.env.XDG_DATA_HOME, 'applications');
    }
    const home = this.env.HOME;
    return home ? join(home, '.local', 'share', 'applications') : undefined;
  }

  private searchPath(): SearchPathOptions {
    return {
      pathValue: this.env.PATH,
      delimiter: ':',
      extensions: [],
      requireExecutable: true
    };
  }
}
