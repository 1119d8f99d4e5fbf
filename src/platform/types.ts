/**
 * Platform Capability Types
 *
 * Everything the launcher needs to know about the host platform. The
 * orchestration logic only talks to this interface.
 */

import type { ExecutionEnvironment, LaunchConfig, LauncherCandidate } from '../core/types.js';

export type PlatformId = 'windows' | 'linux' | 'macos';

/**
 * File format written by the shortcut installer
 */
export type ShortcutFormat = 'lnk' | 'desktop-entry' | 'command-script';

export interface RuntimeDescriptor {
  /** Name shown in diagnostics */
  name: string;
  /** Where users get the runtime */
  installUrl: string;
}

export interface PlatformProfile {
  readonly id: PlatformId;
  readonly runtime: RuntimeDescriptor;
  readonly shortcutFormat: ShortcutFormat;
  /** File extension of shortcut files, including the dot */
  readonly shortcutExtension: string;

  /** Where the isolated environment keeps its binaries */
  environmentLayout(config: LaunchConfig): ExecutionEnvironment;

  /** Launchers for the target program, highest priority first */
  launcherCandidates(environment: ExecutionEnvironment): LauncherCandidate[];

  /** Interpreters able to create an environment, highest priority first */
  baseRuntimeCandidates(): LauncherCandidate[];

  desktopPath(): string | undefined;
  startMenuPath(): string | undefined;
}
