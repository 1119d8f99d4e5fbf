/**
 * Core Types
 *
 * Shared data model for configuration, launcher candidates, environments
 * and the results that flow between provisioning, locating and launching.
 */

import type { LaunchError } from './errors.js';

/**
 * What to do when upgrading tooling or installing dependencies fails
 * after the environment itself was created.
 */
export type DependencyPolicy = 'best-effort' | 'fail-fast';

export interface LaunchTimeouts {
  /** Environment creation (ms) */
  createMs: number;
  /** Each package-manager invocation (ms) */
  installMs: number;
  /** How long to wait for another launch holding the provisioning lock (ms) */
  lockWaitMs: number;
}

/**
 * Explicit launcher configuration, built once at start and passed to
 * every component. All paths are absolute.
 */
export interface LaunchConfig {
  installRoot: string;
  environmentDir: string;
  manifestPath: string;
  entryPath: string;
  iconPath: string;
  appName: string;
  autoSetup: boolean;
  dependencyPolicy: DependencyPolicy;
  timeouts: LaunchTimeouts;
}

/**
 * On-disk locations of one isolated execution environment
 */
export interface ExecutionEnvironment {
  root: string;
  binDir: string;
  /** Windowed launcher inside the environment */
  launcherPath: string;
  /** Console interpreter used to drive the package manager */
  interpreterPath: string;
  /** Present only while provisioning is in progress (or failed fail-fast) */
  markerPath: string;
  lockPath: string;
  manifestPath: string;
}

export type LauncherCandidateId =
  | 'environment-windowed'
  | 'version-selector'
  | 'system-windowed'
  | 'system-interpreter';

/**
 * One concrete way to run the target program.
 *
 * `command` is resolved lazily by `isAvailable()` for search-path lookups,
 * so it is only meaningful once the predicate returned true.
 */
export interface LauncherCandidate {
  id: LauncherCandidateId;
  label: string;
  readonly command: string | undefined;
  args: readonly string[];
  isAvailable(): boolean;
}

export type DependencyOutcome = 'installed' | 'skipped-no-manifest' | 'failed';

export type BootstrapResult =
  | { status: 'already-present' }
  | { status: 'created-and-populated'; dependencies: DependencyOutcome; warnings: string[] }
  | { status: 'failed'; error: LaunchError };

export type LaunchState = 'start' | 'provisioning' | 'locating' | 'launching' | 'failed';

export type LaunchOutcome =
  | {
      state: 'launching';
      exitCode: number;
      candidate: LauncherCandidate;
      bootstrap?: BootstrapResult;
      transitions: LaunchState[];
    }
  | {
      state: 'failed';
      exitCode: number;
      error: LaunchError;
      diagnostic: string;
      bootstrap?: BootstrapResult;
      transitions: LaunchState[];
    };
