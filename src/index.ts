/**
 * applaunch
 *
 * Bootstrap and launch a local application: provision an isolated runtime
 * environment on first run, pick a launcher through an ordered fallback
 * cascade and hand the application off to it.
 */

// Core
export * from './core/errors.js';
export type {
  BootstrapResult,
  DependencyOutcome,
  DependencyPolicy,
  ExecutionEnvironment,
  LaunchConfig,
  LauncherCandidate,
  LauncherCandidateId,
  LaunchOutcome,
  LaunchState,
  LaunchTimeouts
} from './core/types.js';

// Configuration
export { ConfigLoader, CONFIG_DEFAULTS, loadLaunchConfig } from './config/ConfigLoader.js';
export type { ConfigOverrides, LauncherEnv } from './config/ConfigLoader.js';

// Platform
export * from './platform/index.js';

// Runtime location
export { RuntimeLocator } from './runtime/RuntimeLocator.js';
export type { CandidateReport } from './runtime/RuntimeLocator.js';
export { FileCandidate, SearchPathCandidate } from './runtime/candidates.js';

// Processes
export { ChildProcessRunner, describeFailure, succeeded } from './process/CommandRunner.js';
export type { CommandOptions, CommandResult, CommandRunner } from './process/CommandRunner.js';
export { DetachedProcessLauncher } from './process/ProcessLauncher.js';
export type { LaunchHandoff, LaunchRequest, ProcessLauncher } from './process/ProcessLauncher.js';

// Environment
export { EnvironmentProvisioner } from './environment/EnvironmentProvisioner.js';
export type { ProvisionerOptions } from './environment/EnvironmentProvisioner.js';
export { ProvisioningLock } from './environment/ProvisioningLock.js';
export type { LockOptions } from './environment/ProvisioningLock.js';

// Launch
export { LaunchOrchestrator } from './launch/LaunchOrchestrator.js';
export type { OrchestratorDependencies, RunOptions } from './launch/LaunchOrchestrator.js';
export { bootstrap } from './launch/bootstrap.js';
export type { BootstrapOptions, LaunchContext } from './launch/bootstrap.js';
export { formatDiagnostic } from './launch/diagnostics.js';

// Shortcuts
export { ShortcutInstaller, shortcutFileName } from './shortcut/ShortcutInstaller.js';
export type {
  ShortcutInstallerOptions,
  ShortcutInstallResult,
  ShortcutLocation,
  ShortcutSpec
} from './shortcut/ShortcutInstaller.js';
