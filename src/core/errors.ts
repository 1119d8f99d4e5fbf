/**
 * Launch Error Classes
 *
 * Every failure the launcher can report to a user. Each carries the process
 * exit code the CLI terminates with and a remediation line for the diagnostic.
 */

export type LaunchErrorCode =
  | 'NO_BASE_RUNTIME'
  | 'ENVIRONMENT_CREATION_FAILED'
  | 'DEPENDENCY_INSTALL_FAILED'
  | 'RUNTIME_UNAVAILABLE'
  | 'ENTRY_NOT_FOUND'
  | 'LAUNCH_FAILED'
  | 'CONFIG_INVALID'
  | 'SHORTCUT_FAILED';

export const EXIT_CODES: Record<LaunchErrorCode, number> = {
  NO_BASE_RUNTIME: 2,
  ENVIRONMENT_CREATION_FAILED: 3,
  DEPENDENCY_INSTALL_FAILED: 4,
  RUNTIME_UNAVAILABLE: 5,
  ENTRY_NOT_FOUND: 6,
  LAUNCH_FAILED: 7,
  CONFIG_INVALID: 8,
  SHORTCUT_FAILED: 9
};

/**
 * Base class for all launcher errors
 */
export abstract class LaunchError extends Error {
  abstract readonly code: LaunchErrorCode;
  public readonly remediation: string;

  constructor(message: string, remediation: string) {
    super(message);
    this.name = new.target.name;
    this.remediation = remediation;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/**
 * No interpreter capable of creating an isolated environment was found
 */
export class NoBaseRuntimeError extends LaunchError {
  readonly code = 'NO_BASE_RUNTIME';
  public readonly runtimeName: string;
  public readonly installUrl: string;
  public readonly tried: readonly string[];

  constructor(runtimeName: string, installUrl: string, tried: readonly string[]) {
    super(
      `${runtimeName} is not installed: none of ${tried.join(', ')} was found.`,
      `Install ${runtimeName} from ${installUrl} and launch again.`
    );
    this.runtimeName = runtimeName;
    this.installUrl = installUrl;
    this.tried = tried;
  }
}

export class EnvironmentCreationError extends LaunchError {
  readonly code = 'ENVIRONMENT_CREATION_FAILED';
  public readonly environmentDir: string;

  constructor(environmentDir: string, reason: string) {
    super(
      `Could not create the environment at ${environmentDir}: ${reason}`,
      `Delete ${environmentDir} if it exists and launch again.`
    );
    this.environmentDir = environmentDir;
  }
}

/**
 * Fatal only under the fail-fast dependency policy
 */
export class DependencyInstallError extends LaunchError {
  readonly code = 'DEPENDENCY_INSTALL_FAILED';
  public readonly step: string;

  constructor(step: string, reason: string, manifestPath?: string) {
    super(
      `Dependency step "${step}" failed: ${reason}`,
      manifestPath
        ? `Check the packages listed in ${manifestPath} and your network connection, then run "applaunch setup".`
        : 'Check your network connection, then run "applaunch setup".'
    );
    this.step = step;
  }
}

export class RuntimeUnavailableError extends LaunchError {
  readonly code = 'RUNTIME_UNAVAILABLE';
  public readonly runtimeName: string;
  public readonly installUrl: string;
  public readonly tried: readonly string[];

  constructor(runtimeName: string, installUrl: string, tried: readonly string[]) {
    super(
      `No ${runtimeName} launcher found (tried: ${tried.join(', ')}).`,
      `Install ${runtimeName} from ${installUrl}, or run "applaunch setup" to create the local environment.`
    );
    this.runtimeName = runtimeName;
    this.installUrl = installUrl;
    this.tried = tried;
  }
}

export class EntryNotFoundError extends LaunchError {
  readonly code = 'ENTRY_NOT_FOUND';
  public readonly entryPath: string;

  constructor(entryPath: string) {
    super(
      `Application entry file not found: ${entryPath}`,
      'Reinstall the application or set APPLAUNCH_ENTRY to the correct file.'
    );
    this.entryPath = entryPath;
  }
}

export class LaunchSpawnError extends LaunchError {
  readonly code = 'LAUNCH_FAILED';
  public readonly command: string;

  constructor(command: string, reason: string) {
    super(`Could not start ${command}: ${reason}`, 'Run "applaunch doctor" to inspect the available launchers.');
    this.command = command;
  }
}

export class ConfigError extends LaunchError {
  readonly code = 'CONFIG_INVALID';
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(
      `Invalid launcher configuration: ${issues.join('; ')}`,
      'Fix the listed values in the environment or in the .env file of the install root.'
    );
    this.issues = issues;
  }
}

export class ShortcutLocationError extends LaunchError {
  readonly code = 'SHORTCUT_FAILED';

  constructor(reason: string) {
    super(`Could not create shortcut: ${reason}`, 'Create the shortcut manually or pass --desktop-dir to choose a location.');
  }
}

/**
 * Human-readable message for anything thrown or rejected
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error.trim();
  }
  return 'unknown error';
}
