import type { LaunchError } from '../core/errors.js';

/**
 * Plain-text message shown to the user when a launch fails
 */
export function formatDiagnostic(error: LaunchError, appName: string): string {
  return [
    `${appName} could not be started.`,
    '',
    error.message,
    error.remediation
  ].join('\n');
}
