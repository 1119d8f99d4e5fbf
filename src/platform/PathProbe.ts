/**
 * PathProbe
 *
 * Existence checks used by every presence predicate. Pure probing:
 * nothing here spawns a process or writes to disk.
 */

import { accessSync, constants, statSync } from 'fs';
import * as path from 'path';

export interface SearchPathOptions {
  /** Raw value of the PATH variable */
  pathValue: string | undefined;
  /** Separator between PATH entries (';' on Windows, ':' elsewhere) */
  delimiter: string;
  /** Executable extensions to try, e.g. from PATHEXT. Empty on POSIX. */
  extensions: readonly string[];
  /** Also require the execute permission bit */
  requireExecutable: boolean;
}

/**
 * True when `filePath` names an existing regular file
 */
export function fileExists(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function isRunnable(filePath: string, requireExecutable: boolean): boolean {
  if (!fileExists(filePath)) return false;
  if (!requireExecutable) return true;

  try {
    accessSync(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Split a PATHEXT value into lowercase extensions, dropping empties
 */
export function parsePathExt(value: string | undefined): string[] {
  if (!value) return ['.com', '.exe', '.bat', '.cmd'];
  return value
    .split(';')
    .map(ext => ext.trim().toLowerCase())
    .filter(ext => ext.length > 0);
}

/**
 * Candidate file names for `name`: the bare name first when it already
 * carries a known extension, then one per extension.
 */
function fileNamesFor(name: string, extensions: readonly string[]): string[] {
  if (extensions.length === 0) return [name];

  const lower = name.toLowerCase();
  const names: string[] = [];
  if (extensions.some(ext => lower.endsWith(ext))) {
    names.push(name);
  }
  for (const ext of extensions) {
    names.push(name + ext);
  }
  return names;
}

/**
 * Resolve `name` against the executable search path.
 *
 * @returns Absolute path of the first match, in PATH order
 */
export function findOnPath(name: string, options: SearchPathOptions): string | undefined {
  const entries = (options.pathValue ?? '')
    .split(options.delimiter)
    .map(entry => entry.trim().replace(/^"(.*)"$/, '$1'))
    .filter(entry => entry.length > 0);

  const names = fileNamesFor(name, options.extensions);

  for (const dir of entries) {
    for (const fileName of names) {
      const candidate = path.resolve(dir, fileName);
      if (isRunnable(candidate, options.requireExecutable)) {
        return candidate;
      }
    }
  }

  return undefined;
}
