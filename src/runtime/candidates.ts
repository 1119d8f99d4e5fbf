/**
 * Launcher candidate implementations: a fixed file, or a name looked up
 * on the executable search path.
 */

import type { LauncherCandidate, LauncherCandidateId } from '../core/types.js';
import { fileExists, findOnPath, type SearchPathOptions } from '../platform/PathProbe.js';

/**
 * Candidate that is present when a known file exists
 */
export class FileCandidate implements LauncherCandidate {
  readonly id: LauncherCandidateId;
  readonly label: string;
  readonly args: readonly string[];
  private readonly filePath: string;

  constructor(id: LauncherCandidateId, label: string, filePath: string, args: readonly string[] = []) {
    this.id = id;
    this.label = label;
    this.filePath = filePath;
    this.args = args;
  }

  get command(): string {
    return this.filePath;
  }

  isAvailable(): boolean {
    return fileExists(this.filePath);
  }
}

/**
 * Candidate resolved through PATH. The resolved location is remembered
 * for the lifetime of this object only; profiles build fresh candidates
 * for every launch.
 */
export class SearchPathCandidate implements LauncherCandidate {
  readonly id: LauncherCandidateId;
  readonly label: string;
  readonly args: readonly string[];
  private readonly executable: string;
  private readonly search: SearchPathOptions;
  private resolved: string | undefined;

  constructor(
    id: LauncherCandidateId,
    label: string,
    executable: string,
    search: SearchPathOptions,
    args: readonly string[] = []
  ) {
    this.id = id;
    this.label = label;
    this.executable = executable;
    this.search = search;
    this.args = args;
  }

  get command(): string | undefined {
    return this.resolved;
  }

  isAvailable(): boolean {
    this.resolved = findOnPath(this.executable, this.search);
    return this.resolved !== undefined;
  }
}
