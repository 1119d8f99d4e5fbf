/**
 * RuntimeLocator
 *
 * Picks the first usable launcher from an ordered candidate list.
 * Predicates run in priority order and probing stops at the first match.
 */

import { RuntimeUnavailableError } from '../core/errors.js';
import type { LauncherCandidate } from '../core/types.js';
import type { RuntimeDescriptor } from '../platform/types.js';

export interface CandidateReport {
  candidate: LauncherCandidate;
  available: boolean;
}

export class RuntimeLocator {
  /**
   * @returns The first available candidate, or null when none is present
   */
  locate(candidates: readonly LauncherCandidate[]): LauncherCandidate | null {
    for (const candidate of candidates) {
      if (candidate.isAvailable()) {
        console.log(`[Locator] Using ${candidate.label}: ${candidate.command ?? candidate.id}`);
        return candidate;
      }
    }
    console.log(`[Locator] No launcher found among ${candidates.length} candidates`);
    return null;
  }

  /**
   * Like `locate`, but signals RuntimeUnavailable when nothing is present
   */
  require(candidates: readonly LauncherCandidate[], runtime: RuntimeDescriptor): LauncherCandidate {
    const found = this.locate(candidates);
    if (!found) {
      throw new RuntimeUnavailableError(
        runtime.name,
        runtime.installUrl,
        candidates.map(c => c.label)
      );
    }
    return found;
  }

  /**
   * Check every candidate, for diagnostics. Unlike `locate` this does
   * not stop at the first match.
   */
  survey(candidates: readonly LauncherCandidate[]): CandidateReport[] {
    return candidates.map(candidate => ({ candidate, available: candidate.isAvailable() }));
  }
}
