import { existsSync } from 'fs';
import { resolve } from 'path';

export interface SelfLaunch {
  command: string;
  args: string[];
}

/**
 * How to start this CLI again from a shortcut: node plus the entry
 * script, or the executable itself when packaged as one.
 */
export function resolveSelfLaunch(
  argv: readonly string[] = process.argv,
  execPath: string = process.execPath
): SelfLaunch {
  const entry = argv[1];
  if (!entry || !existsSync(entry) || resolve(entry) === execPath) {
    return { command: execPath, args: [] };
  }
  return { command: execPath, args: [resolve(entry)] };
}
