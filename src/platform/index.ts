/**
 * Platform Module
 */

import { PosixPlatform } from './PosixPlatform.js';
import { WindowsPlatform } from './WindowsPlatform.js';
import type { PlatformId, PlatformProfile } from './types.js';

/**
 * Detect the current platform
 */
export function detectPlatform(platform: NodeJS.Platform = process.platform): PlatformId {
  if (platform === 'win32') return 'windows';
  if (platform === 'darwin') return 'macos';
  return 'linux';
}

export function createPlatformProfile(id: PlatformId, env: NodeJS.ProcessEnv): PlatformProfile {
  if (id === 'windows') return new WindowsPlatform(env);
  return new PosixPlatform(id, env);
}

export { WindowsPlatform } from './WindowsPlatform.js';
export { PosixPlatform } from './PosixPlatform.js';
export { fileExists, findOnPath, parsePathExt } from './PathProbe.js';
export type { SearchPathOptions } from './PathProbe.js';
export { PROVISIONING_MARKER, PYTHON_RUNTIME } from './constants.js';
export type { PlatformId, PlatformProfile, RuntimeDescriptor, ShortcutFormat } from './types.js';
