/**
 * Configuration Loader
 *
 * Builds the LaunchConfig once at start. Values come from, in order of
 * precedence: explicit overrides (CLI flags), the process environment,
 * the install root's .env file, then defaults. The .env file is read into
 * a private map and never copied into process.env.
 */

import { config as loadDotenv } from 'dotenv';
import { basename, isAbsolute, join, relative, resolve, sep } from 'path';
import { z } from 'zod';

import { ConfigError } from '../core/errors.js';
import type { DependencyPolicy, LaunchConfig, LaunchTimeouts } from '../core/types.js';

export const CONFIG_DEFAULTS = {
  environmentDir: '.venv',
  manifest: 'requirements.txt',
  entry: 'main.py',
  icon: 'app.ico',
  autoSetup: false,
  dependencyPolicy: 'best-effort',
  timeouts: {
    createMs: 120_000,
    installMs: 600_000,
    lockWaitMs: 300_000
  }
} as const;

export interface ConfigOverrides {
  environmentDir?: string;
  manifestPath?: string;
  entryPath?: string;
  iconPath?: string;
  appName?: string;
  autoSetup?: boolean;
  dependencyPolicy?: DependencyPolicy;
  timeouts?: Partial<LaunchTimeouts>;
}

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FLAG_VALUES = ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'] as const;

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(FLAG_VALUES))
  .transform(value => TRUTHY.includes(value));

const milliseconds = z.coerce.number().int().positive();

const EnvSchema = z.object({
  APPLAUNCH_ENV_DIR: z.string().optional(),
  APPLAUNCH_MANIFEST: z.string().optional(),
  APPLAUNCH_ENTRY: z.string().optional(),
  APPLAUNCH_ICON: z.string().optional(),
  APPLAUNCH_APP_NAME: z.string().optional(),
  APPLAUNCH_AUTO_SETUP: booleanFlag.optional(),
  APPLAUNCH_DEPENDENCY_POLICY: z.enum(['best-effort', 'fail-fast']).optional(),
  APPLAUNCH_CREATE_TIMEOUT_MS: milliseconds.optional(),
  APPLAUNCH_INSTALL_TIMEOUT_MS: milliseconds.optional(),
  APPLAUNCH_LOCK_WAIT_MS: milliseconds.optional()
});

export type LauncherEnv = z.infer<typeof EnvSchema>;

/**
 * Drop unset and blank values so they fall through to the next source
 */
function present(source: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (key.startsWith('APPLAUNCH_') && value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * True when `inner` is `outer` itself or lies below it
 */
function contains(outer: string, inner: string): boolean {
  const rel = relative(outer, inner);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

export class ConfigLoader {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Read `<installRoot>/.env` without touching process.env
   */
  readEnvFile(installRoot: string): Record<string, string> {
    const fileEnv: Record<string, string> = {};
    loadDotenv({ path: join(installRoot, '.env'), processEnv: fileEnv });
    return fileEnv;
  }

  /**
   * Merge and validate the APPLAUNCH_* variables
   */
  readLauncherEnv(installRoot: string): LauncherEnv {
    const merged = { ...present(this.readEnvFile(installRoot)), ...present(this.env) };
    const parsed = EnvSchema.safeParse(merged);
    if (!parsed.success) {
      throw new ConfigError(
        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  load(appDir: string, overrides: ConfigOverrides = {}): LaunchConfig {
    const installRoot = resolve(appDir);
    const env = this.readLauncherEnv(installRoot);
    const at = (value: string) => resolve(installRoot, value);

    const timeouts: LaunchTimeouts = {
      createMs:
        overrides.timeouts?.createMs ?? env.APPLAUNCH_CREATE_TIMEOUT_MS ?? CONFIG_DEFAULTS.timeouts.createMs,
      installMs:
        overrides.timeouts?.installMs ?? env.APPLAUNCH_INSTALL_TIMEOUT_MS ?? CONFIG_DEFAULTS.timeouts.installMs,
      lockWaitMs:
        overrides.timeouts?.lockWaitMs ?? env.APPLAUNCH_LOCK_WAIT_MS ?? CONFIG_DEFAULTS.timeouts.lockWaitMs
    };

    const invalid = Object.entries(timeouts)
      .filter(([, value]) => !Number.isInteger(value) || value <= 0)
      .map(([key]) => `timeouts.${key}: must be a positive integer`);
    if (invalid.length > 0) {
      throw new ConfigError(invalid);
    }

    const environmentDir = at(overrides.environmentDir ?? env.APPLAUNCH_ENV_DIR ?? CONFIG_DEFAULTS.environmentDir);
    if (contains(environmentDir, installRoot)) {
      throw new ConfigError([
        `APPLAUNCH_ENV_DIR: ${environmentDir} is the install root or one of its parents`
      ]);
    }

    return {
      installRoot,
      environmentDir,
      manifestPath: at(overrides.manifestPath ?? env.APPLAUNCH_MANIFEST ?? CONFIG_DEFAULTS.manifest),
      entryPath: at(overrides.entryPath ?? env.APPLAUNCH_ENTRY ?? CONFIG_DEFAULTS.entry),
      iconPath: at(overrides.iconPath ?? env.APPLAUNCH_ICON ?? CONFIG_DEFAULTS.icon),
      appName: overrides.appName ?? env.APPLAUNCH_APP_NAME ?? (basename(installRoot) || 'Application'),
      autoSetup: overrides.autoSetup ?? env.APPLAUNCH_AUTO_SETUP ?? CONFIG_DEFAULTS.autoSetup,
      dependencyPolicy:
        overrides.dependencyPolicy ?? env.APPLAUNCH_DEPENDENCY_POLICY ?? CONFIG_DEFAULTS.dependencyPolicy,
      timeouts
    };
  }
}

/**
 * Build the launch configuration for `appDir`
 */
export function loadLaunchConfig(
  appDir: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LaunchConfig {
  return new ConfigLoader(env).load(appDir, overrides);
}
