import { delimiter, join, resolve } from 'path';
import { homedir } from 'os';
import type { DataDepsConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration for datadep, read from the environment once and then
 * passed down explicitly. Nothing below this module reads process.env.
 */

export const ENV_VARS = {
  ALWAYS_ACCEPT: 'DATADEPS_ALWAYS_ACCEPT',
  /** @deprecated misspelled alias of ALWAYS_ACCEPT, still honored */
  ALWAYS_ACCEPT_DEPRECATED: 'DATADEPS_ALWAY_ACCEPT',
  DISABLE_DOWNLOAD: 'DATADEPS_DISABLE_DOWNLOAD',
  LOAD_PATH: 'DATADEPS_LOAD_PATH'
} as const;

const TRUE_VALUES = new Set(['1', 'true', 't', 'yes', 'y', 'on']);
const FALSE_VALUES = new Set(['', '0', 'false', 'f', 'no', 'n', 'off']);

let deprecationWarned = false;

/**
 * Parse a boolean environment variable. Unset is false.
 */
export function parseEnvBool(env: NodeJS.ProcessEnv, key: string): boolean {
  const raw = env[key];
  if (raw === undefined) {
    return false;
  }
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) {
    return true;
  }
  if (FALSE_VALUES.has(value)) {
    return false;
  }
  throw new ConfigError(`Environment variable ${key} has a non-boolean value '${raw}'`, { key, value: raw });
}

export function getDefaultLoadPath(): string[] {
  return [join(homedir(), '.datadeps')];
}

function parseLoadPath(env: NodeJS.ProcessEnv): string[] {
  const raw = env[ENV_VARS.LOAD_PATH];
  if (raw === undefined || raw.trim() === '') {
    return getDefaultLoadPath();
  }
  return raw
    .split(delimiter)
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => resolve(entry));
}

/**
 * Resolve the always-accept flag. The canonical variable wins when both
 * are set; the deprecated one logs a migration warning once per process.
 */
function resolveAlwaysAccept(env: NodeJS.ProcessEnv): boolean {
  const deprecatedSet = env[ENV_VARS.ALWAYS_ACCEPT_DEPRECATED] !== undefined;
  if (deprecatedSet && !deprecationWarned) {
    deprecationWarned = true;
    logger.warn(
      `Environment variable $${ENV_VARS.ALWAYS_ACCEPT_DEPRECATED} is deprecated. ` +
      `Please use $${ENV_VARS.ALWAYS_ACCEPT} instead.`
    );
  }

  if (env[ENV_VARS.ALWAYS_ACCEPT] !== undefined) {
    return parseEnvBool(env, ENV_VARS.ALWAYS_ACCEPT);
  }
  return deprecatedSet ? parseEnvBool(env, ENV_VARS.ALWAYS_ACCEPT_DEPRECATED) : false;
}

/**
 * Build the configuration from environment variables
 */
export function loadDataDepsConfig(env: NodeJS.ProcessEnv = process.env): DataDepsConfig {
  const config: DataDepsConfig = {
    alwaysAccept: resolveAlwaysAccept(env),
    disableDownload: parseEnvBool(env, ENV_VARS.DISABLE_DOWNLOAD),
    loadPath: parseLoadPath(env)
  };
  logger.debug('Loaded datadep configuration', config);
  return config;
}

/**
 * Test hook: forget that the deprecation warning was shown
 */
export function resetDeprecationWarnings(): void {
  deprecationWarned = false;
}
