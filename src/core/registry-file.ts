/**
 * Registry files
 *
 * Loads data dependency declarations from a YAML file:
 *
 *   dependencies:
 *     - name: Example
 *       remote: https://example.org/data.csv   # or a list
 *       hash: sha256:<hex>                     # or a list; bare hex means sha256
 *       message: Terms of use...
 *       post_fetch: tar -xzf {file}            # or a list
 *
 * Transports and post-fetch runners are supplied by the caller.
 */

import * as yaml from 'js-yaml';
import { dirname, isAbsolute, resolve } from 'path';
import type { Checksum, DataDep, FetchMethod, PostFetchMethod } from '../types/index.js';
import { createDataDep } from './datadep.js';
import { DataDepRegistry } from './registry.js';
import { readTextFile } from '../utils/fs.js';
import { getHashAlgorithm } from '../utils/hash-utils.js';
import { isUrlLocator } from '../utils/path-utils.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_REGISTRY_FILE = 'datadeps.yml';

export interface RegistryFileEntry {
  name: string;
  remote: string | string[];
  hash?: string | string[];
  message?: string;
  post_fetch?: string | string[];
}

export interface RegistryFileOptions {
  /** Transport used for every locator in the file */
  fetchMethod: FetchMethod;
  /** Turns a `post_fetch` command into a post-fetch method */
  postFetchCommand?: (command: string) => PostFetchMethod;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringOrList(entry: Record<string, unknown>, key: string, where: string): string | string[] | undefined {
  const value = entry[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new ValidationError(`${where}: '${key}' must be a string or a list of strings`);
}

/**
 * Parse "algorithm:hex" (or bare hex, meaning sha256) into a Checksum
 */
export function parseChecksum(text: string): Checksum {
  const separator = text.indexOf(':');
  const algorithmName = separator === -1 ? 'sha256' : text.slice(0, separator).trim();
  const value = (separator === -1 ? text : text.slice(separator + 1)).trim();
  if (!/^[0-9a-f]+$/i.test(value)) {
    throw new ValidationError(`checksum '${text}' is not a hex digest`);
  }
  return { algorithm: getHashAlgorithm(algorithmName), value };
}

/**
 * Validate one parsed YAML entry
 */
export function parseRegistryEntry(raw: unknown, index: number, source: string): RegistryFileEntry {
  const where = `${source} dependencies[${index}]`;
  if (!isRecord(raw)) {
    throw new ValidationError(`${where}: expected a mapping`);
  }

  const name = raw.name;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ValidationError(`${where}: 'name' is required`);
  }

  const remote = readStringOrList(raw, 'remote', where);
  if (remote === undefined) {
    throw new ValidationError(`${where}: dependency '${name}' must specify 'remote'`);
  }

  const message = raw.message;
  if (message !== undefined && message !== null && typeof message !== 'string') {
    throw new ValidationError(`${where}: 'message' must be a string`);
  }

  return {
    name,
    remote,
    hash: readStringOrList(raw, 'hash', where),
    message: typeof message === 'string' ? message : undefined,
    post_fetch: readStringOrList(raw, 'post_fetch', where)
  };
}

function mapOneOrList<T, U>(value: T | T[], fn: (item: T) => U): U | U[] {
  return Array.isArray(value) ? value.map(item => fn(item)) : fn(value);
}

/**
 * Turn a validated entry into a DataDep. Relative local locators are taken
 * relative to `baseDir`.
 */
export function entryToDataDep(entry: RegistryFileEntry, baseDir: string, options: RegistryFileOptions): DataDep {
  const remotePath = mapOneOrList(entry.remote, locator =>
    isUrlLocator(locator) || isAbsolute(locator) ? locator : resolve(baseDir, locator)
  );

  let postFetchMethod: PostFetchMethod | PostFetchMethod[] | undefined;
  if (entry.post_fetch !== undefined) {
    const toMethod = options.postFetchCommand;
    if (!toMethod) {
      throw new ValidationError(`dependency '${entry.name}' has post_fetch but no command runner is available`);
    }
    postFetchMethod = mapOneOrList(entry.post_fetch, toMethod);
  }

  return createDataDep({
    name: entry.name,
    remotePath,
    fetchMethod: options.fetchMethod,
    hash: entry.hash === undefined ? undefined : mapOneOrList(entry.hash, parseChecksum),
    postFetchMethod,
    extraMessage: entry.message
  });
}

/**
 * Parse registry YAML text into DataDeps
 */
export function parseRegistry(content: string, source: string, options: RegistryFileOptions): DataDep[] {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ValidationError(`Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (parsed === undefined || parsed === null) {
    return [];
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`${source} must be a mapping with a 'dependencies' list`);
  }

  const dependencies = parsed.dependencies ?? [];
  if (!Array.isArray(dependencies)) {
    throw new ValidationError(`${source}: 'dependencies' must be a list`);
  }

  const baseDir = dirname(resolve(source));
  return dependencies.map((raw, index) => entryToDataDep(parseRegistryEntry(raw, index, source), baseDir, options));
}

/**
 * Load a registry file and register every dependency it declares.
 */
export async function loadRegistryFile(
  filePath: string,
  options: RegistryFileOptions,
  registry: DataDepRegistry = new DataDepRegistry()
): Promise<DataDepRegistry> {
  const content = await readTextFile(filePath);
  const deps = parseRegistry(content, filePath, options);
  for (const dep of deps) {
    registry.register(dep);
  }
  logger.debug(`Loaded ${deps.length} data dependencies from ${filePath}`);
  return registry;
}
