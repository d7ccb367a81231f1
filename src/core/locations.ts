/**
 * Load path probing
 *
 * Where existing copies of a dependency are looked for, and where a new
 * copy is saved. A calling file contributes a `data` directory beside it,
 * searched before the configured load path.
 */

import { dirname, join, resolve } from 'path';
import type { DataDepsConfig } from '../types/index.js';
import { canWriteOrCreate, isDirectory } from '../utils/fs.js';
import { FileSystemError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface LoadPathProbe {
  /** Directory of an existing copy, or null when there is none */
  findExisting(name: string, callingPath?: string): Promise<string | null>;
  /** Directory a new copy of `name` should be downloaded into */
  determineSavePath(name: string, callingPath?: string): Promise<string>;
}

/**
 * Load path entries in search order for a given caller
 */
export function candidateLoadPaths(config: DataDepsConfig, callingPath?: string): string[] {
  const paths = callingPath ? [join(dirname(resolve(callingPath)), 'data')] : [];
  for (const entry of config.loadPath) {
    if (!paths.includes(entry)) {
      paths.push(entry);
    }
  }
  return paths;
}

export function createLoadPathProbe(config: DataDepsConfig): LoadPathProbe {
  return {
    async findExisting(name: string, callingPath?: string): Promise<string | null> {
      for (const loadPath of candidateLoadPaths(config, callingPath)) {
        const candidate = join(loadPath, name);
        if (await isDirectory(candidate)) {
          logger.debug(`Found existing copy of '${name}' at ${candidate}`);
          return candidate;
        }
      }
      return null;
    },

    async determineSavePath(name: string, callingPath?: string): Promise<string> {
      const candidates = candidateLoadPaths(config, callingPath);
      for (const loadPath of candidates) {
        if (await canWriteOrCreate(loadPath)) {
          return join(loadPath, name);
        }
      }
      throw new FileSystemError(
        `No writable load path to save '${name}' into (tried: ${candidates.join(', ')})`,
        { name, candidates }
      );
    }
  };
}
