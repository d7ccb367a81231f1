/**
 * Default transports and post-fetch runners for the CLI
 *
 * The resolution core takes these as injected methods; they live here so
 * that a registry file can be used from the command line.
 */

import { spawn, type StdioOptions } from 'child_process';
import { createWriteStream } from 'fs';
import { basename } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { fileURLToPath } from 'url';
import type { FetchMethod, PostFetchMethod } from '../types/index.js';
import { copyFile, remove } from '../utils/fs.js';
import { isUrlLocator } from '../utils/path-utils.js';
import { FileSystemError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Download an http(s) URL to `destinationPath`, streaming the body to disk.
 * A partially written file is removed when the transfer fails.
 */
export const httpFetch = (async (locator, destinationPath) => {
  const res = await fetch(locator);
  if (!res.ok || !res.body) {
    throw new Error(`Failed to download ${locator}: ${res.status} ${res.statusText}`);
  }
  try {
    await pipeline(Readable.fromWeb(res.body), createWriteStream(destinationPath));
  } catch (error) {
    await remove(destinationPath);
    throw new FileSystemError(`Failed to download ${locator} to ${destinationPath}`, { locator, destinationPath, error });
  }
  logger.debug(`Downloaded ${locator} to ${destinationPath}`);
}) satisfies FetchMethod;

/**
 * Copy a local path or file:// URL to `destinationPath`
 */
export const localCopy = (async (locator, destinationPath) => {
  const source = locator.startsWith('file://') ? fileURLToPath(locator) : locator;
  await copyFile(source, destinationPath);
}) satisfies FetchMethod;

/**
 * Pick a transport by the locator's scheme
 */
export const defaultTransport = (async (locator, destinationPath) => {
  if (!isUrlLocator(locator) || locator.startsWith('file://')) {
    return localCopy(locator, destinationPath);
  }
  const protocol = new URL(locator).protocol;
  if (protocol === 'http:' || protocol === 'https:') {
    return httpFetch(locator, destinationPath);
  }
  throw new ValidationError(`No transport for '${protocol}' locators (${locator})`);
}) satisfies FetchMethod;

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function runShell(command: string, stdio: StdioOptions): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, { shell: true, cwd: process.cwd(), stdio });
    child.once('error', reject);
    child.once('close', code => resolve(code));
  });
}

export interface ShellPostFetchOptions {
  /** Where the command's output goes (default: this process's terminal) */
  stdio?: StdioOptions;
}

/**
 * Post-fetch method that runs a shell command in the artifact's directory.
 * `{file}` in the command is replaced by the artifact's quoted file name.
 * Output is passed through, not buffered.
 */
export function shellPostFetch(command: string, options: ShellPostFetchOptions = {}): PostFetchMethod {
  return async (fetchedPath: string) => {
    const resolved = command.split('{file}').join(shellQuote(basename(fetchedPath)));
    logger.debug(`Running post-fetch command: ${resolved}`, { cwd: process.cwd() });

    let code: number | null;
    try {
      code = await runShell(resolved, options.stdio ?? ['ignore', 'inherit', 'inherit']);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Post-fetch command failed for ${fetchedPath}: ${message}`);
    }
    if (code !== 0) {
      throw new ValidationError(`Post-fetch command failed for ${fetchedPath}: '${resolved}' exited with code ${code}`);
    }
  };
}
