/**
 * Fetch execution
 *
 * Runs transport methods to place remote content in a local directory.
 * Several locators are fetched concurrently into the same directory.
 */

import { dirname, join, resolve } from 'path';
import type { FetchMethod, FetchOutcome, OneOrMany } from '../types/index.js';
import type { OutputPort } from './ports/output.js';
import { resolveOutput } from './ports/resolve.js';
import { ensureDir } from '../utils/fs.js';
import { InvalidDataDepError } from '../utils/errors.js';
import { filenameFromLocator } from '../utils/path-utils.js';
import { logger } from '../utils/logger.js';
import { assertPairable, many, one, valueAt, valuesOf } from './datadep.js';

/**
 * Wait for every task to settle, then return their results in order or
 * rethrow the first failure in order. Nothing is left running on failure.
 */
export async function settleAll<T>(tasks: ReadonlyArray<Promise<T>>): Promise<T[]> {
  const results = await Promise.allSettled(tasks);
  const values: T[] = [];
  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
    values.push(result.value);
  }
  return values;
}

/**
 * Reject locators that would be saved under the same file name, before
 * anything is fetched.
 */
export function assertDistinctDestinations(locators: readonly string[], localDir: string): void {
  const seen = new Map<string, string>();
  for (const locator of locators) {
    const filename = filenameFromLocator(locator);
    const earlier = seen.get(filename);
    if (earlier !== undefined) {
      throw new InvalidDataDepError(
        `'${earlier}' and '${locator}' would both be saved as "${join(localDir, filename)}"`,
        { locators: [earlier, locator], filename }
      );
    }
    seen.set(filename, locator);
  }
}

/**
 * Fetch a single locator into `localDir`, returning the local path.
 */
export async function fetchOne(method: FetchMethod, locator: string, localDir: string): Promise<string> {
  const localPath = join(localDir, filenameFromLocator(locator));
  if (dirname(resolve(localPath)) !== resolve(localDir)) {
    throw new InvalidDataDepError(`'${locator}' would be saved outside "${localDir}"`, { locator, localPath });
  }
  logger.debug(`Fetching ${locator} -> ${localPath}`);
  await method(locator, localPath);
  return localPath;
}

/**
 * Execute the fetch method(s) on the remote path(s) into `localDir`.
 * The outcome has the same shape and order as `remotePath`.
 */
export async function runFetch(
  fetchMethod: OneOrMany<FetchMethod>,
  remotePath: OneOrMany<string>,
  localDir: string,
  ctx?: { output?: OutputPort }
): Promise<FetchOutcome> {
  assertPairable('fetch method', fetchMethod, remotePath, `fetch into "${localDir}"`);
  const locators = valuesOf(remotePath);
  assertDistinctDestinations(locators, localDir);
  await ensureDir(localDir);

  const spinner = resolveOutput(ctx).spinner();
  spinner.start(locators.length === 1 ? `Fetching ${locators[0]}` : `Fetching ${locators.length} files`);

  try {
    if (remotePath.kind === 'one') {
      const localPath = await fetchOne(valueAt(fetchMethod, 0), remotePath.value, localDir);
      spinner.stop(`Fetched ${remotePath.value}`);
      return one(localPath);
    }

    const localPaths = await settleAll(
      remotePath.values.map((locator, index) => fetchOne(valueAt(fetchMethod, index), locator, localDir))
    );
    spinner.stop(`Fetched ${localPaths.length} files`);
    return many(localPaths);
  } catch (error) {
    spinner.stop('Fetch failed');
    throw error;
  }
}
