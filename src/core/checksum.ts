/**
 * Checksum verification
 *
 * Compares fetched files against their expected digests and, on a
 * mismatch, lets the user abort, retry the download or keep the files.
 */

import type { Checksum, DataDepsContext, FetchOutcome, OneOrMany } from '../types/index.js';
import { resolveInteraction, resolveOutput } from './ports/resolve.js';
import { ChecksumAbortedError, InvalidDataDepError } from '../utils/errors.js';
import { combineDigests, normalizeDigest } from '../utils/hash-utils.js';
import { logger } from '../utils/logger.js';
import { valuesOf } from './datadep.js';

async function digestMatches(checksum: Checksum, filePath: string): Promise<boolean> {
  const actual = await checksum.algorithm.digestFile(filePath);
  const matches = normalizeDigest(actual) === normalizeDigest(checksum.value);
  if (!matches) {
    logger.debug(`${checksum.algorithm.name} mismatch on ${filePath}`, { expected: checksum.value, actual });
  }
  return matches;
}

/**
 * Verify fetched files against `hash`, returning the paths that failed.
 *
 * One checksum over several files is compared with the XOR of their
 * individual digests; per-locator checksums are compared pairwise.
 */
export async function runChecksum(hash: OneOrMany<Checksum>, fetched: FetchOutcome): Promise<string[]> {
  if (hash.kind === 'one') {
    if (fetched.kind === 'one') {
      return (await digestMatches(hash.value, fetched.value)) ? [] : [fetched.value];
    }

    const digests = await Promise.all(fetched.values.map(path => hash.value.algorithm.digestFile(path)));
    const combined = combineDigests(digests);
    return combined === normalizeDigest(hash.value.value) ? [] : [...fetched.values];
  }

  const paths = valuesOf(fetched);
  if (fetched.kind === 'one' || paths.length !== hash.values.length) {
    throw new InvalidDataDepError(
      `${hash.values.length} checksums given for ${paths.length} fetched files`,
      { paths }
    );
  }

  const results = await Promise.all(paths.map((path, index) => digestMatches(hash.values[index], path)));
  return paths.filter((_, index) => !results[index]);
}

/**
 * Ensure the checksum passes, and handle the dialog with the user when it
 * fails for dependency `name`. Returns true to keep the fetched files,
 * false to fetch again.
 * An unset hash means no verification is configured.
 */
export async function checksumPass(
  hash: OneOrMany<Checksum> | undefined,
  fetched: FetchOutcome,
  ctx: DataDepsContext,
  name: string
): Promise<boolean> {
  if (!hash) {
    return true;
  }

  const failed = await runChecksum(hash, fetched);
  if (failed.length === 0) {
    return true;
  }

  const out = resolveOutput(ctx);
  for (const path of failed) {
    out.warn(`Hash failed on ${path}`);
  }

  return resolveInteraction(ctx).choose<boolean>('Do you wish to Abort, Retry download or Ignore', [
    {
      key: 'a',
      label: 'Abort',
      action: () => {
        throw new ChecksumAbortedError(name, failed);
      }
    },
    { key: 'r', label: 'Retry download', action: () => false },
    { key: 'i', label: 'Ignore', action: () => true }
  ]);
}
