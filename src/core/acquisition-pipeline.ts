/**
 * Acquisition Pipeline
 *
 * Downloads a data dependency into a local directory:
 *   authorizing → fetching → verifying → (fetching again | post-fetch) → succeeded
 *
 * Every failure is terminal and thrown; the only loop is the user-directed
 * re-fetch after a checksum mismatch.
 */

import { dirname } from 'path';
import type {
  AcquisitionPhase,
  DataDep,
  DataDepsContext,
  DownloadOptions,
  FetchOutcome,
  OneOrMany,
  PostFetchMethod
} from '../types/index.js';
import { acceptTerms } from './terms-gate.js';
import { runFetch, settleAll } from './fetch-executor.js';
import { checksumPass } from './checksum.js';
import { assertPairable, toRemotePath, valueAt, valuesOf } from './datadep.js';
import { resolveOutput } from './ports/resolve.js';
import { DownloadsDisabledError } from '../utils/errors.js';
import { withWorkingDirectory } from '../utils/working-directory.js';
import { logger } from '../utils/logger.js';

function enter(dep: DataDep, phase: AcquisitionPhase): void {
  logger.debug(`[${dep.name}] acquisition -> ${phase}`);
}

/**
 * Run the post-fetch method(s) on the fetched path(s). Each call runs with
 * the working directory set to the directory holding its artifact.
 */
export async function runPostFetch(
  postFetchMethod: OneOrMany<PostFetchMethod>,
  fetched: FetchOutcome
): Promise<void> {
  const paths = valuesOf(fetched);
  await settleAll(
    paths.map((fetchedPath, index) =>
      withWorkingDirectory(dirname(fetchedPath), () => valueAt(postFetchMethod, index)(fetchedPath))
    )
  );
}

/**
 * Download `dep` into `localDir`.
 *
 * Normally this runs automatically when a dependency is resolved and no
 * local copy exists. Calling it directly is useful for debugging, or for
 * scripting a download with a different remote path, without checksum
 * verification, or with the terms decision made in advance.
 */
export async function downloadDataDep(
  dep: DataDep,
  localDir: string,
  options: DownloadOptions,
  ctx: DataDepsContext
): Promise<void> {
  if (ctx.config.disableDownload) {
    throw new DownloadsDisabledError(dep.name);
  }

  const remotePath = options.remotePath === undefined
    ? dep.remotePath
    : toRemotePath(options.remotePath, dep.name);
  const subject = `'${dep.name}'`;
  assertPairable('fetch method', dep.fetchMethod, remotePath, subject);
  assertPairable('post-fetch method', dep.postFetchMethod, remotePath, subject);
  if (!options.skipChecksum) {
    assertPairable('hash', dep.hash, remotePath, subject);
  }

  enter(dep, 'authorizing');
  await acceptTerms(dep, localDir, remotePath, options.acceptTerms, ctx);

  let fetched: FetchOutcome;
  for (;;) {
    enter(dep, 'fetching');
    fetched = await runFetch(dep.fetchMethod, remotePath, localDir, ctx);
    if (options.skipChecksum) {
      break;
    }
    enter(dep, 'verifying');
    if (await checksumPass(dep.hash, fetched, ctx, dep.name)) {
      break;
    }
  }

  if (dep.postFetchMethod) {
    enter(dep, 'post-fetch');
    await runPostFetch(dep.postFetchMethod, fetched);
  }

  enter(dep, 'succeeded');
  resolveOutput(ctx).success(`Downloaded ${dep.name} to ${localDir}`);
}
