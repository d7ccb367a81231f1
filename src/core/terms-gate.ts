/**
 * Terms acceptance
 *
 * Decides whether a download may go ahead: an explicit override first,
 * then the always-accept configuration, then a prompt.
 */

import type { DataDep, DataDepsContext, OneOrMany } from '../types/index.js';
import { resolveInteraction, resolveOutput } from './ports/resolve.js';
import { DownloadsDisabledError, TermsDeniedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { valuesOf } from './datadep.js';

export function describeRemotePath(remotePath: OneOrMany<string>): string {
  return valuesOf(remotePath).join(', ');
}

/**
 * Ask the user whether to download `dep`. Returns their answer.
 */
export async function checkIfAcceptTerms(
  dep: DataDep,
  localDir: string,
  remotePath: OneOrMany<string>,
  ctx: DataDepsContext
): Promise<boolean> {
  const out = resolveOutput(ctx);
  out.info(`This program has requested access to the data dependency ${dep.name}.`);
  out.info('which is not currently installed. It can be installed automatically, and you will not see this message again.');
  if (dep.extraMessage) {
    out.note(dep.extraMessage, dep.name);
  }

  return resolveInteraction(ctx).confirm(
    `Do you want to download the dataset from ${describeRemotePath(remotePath)} to "${localDir}"?`
  );
}

/**
 * Ensure the download of `dep` is authorized, or throw.
 *
 * @param override - true accepts, false refuses without prompting,
 *   undefined defers to configuration and then to the user
 */
export async function acceptTerms(
  dep: DataDep,
  localDir: string,
  remotePath: OneOrMany<string>,
  override: boolean | undefined,
  ctx: DataDepsContext
): Promise<true> {
  if (ctx.config.disableDownload) {
    throw new DownloadsDisabledError(dep.name);
  }

  let decision = override;
  if (decision === undefined) {
    if (ctx.config.alwaysAccept) {
      logger.debug(`Terms for '${dep.name}' accepted by configuration`);
      return true;
    }
    decision = await checkIfAcceptTerms(dep, localDir, remotePath, ctx);
  }

  if (!decision) {
    throw new TermsDeniedError(dep.name);
  }
  return true;
}
