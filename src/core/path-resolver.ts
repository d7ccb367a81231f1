/**
 * Path Resolver
 *
 * Entry point: turns "Name/inner/path" into an absolute local path,
 * downloading the dependency first when no local copy exists.
 *
 *   locating → validating → succeeded
 *                  ↓    ↑ retry
 *              repairing ── purge → locating
 *
 * The repair loop has no retry limit; it ends on success or when the user
 * chooses Abort.
 */

import { join } from 'path';
import type { DataDep, DataDepsContext, ResolutionPhase } from '../types/index.js';
import { downloadDataDep } from './acquisition-pipeline.js';
import { resolveInteraction, resolveOutput } from './ports/resolve.js';
import { canRead, canonicalPath, remove } from '../utils/fs.js';
import { DownloadsDisabledError, ResolutionAbortedError } from '../utils/errors.js';
import { splitNamePath } from '../utils/path-utils.js';
import { logger } from '../utils/logger.js';

type RepairAction = 'retry' | 'purge';

function enter(dep: DataDep, phase: ResolutionPhase): void {
  logger.debug(`[${dep.name}] resolution -> ${phase}`);
}

/**
 * Download a missing dependency into its save path and return that path.
 */
export async function handleMissing(dep: DataDep, ctx: DataDepsContext, callingPath?: string): Promise<string> {
  const saveDir = await ctx.probe.determineSavePath(dep.name, callingPath);
  if (ctx.config.disableDownload) {
    throw new DownloadsDisabledError(dep.name);
  }
  await downloadDataDep(dep, saveDir, {}, ctx);
  return saveDir;
}

/**
 * Directory holding `dep`: an existing copy on the load path, or a fresh
 * download. Concurrent calls for the same name within one context share
 * one lookup and at most one download.
 */
export function locateDataDep(dep: DataDep, ctx: DataDepsContext, callingPath?: string): Promise<string> {
  return ctx.acquisitions.run(dep.name, async () => {
    const existing = await ctx.probe.findExisting(dep.name, callingPath);
    return existing ?? handleMissing(dep, ctx, callingPath);
  });
}

async function askForRepair(
  dep: DataDep,
  dirPath: string,
  filePath: string,
  ctx: DataDepsContext
): Promise<RepairAction> {
  const out = resolveOutput(ctx);
  out.warn(`DataDep ${dep.name} found at "${dirPath}". But could not read file at "${filePath}".`);
  out.warn('Something has gone wrong. What would you like to do?');

  return resolveInteraction(ctx).choose<RepairAction>('What would you like to do?', [
    {
      key: 'A',
      label: 'Abort -- this will error out',
      action: () => {
        throw new ResolutionAbortedError(dep.name, filePath);
      }
    },
    {
      key: 'R',
      label: 'Retry -- do this after fixing the problem outside of this script',
      action: () => 'retry'
    },
    {
      key: 'X',
      label: "Remove directory and retry -- will retrigger download if there isn't another copy elsewhere",
      action: async (): Promise<RepairAction> => {
        await remove(dirPath);
        return 'purge';
      }
    }
  ]);
}

/**
 * Resolve a registered dependency (or its name) plus an inner path to an
 * absolute path with symlinks resolved.
 *
 * @param innerPath - path inside the dependency directory; '' for the directory itself
 * @param callingPath - file the request comes from; adds `<its dir>/data` to the search
 */
export async function resolveDataDep(
  depOrName: DataDep | string,
  innerPath: string,
  ctx: DataDepsContext,
  callingPath?: string
): Promise<string> {
  const dep = typeof depOrName === 'string' ? ctx.registry.get(depOrName) : depOrName;

  for (;;) {
    enter(dep, 'locating');
    const dirPath = await locateDataDep(dep, ctx, callingPath);
    const filePath = innerPath ? join(dirPath, innerPath) : dirPath;

    for (;;) {
      enter(dep, 'validating');
      if (await canRead(filePath)) {
        enter(dep, 'succeeded');
        return canonicalPath(filePath);
      }

      enter(dep, 'repairing');
      const action = await askForRepair(dep, dirPath, filePath, ctx);
      if (action === 'purge') {
        break;
      }
    }
  }
}

/**
 * Resolve "Name" or "Name/inner/path" through the context's registry.
 */
export async function resolve(namePath: string, ctx: DataDepsContext, callingPath?: string): Promise<string> {
  const { name, innerPath } = splitNamePath(namePath);
  return resolveDataDep(name, innerPath, ctx, callingPath);
}
