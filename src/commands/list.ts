/**
 * @fileoverview Command setup for 'datadep list'
 */

import { Command } from 'commander';
import pico from 'picocolors';
import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, type CliContextOptions } from '../cli/context.js';
import type { DataDepsContext } from '../types/index.js';
import { valuesOf } from '../core/datadep.js';

export interface DataDepListing {
  name: string;
  remote: string[];
  /** Directory of the local copy, or null when not installed */
  installedAt: string | null;
}

/**
 * Every registered dependency with its install location
 */
export async function listDataDeps(ctx: DataDepsContext): Promise<DataDepListing[]> {
  const listings: DataDepListing[] = [];
  for (const dep of ctx.registry.list()) {
    listings.push({
      name: dep.name,
      remote: [...valuesOf(dep.remotePath)],
      installedAt: await ctx.probe.findExisting(dep.name)
    });
  }
  return listings;
}

export function formatListing(listing: DataDepListing): string {
  const status = listing.installedAt
    ? pico.green(listing.installedAt)
    : pico.dim('not installed');
  return `${pico.bold(listing.name)}  ${status}\n  ${listing.remote.join('\n  ')}`;
}

/**
 * Setup the 'datadep list' command
 */
export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List registered data dependencies and where they are installed')
    .action(
      withErrorHandling(async () => {
        const ctx = await createCliContext(program.opts<CliContextOptions>());
        const listings = await listDataDeps(ctx);
        if (listings.length === 0) {
          console.log('No data dependencies registered');
          return;
        }
        for (const listing of listings) {
          console.log(formatListing(listing));
        }
      })
    );
}
