/**
 * @fileoverview Command setup for 'datadep download'
 * 
 * Downloads a data dependency explicitly, with the debugging overrides
 * that automatic resolution does not expose.
 */

import { Command } from 'commander';
import { resolve as resolvePath } from 'path';
import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, type CliContextOptions } from '../cli/context.js';
import { downloadDataDep } from '../core/acquisition-pipeline.js';

interface DownloadCommandOptions {
  dir?: string;
  remote?: string[];
  skipChecksum?: boolean;
  accept?: boolean;
}

/**
 * Setup the 'datadep download' command
 */
export function setupDownloadCommand(program: Command): void {
  program
    .command('download')
    .argument('<name>', 'registered dependency name')
    .description('Download a data dependency')
    .option('--dir <dir>', 'directory to download into (default: the save path on the load path)')
    .option('--remote <locators...>', 'fetch from these locators instead of the registered ones')
    .option('--skip-checksum', 'do not verify the downloaded files')
    .option('--accept', 'accept the terms of use without prompting')
    .action(
      withErrorHandling(async (name: string, options: DownloadCommandOptions) => {
        const ctx = await createCliContext(program.opts<CliContextOptions>());
        const dep = ctx.registry.get(name);
        const localDir = options.dir
          ? resolvePath(process.cwd(), options.dir)
          : await ctx.probe.determineSavePath(dep.name);

        await downloadDataDep(dep, localDir, {
          remotePath: options.remote,
          skipChecksum: options.skipChecksum ?? false,
          acceptTerms: options.accept ? true : undefined
        }, ctx);
        console.log(localDir);
      })
    );
}
