/**
 * @fileoverview Command setup for 'datadep resolve'
 * 
 * Prints the local path of a data dependency, downloading it first if needed.
 */

import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { createCliContext, type CliContextOptions } from '../cli/context.js';
import { resolve } from '../core/path-resolver.js';

/**
 * Setup the 'datadep resolve' command
 */
export function setupResolveCommand(program: Command): void {
  program
    .command('resolve')
    .argument('<name-path>', 'dependency name, optionally followed by a path inside it (Name/file.csv)')
    .description('Print the local path of a data dependency, downloading it if missing')
    .action(
      withErrorHandling(async (namePath: string) => {
        const ctx = await createCliContext(program.opts<CliContextOptions>());
        const path = await resolve(namePath, ctx);
        console.log(path);
      })
    );
}
