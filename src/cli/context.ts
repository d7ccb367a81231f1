/**
 * CLI Context Factory
 * 
 * Creates DataDepsContext instances with CLI-specific port implementations
 * (Clack output adapter, Clack interaction adapter) and the registry file
 * loaded with the default transports.
 */

import { resolve } from 'path';
import type { DataDepsContext } from '../types/execution-context.js';
import { createDataDepsContext } from '../core/execution-context.js';
import { loadDataDepsConfig } from '../core/config.js';
import { DEFAULT_REGISTRY_FILE, loadRegistryFile } from '../core/registry-file.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackInteraction } from './clack-interaction-adapter.js';
import { defaultTransport, shellPostFetch } from './transports.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { InteractionPort } from '../core/ports/interaction.js';

export type CliContextOptions = {
  /** Registry file (default: datadeps.yml in the working directory) */
  registry?: string;
  /** Accept every download's terms for this run */
  yes?: boolean;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
};

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

function getCliPorts(isInteractive: boolean): { output: OutputPort; interaction: InteractionPort } {
  if (isInteractive) {
    return { output: createClackOutput(), interaction: createClackInteraction() };
  }
  return { output: consoleOutput, interaction: nonInteractivePrompt };
}

/**
 * Create a DataDepsContext for a CLI command.
 * 
 * In interactive mode (TTY): uses Clack for output and prompts.
 * In non-interactive mode (CI/piped): uses plain console output and throws on prompts.
 */
export async function createCliContext(options: CliContextOptions = {}): Promise<DataDepsContext> {
  const config = loadDataDepsConfig(process.env);
  if (options.yes) {
    config.alwaysAccept = true;
  }

  const registryPath = resolve(process.cwd(), options.registry ?? DEFAULT_REGISTRY_FILE);
  const registry = await loadRegistryFile(registryPath, {
    fetchMethod: defaultTransport,
    postFetchCommand: command => shellPostFetch(command)
  });

  return createDataDepsContext({
    config,
    registry,
    ...getCliPorts(detectInteractive(options.interactive))
  });
}
