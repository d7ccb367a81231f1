/**
 * Execution Context Module
 *
 * Creates the DataDepsContext threaded through every resolution call.
 * Configuration is read here, once, and never again below this point.
 */

import type { DataDepsContext, DataDepsContextOptions } from '../types/execution-context.js';
import { loadDataDepsConfig } from './config.js';
import { DataDepRegistry } from './registry.js';
import { createLoadPathProbe } from './locations.js';
import { SingleFlight } from '../utils/single-flight.js';
import { logger } from '../utils/logger.js';

/**
 * Create a DataDepsContext, filling in defaults for anything not supplied:
 * configuration from the environment, an empty registry and the default
 * load-path probe. Ports stay unset so resolveOutput/resolveInteraction
 * pick the non-interactive fallbacks.
 */
export function createDataDepsContext(options: DataDepsContextOptions = {}): DataDepsContext {
  const config = options.config ?? loadDataDepsConfig(options.env ?? process.env);

  const context: DataDepsContext = {
    config,
    registry: options.registry ?? new DataDepRegistry(),
    probe: options.probe ?? createLoadPathProbe(config),
    acquisitions: new SingleFlight<string>(),
    output: options.output,
    interaction: options.interaction
  };

  logger.debug('Created datadep context', {
    loadPath: config.loadPath,
    alwaysAccept: config.alwaysAccept,
    disableDownload: config.disableDownload
  });

  return context;
}
