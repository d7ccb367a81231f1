/**
 * Execution Context Types
 *
 * Type definitions for the context threaded through every resolution call.
 * The context replaces ambient globals: configuration, the registry, the
 * load-path probe and the UI ports all travel with the call.
 */

import type { DataDepsConfig } from './index.js';
import type { DataDepRegistry } from '../core/registry.js';
import type { LoadPathProbe } from '../core/locations.js';
import type { OutputPort } from '../core/ports/output.js';
import type { InteractionPort } from '../core/ports/interaction.js';
import type { SingleFlight } from '../utils/single-flight.js';

/**
 * DataDepsContext - everything a resolution needs besides its arguments
 */
export interface DataDepsContext {
  /**
   * Normalized configuration, read once from the environment
   * (or supplied directly by embedding code and tests).
   */
  config: DataDepsConfig;

  /**
   * Registry that maps dependency names to descriptors.
   */
  registry: DataDepRegistry;

  /**
   * Finds existing local copies and decides where new ones are saved.
   */
  probe: LoadPathProbe;

  /**
   * In-flight acquisitions keyed by dependency name, so that concurrent
   * resolutions of one name share a single download.
   */
  acquisitions: SingleFlight<string>;

  /**
   * Output port for user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * Interaction port for confirmations and menus.
   * When not provided, defaults to nonInteractivePrompt (throws on prompt).
   */
  interaction?: InteractionPort;
}

/**
 * Options for creating a DataDepsContext
 */
export interface DataDepsContextOptions {
  /** Full configuration; when absent it is read from `env` */
  config?: DataDepsConfig;

  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv;

  registry?: DataDepRegistry;

  probe?: LoadPathProbe;

  output?: OutputPort;

  interaction?: InteractionPort;
}
