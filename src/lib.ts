/**
 * datadep - library entry point
 *
 * Resolve named data dependencies to local paths, downloading them on
 * first use. All user-facing output and prompts go through the
 * OutputPort and InteractionPort interfaces, so the same logic runs
 * under the CLI, in scripts and in tests.
 */

// ============================================================================
// Port Interfaces
// ============================================================================

export type { OutputPort, UnifiedSpinner } from './core/ports/output.js';
export type { InteractionPort, InteractionChoice } from './core/ports/interaction.js';
export { consoleOutput } from './core/ports/console-output.js';
export { nonInteractivePrompt, NonInteractivePromptError } from './core/ports/console-prompt.js';
export { resolveOutput, resolveInteraction } from './core/ports/resolve.js';

// ============================================================================
// Types
// ============================================================================

export type {
  AcquisitionPhase,
  Checksum,
  CommandResult,
  DataDep,
  DataDepOptions,
  DataDepsConfig,
  DataDepsContext,
  DataDepsContextOptions,
  DownloadOptions,
  FetchMethod,
  FetchOutcome,
  HashAlgorithm,
  OneOrMany,
  PostFetchMethod,
  ResolutionPhase
} from './types/index.js';
export { DataDepError, ErrorCodes } from './types/index.js';

// ============================================================================
// Context, Configuration & Registry
// ============================================================================

export { createDataDepsContext } from './core/execution-context.js';
export { loadDataDepsConfig, ENV_VARS } from './core/config.js';
export { DataDepRegistry } from './core/registry.js';
export { createLoadPathProbe, candidateLoadPaths } from './core/locations.js';
export type { LoadPathProbe } from './core/locations.js';
export { createDataDep, one, many } from './core/datadep.js';
export { loadRegistryFile } from './core/registry-file.js';

// ============================================================================
// Resolution & Acquisition
// ============================================================================

export { resolve, resolveDataDep, locateDataDep } from './core/path-resolver.js';
export { downloadDataDep, runPostFetch } from './core/acquisition-pipeline.js';
export { acceptTerms } from './core/terms-gate.js';
export { runFetch } from './core/fetch-executor.js';
export { checksumPass, runChecksum } from './core/checksum.js';

// ============================================================================
// Utilities
// ============================================================================

export { sha256, xxhash3, getHashAlgorithm, combineDigests } from './utils/hash-utils.js';
export { splitNamePath, filenameFromLocator } from './utils/path-utils.js';
export { withWorkingDirectory } from './utils/working-directory.js';
export {
  DownloadsDisabledError,
  UnknownDependencyError,
  TermsDeniedError,
  ChecksumAbortedError,
  ResolutionAbortedError,
  InvalidDataDepError,
  FileSystemError,
  ValidationError,
  ConfigError,
  UserCancellationError
} from './utils/errors.js';
