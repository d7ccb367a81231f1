/**
 * Data dependency descriptor types
 *
 * A descriptor names a remote dataset and says how to fetch it, how to
 * verify it and what to run on it once it is on disk. Every field that may
 * be given per remote locator is a OneOrMany value, paired by position.
 */

/**
 * A value given once for every locator, or once per locator.
 */
export type OneOrMany<T> =
  | { readonly kind: 'one'; readonly value: T }
  | { readonly kind: 'many'; readonly values: readonly T[] };

/**
 * Places the resource at `remoteLocator` on disk at `destinationPath`.
 */
export type FetchMethod = (remoteLocator: string, destinationPath: string) => Promise<void> | void;

/**
 * Runs once on a freshly fetched artifact, with the working directory set
 * to the directory holding it.
 */
export type PostFetchMethod = (fetchedPath: string) => Promise<void> | void;

export interface HashAlgorithm {
  readonly name: string;
  /** Hex digest of the file's contents */
  digestFile(filePath: string): Promise<string>;
}

export interface Checksum {
  readonly algorithm: HashAlgorithm;
  /** Expected hex digest */
  readonly value: string;
}

export interface DataDep {
  readonly name: string;
  readonly remotePath: OneOrMany<string>;
  readonly fetchMethod: OneOrMany<FetchMethod>;
  readonly postFetchMethod?: OneOrMany<PostFetchMethod>;
  readonly hash?: OneOrMany<Checksum>;
  readonly extraMessage: string;
}

/**
 * Loose input accepted by createDataDep. Arrays become `many`.
 */
export interface DataDepOptions {
  name: string;
  remotePath: string | readonly string[];
  fetchMethod: FetchMethod | readonly FetchMethod[];
  postFetchMethod?: PostFetchMethod | readonly PostFetchMethod[];
  hash?: Checksum | readonly Checksum[];
  extraMessage?: string;
}

/** Local path(s) written by one fetch, in locator order */
export type FetchOutcome = OneOrMany<string>;

export interface DownloadOptions {
  /** Fetch from here instead of the descriptor's remote path */
  remotePath?: string | readonly string[];
  /** Accept whatever was fetched without verifying it */
  skipChecksum?: boolean;
  /**
   * Explicit terms decision. `true` skips the prompt, `false` refuses the
   * download, unset falls back to configuration and then to a prompt.
   */
  acceptTerms?: boolean;
}

export type AcquisitionPhase = 'authorizing' | 'fetching' | 'verifying' | 'post-fetch' | 'succeeded';

export type ResolutionPhase = 'locating' | 'validating' | 'repairing' | 'succeeded';
