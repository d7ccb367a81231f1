/**
 * Data dependency construction
 *
 * Normalizes the loose DataDepOptions into a frozen DataDep, rejecting
 * per-locator fields whose length does not match the remote path.
 */

import type {
  Checksum,
  DataDep,
  DataDepOptions,
  FetchMethod,
  OneOrMany,
  PostFetchMethod
} from '../types/index.js';
import { InvalidDataDepError } from '../utils/errors.js';

function isMany<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

export function one<T>(value: T): OneOrMany<T> {
  return { kind: 'one', value };
}

export function many<T>(values: readonly T[]): OneOrMany<T> {
  return { kind: 'many', values: Object.freeze([...values]) };
}

/**
 * Arrays become `many`, anything else `one`
 */
export function toOneOrMany<T>(value: T | readonly T[]): OneOrMany<T> {
  return isMany(value) ? many(value) : one(value);
}

/**
 * Flatten to an array in declaration order
 */
export function valuesOf<T>(value: OneOrMany<T>): readonly T[] {
  return value.kind === 'one' ? [value.value] : value.values;
}

/**
 * Value paired with the locator at `index`: a `one` value is shared by
 * every locator.
 */
export function valueAt<T>(value: OneOrMany<T>, index: number): T {
  if (value.kind === 'one') {
    return value.value;
  }
  const item = value.values[index];
  if (item === undefined) {
    throw new InvalidDataDepError(`no entry at position ${index}`, { index, length: value.values.length });
  }
  return item;
}

/**
 * Check that a per-locator field lines up with the locators it pairs with.
 */
export function assertPairable<T>(
  field: string,
  value: OneOrMany<T> | undefined,
  locators: OneOrMany<string>,
  subject: string
): void {
  if (!value || value.kind === 'one') {
    return;
  }
  if (locators.kind === 'one') {
    throw new InvalidDataDepError(
      `${subject} has ${value.values.length} ${field} entries for a single remote path`,
      { subject, field }
    );
  }
  if (value.values.length !== locators.values.length) {
    throw new InvalidDataDepError(
      `${subject} has ${value.values.length} ${field} entries for ${locators.values.length} remote paths`,
      { subject, field }
    );
  }
}

/**
 * Build a remote path, rejecting an empty list
 */
export function toRemotePath(remotePath: string | readonly string[], name: string): OneOrMany<string> {
  const locators = toOneOrMany(remotePath);
  if (locators.kind === 'many' && locators.values.length === 0) {
    throw new InvalidDataDepError(`'${name}' has an empty remote path list`, { name });
  }
  if (valuesOf(locators).some(locator => locator.trim().length === 0)) {
    throw new InvalidDataDepError(`'${name}' has a blank remote path`, { name });
  }
  return locators;
}

/**
 * Create a validated, immutable DataDep.
 */
export function createDataDep(options: DataDepOptions): DataDep {
  const name = options.name.trim();
  if (!name) {
    throw new InvalidDataDepError('name must not be empty');
  }
  if (/[\\/]/.test(name)) {
    throw new InvalidDataDepError(`name '${name}' must not contain path separators`, { name });
  }

  const remotePath = toRemotePath(options.remotePath, name);
  const fetchMethod: OneOrMany<FetchMethod> = toOneOrMany(options.fetchMethod);
  const postFetchMethod: OneOrMany<PostFetchMethod> | undefined =
    options.postFetchMethod === undefined ? undefined : toOneOrMany(options.postFetchMethod);
  const hash: OneOrMany<Checksum> | undefined =
    options.hash === undefined ? undefined : toOneOrMany(options.hash);

  const subject = `'${name}'`;
  assertPairable('fetch method', fetchMethod, remotePath, subject);
  assertPairable('post-fetch method', postFetchMethod, remotePath, subject);
  assertPairable('hash', hash, remotePath, subject);

  return Object.freeze({
    name,
    remotePath,
    fetchMethod,
    postFetchMethod,
    hash,
    extraMessage: options.extraMessage ?? ''
  });
}
