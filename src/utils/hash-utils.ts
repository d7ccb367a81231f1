/**
 * Hash Utilities Module
 * File digests for checksum verification
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { createXXHash3 } from 'hash-wasm';
import type { HashAlgorithm } from '../types/index.js';
import { FileSystemError, ValidationError } from './errors.js';

/**
 * SHA-256 of a file, streamed
 */
export const sha256: HashAlgorithm = {
  name: 'sha256',
  async digestFile(filePath: string): Promise<string> {
    const hash = createHash('sha256');
    try {
      for await (const chunk of createReadStream(filePath)) {
        hash.update(chunk);
      }
    } catch (error) {
      throw new FileSystemError(`Failed to hash file: ${filePath}`, { filePath, error });
    }
    return hash.digest('hex');
  }
};

/**
 * XXH3 (64-bit) of a file, streamed
 */
export const xxhash3: HashAlgorithm = {
  name: 'xxhash3',
  async digestFile(filePath: string): Promise<string> {
    const hasher = await createXXHash3();
    hasher.init();
    try {
      for await (const chunk of createReadStream(filePath)) {
        hasher.update(chunk);
      }
    } catch (error) {
      throw new FileSystemError(`Failed to hash file: ${filePath}`, { filePath, error });
    }
    return hasher.digest('hex');
  }
};

const ALGORITHMS: Record<string, HashAlgorithm> = {
  sha256,
  xxhash3
};

/**
 * Look up a built-in algorithm by name
 */
export function getHashAlgorithm(name: string): HashAlgorithm {
  const algorithm = ALGORITHMS[name.toLowerCase()];
  if (!algorithm) {
    throw new ValidationError(
      `unknown hash algorithm '${name}' (expected one of: ${Object.keys(ALGORITHMS).join(', ')})`
    );
  }
  return algorithm;
}

export function normalizeDigest(digest: string): string {
  return digest.trim().toLowerCase();
}

/**
 * Byte-wise XOR of hex digests, so one checksum can cover several files
 * regardless of their order.
 */
export function combineDigests(digests: readonly string[]): string {
  if (digests.length === 0) {
    throw new ValidationError('cannot combine an empty list of digests');
  }

  const buffers = digests.map(d => Buffer.from(normalizeDigest(d), 'hex'));
  const length = buffers[0].length;
  if (buffers.some(b => b.length !== length)) {
    throw new ValidationError('cannot combine digests of different lengths');
  }

  const combined = Buffer.alloc(length);
  for (const buffer of buffers) {
    for (let i = 0; i < length; i++) {
      combined[i] ^= buffer[i];
    }
  }
  return combined.toString('hex');
}
