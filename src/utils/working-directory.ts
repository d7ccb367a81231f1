/**
 * Scoped working-directory switch
 *
 * process.cwd() is process-wide, so scopes are serialized: a scope waits
 * for every earlier scope at its level to restore its directory before
 * switching. A scope opened from inside another (a post-fetch step that
 * resolves a further dependency) queues behind its siblings only, not
 * behind the scope that encloses it.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { logger } from './logger.js';

interface ScopeQueue {
  tail: Promise<void>;
}

const rootQueue: ScopeQueue = { tail: Promise.resolve() };
const enclosingQueue = new AsyncLocalStorage<ScopeQueue>();

async function acquire(queue: ScopeQueue): Promise<() => void> {
  const previous = queue.tail;
  let release: () => void = () => undefined;
  const released = new Promise<void>(resolve => {
    release = resolve;
  });
  queue.tail = previous.then(() => released);
  await previous;
  return release;
}

/**
 * Run `fn` with the working directory set to `dir`, restoring the previous
 * directory afterwards whether `fn` returns or throws.
 */
export async function withWorkingDirectory<T>(dir: string, fn: () => Promise<T> | T): Promise<T> {
  const queue = enclosingQueue.getStore() ?? rootQueue;
  const release = await acquire(queue);
  const prior = process.cwd();
  try {
    process.chdir(dir);
    logger.debug(`Working directory switched: ${prior} -> ${dir}`);
    return await enclosingQueue.run({ tail: Promise.resolve() }, fn);
  } finally {
    process.chdir(prior);
    release();
  }
}
