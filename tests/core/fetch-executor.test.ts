import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { readFile, stat } from 'fs/promises';
import { join } from 'path';
import { runFetch, settleAll } from '../../src/core/fetch-executor.js';
import { many, one } from '../../src/core/datadep.js';
import { InvalidDataDepError } from '../../src/utils/errors.js';
import type { FetchMethod } from '../../src/types/index.js';
import { createRecordingOutput, createStubTransport, makeTempDir, removeDir } from '../test-helpers.js';

describe('settleAll', () => {
  it('returns results in task order', async () => {
    const slow = new Promise<number>(resolve => setTimeout(() => resolve(1), 10));
    assert.deepStrictEqual(await settleAll([slow, Promise.resolve(2)]), [1, 2]);
  });

  it('rethrows the first failure in order after every task settles', async () => {
    let lateFinished = false;
    const late = new Promise<string>(resolve => setTimeout(() => {
      lateFinished = true;
      resolve('late');
    }, 10));

    await assert.rejects(
      settleAll([late, Promise.reject(new Error('first')), Promise.reject(new Error('second'))]),
      { message: 'first' }
    );
    assert.strictEqual(lateFinished, true);
  });
});

describe('runFetch', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('fetch');
  });

  after(async () => {
    await removeDir(root);
  });

  it('fetches a single locator into a created directory', async () => {
    const transport = createStubTransport('a,b\n1,2\n');
    const output = createRecordingOutput();
    const localDir = join(root, 'single', 'Example');

    const outcome = await runFetch(one(transport.fetchMethod), one('https://example.org/data.csv'), localDir, { output });

    assert.deepStrictEqual(outcome, one(join(localDir, 'data.csv')));
    assert.strictEqual(await readFile(join(localDir, 'data.csv'), 'utf8'), 'a,b\n1,2\n');
    assert.deepStrictEqual(transport.calls, ['https://example.org/data.csv']);
    assert.deepStrictEqual(output.of('spinner'), [
      'start Fetching https://example.org/data.csv',
      'stop Fetched https://example.org/data.csv'
    ]);
  });

  it('names files after the URL path, without query or fragment', async () => {
    const transport = createStubTransport('x');
    const localDir = join(root, 'query');
    const outcome = await runFetch(
      one(transport.fetchMethod),
      one('https://example.org/files/my%20table.csv?download=1#top'),
      localDir,
      { output: createRecordingOutput() }
    );
    assert.deepStrictEqual(outcome, one(join(localDir, 'my table.csv')));
  });

  it('pairs per-locator methods with locators and keeps their order', async () => {
    const first = createStubTransport('first');
    const second = createStubTransport('second');
    const localDir = join(root, 'pair');

    const outcome = await runFetch(
      many([first.fetchMethod, second.fetchMethod]),
      many(['https://example.org/a.txt', 'https://example.org/b.txt']),
      localDir,
      { output: createRecordingOutput() }
    );

    assert.deepStrictEqual(outcome, many([join(localDir, 'a.txt'), join(localDir, 'b.txt')]));
    assert.deepStrictEqual(first.calls, ['https://example.org/a.txt']);
    assert.deepStrictEqual(second.calls, ['https://example.org/b.txt']);
    assert.strictEqual(await readFile(join(localDir, 'b.txt'), 'utf8'), 'second');
  });

  it('propagates a transport failure', async () => {
    const failing: FetchMethod = async () => {
      throw new Error('connection refused');
    };
    const output = createRecordingOutput();
    const localDir = join(root, 'failing');

    await assert.rejects(
      runFetch(one(failing), one('https://example.org/data.csv'), localDir, { output }),
      { message: 'connection refused' }
    );
    assert.deepStrictEqual(output.of('spinner'), ['start Fetching https://example.org/data.csv', 'stop Fetch failed']);
  });

  it('rejects a fetch method list that does not match the locators', async () => {
    const localDir = join(root, 'mismatch');
    await assert.rejects(
      runFetch(many([createStubTransport('x').fetchMethod]), many(['https://example.org/a', 'https://example.org/b']), localDir),
      InvalidDataDepError
    );
    await assert.rejects(stat(localDir));
  });

  it('refuses a locator whose file name leaves the download directory', async () => {
    const transport = createStubTransport('x');
    const localDir = join(root, 'escape', 'Example');

    await assert.rejects(
      runFetch(one(transport.fetchMethod), one('https://example.org/..%2F..%2Fescaped.csv'), localDir),
      InvalidDataDepError
    );
    assert.deepStrictEqual(transport.calls, []);
    await assert.rejects(stat(localDir), { code: 'ENOENT' });
  });

  it('refuses locators that would be saved under the same name before fetching any', async () => {
    const transport = createStubTransport('x');
    const localDir = join(root, 'duplicate');

    await assert.rejects(
      runFetch(
        one(transport.fetchMethod),
        many(['https://example.org/a/data.csv', 'https://example.org/b/data.csv']),
        localDir
      ),
      (error: unknown) => {
        assert.ok(error instanceof InvalidDataDepError);
        assert.strictEqual(
          error.message,
          `Invalid data dependency: 'https://example.org/a/data.csv' and 'https://example.org/b/data.csv' would both be saved as "${join(localDir, 'data.csv')}"`
        );
        return true;
      }
    );
    assert.deepStrictEqual(transport.calls, []);
    await assert.rejects(stat(localDir), { code: 'ENOENT' });
  });
});
