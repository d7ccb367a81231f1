import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SingleFlight } from '../../src/utils/single-flight.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('SingleFlight', () => {
  it('runs one task for concurrent callers of a key', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();
    let runs = 0;
    const task = () => {
      runs += 1;
      return gate.promise;
    };

    const first = flight.run('Example', task);
    const second = flight.run('Example', task);
    assert.strictEqual(flight.has('Example'), true);

    gate.resolve('/data/Example');
    assert.deepStrictEqual(await Promise.all([first, second]), ['/data/Example', '/data/Example']);
    assert.strictEqual(runs, 1);
    assert.strictEqual(flight.has('Example'), false);
  });

  it('keeps keys independent', async () => {
    const flight = new SingleFlight<string>();
    const results = await Promise.all([
      flight.run('A', async () => 'a'),
      flight.run('B', async () => 'b')
    ]);
    assert.deepStrictEqual(results, ['a', 'b']);
  });

  it('shares a failure and lets the next call start over', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();

    const first = flight.run('Example', () => gate.promise);
    const second = flight.run('Example', async () => 'unused');
    gate.reject(new Error('fetch failed'));

    await assert.rejects(first, { message: 'fetch failed' });
    await assert.rejects(second, { message: 'fetch failed' });
    assert.strictEqual(await flight.run('Example', async () => 'retried'), 'retried');
  });
});
