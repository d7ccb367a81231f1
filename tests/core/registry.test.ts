import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DataDepRegistry } from '../../src/core/registry.js';
import { createDataDep } from '../../src/core/datadep.js';
import { UnknownDependencyError } from '../../src/utils/errors.js';

function dep(name: string, remotePath = `https://example.org/${name}.csv`) {
  return createDataDep({ name, remotePath, fetchMethod: () => undefined });
}

describe('DataDepRegistry', () => {
  it('returns registered descriptors by name', () => {
    const registry = new DataDepRegistry();
    const example = dep('Example');
    registry.register(example);

    assert.strictEqual(registry.get('Example'), example);
    assert.strictEqual(registry.has('Example'), true);
    assert.strictEqual(registry.has('Other'), false);
  });

  it('throws UnknownDependencyError for unregistered names', () => {
    const registry = new DataDepRegistry();
    assert.throws(() => registry.get('Nope'), (error: unknown) => {
      assert.ok(error instanceof UnknownDependencyError);
      assert.strictEqual(error.message, "Data dependency 'Nope' is not registered");
      return true;
    });
  });

  it('replaces an earlier registration under the same name', () => {
    const registry = new DataDepRegistry();
    registry.register(dep('Example', 'https://example.org/old.csv'));
    const replacement = dep('Example', 'https://example.org/new.csv');
    registry.register(replacement);

    assert.strictEqual(registry.get('Example'), replacement);
    assert.strictEqual(registry.list().length, 1);
  });

  it('lists descriptors sorted by name', () => {
    const registry = new DataDepRegistry();
    registry.register(dep('Zeta'));
    registry.register(dep('Alpha'));
    registry.register(dep('Mid'));

    assert.deepStrictEqual(registry.list().map(d => d.name), ['Alpha', 'Mid', 'Zeta']);
  });
});
