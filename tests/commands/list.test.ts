import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdir } from 'fs/promises';
import { join } from 'path';
import { formatListing, listDataDeps } from '../../src/commands/list.js';
import { createDataDep } from '../../src/core/datadep.js';
import { DataDepRegistry } from '../../src/core/registry.js';
import { createDataDepsContext } from '../../src/core/execution-context.js';
import { makeTempDir, removeDir, testConfig } from '../test-helpers.js';

function stripColors(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

describe('list command', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('list');
    await mkdir(join(root, 'Example'));
  });

  after(async () => {
    await removeDir(root);
  });

  it('reports where each registered dependency is installed', async () => {
    const registry = new DataDepRegistry();
    registry.register(createDataDep({
      name: 'Other',
      remotePath: ['https://example.org/a.csv', 'https://example.org/b.csv'],
      fetchMethod: () => undefined
    }));
    registry.register(createDataDep({ name: 'Example', remotePath: 'https://example.org/data.csv', fetchMethod: () => undefined }));
    const ctx = createDataDepsContext({ config: testConfig([root]), registry });

    const listings = await listDataDeps(ctx);

    assert.deepStrictEqual(listings, [
      { name: 'Example', remote: ['https://example.org/data.csv'], installedAt: join(root, 'Example') },
      { name: 'Other', remote: ['https://example.org/a.csv', 'https://example.org/b.csv'], installedAt: null }
    ]);
    assert.strictEqual(
      stripColors(formatListing(listings[0])),
      `Example  ${join(root, 'Example')}\n  https://example.org/data.csv`
    );
    assert.strictEqual(
      stripColors(formatListing(listings[1])),
      'Other  not installed\n  https://example.org/a.csv\n  https://example.org/b.csv'
    );
  });
});
