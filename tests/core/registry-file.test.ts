import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { loadRegistryFile, parseChecksum, parseRegistry } from '../../src/core/registry-file.js';
import { valuesOf } from '../../src/core/datadep.js';
import { ValidationError } from '../../src/utils/errors.js';
import type { FetchMethod, PostFetchMethod } from '../../src/types/index.js';
import { makeTempDir, removeDir } from '../test-helpers.js';

const fetchMethod: FetchMethod = () => undefined;

describe('parseChecksum', () => {
  it('reads algorithm-prefixed digests', () => {
    const checksum = parseChecksum('xxhash3:00ff00ff00ff00ff');
    assert.strictEqual(checksum.algorithm.name, 'xxhash3');
    assert.strictEqual(checksum.value, '00ff00ff00ff00ff');
  });

  it('treats a bare digest as sha256', () => {
    const checksum = parseChecksum(' ABCDEF ');
    assert.strictEqual(checksum.algorithm.name, 'sha256');
    assert.strictEqual(checksum.value, 'ABCDEF');
  });

  it('rejects unknown algorithms and non-hex digests', () => {
    assert.throws(() => parseChecksum('md5:abcd'), ValidationError);
    assert.throws(() => parseChecksum('sha256:not-hex'), {
      message: "Validation error: checksum 'sha256:not-hex' is not a hex digest"
    });
  });
});

describe('parseRegistry', () => {
  const source = '/project/datadeps.yml';

  it('builds descriptors from every entry', () => {
    const commands: string[] = [];
    const postFetchCommand = (command: string): PostFetchMethod => {
      commands.push(command);
      return () => undefined;
    };
    const content = [
      'dependencies:',
      '  - name: Example',
      '    remote: https://example.org/data.csv',
      '    hash: sha256:ABCD',
      '    message: Cite the example dataset.',
      '  - name: Pair',
      '    remote:',
      '      - raw/a.csv',
      '      - /abs/b.csv',
      '    hash:',
      '      - ab',
      '      - xxhash3:cd',
      '    post_fetch: gunzip {file}',
      ''
    ].join('\n');

    const [example, pair] = parseRegistry(content, source, { fetchMethod, postFetchCommand });

    assert.strictEqual(example.name, 'Example');
    assert.deepStrictEqual(example.remotePath, { kind: 'one', value: 'https://example.org/data.csv' });
    assert.deepStrictEqual(example.fetchMethod, { kind: 'one', value: fetchMethod });
    assert.strictEqual(example.extraMessage, 'Cite the example dataset.');
    assert.strictEqual(example.postFetchMethod, undefined);
    assert.ok(example.hash);
    assert.deepStrictEqual(valuesOf(example.hash).map(c => `${c.algorithm.name}:${c.value}`), ['sha256:ABCD']);

    assert.strictEqual(pair.name, 'Pair');
    assert.deepStrictEqual(valuesOf(pair.remotePath), [resolve('/project', 'raw/a.csv'), '/abs/b.csv']);
    assert.ok(pair.hash);
    assert.deepStrictEqual(valuesOf(pair.hash).map(c => `${c.algorithm.name}:${c.value}`), ['sha256:ab', 'xxhash3:cd']);
    assert.strictEqual(pair.postFetchMethod?.kind, 'one');
    assert.deepStrictEqual(commands, ['gunzip {file}']);
  });

  it('treats an empty file as declaring nothing', () => {
    assert.deepStrictEqual(parseRegistry('', source, { fetchMethod }), []);
    assert.deepStrictEqual(parseRegistry('dependencies: []\n', source, { fetchMethod }), []);
  });

  it('requires a remote for every entry', () => {
    assert.throws(() => parseRegistry('dependencies:\n  - name: A\n', source, { fetchMethod }), {
      message: "Validation error: /project/datadeps.yml dependencies[0]: dependency 'A' must specify 'remote'"
    });
  });

  it('rejects post-fetch commands when no runner is supplied', () => {
    const content = 'dependencies:\n  - name: A\n    remote: https://example.org/a.tgz\n    post_fetch: tar -xzf {file}\n';
    assert.throws(() => parseRegistry(content, source, { fetchMethod }), {
      message: "Validation error: dependency 'A' has post_fetch but no command runner is available"
    });
  });

  it('rejects documents that are not a mapping', () => {
    assert.throws(() => parseRegistry('- a\n- b\n', source, { fetchMethod }), {
      message: "Validation error: /project/datadeps.yml must be a mapping with a 'dependencies' list"
    });
  });

  it('reports YAML syntax errors as validation errors', () => {
    assert.throws(() => parseRegistry('dependencies: [\n', source, { fetchMethod }), ValidationError);
  });
});

describe('loadRegistryFile', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('registry-file');
  });

  after(async () => {
    await removeDir(root);
  });

  it('registers every dependency declared in the file', async () => {
    const file = join(root, 'datadeps.yml');
    await writeFile(file, [
      'dependencies:',
      '  - name: Local',
      '    remote: fixtures/local.csv',
      '  - name: Remote',
      '    remote: https://example.org/remote.csv',
      ''
    ].join('\n'));

    const registry = await loadRegistryFile(file, { fetchMethod });

    assert.deepStrictEqual(registry.list().map(d => d.name), ['Local', 'Remote']);
    assert.deepStrictEqual(valuesOf(registry.get('Local').remotePath), [join(root, 'fixtures', 'local.csv')]);
  });
});
