import { describe, it } from 'node:test';
import assert from 'node:assert';
import { acceptTerms } from '../../src/core/terms-gate.js';
import { createDataDep, many } from '../../src/core/datadep.js';
import { createDataDepsContext } from '../../src/core/execution-context.js';
import { DownloadsDisabledError, TermsDeniedError } from '../../src/utils/errors.js';
import type { DataDepsConfig } from '../../src/types/index.js';
import { createRecordingOutput, createScriptedInteraction, testConfig } from '../test-helpers.js';

const dep = createDataDep({
  name: 'Example',
  remotePath: 'https://example.org/data.csv',
  fetchMethod: () => undefined,
  extraMessage: 'Please cite the example dataset.'
});

function setup(config: DataDepsConfig, confirms: boolean[] = []) {
  const output = createRecordingOutput();
  const interaction = createScriptedInteraction({ confirms });
  const ctx = createDataDepsContext({ config, output, interaction });
  return { ctx, output, interaction };
}

describe('acceptTerms', () => {
  it('refuses when downloads are disabled, whatever the override', async () => {
    const { ctx, interaction } = setup(testConfig([], { disableDownload: true }));
    await assert.rejects(
      acceptTerms(dep, '/data/Example', dep.remotePath, true, ctx),
      (error: unknown) => {
        assert.ok(error instanceof DownloadsDisabledError);
        assert.strictEqual(
          error.message,
          "DATADEPS_DISABLE_DOWNLOAD environment variable set. Can not trigger download of 'Example'."
        );
        return true;
      }
    );
    assert.strictEqual(interaction.calls.length, 0);
  });

  it('accepts without prompting when configured to always accept', async () => {
    const { ctx, interaction, output } = setup(testConfig([], { alwaysAccept: true }));
    assert.strictEqual(await acceptTerms(dep, '/data/Example', dep.remotePath, undefined, ctx), true);
    assert.strictEqual(interaction.calls.length, 0);
    assert.deepStrictEqual(output.records, []);
  });

  it('lets an explicit false override always-accept', async () => {
    const { ctx, interaction } = setup(testConfig([], { alwaysAccept: true }));
    await assert.rejects(acceptTerms(dep, '/data/Example', dep.remotePath, false, ctx), TermsDeniedError);
    assert.strictEqual(interaction.calls.length, 0);
  });

  it('lets an explicit true skip the prompt', async () => {
    const { ctx, interaction } = setup(testConfig([], { alwaysAccept: false }));
    assert.strictEqual(await acceptTerms(dep, '/data/Example', dep.remotePath, true, ctx), true);
    assert.strictEqual(interaction.calls.length, 0);
  });

  it('shows the terms and asks when nothing decides in advance', async () => {
    const { ctx, interaction, output } = setup(testConfig([], { alwaysAccept: false }), [true]);

    assert.strictEqual(await acceptTerms(dep, '/data/Example', dep.remotePath, undefined, ctx), true);
    assert.deepStrictEqual(output.of('info'), [
      'This program has requested access to the data dependency Example.',
      'which is not currently installed. It can be installed automatically, and you will not see this message again.'
    ]);
    assert.deepStrictEqual(output.of('note'), ['Example: Please cite the example dataset.']);
    assert.deepStrictEqual(interaction.calls, [{
      type: 'confirm',
      message: 'Do you want to download the dataset from https://example.org/data.csv to "/data/Example"?'
    }]);
  });

  it('names every locator of a multi-file dependency in the prompt', async () => {
    const { ctx, interaction } = setup(testConfig([], { alwaysAccept: false }), [true]);
    const remote = many(['https://example.org/a.csv', 'https://example.org/b.csv']);

    await acceptTerms(dep, '/data/Example', remote, undefined, ctx);
    assert.strictEqual(
      interaction.calls[0].message,
      'Do you want to download the dataset from https://example.org/a.csv, https://example.org/b.csv to "/data/Example"?'
    );
  });

  it('throws TermsDeniedError when the user declines', async () => {
    const { ctx } = setup(testConfig([], { alwaysAccept: false }), [false]);
    await assert.rejects(
      acceptTerms(dep, '/data/Example', dep.remotePath, undefined, ctx),
      { name: 'TermsDeniedError', message: 'User declined to download Example. Can not proceed without the data.' }
    );
  });
});
