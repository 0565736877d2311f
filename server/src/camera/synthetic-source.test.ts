import { assert } from 'chai';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pngjs from 'pngjs';
import { SourceUnavailable } from '../lib/errors.js';
import { silentLogger } from '../test-helpers.js';
import { frameFileName, SyntheticSource } from './synthetic-source.js';

const { PNG } = pngjs;

describe('SyntheticSource', () => {
  let savePath: string;

  beforeEach(async () => {
    savePath = await fs.mkdtemp(path.join(os.tmpdir(), 'lenscast-synthetic-'));
  });

  afterEach(async () => {
    await fs.rm(savePath, { recursive: true, force: true });
  });

  it('names frames by zero-padded index', () => {
    assert.equal(frameFileName(0), '000000.png');
    assert.equal(frameFileName(1234), '001234.png');
  });

  it('writes a PNG of the configured size for every frame', async () => {
    const source = await SyntheticSource.open({
      width: 4,
      height: 3,
      savePath,
      random: () => 0.5,
      logger: silentLogger,
    });

    const first = await source.next();
    const second = await source.next();

    assert.deepEqual(first, { index: 0, reference: path.join(savePath, '000000.png') });
    assert.deepEqual(second, { index: 1, reference: path.join(savePath, '000001.png') });

    const image = PNG.sync.read(await fs.readFile(second.reference));
    assert.equal(image.width, 4);
    assert.equal(image.height, 3);
    assert.deepEqual(Array.from(image.data.subarray(0, 4)), [128, 128, 128, 255]);
  });

  it('keeps only the most recent frames on disk', async () => {
    const source = await SyntheticSource.open({
      width: 2,
      height: 2,
      savePath,
      retain: 3,
      logger: silentLogger,
    });

    for (let i = 0; i < 5; i += 1) {
      await source.next();
    }

    const files = (await fs.readdir(savePath)).sort();
    assert.deepEqual(files, ['000002.png', '000003.png', '000004.png']);
  });

  it('fails to open without a save directory', async () => {
    let failure: unknown;
    try {
      await SyntheticSource.open({ width: 2, height: 2, savePath: path.join(savePath, 'nope') });
    } catch (error) {
      failure = error;
    }
    assert.instanceOf(failure, SourceUnavailable);
  });

  it('reports a failed write as SourceUnavailable', async () => {
    const source = await SyntheticSource.open({
      width: 2,
      height: 2,
      savePath,
      logger: silentLogger,
    });
    await fs.rm(savePath, { recursive: true, force: true });

    let failure: unknown;
    try {
      await source.next();
    } catch (error) {
      failure = error;
    }
    assert.instanceOf(failure, SourceUnavailable);
  });
});
