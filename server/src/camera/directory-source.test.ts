import { assert } from 'chai';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SourceUnavailable } from '../lib/errors.js';
import type { Frame } from '../types.js';
import { compileFormat, DirectorySource } from './directory-source.js';

async function pull(source: DirectorySource, count: number): Promise<(Frame | null)[]> {
  const frames: (Frame | null)[] = [];
  for (let i = 0; i < count; i += 1) {
    frames.push(await source.next());
  }
  return frames;
}

describe('DirectorySource', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'lenscast-dir-'));
    for (const name of ['b.jpg', 'a.jpg', 'c.jpg', 'notes.txt', '.hidden.jpg']) {
      await fs.writeFile(path.join(directory, name), 'x');
    }
    await fs.mkdir(path.join(directory, 'nested.jpg'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('serves matching files in lexicographic order, then ends', async () => {
    const source = await DirectorySource.open({ directory, format: '*.jpg', cycle: false });

    assert.equal(source.size, 3);
    assert.deepEqual(await pull(source, 5), [
      { index: 0, reference: path.join(directory, 'a.jpg') },
      { index: 1, reference: path.join(directory, 'b.jpg') },
      { index: 2, reference: path.join(directory, 'c.jpg') },
      null,
      null,
    ]);
  });

  it('repeats the same references forever when cycling', async () => {
    const source = await DirectorySource.open({ directory, format: '*.jpg', cycle: true });
    const frames = await pull(source, 8);

    assert.deepEqual(
      frames.map((frame) => frame?.index),
      [0, 1, 2, 3, 4, 5, 6, 7],
    );
    assert.deepEqual(
      frames.map((frame) => (frame ? path.basename(frame.reference) : null)),
      ['a.jpg', 'b.jpg', 'c.jpg', 'a.jpg', 'b.jpg', 'c.jpg', 'a.jpg', 'b.jpg'],
    );
  });

  it('stops producing once closed', async () => {
    const source = await DirectorySource.open({ directory, cycle: true });
    await source.close();
    assert.isNull(await source.next());
  });

  it('fails when the directory is missing', async () => {
    let failure: unknown;
    try {
      await DirectorySource.open({ directory: path.join(directory, 'missing') });
    } catch (error) {
      failure = error;
    }
    assert.instanceOf(failure, SourceUnavailable);
  });

  it('fails when nothing matches the format', async () => {
    let failure: unknown;
    try {
      await DirectorySource.open({ directory, format: '*.png' });
    } catch (error) {
      failure = error;
    }
    assert.instanceOf(failure, SourceUnavailable);
    assert.match(String(failure), /No files matching \*\.png/);
  });
});

describe('compileFormat', () => {
  it('supports * and ? wildcards', () => {
    const matches = compileFormat('frame_??.jp*g');
    assert.isTrue(matches('frame_01.jpg'));
    assert.isTrue(matches('frame_01.jpeg'));
    assert.isFalse(matches('frame_1.jpg'));
    assert.isFalse(matches('frame_01.png'));
  });

  it('treats regex characters literally', () => {
    const matches = compileFormat('shot(1).jpg');
    assert.isTrue(matches('shot(1).jpg'));
    assert.isFalse(matches('shot1xjpg'));
  });

  it('skips hidden files unless the format names them', () => {
    assert.isFalse(compileFormat('*.jpg')('.hidden.jpg'));
    assert.isTrue(compileFormat('.*.jpg')('.hidden.jpg'));
  });
});
