import { assert } from 'chai';
import express from 'express';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import http, { type Server } from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { listen, shutDown } from '../test-helpers.js';
import { NO_CACHE, createImagesRouter } from './images.js';

describe('images route', () => {
  let directory: string;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'lenscast-images-'));
    await writeFile(path.join(directory, '000001.png'), 'frame-one');
    await writeFile(path.join(directory, 'front door #2.jpg'), 'frame-two');
    const app = express();
    app.use('/images', createImagesRouter(directory));
    server = http.createServer(app);
    base = `http://127.0.0.1:${await listen(server)}/images`;
  });

  afterEach(async () => {
    await shutDown(server);
    await rm(directory, { recursive: true, force: true });
  });

  it('serves frames with caching disabled', async () => {
    const res = await fetch(`${base}/000001.png`);

    assert.equal(res.status, 200);
    assert.equal(res.headers.get('cache-control'), NO_CACHE);
    assert.equal(NO_CACHE, 'no-store, no-cache, must-revalidate, max-age=0');
    assert.isNull(res.headers.get('etag'));
    assert.equal(await res.text(), 'frame-one');
  });

  it('serves the percent-encoded names that viewers are sent', async () => {
    const res = await fetch(`${base}/front%20door%20%232.jpg`);

    assert.equal(res.status, 200);
    assert.equal(await res.text(), 'frame-two');
  });

  it('answers 404 JSON for a missing frame', async () => {
    const res = await fetch(`${base}/000099.png`);

    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { error: 'NOT_FOUND' });
  });
});
