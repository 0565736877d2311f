import { assert } from 'chai';
import { DecodeFailure } from './errors';
import { FpsCounter } from './fps-counter';
import { FrameConsumer, resolveFrameUrl } from './frame-consumer';

interface PendingLoad {
  url: string;
  resolve: (image: string) => void;
  reject: (error: Error) => void;
}

function harness() {
  const loads: PendingLoad[] = [];
  const drawn: string[] = [];
  const fpsReports: number[] = [];
  const skipped: string[] = [];
  const errors: DecodeFailure[] = [];
  let clock = 0;

  const consumer = new FrameConsumer<string>({
    baseUrl: 'http://localhost:8888',
    load: (url) =>
      new Promise<string>((resolve, reject) => {
        loads.push({ url, resolve, reject });
      }),
    draw: (image) => {
      drawn.push(image);
    },
    fps: new FpsCounter(() => clock),
    onFps: (fps) => fpsReports.push(fps),
    onSkip: (path) => skipped.push(path),
    onError: (error) => errors.push(error),
  });

  return {
    consumer,
    loads,
    drawn,
    fpsReports,
    skipped,
    errors,
    setClock: (ms: number) => {
      clock = ms;
    },
  };
}

describe('resolveFrameUrl', () => {
  it('resolves against the base address', () => {
    assert.equal(
      resolveFrameUrl('http://localhost:8888', 'images/000012.png'),
      'http://localhost:8888/images/000012.png',
    );
    assert.equal(
      resolveFrameUrl('http://cam.test/viewer/', 'images/000012.png'),
      'http://cam.test/viewer/images/000012.png',
    );
  });

  it('keeps decoded names fetchable', () => {
    assert.equal(
      resolveFrameUrl('http://localhost:8888/', 'images/front door #2.jpg'),
      'http://localhost:8888/images/front%20door%20%232.jpg',
    );
  });
});

describe('FrameConsumer', () => {
  it('discards references that arrive while a fetch is in flight', async () => {
    const { consumer, loads, drawn, skipped } = harness();

    const first = consumer.handle('images/000001.png');
    assert.isTrue(consumer.inFlight);
    assert.equal(await consumer.handle('images/000002.png'), 'skipped');
    assert.equal(loads.length, 1);
    assert.equal(loads[0]?.url, 'http://localhost:8888/images/000001.png');

    loads[0]?.resolve('frame-1');
    assert.equal(await first, 'rendered');
    assert.isFalse(consumer.inFlight);
    assert.deepEqual(drawn, ['frame-1']);
    assert.deepEqual(skipped, ['images/000002.png']);

    const third = consumer.handle('images/000003.png');
    assert.equal(loads.length, 2);
    loads[1]?.resolve('frame-3');
    assert.equal(await third, 'rendered');
    assert.deepEqual(drawn, ['frame-1', 'frame-3']);
    assert.deepEqual(consumer.stats, { rendered: 2, skipped: 1, failed: 0 });
  });

  it('recovers from a failed load without touching the fps count', async () => {
    const { consumer, loads, drawn, fpsReports, errors } = harness();

    const failing = consumer.handle('images/000001.png');
    loads[0]?.reject(new Error('404'));
    assert.equal(await failing, 'failed');

    assert.isFalse(consumer.inFlight);
    assert.deepEqual(drawn, []);
    assert.deepEqual(fpsReports, []);
    assert.lengthOf(errors, 1);
    assert.instanceOf(errors[0], DecodeFailure);
    assert.equal(errors[0]?.path, 'images/000001.png');

    const next = consumer.handle('images/000002.png');
    loads[1]?.resolve('frame-2');
    assert.equal(await next, 'rendered');
  });

  it('treats a draw error as a decode failure', async () => {
    const errors: DecodeFailure[] = [];
    const consumer = new FrameConsumer<string>({
      baseUrl: 'http://localhost:8888',
      load: async (url) => url,
      draw: () => {
        throw new Error('canvas lost');
      },
      onError: (error) => errors.push(error),
    });

    assert.equal(await consumer.handle('images/000001.png'), 'failed');
    assert.isFalse(consumer.inFlight);
    assert.equal(errors[0]?.path, 'images/000001.png');
  });

  it('reports fps once per rendered frame', async () => {
    const { consumer, loads, fpsReports, setClock } = harness();

    for (const [index, at] of [0, 300, 600, 1100].entries()) {
      setClock(at);
      const pending = consumer.handle(`images/${index}.png`);
      loads[index]?.resolve(`frame-${index}`);
      await pending;
    }

    assert.deepEqual(fpsReports, [0, 0, 0, 3]);
    assert.equal(consumer.fps, 3);
  });
});
