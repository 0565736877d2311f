import { assert } from 'chai';
import { flush, silentLogger } from '../test-helpers.js';
import type { ControlMessage } from '../ws/schemas.js';
import { ChannelRegistry } from './registry.js';

describe('ChannelRegistry', () => {
  it('creates each channel once with its delivery policy', () => {
    const registry = new ChannelRegistry(silentLogger);

    assert.strictEqual(registry.channel('camera'), registry.channel('camera'));
    assert.equal(registry.channel('camera').policy, 'coalesce');
    assert.equal(registry.channel('shoot').policy, 'queue');
    assert.equal(registry.channel('mode').policy, 'queue');
  });

  it('keeps channels independent', async () => {
    const registry = new ChannelRegistry(silentLogger);
    const frames: ControlMessage[] = [];
    const shots: ControlMessage[] = [];
    registry.attach('camera', async (message) => {
      frames.push(message);
    });
    registry.attach('shoot', async (message) => {
      shots.push(message);
    });

    registry.publish('shoot', { type: 'shoot', shot: 'burst' });
    registry.publish('camera', { type: 'image_path', path: 'images/000001.png' });
    await flush();

    assert.deepEqual(frames, [{ type: 'image_path', path: 'images/000001.png' }]);
    assert.deepEqual(shots, [{ type: 'shoot', shot: 'burst' }]);
  });

  it('detaches a subscription from whichever channel holds it', () => {
    const registry = new ChannelRegistry(silentLogger);
    const subscription = registry.attach('mode', async () => {});

    assert.isTrue(registry.detach(subscription));
    assert.isFalse(registry.detach(subscription));
    assert.equal(registry.channel('mode').size, 0);
  });

  it('reports stats per channel and tears everything down on close', () => {
    const registry = new ChannelRegistry(silentLogger);
    const subscription = registry.attach('camera', async () => {});
    registry.publish('camera', { type: 'image_path', path: 'images/a.jpg' });

    assert.deepEqual(
      registry.stats().map(({ name, subscribers, published }) => ({ name, subscribers, published })),
      [{ name: 'camera', subscribers: 1, published: 1 }],
    );

    registry.close();

    assert.isFalse(subscription.active);
    assert.deepEqual(registry.stats(), []);
  });
});
