import { assert } from 'chai';
import { ProtocolError } from '../lib/errors.js';
import {
  decodeMessage,
  encodeMessage,
  imagePathMessage,
  imageUrl,
  modeMessage,
  shootMessage,
} from './utils.js';

describe('control messages', () => {
  it('self-identifies each kind', () => {
    assert.equal(encodeMessage(modeMessage('smart')), '{"type":"mode","mode":"smart"}');
    assert.equal(encodeMessage(shootMessage('burst')), '{"type":"shoot","shot":"burst"}');
    assert.equal(
      encodeMessage(imagePathMessage('images/000007.png')),
      '{"type":"image_path","path":"images/000007.png"}',
    );
  });

  it('decodes every kind', () => {
    assert.deepEqual(decodeMessage('{"type":"mode","mode":"motion"}'), {
      type: 'mode',
      mode: 'motion',
    });
    assert.deepEqual(decodeMessage('{"type":"shoot","shot":"single"}'), {
      type: 'shoot',
      shot: 'single',
    });
    assert.deepEqual(decodeMessage('{"type":"image_path","path":"images/a%20b.jpg"}'), {
      type: 'image_path',
      path: 'images/a%20b.jpg',
    });
  });

  it('rejects unknown kinds, bad values and broken JSON', () => {
    for (const raw of [
      '{"type":"zoom","level":2}',
      '{"type":"shoot","shot":"triple"}',
      '{"type":"image_path","path":""}',
      'single',
      '{"type":',
    ]) {
      assert.throws(() => decodeMessage(raw), ProtocolError, undefined, raw);
    }
  });
});

describe('imageUrl', () => {
  it('publishes the basename under images/', () => {
    assert.equal(imageUrl('/run/shm/frames/000042.png'), 'images/000042.png');
  });

  it('percent-encodes characters a text transport could mangle', () => {
    assert.equal(imageUrl('/data/shots/front door #2.jpg'), 'images/front%20door%20%232.jpg');
  });
});
