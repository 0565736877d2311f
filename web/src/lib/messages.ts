import type { CameraMode, ControlMessage, ShotType } from '../types/camera';
import { MessageFormatError } from './errors';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isCameraMode = (value: unknown): value is CameraMode =>
  value === 'motion' || value === 'smart';

export const isShotType = (value: unknown): value is ShotType =>
  value === 'single' || value === 'burst';

const toControlMessage = (data: Record<string, unknown>): ControlMessage | null => {
  switch (data.type) {
    case 'mode':
      return isCameraMode(data.mode) ? { type: 'mode', mode: data.mode } : null;
    case 'shoot':
      return isShotType(data.shot) ? { type: 'shoot', shot: data.shot } : null;
    case 'image_path':
      return typeof data.path === 'string' && data.path.length > 0
        ? { type: 'image_path', path: data.path }
        : null;
    default:
      return null;
  }
};

/**
 * Parses one text frame from a channel. Image paths arrive percent-encoded
 * and are decoded here, so handlers always see the plain file name.
 */
export function parseControlMessage(raw: string): ControlMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new MessageFormatError('Message is not valid JSON', { cause: error });
  }
  const message = isRecord(data) ? toControlMessage(data) : null;
  if (!message) {
    throw new MessageFormatError(`Unrecognised message: ${raw.slice(0, 120)}`);
  }
  if (message.type !== 'image_path') return message;

  try {
    return { type: 'image_path', path: decodeURIComponent(message.path) };
  } catch (error) {
    throw new MessageFormatError(`Malformed image path: ${message.path}`, { cause: error });
  }
}
