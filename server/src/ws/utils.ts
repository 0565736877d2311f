import path from 'node:path';
import { ProtocolError } from '../lib/errors.js';
import {
  controlMessageSchema,
  type CameraMode,
  type ControlMessage,
  type ImagePathMessage,
  type ModeMessage,
  type ShootMessage,
  type ShotType,
} from './schemas.js';

export const modeMessage = (mode: CameraMode): ModeMessage => ({ type: 'mode', mode });

export const shootMessage = (shot: ShotType): ShootMessage => ({ type: 'shoot', shot });

export const imagePathMessage = (imagePath: string): ImagePathMessage => ({
  type: 'image_path',
  path: imagePath,
});

/**
 * Maps a frame file to the URL path viewers fetch it from. The basename is
 * percent-encoded; viewers decode before resolving against their base address.
 */
export function imageUrl(reference: string): string {
  return `images/${encodeURIComponent(path.basename(reference))}`;
}

export function encodeMessage(message: ControlMessage): string {
  return JSON.stringify(message);
}

export function decodeMessage(raw: string): ControlMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ProtocolError('Message is not valid JSON', { cause: error });
  }
  const parsed = controlMessageSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProtocolError(
      `Unrecognised message: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`,
    );
  }
  return parsed.data;
}
