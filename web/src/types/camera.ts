export type CameraMode = 'motion' | 'smart';

export type ShotType = 'single' | 'burst';

export type ChannelName = 'camera' | 'shoot' | 'mode';

export interface ModeMessage {
  type: 'mode';
  mode: CameraMode;
}

export interface ShootMessage {
  type: 'shoot';
  shot: ShotType;
}

export interface ImagePathMessage {
  type: 'image_path';
  path: string;
}

export type ControlMessage = ModeMessage | ShootMessage | ImagePathMessage;

export type StreamStatus = 'connecting' | 'open' | 'closed';

/** What the shot banner shows; `idle` is the "all clear" state. */
export type ShotDisplay = ShotType | 'idle';

export interface ActivityEntry {
  id: string;
  label: string;
  detail?: string;
  timestamp: number;
  tone: 'info' | 'success' | 'warning' | 'danger';
}
