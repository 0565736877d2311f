import ky from 'ky';
import { API_BASE } from '../config';
import type { CameraMode, ShotType } from '../types/camera';

const client = ky.create({
  prefixUrl: API_BASE,
  timeout: 8000,
});

export interface ChannelReport {
  name: string;
  policy: 'coalesce' | 'queue';
  live: boolean;
  subscribers: number;
  published: number;
  delivered: number;
  dropped: number;
}

export interface HealthReport {
  status: 'ok';
  uptime: number;
  scheduler: {
    state: 'idle' | 'running' | 'exhausted' | 'failed' | 'stopped';
    published: number;
    periodMs: number;
  };
  channels: ChannelReport[];
  sessions: number;
}

export interface ModeChange {
  mode: CameraMode;
  changed: boolean;
  delivered: number;
}

export interface ShotResult {
  shot: ShotType;
  delivered: number;
}

export function fetchHealth() {
  return client.get('health').json<HealthReport>();
}

export function fetchMode() {
  return client.get('api/control/mode').json<{ mode: CameraMode }>();
}

export function postMode(mode: CameraMode) {
  return client.post('api/control/mode', { json: { mode } }).json<ModeChange>();
}

export function postShoot(shot: ShotType) {
  return client.post('api/control/shoot', { json: { shot } }).json<ShotResult>();
}
