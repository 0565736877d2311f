import { useCallback, useEffect, useRef, useState, type MutableRefObject } from 'react';
import { API_BASE, WS_BASE } from '../config';
import { FrameConsumer } from '../lib/frame-consumer';
import { ShotNotifier } from '../lib/shot-notifier';
import { CameraStream } from '../lib/stream';
import type {
  ActivityEntry,
  CameraMode,
  ChannelName,
  ControlMessage,
  ShotDisplay,
  StreamStatus,
} from '../types/camera';

const CHANNELS: readonly ChannelName[] = ['camera', 'shoot', 'mode'];

const makeId = () =>
  typeof crypto !== 'undefined' && 'randomUUID' in crypto
    ? crypto.randomUUID()
    : Math.random().toString(36).slice(2);

const loadImage = (url: string) =>
  new Promise<HTMLImageElement>((resolve, reject) => {
    const image = new Image();
    image.decoding = 'async';
    image.onload = () => resolve(image);
    image.onerror = () => reject(new Error(`Failed to load ${url}`));
    image.src = url;
  });

export type StreamStatuses = Record<ChannelName, StreamStatus>;

export interface CameraStreamApi {
  canvasRef: MutableRefObject<HTMLCanvasElement | null>;
  streams: StreamStatuses;
  fps: number;
  skipped: number;
  shot: ShotDisplay;
  /** Last mode seen on the mode channel; unknown until the first change. */
  mode: CameraMode | null;
  activity: ActivityEntry[];
  lastError?: string;
  reconnect: () => void;
  resetError: () => void;
}

/**
 * Opens the three camera channels and renders frames into `canvasRef`.
 * Frames that arrive while one is still loading are skipped.
 */
export const useCameraStream = (): CameraStreamApi => {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const streamsRef = useRef<CameraStream[]>([]);
  const [streams, setStreams] = useState<StreamStatuses>({
    camera: 'closed',
    shoot: 'closed',
    mode: 'closed',
  });
  const [fps, setFps] = useState(0);
  const [skipped, setSkipped] = useState(0);
  const [shot, setShot] = useState<ShotDisplay>('idle');
  const [mode, setMode] = useState<CameraMode | null>(null);
  const [activity, setActivity] = useState<ActivityEntry[]>([]);
  const [lastError, setLastError] = useState<string>();

  const addActivity = useCallback((entry: Omit<ActivityEntry, 'id' | 'timestamp'>) => {
    setActivity((prev) =>
      [{ ...entry, id: makeId(), timestamp: Date.now() }, ...prev].slice(0, 20),
    );
  }, []);

  useEffect(() => {
    const draw = (image: HTMLImageElement) => {
      const canvas = canvasRef.current;
      const ctx = canvas?.getContext('2d', { alpha: false });
      if (!canvas || !ctx) throw new Error('Canvas is not mounted');
      if (canvas.width !== image.naturalWidth) canvas.width = image.naturalWidth;
      if (canvas.height !== image.naturalHeight) canvas.height = image.naturalHeight;
      ctx.drawImage(image, 0, 0);
    };

    const consumer = new FrameConsumer<HTMLImageElement>({
      baseUrl: API_BASE,
      load: loadImage,
      draw,
      onFps: setFps,
      onSkip: (_path, count) => setSkipped(count),
      onError: (error) => {
        console.warn('[camera] frame dropped', error);
        setLastError(error.message);
      },
    });
    const notifier = new ShotNotifier(setShot);

    const handle = (message: ControlMessage) => {
      switch (message.type) {
        case 'image_path':
          void consumer.handle(message.path);
          break;
        case 'shoot':
          notifier.notify(message.shot);
          addActivity({ label: 'Shot fired', detail: message.shot, tone: 'success' });
          break;
        case 'mode':
          setMode(message.mode);
          addActivity({ label: 'Mode changed', detail: message.mode, tone: 'info' });
          break;
      }
    };

    const opened = CHANNELS.map((channel) => {
      const stream = new CameraStream({
        baseUrl: WS_BASE,
        channel,
        onStatus: (status) => {
          setStreams((prev) => ({ ...prev, [channel]: status }));
          if (status === 'open') {
            addActivity({ label: 'Channel open', detail: `/ws/${channel}`, tone: 'info' });
          } else if (status === 'closed') {
            addActivity({ label: 'Channel closed', detail: `/ws/${channel}`, tone: 'warning' });
          }
        },
        onError: (error) => {
          console.warn(`[${channel}]`, error);
          setLastError(error.message);
        },
      });
      stream.register(handle);
      stream.open();
      return stream;
    });
    streamsRef.current = opened;

    return () => {
      opened.forEach((stream) => stream.close());
      notifier.dispose();
      streamsRef.current = [];
    };
  }, [addActivity]);

  const reconnect = useCallback(() => {
    streamsRef.current.forEach((stream) => {
      if (stream.status === 'closed') stream.open();
    });
  }, []);

  const resetError = useCallback(() => setLastError(undefined), []);

  return {
    canvasRef,
    streams,
    fps,
    skipped,
    shot,
    mode,
    activity,
    lastError,
    reconnect,
    resetError,
  };
};
