import { useState } from 'react';
import clsx from 'clsx';
import { Expand, Gauge, RefreshCw } from 'lucide-react';
import type { CameraStreamApi } from '../hooks/useCameraStream';
import { ShotBanner } from './ShotBanner';
import { ToolbarButton } from './ToolbarButton';

interface Props {
  camera: CameraStreamApi;
}

export const CameraSurface = ({ camera }: Props) => {
  const [fitMode, setFitMode] = useState<'contain' | 'actual'>('contain');
  const live = camera.streams.camera === 'open';
  const anyClosed = Object.values(camera.streams).some((status) => status === 'closed');

  return (
    <section className="glass-panel relative overflow-hidden">
      <div className="flex items-center justify-between border-b border-white/5 px-6 py-4">
        <div>
          <p className="text-xs uppercase tracking-[0.4em] text-white/40">Camera</p>
          <p className="text-lg font-semibold text-white">
            {live ? 'Live feed' : 'Waiting for frames'}
          </p>
        </div>
        <div className="flex gap-2">
          <ToolbarButton
            icon={<Expand />}
            label={fitMode === 'contain' ? 'Actual Size' : 'Fit'}
            active={fitMode === 'actual'}
            onClick={() => setFitMode((mode) => (mode === 'contain' ? 'actual' : 'contain'))}
          />
          <ToolbarButton
            icon={<RefreshCw />}
            label="Reconnect"
            disabled={!anyClosed}
            onClick={camera.reconnect}
          />
        </div>
      </div>

      <div
        className={clsx(
          'relative flex min-h-[420px] items-center justify-center bg-night-950',
          fitMode === 'contain' ? 'overflow-hidden' : 'overflow-auto',
        )}
      >
        <canvas
          ref={camera.canvasRef}
          className={clsx(fitMode === 'contain' ? 'max-h-[70vh] max-w-full' : 'max-w-none')}
        />
        <ShotBanner shot={camera.shot} />
      </div>

      <footer className="flex items-center justify-between border-t border-white/5 px-6 py-3 text-sm text-white/60">
        <div className="flex items-center gap-1">
          <Gauge className="h-4 w-4" />
          <span>FPS: {camera.fps}</span>
        </div>
        <span>Skipped: {camera.skipped}</span>
      </footer>
    </section>
  );
};
