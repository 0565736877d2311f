import { useEffect, useState } from 'react';
import { Aperture, Layers, Radar, Sparkles } from 'lucide-react';
import { fetchMode, postMode, postShoot } from '../services/api';
import type { CameraMode, ShotType } from '../types/camera';
import { ToolbarButton } from './ToolbarButton';

interface Props {
  /** Mode as last seen on the mode channel. */
  viewerMode: CameraMode | null;
}

const errorText = (error: unknown) => (error instanceof Error ? error.message : 'Request failed');

export const ControlPanel = ({ viewerMode }: Props) => {
  const [serverMode, setServerMode] = useState<CameraMode | null>(null);
  const [busy, setBusy] = useState(false);
  const [note, setNote] = useState<string>();

  useEffect(() => {
    let cancelled = false;
    fetchMode()
      .then(({ mode }) => {
        if (!cancelled) setServerMode(mode);
      })
      .catch((error: unknown) => {
        console.warn('[control] could not read mode', error);
      });
    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    if (viewerMode) setServerMode(viewerMode);
  }, [viewerMode]);

  const shoot = async (shot: ShotType) => {
    setBusy(true);
    try {
      const result = await postShoot(shot);
      setNote(`${result.shot} shot sent to ${result.delivered} viewer(s)`);
    } catch (error) {
      setNote(errorText(error));
    } finally {
      setBusy(false);
    }
  };

  const switchMode = async (mode: CameraMode) => {
    setBusy(true);
    try {
      const result = await postMode(mode);
      setServerMode(result.mode);
      setNote(result.changed ? `Mode set to ${result.mode}` : `Already in ${result.mode} mode`);
    } catch (error) {
      setNote(errorText(error));
    } finally {
      setBusy(false);
    }
  };

  return (
    <section className="glass-panel space-y-4 p-5">
      <div>
        <p className="text-xs uppercase tracking-[0.4em] text-white/40">Shutter</p>
        <p className="text-lg font-semibold text-white">Controls</p>
      </div>

      <div className="grid grid-cols-2 gap-2">
        <ToolbarButton
          icon={<Aperture />}
          label="Single"
          disabled={busy}
          onClick={() => void shoot('single')}
        />
        <ToolbarButton
          icon={<Layers />}
          label="Burst"
          disabled={busy}
          onClick={() => void shoot('burst')}
        />
        <ToolbarButton
          icon={<Radar />}
          label="Motion"
          active={serverMode === 'motion'}
          disabled={busy}
          onClick={() => void switchMode('motion')}
        />
        <ToolbarButton
          icon={<Sparkles />}
          label="Smart"
          active={serverMode === 'smart'}
          disabled={busy}
          onClick={() => void switchMode('smart')}
        />
      </div>

      <p className="text-xs text-white/50">
        Viewer mode: {viewerMode ?? 'unknown until the next change'}
      </p>
      {note && <p className="text-sm text-white/70">{note}</p>}
    </section>
  );
};
