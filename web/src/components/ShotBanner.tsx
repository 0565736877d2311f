import clsx from 'clsx';
import { Aperture, Layers } from 'lucide-react';
import type { ShotDisplay } from '../types/camera';

interface Props {
  shot: ShotDisplay;
}

export const ShotBanner = ({ shot }: Props) => (
  <div
    className={clsx(
      'pointer-events-none absolute left-1/2 top-4 flex -translate-x-1/2 items-center gap-2 rounded-full px-4 py-1 text-sm font-semibold uppercase tracking-wide transition',
      shot === 'idle' ? 'bg-black/40 text-white/50' : 'bg-signal text-night-950 shadow-glow',
    )}
  >
    {shot === 'burst' ? <Layers className="h-4 w-4" /> : <Aperture className="h-4 w-4" />}
    <span>{shot === 'idle' ? 'All clear' : shot}</span>
  </div>
);
