import { useEffect, useState } from 'react';
import clsx from 'clsx';
import { Camera } from 'lucide-react';
import { fetchHealth, type HealthReport } from '../services/api';

const HEALTH_POLL_MS = 5000;

export const Header = () => {
  const [health, setHealth] = useState<HealthReport | null>(null);

  useEffect(() => {
    let cancelled = false;
    const poll = () => {
      fetchHealth()
        .then((report) => {
          if (!cancelled) setHealth(report);
        })
        .catch((error: unknown) => {
          console.warn('[health] unreachable', error);
          if (!cancelled) setHealth(null);
        });
    };
    poll();
    const timer = window.setInterval(poll, HEALTH_POLL_MS);
    return () => {
      cancelled = true;
      window.clearInterval(timer);
    };
  }, []);

  const state = health?.scheduler.state;

  return (
    <header className="mx-auto flex w-full max-w-6xl items-center justify-between px-6 py-8 text-white">
      <div className="flex items-center gap-3">
        <div className="flex h-12 w-12 items-center justify-center rounded-2xl bg-signal/20 text-signal shadow-glow">
          <Camera />
        </div>
        <div>
          <p className="text-xs uppercase tracking-[0.3em] text-white/60">Lenscast</p>
          <h1 className="text-2xl font-semibold text-white">Live Camera</h1>
        </div>
      </div>
      <div className="flex gap-3 text-sm text-white/70">
        <span
          className={clsx(
            'rounded-full border px-3 py-1',
            state === 'running' ? 'border-signal/60 text-white' : 'border-white/15',
          )}
        >
          {health ? `Source ${state}` : 'Server offline'}
        </span>
        {health && (
          <span className="rounded-full border border-white/15 px-3 py-1">
            {health.sessions} viewer{health.sessions === 1 ? '' : 's'}
          </span>
        )}
      </div>
    </header>
  );
};
