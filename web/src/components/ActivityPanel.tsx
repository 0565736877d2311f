import clsx from 'clsx';
import type { ActivityEntry } from '../types/camera';

interface Props {
  activity: ActivityEntry[];
}

const toneClass: Record<ActivityEntry['tone'], string> = {
  info: 'border-white/5',
  success: 'border-signal/30',
  warning: 'border-amber-400/30',
  danger: 'border-rose-500/40',
};

export const ActivityPanel = ({ activity }: Props) => (
  <section className="glass-panel space-y-4 p-5">
    <div>
      <p className="text-xs uppercase tracking-[0.4em] text-white/40">Telemetry</p>
      <p className="text-lg font-semibold text-white">Activity log</p>
    </div>

    <ol className="space-y-3 text-sm text-white/80">
      {activity.length === 0 && <p className="text-white/50">No activity yet.</p>}
      {activity.map((entry) => (
        <li
          key={entry.id}
          className={clsx(
            'flex items-start justify-between rounded-2xl border bg-white/[0.02] px-4 py-3',
            toneClass[entry.tone],
          )}
        >
          <div>
            <p className="font-semibold">{entry.label}</p>
            {entry.detail && <p className="text-xs text-white/60">{entry.detail}</p>}
          </div>
          <time className="text-xs text-white/40">
            {new Date(entry.timestamp).toLocaleTimeString([], {
              hour: '2-digit',
              minute: '2-digit',
              second: '2-digit',
            })}
          </time>
        </li>
      ))}
    </ol>
  </section>
);
