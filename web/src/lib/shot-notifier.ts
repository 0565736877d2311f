import type { ShotDisplay, ShotType } from '../types/camera';

/** Runs `callback` after `ms`; the returned function cancels it. */
export type Schedule = (callback: () => void, ms: number) => () => void;

export const SHOT_DISPLAY_MS = 500;

export const timerSchedule: Schedule = (callback, ms) => {
  const handle = setTimeout(callback, ms);
  return () => clearTimeout(handle);
};

/**
 * Shows the latest shot and reverts to idle once it has been on screen for
 * `holdMs`. A new shot replaces the old one and restarts the timer.
 */
export class ShotNotifier {
  private current: ShotDisplay = 'idle';
  private cancel: (() => void) | null = null;

  constructor(
    private readonly onChange: (display: ShotDisplay) => void,
    private readonly schedule: Schedule = timerSchedule,
    private readonly holdMs = SHOT_DISPLAY_MS,
  ) {}

  get display(): ShotDisplay {
    return this.current;
  }

  notify(shot: ShotType): void {
    this.cancel?.();
    this.show(shot);
    this.cancel = this.schedule(() => {
      this.cancel = null;
      this.show('idle');
    }, this.holdMs);
  }

  dispose(): void {
    this.cancel?.();
    this.cancel = null;
  }

  private show(display: ShotDisplay): void {
    this.current = display;
    this.onChange(display);
  }
}
