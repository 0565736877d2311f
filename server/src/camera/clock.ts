import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  /** Milliseconds from an arbitrary fixed origin. */
  now(): number;
  /** Rejects when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
};
