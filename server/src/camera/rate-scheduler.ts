import type { ChannelRegistry } from '../channels/registry.js';
import { ConfigurationError } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { Frame, SchedulerState } from '../types.js';
import { imagePathMessage } from '../ws/utils.js';
import { systemClock, type Clock } from './clock.js';
import type { FrameSource } from './frame-source.js';

export interface RateSchedulerOptions {
  source: FrameSource;
  registry: ChannelRegistry;
  /** Frames per second. */
  rate: number;
  clock?: Clock;
  logger?: Logger;
  /** Path published for a frame; defaults to the raw reference. */
  toPath?: (frame: Frame) => string;
}

// Tolerates float error when `now` lands exactly on a grid slot.
const SLOT_EPSILON = 1e-9;

/**
 * Pulls frames from a source on a fixed grid (`origin + k / rate`) and
 * publishes each one on the `camera` channel.
 *
 * Slots that pass while a slow pull is outstanding are dropped: the next
 * publish waits for the first grid slot at or after the current time, so a
 * late frame never causes a burst of catch-up frames.
 */
export class RateScheduler {
  readonly period: number;
  private readonly source: FrameSource;
  private readonly registry: ChannelRegistry;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly toPath: (frame: Frame) => string;
  private current: SchedulerState = 'idle';
  private publishedCount = 0;
  private controller: AbortController | null = null;
  private loop: Promise<void> = Promise.resolve();

  constructor(options: RateSchedulerOptions) {
    if (!Number.isInteger(options.rate) || options.rate <= 0) {
      throw new ConfigurationError([
        `CAMERA_RATE: must be a positive integer, got ${options.rate}`,
      ]);
    }
    this.period = 1000 / options.rate;
    this.source = options.source;
    this.registry = options.registry;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? rootLogger;
    this.toPath = options.toPath ?? ((frame) => frame.reference);
  }

  get state(): SchedulerState {
    return this.current;
  }

  get published(): number {
    return this.publishedCount;
  }

  /** Settles when the loop has ended, whatever the reason. */
  get done(): Promise<void> {
    return this.loop;
  }

  start(): void {
    if (this.current !== 'idle') return;
    this.current = 'running';
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
  }

  stop(): void {
    if (this.current !== 'running') return;
    this.controller?.abort();
  }

  private async run(signal: AbortSignal): Promise<void> {
    const origin = this.clock.now();
    let slot = 0;
    this.logger.info({ rate: 1000 / this.period, period: this.period }, 'scheduler_started');

    try {
      while (!signal.aborted) {
        const wait = origin + slot * this.period - this.clock.now();
        if (wait > 0) {
          await this.clock.sleep(wait, signal);
        }
        if (signal.aborted) break;

        const frame = await this.source.next();
        if (signal.aborted) break;
        if (frame === null) {
          this.logger.info({ published: this.publishedCount }, 'scheduler_exhausted');
          this.finish('exhausted');
          return;
        }

        this.publish(frame);
        slot = this.nextSlot(origin, slot);
      }
      this.finish('stopped');
    } catch (error) {
      if (signal.aborted) {
        this.finish('stopped');
        return;
      }
      this.logger.error({ err: error, published: this.publishedCount }, 'scheduler_failed');
      this.finish('failed');
    }
  }

  private publish(frame: Frame): void {
    const delivered = this.registry.publish('camera', imagePathMessage(this.toPath(frame)));
    this.publishedCount += 1;
    this.logger.debug({ index: frame.index, delivered }, 'frame_published');
  }

  private nextSlot(origin: number, slot: number): number {
    const elapsed = this.clock.now() - origin;
    return Math.max(slot + 1, Math.ceil(elapsed / this.period - SLOT_EPSILON));
  }

  private finish(state: SchedulerState): void {
    this.current = state;
    this.registry.channel('camera').endPublication();
    if (state === 'stopped') {
      this.logger.info({ published: this.publishedCount }, 'scheduler_stopped');
    }
  }
}
