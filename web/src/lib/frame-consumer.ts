import { DecodeFailure } from './errors';
import { FpsCounter } from './fps-counter';

export type FrameOutcome = 'rendered' | 'skipped' | 'failed';

export interface FrameConsumerOptions<I> {
  /** Base address frame paths are resolved against. */
  baseUrl: string;
  load: (url: string) => Promise<I>;
  draw: (image: I) => void;
  fps?: FpsCounter;
  onFps?: (fps: number) => void;
  onSkip?: (path: string, skipped: number) => void;
  onError?: (error: DecodeFailure) => void;
}

/** Re-encodes each path segment, so names with spaces or `#` stay intact. */
export const resolveFrameUrl = (baseUrl: string, path: string) => {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const encoded = path.split('/').map(encodeURIComponent).join('/');
  return new URL(encoded, base).toString();
};

/**
 * Renders frame references one at a time. A reference that arrives while a
 * fetch is outstanding is dropped, never queued.
 */
export class FrameConsumer<I> {
  private busy = false;
  private renderedCount = 0;
  private skippedCount = 0;
  private failedCount = 0;
  private readonly counter: FpsCounter;

  constructor(private readonly options: FrameConsumerOptions<I>) {
    this.counter = options.fps ?? new FpsCounter();
  }

  get inFlight(): boolean {
    return this.busy;
  }

  get fps(): number {
    return this.counter.fps;
  }

  get stats() {
    return {
      rendered: this.renderedCount,
      skipped: this.skippedCount,
      failed: this.failedCount,
    };
  }

  async handle(path: string): Promise<FrameOutcome> {
    if (this.busy) {
      this.skippedCount += 1;
      this.options.onSkip?.(path, this.skippedCount);
      return 'skipped';
    }
    this.busy = true;

    try {
      const image = await this.options.load(resolveFrameUrl(this.options.baseUrl, path));
      this.options.draw(image);
    } catch (error) {
      this.busy = false;
      this.failedCount += 1;
      this.options.onError?.(new DecodeFailure(path, { cause: error }));
      return 'failed';
    }

    this.renderedCount += 1;
    const fps = this.counter.tick();
    this.busy = false;
    this.options.onFps?.(fps);
    return 'rendered';
  }
}
