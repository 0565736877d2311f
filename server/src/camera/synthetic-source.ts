import fs from 'node:fs/promises';
import path from 'node:path';
import pngjs from 'pngjs';
import { SourceUnavailable } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { Frame } from '../types.js';
import type { FrameSource } from './frame-source.js';

const { PNG } = pngjs;

export interface SyntheticSourceOptions {
  width: number;
  height: number;
  savePath: string;
  /** Images kept on disk; older ones are deleted as new ones are written. */
  retain?: number;
  /** Uniform generator in [0, 1). */
  random?: () => number;
  logger?: Logger;
}

export const DEFAULT_RETAIN = 100;

export function frameFileName(index: number): string {
  return `${String(index).padStart(6, '0')}.png`;
}

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Generates grayscale noise frames of a fixed resolution, written as PNG
 * files into `savePath`. The sequence never ends.
 */
export class SyntheticSource implements FrameSource {
  private index = 0;
  private readonly retain: number;
  private readonly random: () => number;
  private readonly logger: Logger;

  private constructor(
    readonly frameDirectory: string,
    private readonly width: number,
    private readonly height: number,
    options: SyntheticSourceOptions,
  ) {
    this.retain = options.retain ?? DEFAULT_RETAIN;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? rootLogger;
  }

  static async open(options: SyntheticSourceOptions): Promise<SyntheticSource> {
    const savePath = path.resolve(options.savePath);
    try {
      const stats = await fs.stat(savePath);
      if (!stats.isDirectory()) {
        throw new SourceUnavailable(`Save path is not a directory: ${savePath}`);
      }
    } catch (error) {
      if (error instanceof SourceUnavailable) throw error;
      throw new SourceUnavailable(`Save path not found: ${savePath}`, { cause: error });
    }
    return new SyntheticSource(savePath, options.width, options.height, options);
  }

  async next(): Promise<Frame> {
    const index = this.index;
    const reference = path.join(this.frameDirectory, frameFileName(index));
    try {
      await fs.writeFile(reference, this.render());
    } catch (error) {
      throw new SourceUnavailable(`Failed to write synthetic frame ${reference}`, {
        cause: error,
      });
    }
    this.index += 1;
    await this.prune(index);
    return { index, reference };
  }

  async close(): Promise<void> {
    // Nothing held open between frames.
  }

  private render(): Buffer {
    const png = new PNG({ width: this.width, height: this.height });
    for (let offset = 0; offset < png.data.length; offset += 4) {
      const level = Math.min(255, Math.floor(this.random() * 256));
      png.data[offset] = level;
      png.data[offset + 1] = level;
      png.data[offset + 2] = level;
      png.data[offset + 3] = 255;
    }
    return PNG.sync.write(png);
  }

  private async prune(index: number): Promise<void> {
    if (index < this.retain) return;
    const stale = path.join(this.frameDirectory, frameFileName(index - this.retain));
    try {
      await fs.unlink(stale);
    } catch (error) {
      if (isMissingFile(error)) return;
      this.logger.warn({ err: error, path: stale }, 'retention_failed');
    }
  }
}
