import type { Logger } from '../lib/logger.js';
import type { Frame, SourceConfig } from '../types.js';
import { DirectorySource } from './directory-source.js';
import { SyntheticSource } from './synthetic-source.js';

/**
 * Pull-based producer of frames. `next()` resolves to `null` once the
 * sequence has ended; indices are gap-free from 0.
 */
export interface FrameSource {
  /** Directory the frame references point into, served to viewers as /images. */
  readonly frameDirectory: string;
  next(): Promise<Frame | null>;
  close(): Promise<void>;
}

export async function openFrameSource(
  config: SourceConfig,
  logger: Logger,
): Promise<FrameSource> {
  if (config.kind === 'directory') {
    return DirectorySource.open({
      directory: config.directory,
      format: config.format,
      cycle: config.cycle,
    });
  }
  return SyntheticSource.open({
    width: config.resolution.width,
    height: config.resolution.height,
    savePath: config.savePath,
    retain: config.retain,
    logger,
  });
}
