import type { Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { SourceUnavailable } from '../lib/errors.js';
import type { Frame } from '../types.js';
import type { FrameSource } from './frame-source.js';

export interface DirectorySourceOptions {
  directory: string;
  /** Basename glob, `*` and `?` wildcards. */
  format?: string;
  cycle?: boolean;
}

const SPECIAL = /[.+^${}()|[\]\\]/g;

export function compileFormat(format: string): (name: string) => boolean {
  const pattern = Array.from(format)
    .map((char) => {
      if (char === '*') return '[^/]*';
      if (char === '?') return '[^/]';
      return char.replace(SPECIAL, '\\$&');
    })
    .join('');
  const matcher = new RegExp(`^${pattern}$`);
  const allowHidden = format.startsWith('.');
  return (name) => (allowHidden || !name.startsWith('.')) && matcher.test(name);
}

/**
 * Serves the files of one directory in lexicographic order, optionally
 * starting over once the last file has been handed out.
 */
export class DirectorySource implements FrameSource {
  private cursor = 0;
  private index = 0;
  private closed = false;

  private constructor(
    readonly frameDirectory: string,
    private readonly files: readonly string[],
    private readonly cycle: boolean,
  ) {}

  static async open(options: DirectorySourceOptions): Promise<DirectorySource> {
    const directory = path.resolve(options.directory);
    const format = options.format ?? '*.jpg';

    let stats: Stats;
    try {
      stats = await fs.stat(directory);
    } catch (error) {
      throw new SourceUnavailable(`Image directory not found: ${directory}`, {
        cause: error,
      });
    }
    if (!stats.isDirectory()) {
      throw new SourceUnavailable(`Not a directory: ${directory}`);
    }

    const matches = compileFormat(format);
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && matches(entry.name))
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(directory, name));

    if (files.length === 0) {
      throw new SourceUnavailable(`No files matching ${format} in ${directory}`);
    }
    return new DirectorySource(directory, files, options.cycle ?? false);
  }

  get size(): number {
    return this.files.length;
  }

  async next(): Promise<Frame | null> {
    if (this.closed) return null;
    if (this.cursor >= this.files.length) {
      if (!this.cycle) return null;
      this.cursor = 0;
    }
    const frame: Frame = { index: this.index, reference: this.files[this.cursor] };
    this.cursor += 1;
    this.index += 1;
    return frame;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
