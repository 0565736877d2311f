import type { ChannelRegistry } from '../channels/registry.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { CameraMode, ShotType } from '../ws/schemas.js';
import { modeMessage, shootMessage } from '../ws/utils.js';

export interface ControlSurfaceOptions {
  initialMode?: CameraMode;
  logger?: Logger;
}

export interface ModeChange {
  mode: CameraMode;
  changed: boolean;
  delivered: number;
}

/**
 * Entry point for discrete camera events. Mode is published only when it
 * changes; shots are published every time. Nothing is replayed to viewers
 * that attach later.
 */
export class ControlSurface {
  private current: CameraMode;
  private readonly logger: Logger;

  constructor(
    private readonly registry: ChannelRegistry,
    options: ControlSurfaceOptions = {},
  ) {
    this.current = options.initialMode ?? 'motion';
    this.logger = options.logger ?? rootLogger;
  }

  get mode(): CameraMode {
    return this.current;
  }

  setMode(mode: CameraMode): ModeChange {
    if (mode === this.current) {
      return { mode, changed: false, delivered: 0 };
    }
    const previous = this.current;
    this.current = mode;
    const delivered = this.registry.publish('mode', modeMessage(mode));
    this.logger.info({ from: previous, to: mode, delivered }, 'mode_changed');
    return { mode, changed: true, delivered };
  }

  shoot(shot: ShotType): number {
    const delivered = this.registry.publish('shoot', shootMessage(shot));
    this.logger.info({ shot, delivered }, 'shot_fired');
    return delivered;
  }
}
