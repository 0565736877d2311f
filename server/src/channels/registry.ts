import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { ChannelStats, DeliveryPolicy } from '../types.js';
import type { ControlMessage } from '../ws/schemas.js';
import { BroadcastChannel } from './broadcast-channel.js';
import type { DetachListener, Sink, Subscription } from './subscription.js';

export const CHANNEL_NAMES = ['camera', 'shoot', 'mode'] as const;

export type ChannelName = (typeof CHANNEL_NAMES)[number];

export const CHANNEL_POLICIES: Record<ChannelName, DeliveryPolicy> = {
  camera: 'coalesce',
  shoot: 'queue',
  mode: 'queue',
};

export type CameraChannel = BroadcastChannel<ControlMessage>;

/**
 * Owns the process's channels. Built once at startup and handed to the
 * scheduler, the control surface and the WebSocket server.
 */
export class ChannelRegistry {
  private readonly channels = new Map<ChannelName, CameraChannel>();

  constructor(private readonly logger: Logger = rootLogger) {}

  channel(name: ChannelName): CameraChannel {
    let channel = this.channels.get(name);
    if (!channel) {
      channel = new BroadcastChannel<ControlMessage>(name, CHANNEL_POLICIES[name], this.logger);
      this.channels.set(name, channel);
    }
    return channel;
  }

  publish(name: ChannelName, message: ControlMessage): number {
    return this.channel(name).publish(message);
  }

  attach(
    name: ChannelName,
    sink: Sink<ControlMessage>,
    onDetach?: DetachListener,
  ): Subscription<ControlMessage> {
    return this.channel(name).attach(sink, onDetach);
  }

  detach(subscription: Subscription<ControlMessage>): boolean {
    for (const channel of this.channels.values()) {
      if (channel.detach(subscription)) return true;
    }
    return false;
  }

  stats(): ChannelStats[] {
    return Array.from(this.channels.values(), (channel) => channel.stats());
  }

  close(): void {
    for (const channel of this.channels.values()) {
      channel.close();
    }
    this.channels.clear();
  }
}
