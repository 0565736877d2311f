import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { ChannelStats, DeliveryPolicy } from '../types.js';
import {
  Subscription,
  type DetachListener,
  type DetachReason,
  type Sink,
} from './subscription.js';

/**
 * Named fan-out of messages to the subscribers attached at publish time.
 * Publishing never waits on a subscriber. With the `coalesce` policy each
 * subscriber buffers at most one undelivered message and a newer publish
 * replaces it; with `queue` every message is delivered in order.
 */
export class BroadcastChannel<M> {
  private readonly subscribers = new Set<Subscription<M>>();
  private publishing = true;
  private publishedCount = 0;
  private retiredDelivered = 0;
  private retiredDropped = 0;

  constructor(
    readonly name: string,
    readonly policy: DeliveryPolicy = 'queue',
    private readonly logger: Logger = rootLogger,
  ) {}

  get live(): boolean {
    return this.publishing;
  }

  get size(): number {
    return this.subscribers.size;
  }

  attach(sink: Sink<M>, onDetach?: DetachListener): Subscription<M> {
    const subscription: Subscription<M> = new Subscription(
      this.name,
      this.policy,
      sink,
      (error) => {
        this.detach(subscription, 'transport_failure', error);
      },
      onDetach,
    );
    this.subscribers.add(subscription);
    return subscription;
  }

  detach(
    subscription: Subscription<M>,
    reason: DetachReason = 'detached',
    error?: unknown,
  ): boolean {
    if (!this.subscribers.delete(subscription)) return false;
    subscription.release();
    this.retiredDelivered += subscription.delivered;
    this.retiredDropped += subscription.dropped;
    if (reason === 'transport_failure') {
      this.logger.warn({ channel: this.name, err: error }, 'subscriber_detached');
    }
    subscription.onDetach?.(reason, error);
    return true;
  }

  /** Returns how many subscribers the message was handed to. */
  publish(message: M): number {
    if (!this.publishing) return 0;
    this.publishedCount += 1;
    let handed = 0;
    for (const subscription of Array.from(this.subscribers)) {
      if (!subscription.active) continue;
      subscription.offer(message);
      handed += 1;
    }
    return handed;
  }

  /** Marks the producer finished. Subscribers stay attached. */
  endPublication(): void {
    this.publishing = false;
  }

  close(): void {
    for (const subscription of Array.from(this.subscribers)) {
      this.detach(subscription, 'closed');
    }
  }

  stats(): ChannelStats {
    let delivered = this.retiredDelivered;
    let dropped = this.retiredDropped;
    for (const subscription of this.subscribers) {
      delivered += subscription.delivered;
      dropped += subscription.dropped;
    }
    return {
      name: this.name,
      policy: this.policy,
      live: this.publishing,
      subscribers: this.subscribers.size,
      published: this.publishedCount,
      delivered,
      dropped,
    };
  }
}
