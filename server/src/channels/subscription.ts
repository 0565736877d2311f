import type { DeliveryPolicy } from '../types.js';

/** Hands one message to the transport; resolves once it has been written. */
export type Sink<M> = (message: M) => Promise<void>;

export type DetachReason = 'detached' | 'transport_failure' | 'closed';

export type DetachListener = (reason: DetachReason, error?: unknown) => void;

/**
 * One subscriber's attachment to a channel. Messages are buffered here and
 * written by a drain loop private to this subscriber, so a slow sink only
 * ever delays itself.
 */
export class Subscription<M> {
  private pending: M[] = [];
  private draining = false;
  private attached = true;
  private deliveredCount = 0;
  private droppedCount = 0;
  private last: M | undefined;

  constructor(
    readonly channel: string,
    private readonly policy: DeliveryPolicy,
    private readonly sink: Sink<M>,
    private readonly fail: (error: unknown) => void,
    readonly onDetach?: DetachListener,
  ) {}

  get active(): boolean {
    return this.attached;
  }

  /** Messages accepted but not yet handed to the sink. */
  get buffered(): number {
    return this.pending.length;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get lastDelivered(): M | undefined {
    return this.last;
  }

  offer(message: M): void {
    if (!this.attached) return;
    if (this.policy === 'coalesce' && this.pending.length > 0) {
      this.pending[0] = message;
      this.droppedCount += 1;
    } else {
      this.pending.push(message);
    }
    if (!this.draining) {
      void this.drain();
    }
  }

  release(): void {
    this.attached = false;
    this.pending = [];
  }

  private async drain(): Promise<void> {
    this.draining = true;
    try {
      while (this.attached && this.pending.length > 0) {
        const message = this.pending[0];
        this.pending.shift();
        await this.sink(message);
        this.deliveredCount += 1;
        this.last = message;
      }
    } catch (error) {
      this.fail(error);
    } finally {
      this.draining = false;
    }
  }
}
