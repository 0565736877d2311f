import { v4 as uuid } from 'uuid';
import type { ChannelName, ChannelRegistry } from '../channels/registry.js';
import type { DetachReason, Subscription } from '../channels/subscription.js';
import { TransportFailure } from '../lib/errors.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { ControlMessage } from './schemas.js';
import { encodeMessage } from './utils.js';

/** The part of a `ws` WebSocket a session relies on. */
export interface ViewerSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
}

export interface ViewerSessionOptions {
  id?: string;
  logger?: Logger;
}

/**
 * Binds one viewer connection to its channels. Every delivered message goes
 * out as one text frame. The session tears itself down once the socket goes
 * away or a send fails.
 */
export class ViewerSession {
  readonly id: string;
  private subscriptions: Subscription<ControlMessage>[] = [];
  private closed = false;
  private alive = true;
  private readonly logger: Logger;

  constructor(
    private readonly socket: ViewerSocket,
    private readonly registry: ChannelRegistry,
    readonly channels: readonly ChannelName[],
    options: ViewerSessionOptions = {},
  ) {
    this.id = options.id ?? uuid();
    this.logger = options.logger ?? rootLogger;

    this.subscriptions = channels.map((name) =>
      registry.attach(
        name,
        (message) => this.forward(message),
        (reason) => this.handleDetach(reason),
      ),
    );

    socket.on('close', () => this.close('socket_closed'));
    socket.on('error', (err) => {
      this.logger.error({ err, sessionId: this.id }, 'ws_error');
      this.close('socket_error');
      socket.close();
    });
    socket.on('pong', () => {
      this.alive = true;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Pings the viewer. A viewer that did not answer the previous ping is
   * terminated and `false` is returned.
   */
  heartbeat(): boolean {
    if (this.closed) return false;
    if (!this.alive) {
      this.logger.info({ sessionId: this.id }, 'ws_heartbeat_timeout');
      this.socket.terminate();
      this.close('heartbeat_timeout');
      return false;
    }
    this.alive = false;
    this.socket.ping();
    return true;
  }

  /** Detaches from every channel and releases anything still buffered. */
  close(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    const subscriptions = this.subscriptions;
    this.subscriptions = [];
    subscriptions.forEach((subscription) => this.registry.detach(subscription));
    this.logger.debug({ sessionId: this.id, reason }, 'session_closed');
  }

  disconnect(code: number, reason: string): void {
    this.close(reason);
    this.socket.close(code, reason);
  }

  private forward(message: ControlMessage): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== this.socket.OPEN) {
        reject(new TransportFailure(`Session ${this.id} socket is not open`));
        return;
      }
      this.socket.send(encodeMessage(message), (err) => {
        if (err) {
          reject(new TransportFailure(`Send to session ${this.id} failed`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  private handleDetach(reason: DetachReason): void {
    if (reason !== 'transport_failure' || this.closed) return;
    this.close('transport_failure');
    this.socket.terminate();
  }
}
