import type { ChannelName, ControlMessage, StreamStatus } from '../types/camera';
import { MessageFormatError } from './errors';
import { parseControlMessage } from './messages';

export interface TransportEvents {
  onOpen: () => void;
  onMessage: (data: string) => void;
  onClose: () => void;
  onError: () => void;
}

export interface Transport {
  close: () => void;
}

export type TransportFactory = (url: string, events: TransportEvents) => Transport;

export type StreamHandler = (message: ControlMessage) => void;

export const browserTransport: TransportFactory = (url, events) => {
  const socket = new WebSocket(url);
  socket.onopen = () => events.onOpen();
  socket.onmessage = (event: MessageEvent<unknown>) => {
    if (typeof event.data === 'string') events.onMessage(event.data);
  };
  socket.onclose = () => events.onClose();
  socket.onerror = () => events.onError();
  return {
    close: () => socket.close(1000, 'client_closed'),
  };
};

export const streamUrl = (baseUrl: string, channel: ChannelName) =>
  `${baseUrl.replace(/\/+$/, '')}/ws/${channel}`;

export interface CameraStreamOptions {
  baseUrl: string;
  channel: ChannelName;
  connect?: TransportFactory;
  onError?: (error: Error) => void;
  onStatus?: (status: StreamStatus) => void;
}

/**
 * Viewer end of one channel. Parsed messages go to every registered handler;
 * frames that fail to parse are reported through `onError` and skipped.
 */
export class CameraStream {
  readonly channel: ChannelName;
  readonly url: string;
  private readonly handlers = new Set<StreamHandler>();
  private readonly connect: TransportFactory;
  private transport: Transport | null = null;
  private generation = 0;
  private current: StreamStatus = 'closed';

  constructor(private readonly options: CameraStreamOptions) {
    this.channel = options.channel;
    this.url = streamUrl(options.baseUrl, options.channel);
    this.connect = options.connect ?? browserTransport;
  }

  get status(): StreamStatus {
    return this.current;
  }

  register(handler: StreamHandler): void {
    this.handlers.add(handler);
  }

  unregister(handler: StreamHandler): void {
    this.handlers.delete(handler);
  }

  open(): void {
    if (this.transport) return;
    const generation = ++this.generation;
    const live = () => generation === this.generation;
    this.setStatus('connecting');
    this.transport = this.connect(this.url, {
      onOpen: () => {
        if (live()) this.setStatus('open');
      },
      onMessage: (data) => {
        if (live()) this.receive(data);
      },
      onClose: () => {
        if (!live()) return;
        this.transport = null;
        this.setStatus('closed');
      },
      onError: () => {
        if (live()) this.report(new Error(`Stream ${this.channel} transport error`));
      },
    });
  }

  /** Drops every handler and closes the transport without reporting. */
  close(): void {
    this.generation += 1;
    this.handlers.clear();
    const transport = this.transport;
    this.transport = null;
    this.setStatus('closed');
    transport?.close();
  }

  private receive(data: string): void {
    let message: ControlMessage;
    try {
      message = parseControlMessage(data);
    } catch (error) {
      this.report(
        error instanceof Error ? error : new MessageFormatError(String(error)),
      );
      return;
    }
    for (const handler of Array.from(this.handlers)) {
      handler(message);
    }
  }

  private report(error: Error): void {
    this.options.onError?.(error);
  }

  private setStatus(status: StreamStatus): void {
    if (status === this.current) return;
    this.current = status;
    this.options.onStatus?.(status);
  }
}
