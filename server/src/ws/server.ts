import type { IncomingMessage, Server } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import type { ChannelName, ChannelRegistry } from '../channels/registry.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import { ViewerSession } from './session.js';

const CHANNEL_ROUTES = new Map<string, ChannelName>([
  ['/ws/camera', 'camera'],
  ['/ws/shoot', 'shoot'],
  ['/ws/mode', 'mode'],
]);

/** Unparseable request targets map to no channel. */
export function channelForUrl(url: string | undefined): ChannelName | undefined {
  if (!url) return undefined;
  let pathname: string;
  try {
    ({ pathname } = new URL(url, 'http://localhost'));
  } catch {
    return undefined;
  }
  return CHANNEL_ROUTES.get(pathname.replace(/\/+$/, ''));
}

export interface WebSocketOptions {
  heartbeatMs: number;
  logger?: Logger;
}

export interface WebSocketHandle {
  sessions(): number;
  close(): Promise<void>;
}

export function registerWebSocketServer(
  httpServer: Server,
  registry: ChannelRegistry,
  options: WebSocketOptions,
): WebSocketHandle {
  const logger = options.logger ?? rootLogger;
  const wss = new WebSocketServer({ noServer: true });
  const sessions = new Set<ViewerSession>();

  httpServer.on('upgrade', (request, socket, head) => {
    const channel = channelForUrl(request.url);
    if (!channel) {
      logger.warn({ url: request.url }, 'ws_rejected_route');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (client) => {
      accept(client, request, channel);
    });
  });

  function accept(client: WebSocket, request: IncomingMessage, channel: ChannelName): void {
    const session = new ViewerSession(client, registry, [channel], { logger });
    sessions.add(session);
    logger.info(
      { id: session.id, channel, ip: request.socket.remoteAddress },
      'ws_connected',
    );

    client.on('message', (_raw, isBinary) => {
      logger.debug({ id: session.id, isBinary }, 'ws_inbound_ignored');
    });

    client.on('close', () => {
      sessions.delete(session);
      logger.info({ id: session.id, channel }, 'ws_disconnected');
    });
  }

  const heartbeatInterval = setInterval(() => {
    for (const session of sessions) {
      if (!session.heartbeat()) {
        sessions.delete(session);
      }
    }
  }, options.heartbeatMs);

  wss.on('close', () => clearInterval(heartbeatInterval));

  return {
    sessions: () => sessions.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(heartbeatInterval);
        sessions.forEach((session) => session.disconnect(1001, 'server_shutdown'));
        sessions.clear();
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
