import http from 'node:http';
import { createApp } from './app.js';
import { openFrameSource, type FrameSource } from './camera/frame-source.js';
import { RateScheduler } from './camera/rate-scheduler.js';
import { ChannelRegistry } from './channels/registry.js';
import { loadConfig, type AppConfig } from './config.js';
import { ControlSurface } from './control/control-surface.js';
import { AppError, ConfigurationError } from './lib/errors.js';
import { logger } from './lib/logger.js';
import { imageUrl } from './ws/utils.js';
import { registerWebSocketServer, type WebSocketHandle } from './ws/server.js';

async function prepare(): Promise<{ config: AppConfig; source: FrameSource }> {
  try {
    const config = loadConfig();
    logger.level = config.logLevel;
    const source = await openFrameSource(config.source, logger);
    return { config, source };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, 'config_invalid');
      process.exit(1);
    }
    if (error instanceof AppError) {
      logger.fatal({ err: error, code: error.code }, 'source_unavailable');
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const { config, source } = await prepare();

  const registry = new ChannelRegistry(logger);
  const scheduler = new RateScheduler({
    source,
    registry,
    rate: config.rate,
    logger,
    toPath: (frame) => imageUrl(frame.reference),
  });
  const control = new ControlSurface(registry, { logger });

  let viewers: WebSocketHandle | undefined;
  const app = createApp({
    config,
    registry,
    scheduler,
    control,
    frameDirectory: source.frameDirectory,
    sessions: () => viewers?.sessions() ?? 0,
  });

  const server = http.createServer(app);
  viewers = registerWebSocketServer(server, registry, {
    heartbeatMs: config.heartbeatMs,
    logger,
  });

  server.listen(config.port, () => {
    logger.info(
      { port: config.port, source: config.source.kind, rate: config.rate },
      'server_started',
    );
    scheduler.start();
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'shutting_down');
    scheduler.stop();
    await scheduler.done;
    await viewers?.close();
    registry.close();
    await source.close();
    server.close(() => process.exit(0));
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'shutdown_failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'startup_failed');
  process.exit(1);
});
