import express from 'express';
import cors from 'cors';
import type { RateScheduler } from './camera/rate-scheduler.js';
import type { ChannelRegistry } from './channels/registry.js';
import type { AppConfig } from './config.js';
import type { ControlSurface } from './control/control-surface.js';
import { createControlRouter } from './routes/control.js';
import { createHealthRouter } from './routes/health.js';
import { createImagesRouter } from './routes/images.js';

export interface AppDeps {
  config: AppConfig;
  registry: ChannelRegistry;
  scheduler: RateScheduler;
  control: ControlSurface;
  frameDirectory: string;
  sessions: () => number;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(
    cors({
      origin: deps.config.corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '16kb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Lenscast Camera',
      version: '0.1.0',
      source: deps.config.source.kind,
      rate: deps.config.rate,
      channels: ['/ws/camera', '/ws/shoot', '/ws/mode'],
    });
  });

  app.use(
    '/health',
    createHealthRouter({
      registry: deps.registry,
      scheduler: deps.scheduler,
      sessions: deps.sessions,
    }),
  );
  app.use('/api/control', createControlRouter(deps.control));
  app.use('/images', createImagesRouter(deps.frameDirectory));

  return app;
}
