import { Router } from 'express';
import os from 'node:os';
import type { RateScheduler } from '../camera/rate-scheduler.js';
import type { ChannelRegistry } from '../channels/registry.js';

export interface HealthDeps {
  registry: ChannelRegistry;
  scheduler: RateScheduler;
  sessions: () => number;
}

export function createHealthRouter({ registry, scheduler, sessions }: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      scheduler: {
        state: scheduler.state,
        published: scheduler.published,
        periodMs: scheduler.period,
      },
      channels: registry.stats(),
      sessions: sessions(),
      load: os.loadavg(),
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
