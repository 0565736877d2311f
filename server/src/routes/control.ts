import { Router } from 'express';
import type { ControlSurface } from '../control/control-surface.js';
import { modeRequestSchema, shootRequestSchema } from '../ws/schemas.js';

export function createControlRouter(control: ControlSurface): Router {
  const router = Router();

  router.get('/mode', (_req, res) => {
    res.json({ mode: control.mode });
  });

  router.post('/mode', (req, res) => {
    const data = modeRequestSchema.safeParse(req.body);
    if (!data.success) {
      res.status(400).json({
        error: 'INVALID_PAYLOAD',
        issues: data.error.issues.map((issue) => issue.message),
      });
      return;
    }
    res.json(control.setMode(data.data.mode));
  });

  router.post('/shoot', (req, res) => {
    const data = shootRequestSchema.safeParse(req.body);
    if (!data.success) {
      res.status(400).json({
        error: 'INVALID_PAYLOAD',
        issues: data.error.issues.map((issue) => issue.message),
      });
      return;
    }
    const delivered = control.shoot(data.data.shot);
    res.json({ shot: data.data.shot, delivered });
  });

  return router;
}
