/**
 * otakeeper Agent — Health Route
 *
 * GET /api/health — Agent liveness, and whether an update is running
 */

import { Router, Request, Response } from 'express';
import { UpdateEngine } from '@otakeeper/engine';

export const AGENT_VERSION = '0.1.0';

export function healthRoutes(engine: UpdateEngine): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      version: AGENT_VERSION,
      uptime: process.uptime(),
      busy: engine.isBusy(),
    });
  });

  return router;
}
