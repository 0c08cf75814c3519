/**
 * otakeeper Agent — Express Application Factory
 *
 * Creates and configures the Express app with all middleware and routes.
 * Separated from server.ts to enable testing with supertest.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import pinoHttp from 'pino-http';
import { Logger, UpdateEngine } from '@otakeeper/engine';
import { Config } from './config';
import { otaRoutes } from './routes/ota';
import { healthRoutes } from './routes/health';

export interface AppContext {
  app: express.Application;
  engine: UpdateEngine;
}

export function createApp(config: Config, engine: UpdateEngine, logger: Logger): AppContext {
  const app = express();

  // ─── Middleware ────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins }));
  app.use(express.json({ limit: '1mb' }));
  app.use(pinoHttp({ logger }));

  // ─── Routes ───────────────────────────────────────────────
  app.use('/api/health', healthRoutes(engine));
  app.use('/api/ota', otaRoutes(engine, config.maxUploadBytes));

  // ─── 404 Handler ──────────────────────────────────────────
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ─── Error Handler ────────────────────────────────────────
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return { app, engine };
}
