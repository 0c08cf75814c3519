/**
 * otakeeper Agent — Update Routes
 *
 * POST /api/ota/upload   — Upload and install an update package
 * GET  /api/ota/version  — Currently committed version and digest
 * GET  /api/ota/history  — Recent update transactions
 */

import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { UpdateEngine, UpdateResult, VERIFICATION_FAILED_MESSAGE } from '@otakeeper/engine';
import { HistoryQuerySchema } from '../schemas';

const ZIP_MIME_TYPES = new Set([
  'application/zip',
  'application/x-zip-compressed',
  'application/zip-compressed',
]);

export interface UploadResponse {
  status: number;
  body: {
    detail: string;
    transaction_id: string;
    version?: string;
    digest?: string;
    category?: string;
  };
}

/**
 * Map a finished transaction to an HTTP status and body.
 */
export function toUploadResponse(result: UpdateResult): UploadResponse {
  const base = { transaction_id: result.transaction_id };

  if (result.final_state === 'COMMITTED') {
    return {
      status: 200,
      body: { ...base, detail: 'Update successful', version: result.version, digest: result.digest },
    };
  }

  const category = result.error?.category ?? 'INTERNAL_ERROR';
  const failure = (status: number, detail: string): UploadResponse => ({
    status,
    body: { ...base, detail, category },
  });

  switch (category) {
    case 'CONFIGURATION_ERROR':
      return failure(500, 'Update certificate is not present');
    case 'PACKAGE_FORMAT_ERROR':
      return failure(400, result.error?.message ?? 'Invalid update package');
    case 'INTEGRITY_ERROR':
    case 'AUTHENTICITY_ERROR':
      return failure(400, VERIFICATION_FAILED_MESSAGE);
    case 'BUSY_ERROR':
      return failure(409, 'Another update is in progress');
    case 'INSTALL_FAILURE':
      return failure(500, 'Failed to start new binary, rollback done');
    case 'INTERNAL_ERROR':
      return failure(500, 'Update failed');
  }
}

export function otaRoutes(engine: UpdateEngine, maxUploadBytes: number): Router {
  const router = Router();
  const receive = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  }).single('file');

  // POST /api/ota/upload
  router.post('/upload', (req: Request, res: Response, next: NextFunction) => {
    receive(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError) {
        if (err.code === 'LIMIT_FILE_SIZE') {
          res.status(413).json({ detail: 'Update package is too large' });
          return;
        }
        res.status(400).json({ detail: err.message });
        return;
      }
      if (err) {
        next(err);
        return;
      }

      if (!req.file) {
        res.status(400).json({ detail: 'No file uploaded' });
        return;
      }
      if (!ZIP_MIME_TYPES.has(req.file.mimetype)) {
        res.status(400).json({ detail: 'Only ZIP files accepted' });
        return;
      }

      engine
        .install(req.file.buffer)
        .then((result) => {
          const response = toUploadResponse(result);
          res.status(response.status).json(response.body);
        })
        .catch(next);
    });
  });

  // GET /api/ota/version
  router.get('/version', (_req: Request, res: Response) => {
    const installed = engine.getInstalledVersion();
    res.json({ version: installed.version, hash: installed.digest });
  });

  // GET /api/ota/history
  router.get('/history', (req: Request, res: Response) => {
    const parse = HistoryQuerySchema.safeParse(req.query);
    if (!parse.success) {
      res
        .status(400)
        .json({ error: 'Validation failed', details: parse.error.flatten() });
      return;
    }

    res.json({ transactions: engine.getHistory(parse.data.limit) });
  });

  return router;
}
