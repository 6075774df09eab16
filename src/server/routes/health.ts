/**
 * Health check endpoint
 */

import { Router, Request, Response } from 'express';
import type { AppConfig } from '../../types.js';

export function createHealthRouter(config: AppConfig): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      model: config.model,
      api_configured: config.gemini !== null,
    });
  });

  return router;
}
