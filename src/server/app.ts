/**
 * ask-gemini HTTP server
 * Express app exposing the question pipeline over JSON
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import './types.js'; // Augments Express.Request with requestId
import cors from 'cors';
import dotenv from 'dotenv';
import { randomUUID } from 'crypto';
import { createHealthRouter } from './routes/health.js';
import { createAskRouter } from './routes/ask.js';
import { createHomeRouter } from './routes/home.js';
import { createQAPipeline } from '../core/pipeline.js';
import { loadConfig, API_KEY_ENV } from '../config.js';
import type { AppConfig, QAPipeline } from '../types.js';

export interface ServerOptions {
  config: AppConfig;
  /** Defaults to a pipeline built from config.gemini (none when the key is missing) */
  pipeline?: QAPipeline | null;
}

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:5000'];

export function createApp(options: ServerOptions): Express {
  const { config } = options;
  const pipeline =
    options.pipeline !== undefined
      ? options.pipeline
      : config.gemini
        ? createQAPipeline({ gemini: config.gemini, policy: config.policy })
        : null;

  const app = express();

  // ─── Request ID ─────────────────────────────────────────────────────────────
  // Must run before all other middleware so req.requestId is always set.
  app.use((req: Request, res: Response, next: NextFunction) => {
    req.requestId = randomUUID();
    res.setHeader('X-Request-Id', req.requestId);
    next();
  });

  // Hard server-side timeout: the Gemini call's own timeout plus headroom
  const timeoutMs = (config.gemini?.timeoutMs ?? 30_000) + 5_000;
  app.use((req: Request, res: Response, next: NextFunction) => {
    req.setTimeout(timeoutMs);
    res.setTimeout(timeoutMs, () => {
      if (!res.headersSent) {
        res.status(504).json({
          error: `Request timed out after ${timeoutMs / 1000}s`,
          requestId: req.requestId,
        });
      }
    });
    next();
  });

  app.use(express.json({ limit: '100kb' }));

  const corsOrigins = [...new Set([...DEFAULT_ORIGINS, ...config.corsOrigins])];
  app.use(cors({ origin: corsOrigins }));

  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    next();
  });

  // JSON parse errors from express.json()
  app.use((err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        error: 'Malformed JSON in request body',
        requestId: req.requestId,
      });
      return;
    }
    next(err);
  });

  app.use(createHomeRouter());
  app.use(createHealthRouter(config));
  app.use(createAskRouter(pipeline));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: `Route not found: ${req.method} ${req.path}`,
      requestId: req.requestId,
    });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    if (res.headersSent) return;

    const message =
      process.env.NODE_ENV === 'production'
        ? 'An unexpected error occurred'
        : err.message || 'An unexpected error occurred';
    res.status(500).json({ error: message, requestId: req.requestId });
  });

  return app;
}

export function startServer(config: AppConfig = loadConfig()): void {
  const app = createApp({ config });

  if (!config.gemini) {
    console.warn(`✗ ${API_KEY_ENV} not set: /ask will answer 500 until it is configured`);
  }

  const server = app.listen(config.port, config.host, () => {
    console.log('='.repeat(60));
    console.log('LLM Q&A System - Powered by Google Gemini');
    console.log('='.repeat(60));
    console.log(`Status: ${config.gemini ? `✓ Ready (${config.gemini.model})` : '✗ Not configured'}`);
    console.log(`Listening on http://${config.host}:${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('\nShutting down gracefully...');
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  dotenv.config();
  startServer();
}
