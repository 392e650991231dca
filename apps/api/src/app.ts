import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { GeotagUseCasePort } from '@geotagger/domain';

import { createGeotagRouter } from './controllers/geotag.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppOptions {
  geotag: GeotagUseCasePort;
  defaultMaxGapSeconds: number;
  corsOrigin?: string;
  /** Write morgan access logs to stdout (default true). */
  accessLog?: boolean;
}

export function buildApp(opts: AppOptions): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: opts.corsOrigin ?? '*' }));
  if (opts.accessLog ?? true) {
    app.use(morgan('combined'));
  }
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api', createGeotagRouter(opts.geotag, opts.defaultMaxGapSeconds));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
