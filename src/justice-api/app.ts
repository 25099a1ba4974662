import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Database } from '@db/connection';
import { API_PREFIX } from '@shared/constants';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

export interface AppOptions {
  /** Request logging; off in tests. */
  logRequests?: boolean;
}

export function createApp(db: Database, options: AppOptions = {}): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: config.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (options.logRequests ?? true) app.use(requestLogger);

  app.use(API_PREFIX, createApiRouter(db));

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Route not found' });
  });
  app.use(errorHandler);

  return app;
}
