import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { RuleSetRegistry } from '@core/registry';
import { errorHandler, requestLogger } from './middleware/index';
import apiRouter from './routes/index';

export interface AppOptions {
  clientUrl: string;
  bulkLimit: number;
  logRequests?: boolean;
}

export function createApp(registry: RuleSetRegistry, options: AppOptions): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: options.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) app.use(requestLogger);

  app.use(API_PREFIX, apiRouter(registry, { bulkLimit: options.bulkLimit }));

  app.use(errorHandler);
  return app;
}
