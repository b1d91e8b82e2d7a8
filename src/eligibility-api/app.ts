import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { ApiContext } from './context';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

export interface AppOptions {
  clientUrl: string;
  logRequests?: boolean;
}

export function createApp(ctx: ApiContext, options: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: options.clientUrl }));
  app.use(express.json({ limit: '100kb' }));
  if (options.logRequests !== false) {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, createApiRouter(ctx));
  app.use(errorHandler);

  return app;
}
