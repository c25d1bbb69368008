import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, requestLogger } from './middleware/index';
import { API_PREFIX } from '@shared/constants';
import apiRouter from './routes/index';

export function createApp() {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use(API_PREFIX, apiRouter);
  app.use(errorHandler);

  return app;
}
