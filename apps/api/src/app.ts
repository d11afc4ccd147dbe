// apps/api/src/app.ts
import cors from 'cors';
import express from 'express';

import type { AppConfig } from './config';
import type { EncodingCandidate } from './encoding';
import { errorHandler, requestLogger } from './middleware/logging';
import { decodeRouter } from './routes/decode';
import { healthRouter, robotsRouter } from './routes/health';

export function createApp(config: AppConfig, candidates: readonly EncodingCandidate[]) {
  const app = express();
  app.use(requestLogger);
  app.disable('x-powered-by');
  app.use(cors());

  // health both with and without /api
  app.use(['/health', '/api/health'], healthRouter(candidates));
  app.use(robotsRouter);

  app.use('/api', decodeRouter({
    candidates,
    maxUploadBytes: config.maxUploadBytes,
    rateLimitPerMin: config.decodeRateLimitPerMin,
  }));

  app.use(errorHandler);
  return app;
}
