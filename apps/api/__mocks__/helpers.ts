import express, { type Router } from 'express';

import { errorHandler, requestLogger } from '../src/middleware/logging';

export function makeApp(mountPath: string, router: Router) {
  const app = express();
  app.use(requestLogger);
  app.use(mountPath, router);
  app.use(errorHandler);
  return app;
}

export function hex(s: string): Buffer {
  return Buffer.from(s.replace(/\s+/g, ''), 'hex');
}
