// apps/api/src/middleware/logging.ts
import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { errMessage, log } from '../lib/logger';

export function requestId(res: Response): string {
  return typeof res.locals.reqId === 'string' ? res.locals.reqId : '';
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const header = req.headers['x-request-id'];
  const id = (typeof header === 'string' && header) || randomUUID().slice(0, 8);
  res.locals.reqId = id;

  const child = log.child({ scope: 'http', ctx: { reqId: id, path: req.path, method: req.method } });
  child.debug('incoming request', 'api.request.start', { ip: req.ip });

  res.on('finish', () => {
    const ctx = {
      status: res.statusCode,
      durMs: Date.now() - start,
      bytes: Number(res.getHeader('Content-Length')) || undefined,
    };
    if (res.statusCode >= 500) child.error('request completed', 'api.request.done', ctx);
    else if (res.statusCode >= 400) child.warn('request completed', 'api.request.done', ctx);
    else child.info('request completed', 'api.request.done', ctx);
  });

  next();
}

// body-parser помечает свои ошибки полями status и type
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const id = requestId(res) || randomUUID().slice(0, 8);
  const child = log.child({ scope: 'http', ctx: { reqId: id, path: req.path, method: req.method } });

  const status = httpStatusOf(err);
  if (status === 413) {
    child.warn('request body too large', 'api.error.too_large');
    res.status(413).json({ error: 'Payload Too Large', requestId: id });
    return;
  }
  if (status !== undefined) {
    child.warn('bad request', 'api.error.client', { status, err: errMessage(err) });
    res.status(status).json({ error: errMessage(err), requestId: id });
    return;
  }

  child.error('unhandled error', 'api.error', {
    err: errMessage(err), stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({ error: 'Internal Error', requestId: id });
}
