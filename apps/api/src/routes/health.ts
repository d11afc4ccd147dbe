// apps/api/src/routes/health.ts
import { Router } from 'express';
import { FAST_PATH_ENCODING, type EncodingCandidate } from '../encoding';
import { createLogger } from '../lib/logger';
import { requestId } from '../middleware/logging';

const log = createLogger({ scope: 'route.health' });

export function healthRouter(candidates: readonly EncodingCandidate[]) {
  const r = Router();
  const encodings = [FAST_PATH_ENCODING, ...candidates.map(c => c.name)];

  r.get('/', (_req, res) => {
    const lg = log.child({ ctx: { reqId: requestId(res) } });
    const payload = { ok: true, encodings };
    res.json(payload);
    lg.debug('health check response sent', 'health.check.done', { encodings: encodings.length });
  });

  return r;
}

export const robotsRouter = Router().get('/robots.txt', (_req, res) => {
  res.type('text/plain').send('User-agent: *\nDisallow: /');
});
