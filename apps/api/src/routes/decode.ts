// apps/api/src/routes/decode.ts
import chardet from 'chardet';
import express, { Router, type Request } from 'express';
import rateLimit from 'express-rate-limit';

import { detectText, type EncodingCandidate } from '../encoding';
import { createLogger } from '../lib/logger';
import { requestId } from '../middleware/logging';
import { viewFile } from '../services/fileView';

const log = createLogger({ scope: 'route.decode' });

export type DecodeRouterOptions = {
  candidates: readonly EncodingCandidate[];
  maxUploadBytes: number;
  rateLimitPerMin: number;
};

// express.raw кладёт Buffer только если тело было; иначе там {}
function bodyBytes(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

const isOn = (v: unknown) => v === '1' || v === 'true';

export function decodeRouter(opts: DecodeRouterOptions) {
  const r = Router();

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: opts.rateLimitPerMin,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });
  // любой Content-Type: файл из архива приходит как есть
  const raw = express.raw({ type: () => true, limit: opts.maxUploadBytes });

  r.post('/decode', limiter, raw, (req, res) => {
    const lg = log.child({ ctx: { reqId: requestId(res) } });
    const bytes = bodyBytes(req);
    const result = detectText(bytes, opts.candidates);
    const explain = isOn(req.query.explain);

    lg.info('decode done', 'decode.done', {
      size: bytes.length,
      binary: result.kind === 'binary',
      encoding: result.kind === 'text' ? result.encoding : null,
      tried: result.attempts.length,
    });

    const extra = explain
      // chardet — только для сравнения в отчёте, на выбор не влияет
      ? { attempts: result.attempts, chardet: chardet.detect(bytes) }
      : {};

    if (result.kind === 'binary') {
      res.json({ binary: true, ...extra });
      return;
    }
    res.json({ binary: false, encoding: result.encoding, text: result.text, ...extra });
  });

  r.post('/view', limiter, raw, (req, res) => {
    const lg = log.child({ ctx: { reqId: requestId(res) } });
    const filePath = typeof req.query.path === 'string' ? req.query.path.trim() : '';
    if (!filePath) {
      lg.warn('view without path', 'view.bad_request');
      res.status(400).json({ error: 'path is required' });
      return;
    }

    const view = viewFile(filePath, bodyBytes(req), opts.candidates);
    lg.info('view done', 'view.done', { path: filePath, kind: view.kind });
    res.json(view);
  });

  return r;
}
