// apps/api/src/main.ts
import fs from 'node:fs';
import path from 'node:path';

import { createApp } from './app';
import { loadConfig } from './config';
import { assertCandidatesSupported, ConfigurationError, FAST_PATH_ENCODING, resolveCandidates } from './encoding';
import { createLogger, errMessage } from './lib/logger';

const config = loadConfig();
const log = createLogger({ scope: 'api.main', ctx: { portApi: config.port } });

function safePkgVersion(): string | null {
  // __dirname -> apps/api/dist после сборки, apps/api/src под ts-node/jest
  const candidates = [
    path.resolve(__dirname, '../package.json'),
    path.resolve(process.cwd(), 'package.json'),
  ];
  for (const p of candidates) {
    if (!fs.existsSync(p)) continue;
    try {
      const json: unknown = JSON.parse(fs.readFileSync(p, 'utf8'));
      if (typeof json === 'object' && json !== null && 'version' in json && typeof json.version === 'string') {
        return json.version;
      }
    } catch (e: unknown) {
      log.warn('package.json unreadable', 'api.startup.pkg', { path: p, err: errMessage(e) });
    }
  }
  return null;
}

function getStartupMeta() {
  return {
    build: {
      version: safePkgVersion() || process.env.BUILD_VERSION || null,
      commit: process.env.GIT_COMMIT || process.env.COMMIT_SHA || null,
    },
    env: {
      NODE_ENV: process.env.NODE_ENV || 'development',
      LOG_LEVEL: config.log.level,
      LOG_TO_FILES: config.log.files !== null,
      MAX_UPLOAD_BYTES: config.maxUploadBytes,
      DECODE_RATE_LIMIT_PER_MIN: config.decodeRateLimitPerMin,
    },
    runtime: {
      node: process.version,
      pid: process.pid,
      platform: process.platform,
      arch: process.arch,
    },
  };
}

function loadCandidates() {
  try {
    const candidates = resolveCandidates(config.candidates);
    assertCandidatesSupported(candidates);
    return candidates;
  } catch (e: unknown) {
    if (e instanceof ConfigurationError) {
      log.fatal('encoding registry invalid', 'api.config.encodings', { err: e.message, encoding: e.encoding });
      process.exit(1);
    }
    throw e;
  }
}

const candidates = loadCandidates();
const app = createApp(config, candidates);

app.listen(config.port, () => {
  log.info('API startup', 'api.startup', getStartupMeta());
  log.info('encoding registry loaded', 'api.encodings', {
    order: [FAST_PATH_ENCODING, ...candidates.map(c => c.name)],
  });
  log.info('API listener up', 'api.listen', { port: config.port });
});
