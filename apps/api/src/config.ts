// apps/api/src/config.ts

export type LogLevelName = 'all' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'off';

export const LOG_LEVELS: readonly LogLevelName[] = ['all', 'debug', 'info', 'warn', 'error', 'fatal', 'off'];

export type LogFileSettings = {
  dir: string;
  maxSizeBytes: number;
  backups: number;
  datePattern: string;
};

export type LogSettings = {
  level: LogLevelName;
  files: LogFileSettings | null; // null — файловые логи выключены
};

export type AppConfig = {
  port: number;
  maxUploadBytes: number;
  decodeRateLimitPerMin: number;
  candidates: string[] | undefined; // undefined — штатный порядок кодировок
  log: LogSettings;
};

type Env = Record<string, string | undefined>;

function isLogLevel(v: string): v is LogLevelName {
  return (LOG_LEVELS as readonly string[]).includes(v);
}

function positiveInt(raw: string | undefined, def: number): number {
  const n = Number(raw);
  return raw && Number.isInteger(n) && n > 0 ? n : def;
}

function flag(raw: string | undefined): boolean {
  return raw === '1' || raw === 'true';
}

const SIZE_UNITS: Record<string, number> = { '': 1, K: 1024, M: 1024 ** 2, G: 1024 ** 3 };

/** "50M", "512K", "1G" или просто байты. */
export function parseSize(raw: string | undefined, def: number): number {
  const m = /^(\d+)\s*([KMG]?)B?$/i.exec((raw || '').trim());
  if (!m) return def;
  const n = Number(m[1]) * SIZE_UNITS[m[2].toUpperCase()];
  return n > 0 ? n : def;
}

export function parseLogLevel(raw: string | undefined, nodeEnv?: string): LogLevelName {
  const v = (raw || '').trim().toLowerCase();
  if (isLogLevel(v)) return v;
  return nodeEnv === 'production' ? 'info' : 'debug';
}

export function readLogSettings(env: Env = process.env): LogSettings {
  return {
    level: parseLogLevel(env.LOG_LEVEL, env.NODE_ENV),
    files: flag(env.LOG_TO_FILES)
      ? {
          dir: env.LOG_DIR || '/var/log/distview',
          maxSizeBytes: parseSize(env.LOG_MAX_SIZE, 50 * 1024 * 1024),
          backups: positiveInt(env.LOG_BACKUPS, 14),
          datePattern: env.LOG_DATE_PATTERN || 'yyyy-MM-dd',
        }
      : null,
  };
}

export function parseCandidateList(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: positiveInt(env.PORT_API, 4000),
    maxUploadBytes: parseSize(env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
    decodeRateLimitPerMin: positiveInt(env.DECODE_RATE_LIMIT_PER_MIN, 120),
    candidates: parseCandidateList(env.DECODE_CANDIDATES),
    log: readLogSettings(env),
  };
}
