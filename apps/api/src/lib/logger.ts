// apps/api/src/lib/logger.ts
/// <reference path="../types/streamroller.d.ts" />
import fs from 'node:fs';
import path from 'node:path';
import { RollingFileWriteStream } from 'streamroller';

import { readLogSettings, type LogFileSettings, type LogLevelName } from '../config';

export type { LogLevelName } from '../config';

const LEVEL_ORDER: Record<LogLevelName, number> = {
  all: 0, debug: 10, info: 20, warn: 30, error: 40, fatal: 50, off: 100,
};

export type LogContext = Record<string, unknown>;
export type EventKey = string;
export type LogRecord = Record<string, unknown> & { ts: string; level: LogLevelName; msg: string };
export type Sink = (rec: LogRecord) => void;

export interface Logger {
  level: LogLevelName;
  child(bindings: { scope?: string; ctx?: LogContext }): Logger;
  debug(msg: string, evt?: EventKey, ctx?: LogContext): void;
  info (msg: string, evt?: EventKey, ctx?: LogContext): void;
  warn (msg: string, evt?: EventKey, ctx?: LogContext): void;
  error(msg: string, evt?: EventKey, ctx?: LogContext): void;
  fatal(msg: string, evt?: EventKey, ctx?: LogContext): void;
}

function shouldLog(current: LogLevelName, target: LogLevelName) {
  return LEVEL_ORDER[current] <= LEVEL_ORDER[target];
}

const isErrorLevel = (lvl: LogLevelName) => lvl === 'error' || lvl === 'fatal';

const consoleSink: Sink = (rec) => {
  const line = JSON.stringify(rec) + '\n';
  if (isErrorLevel(rec.level)) process.stderr.write(line);
  else process.stdout.write(line);
};

/** combined.log + error.log, ротация по дате и по размеру (LOG_TO_FILES=1) */
function makeFileSink(files: LogFileSettings): Sink {
  fs.mkdirSync(files.dir, { recursive: true });

  const open = (name: string) => new RollingFileWriteStream(path.join(files.dir, name), {
    maxSize: files.maxSizeBytes,
    numToKeep: files.backups,
    pattern: files.datePattern,
    compress: true,
    keepFileExt: true,
  });
  const combined = open('combined.log');
  const errors = open('error.log');

  return (rec) => {
    const line = JSON.stringify(rec) + '\n';
    combined.write(line);
    if (isErrorLevel(rec.level)) errors.write(line);
  };
}

const settings = readLogSettings();
const defaultSinks: Sink[] = settings.files ? [consoleSink, makeFileSink(settings.files)] : [consoleSink];

export type LoggerOptions = {
  level?: LogLevelName;
  scope?: string;
  ctx?: LogContext;
  sink?: Sink; // вместо stdout/файлов, для тестов
};

class BaseLogger implements Logger {
  public level: LogLevelName;
  private readonly scope?: string;
  private readonly baseCtx: LogContext;
  private readonly sinks: Sink[];

  constructor(opts: LoggerOptions = {}, sinks?: Sink[]) {
    this.level = opts.level ?? settings.level;
    this.scope = opts.scope;
    this.baseCtx = opts.ctx ?? {};
    this.sinks = sinks ?? (opts.sink ? [opts.sink] : defaultSinks);
  }

  child(bind: { scope?: string; ctx?: LogContext }): Logger {
    return new BaseLogger({
      level: this.level,
      scope: bind.scope ?? this.scope,
      ctx: { ...this.baseCtx, ...(bind.ctx ?? {}) },
    }, this.sinks);
  }

  private emit(target: LogLevelName, msg: string, evt?: EventKey, ctx?: LogContext) {
    if (!shouldLog(this.level, target)) return;

    const rec: LogRecord = {
      ts: new Date().toISOString(),
      level: target,
      msg,
      ...(this.scope ? { scope: this.scope } : {}),
      ...(evt ? { evt } : {}),
      ...this.baseCtx,
      ...(ctx ?? {}),
    };
    for (const sink of this.sinks) sink(rec);
  }

  debug(msg: string, evt?: EventKey, ctx?: LogContext) { this.emit('debug', msg, evt, ctx); }
  info (msg: string, evt?: EventKey, ctx?: LogContext) { this.emit('info',  msg, evt, ctx); }
  warn (msg: string, evt?: EventKey, ctx?: LogContext) { this.emit('warn',  msg, evt, ctx); }
  error(msg: string, evt?: EventKey, ctx?: LogContext) { this.emit('error', msg, evt, ctx); }
  fatal(msg: string, evt?: EventKey, ctx?: LogContext) { this.emit('fatal', msg, evt, ctx); }
}

export function createLogger(opts?: LoggerOptions): Logger {
  return new BaseLogger(opts);
}

export const log = createLogger({ scope: 'app' });

export function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
