import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

/** LOG_LEVEL=silent mutes everything; unknown values behave like the default. */
function minimumLevel(): number {
  const raw = process.env.LOG_LEVEL;
  if (raw === 'silent') return Number.POSITIVE_INFINITY;
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return LEVEL_ORDER[raw];
  }
  return isDevelopment() ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
}

function shouldWriteFileSink(): boolean {
  if (!isDevelopment()) return false;
  return process.env.APP_LOG_FILE !== 'off';
}

function resolveLogFilePath(): string {
  if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;

  const baseDir = process.env.APP_LOG_DIR || './logs';
  const dateDir = new Date().toISOString().slice(0, 10);
  return join(baseDir, dateDir, 'app.ndjson');
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  if (!shouldWriteFileSink()) return null;

  const filePath = resolveLogFilePath();
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      process.stderr.write(`log file sink error: ${error.message}\n`);
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (error) {
    process.stderr.write(`log file sink unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
    return null;
  }
}

function writeLineToFile(line: string): void {
  const sink = ensureFileSink();
  if (!sink) return;
  sink.write(`${line}\n`);
}

function writeToStd(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const context = getLogContext();
  const payload = data ? redactSecrets(data) : {};
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...context,
    ...baseContext,
    ...payload,
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  writeToStd(record.level, line);
  writeLineToFile(line);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < minimumLevel()) return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
    child: (context: LogContext) => createLogger({ ...baseContext, ...context }),
  };
}

/** Flush the development file sink on exit. Safe to call more than once. */
export function initObservability(): void {
  if (sinkHooksInstalled) return;
  sinkHooksInstalled = true;
  process.once('exit', closeFileSink);
  process.once('SIGINT', closeFileSink);
  process.once('SIGTERM', closeFileSink);
}
