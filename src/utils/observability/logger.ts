import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

/**
 * Domains whose payloads carry agent replies or session material. Only
 * allow-listed fields leave the process for these.
 */
const HIGH_RISK_DOMAINS = new Set(['agent-transport', 'capability']);
const HIGH_RISK_ALLOWED_FIELDS = new Set([
  'capability',
  'attempt',
  'attempts',
  'status',
  'code',
  'polls',
  'durationMs',
  'latencyMs',
  'delayMs',
  'replyLength',
  'messageLength',
  'error',
  'recoverable',
]);

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function shouldWriteFileSink(): boolean {
  if (!isDevelopment()) return false;
  return process.env.APP_LOG_FILE !== 'off';
}

function shouldWriteStd(level: LogLevel): boolean {
  if (process.env.NODE_ENV !== 'test') return true;
  // Tests stay quiet unless they ask for output.
  return process.env.APP_LOG_TEST_OUTPUT === 'true' || level === 'error';
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
    stream.on('error', (err: Error) => {
      process.stderr.write(`log file sink error: ${err.message}\n`);
      fileSink = null;
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch (err) {
    process.stderr.write(`log file sink unavailable: ${err instanceof Error ? err.message : String(err)}\n`);
    return null;
  }
}

function writeLineToFile(line: string): void {
  const sink = ensureFileSink();
  if (!sink) return;
  sink.write(`${line}\n`);
}

function writeToStd(level: LogLevel, line: string): void {
  if (!shouldWriteStd(level)) return;
  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function isAllowedHighRiskField(key: string): boolean {
  if (HIGH_RISK_ALLOWED_FIELDS.has(key)) return true;
  if (/^has[A-Z]/.test(key)) return true;
  if (/^[a-zA-Z]+Id$/.test(key)) return true;
  return false;
}

function isHighRisk(context: LogContext): boolean {
  return typeof context.domain === 'string' && HIGH_RISK_DOMAINS.has(context.domain);
}

function shouldRedactContent(context: LogContext): boolean {
  return isHighRisk(context) || process.env.LOG_CONTENT !== 'true';
}

function applyHighRiskFieldPolicy(context: LogContext, payload: LogData): LogData {
  if (!isHighRisk(context)) {
    return payload;
  }

  const filtered: LogData = {};
  for (const [key, value] of Object.entries(payload)) {
    if (isAllowedHighRiskField(key)) {
      filtered[key] = value;
    }
  }
  return filtered;
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const mergedContext = { ...getLogContext(), ...baseContext };
  const redacted = data ? redactSecrets(data, shouldRedactContent(mergedContext)) : {};
  const payload = applyHighRiskFieldPolicy(mergedContext, redacted);
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...mergedContext,
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

/** Close the file sink on process exit. Safe to call more than once. */
export function initObservability(): void {
  if (sinkHooksInstalled) return;
  sinkHooksInstalled = true;
  process.once('exit', closeFileSink);
}
