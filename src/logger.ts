/**
 * Component logger
 *
 * Console output in the `[Component] message {context}` format used across the
 * coordinator and worker agents. The threshold comes from TOOLFLEET_LOG_LEVEL.
 * Lines that pass the threshold are also copied to every open log file.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, ctx?: LogContext): void;
  info(message: string, ctx?: LogContext): void;
  warn(message: string, ctx?: LogContext): void;
  error(message: string, ctx?: LogContext): void;
  /** Logger for a sub-component, e.g. `Coordinator:http` */
  child(component: string): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/** Resolve the minimum level from the environment (default: info) */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.TOOLFLEET_LOG_LEVEL?.toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return 'info';
}

function formatValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function formatContext(ctx?: LogContext): string {
  if (!ctx) return '';
  const entries = Object.entries(ctx).filter(([, value]) => value !== undefined);
  if (entries.length === 0) return '';
  const formatted: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    formatted[key] = formatValue(value);
  }
  return ' ' + JSON.stringify(formatted);
}

export function formatLogLine(component: string, message: string, ctx?: LogContext): string {
  return `[${component}] ${message}${formatContext(ctx)}`;
}

// ---------------------------------------------------------------------------
// Log files
// ---------------------------------------------------------------------------

type WritableLevel = Exclude<LogLevel, 'silent'>;

const logFiles: Set<LogFile> = new Set();

export interface LogFileOptions {
  now?: () => Date;
}

/** `2026-01-02T03:04:05.000Z` → `2026-01-02T03-04-05Z` */
function fileStamp(date: Date): string {
  return date.toISOString().replace(/\.\d+Z$/, 'Z').replace(/:/g, '-');
}

/**
 * Append-only log file that receives every line written by any logger while
 * it is open
 */
export class LogFile {
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly stream: WriteStream,
    private readonly now: () => Date
  ) {
    stream.on('error', (error) => {
      logFiles.delete(this);
      console.error(formatLogLine('logger', `Log file ${path} failed; no longer writing to it`, { error }));
    });
  }

  /**
   * Open `<dir>/<name>-<timestamp>.log`, creating the directory when missing
   */
  static async open(dir: string, name: string, options: LogFileOptions = {}): Promise<LogFile> {
    const now = options.now ?? (() => new Date());
    await mkdir(dir, { recursive: true });
    const path = join(dir, `${name}-${fileStamp(now())}.log`);
    const file = new LogFile(path, createWriteStream(path, { flags: 'a', encoding: 'utf-8' }), now);
    logFiles.add(file);
    return file;
  }

  write(level: WritableLevel, line: string): void {
    if (this.closed) return;
    this.stream.write(`${this.now().toISOString()} ${level.toUpperCase()} ${line}\n`);
  }

  /**
   * Stop receiving lines and flush what was written
   */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    logFiles.delete(this);
    return new Promise((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end(() => resolve());
    });
  }
}

function emit(level: WritableLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
  for (const file of logFiles) {
    file.write(level, line);
  }
}

export function createLogger(component: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LOG_LEVEL_PRIORITY[level];
  const write = (target: WritableLevel, message: string, ctx?: LogContext) => {
    if (LOG_LEVEL_PRIORITY[target] >= threshold) emit(target, formatLogLine(component, message, ctx));
  };

  return {
    debug(message, ctx) {
      write('debug', message, ctx);
    },
    info(message, ctx) {
      write('info', message, ctx);
    },
    warn(message, ctx) {
      write('warn', message, ctx);
    },
    error(message, ctx) {
      write('error', message, ctx);
    },
    child(sub) {
      return createLogger(`${component}:${sub}`, level);
    },
  };
}
