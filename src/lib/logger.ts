import fs from 'fs';
import path from 'path';
import envPaths from 'env-paths';
import { APP_NAME, LOG_FILE_NAME, MAX_LOG_FILES, MAX_LOG_FILE_SIZE } from '../config/constants';
import { errorMessage } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface LoggerOptions {
  /** Absolute path of the active log file */
  file: string;
  level?: LogLevel;
  /** Mirror every entry to stderr (stdout is reserved for the stdio transport) */
  mirrorToStderr?: boolean;
  maxFileSize?: number;
  maxFiles?: number;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// Error instances have no enumerable own properties, so JSON.stringify would drop them
function serializeMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error
      ? { name: value.name, message: value.message, stack: value.stack }
      : value;
  }
  return out;
}

/**
 * JSON-lines file logger with size based rotation
 *
 * The active file is rotated once it grows past `maxFileSize`: `app.log`
 * becomes `app.log.1`, `app.log.1` becomes `app.log.2` and so on, keeping at
 * most `maxFiles` files in total.
 */
export class Logger {
  private readonly file: string;
  private readonly threshold: number;
  private readonly mirrorToStderr: boolean;
  private readonly maxFileSize: number;
  private readonly maxFiles: number;
  private dirReady = false;

  constructor(options: LoggerOptions) {
    this.file = options.file;
    this.threshold = LEVEL_ORDER[options.level ?? 'info'];
    this.mirrorToStderr = options.mirrorToStderr ?? false;
    this.maxFileSize = options.maxFileSize ?? MAX_LOG_FILE_SIZE;
    this.maxFiles = options.maxFiles ?? MAX_LOG_FILES;
  }

  debug(message: string, meta?: LogMeta) {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta) {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const entry = {
      time: new Date().toISOString(),
      level,
      message,
      ...(meta ? serializeMeta(meta) : {})
    };
    const line = `${JSON.stringify(entry)}\n`;

    if (this.mirrorToStderr) {
      process.stderr.write(line);
    }

    try {
      if (!this.dirReady) {
        fs.mkdirSync(path.dirname(this.file), { recursive: true });
        this.dirReady = true;
      }
      this.rotateIfNeeded(Buffer.byteLength(line));
      fs.appendFileSync(this.file, line, 'utf8');
    } catch (error) {
      // Logging must never take a tool call down with it
      process.stderr.write(`Failed to write log file ${this.file}: ${errorMessage(error)}\n`);
      if (!this.mirrorToStderr) process.stderr.write(line);
    }
  }

  private rotateIfNeeded(incoming: number) {
    let size: number;
    try {
      size = fs.statSync(this.file).size;
    } catch {
      return; // no file yet
    }
    if (size + incoming <= this.maxFileSize) return;

    const oldest = `${this.file}.${this.maxFiles - 1}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 2; i >= 1; i--) {
      const from = `${this.file}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.file}.${i + 1}`);
    }
    if (this.maxFiles > 1) {
      fs.renameSync(this.file, `${this.file}.1`);
    } else {
      fs.unlinkSync(this.file);
    }
  }
}

/**
 * Builds the process-wide logger from environment variables
 *
 * - `REPO_TOOLS_LOG_LEVEL`: debug | info | warn | error (default info)
 * - `REPO_TOOLS_DEBUG=1`: also write entries to stderr
 * - `REPO_TOOLS_LOG_FILE`: override the log file location
 */
export function createLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
  const level = env.REPO_TOOLS_LOG_LEVEL;
  const file = env.REPO_TOOLS_LOG_FILE || path.join(envPaths(APP_NAME).log, LOG_FILE_NAME);
  return new Logger({
    file,
    level: isLogLevel(level) ? level : 'info',
    mirrorToStderr: env.REPO_TOOLS_DEBUG === '1'
  });
}

export const logger = createLoggerFromEnv();
