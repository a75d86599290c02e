import { appendFile, stat, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Log levels in order of severity (higher = more severe)
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Context attached to log entries
 */
export interface LogContext {
  toolName?: string;
  callId?: string;
  [key: string]: unknown;
}

/**
 * One line of the log file
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  path: string;
  maxSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'qarnot-mcp.log',
  maxSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

/**
 * Context keys whose values never reach the log file
 */
const REDACTED_KEYS = new Set(['token', 'authorization', 'secretaccesskey', 'password']);

const REDACTED = '[redacted]';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Logger - JSON lines file logger with level filtering and size rotation
 *
 * The MCP stream owns stdout, so entries only ever go to the file. Writes
 * issued through a logger and its children are appended in call order.
 */
export class Logger {
  private config: LoggerConfig;
  private defaultContext: LogContext;
  private queue: { tail: Promise<void> };

  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
    this.queue = { tail: Promise.resolve() };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  set level(level: LogLevel) {
    this.config.level = level;
  }

  get path(): string {
    return this.config.path;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a logger sharing this one's file and write order, with extra
   * default context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.config, {
      ...this.defaultContext,
      ...context,
    });
    childLogger.queue = this.queue;
    return childLogger;
  }

  formatEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedContext = redact({ ...this.defaultContext, ...context });
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    if (error?.stack) {
      entry.stack = error.stack;
    }

    return entry;
  }

  /**
   * Appends an entry, rotating the file first when it is full. A failed
   * write is reported on stderr; the returned promise resolves either way.
   */
  write(entry: LogEntry): Promise<void> {
    const line = JSON.stringify(entry) + '\n';
    const next = this.queue.tail.then(async () => {
      try {
        await mkdir(dirname(this.config.path), { recursive: true });
        await this.rotateIfNeeded();
        await appendFile(this.config.path, line, { encoding: 'utf-8' });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Failed to write log file '${this.config.path}': ${reason}\n`);
      }
    });
    this.queue.tail = next;
    return next;
  }

  async debug(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('debug')) return;
    await this.write(this.formatEntry('debug', message, context));
  }

  async info(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('info')) return;
    await this.write(this.formatEntry('info', message, context));
  }

  async warn(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('warn')) return;
    await this.write(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error with its stack trace
   */
  async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
    if (!this.shouldLog('error')) return;

    const err = error instanceof Error ? error : undefined;
    const entry = this.formatEntry('error', message, context, err);

    if (error !== undefined && !(error instanceof Error)) {
      entry.context = {
        ...entry.context,
        errorDetails: String(error),
      };
    }

    await this.write(entry);
  }

  async rotateIfNeeded(): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.config.path)).size;
    } catch (error) {
      if (isMissing(error)) return;
      throw error;
    }

    if (size >= this.config.maxSize) {
      await this.rotate();
    }
  }

  /**
   * Shifts `<path>.N` to `<path>.N+1`, dropping the oldest, and moves the
   * current file to `<path>.1`
   */
  async rotate(): Promise<void> {
    const { path, maxFiles } = this.config;

    await ignoreMissing(unlink(`${path}.${maxFiles}`));

    for (let i = maxFiles - 1; i >= 1; i--) {
      await ignoreMissing(rename(`${path}.${i}`, `${path}.${i + 1}`));
    }

    await ignoreMissing(rename(path, `${path}.1`));
  }

  /**
   * Lists existing log files, newest first
   */
  async listLogFiles(): Promise<string[]> {
    const candidates = [this.config.path];
    for (let i = 1; i <= this.config.maxFiles; i++) {
      candidates.push(`${this.config.path}.${i}`);
    }

    const files: string[] = [];
    for (const candidate of candidates) {
      try {
        await stat(candidate);
        files.push(candidate);
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
    }
    return files;
  }
}

async function ignoreMissing(operation: Promise<void>): Promise<void> {
  try {
    await operation;
  } catch (error) {
    if (!isMissing(error)) throw error;
  }
}

function redact(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : value;
  }
  return result;
}
