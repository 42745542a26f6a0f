/**
 * Structured logging for the drill
 * Configurable levels, structured output in production, readable output otherwise
 */

import { getEnvironmentConfig } from '../config/environment.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: Error;
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  structured: boolean;
}

// hard cap for any string field
const MAX_LOG_CHARS_DEFAULT = 2000;

function truncateString(str: string, max: number): string {
  if (str.length <= max) return str;
  const omitted = str.length - max;
  return str.slice(0, max) + `...(truncated ${omitted} chars)`;
}

function sanitizeValue(val: unknown, max: number): unknown {
  if (val == null) return val;
  if (typeof val === 'string') {
    return truncateString(val, max);
  }
  if (Array.isArray(val)) {
    return val.map(v => sanitizeValue(v, max));
  }
  if (val instanceof Error) {
    return { name: val.name, message: truncateString(val.message, max) };
  }
  if (typeof val === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = sanitizeValue(v, max);
    }
    return out;
  }
  return val;
}

function sanitizeEntry(entry: LogEntry, max: number): LogEntry {
  const safeMeta: Record<string, unknown> | undefined = entry.metadata
    ? Object.fromEntries(
        Object.entries(entry.metadata).map(([k, v]) => [k, sanitizeValue(v, max)])
      )
    : undefined;
  return {
    ...entry,
    message: truncateString(entry.message, max),
    ...(safeMeta && { metadata: safeMeta }),
  };
}

export class Logger {
  private config: LoggerConfig;
  private static readonly levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
  };

  constructor(config?: Partial<LoggerConfig>) {
    const envConfig = getEnvironmentConfig();
    this.config = {
      level: envConfig.logging.level,
      structured: envConfig.logging.structured,
      ...config
    };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, undefined, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, error, metadata);
  }

  private log(level: LogLevel, message: string, error?: Error, metadata?: Record<string, unknown>): void {
    if (Logger.levelPriority[level] < Logger.levelPriority[this.config.level]) {
      return;
    }

    // While Ink owns the terminal, anything but errors would tear the status line
    const isInkSession = process.env.NBACK_INK === 'true';
    const isDebugMode = process.env.NBACK_DEBUG === 'true' || !!process.env.DEBUG;
    if (isInkSession && level !== 'error' && !isDebugMode) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      error,
      metadata: metadata && Object.keys(metadata).length > 0 ? metadata : undefined,
    };

    const max = Number(process.env.NBACK_MAX_LOG_CHARS || MAX_LOG_CHARS_DEFAULT);
    const safeEntry = sanitizeEntry(entry, isFinite(max) && max > 0 ? max : MAX_LOG_CHARS_DEFAULT);

    if (this.config.structured) {
      this.outputStructured(safeEntry);
    } else {
      this.outputSimple(safeEntry);
    }
  }

  /**
   * Structured JSON lines (production)
   */
  private outputStructured(entry: LogEntry): void {
    const output = {
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack
        }
      }),
      ...(entry.metadata && { metadata: entry.metadata })
    };

    // stderr keeps stdout free for the drill itself
    console.error(JSON.stringify(output));
  }

  /**
   * Human-readable lines (development)
   */
  private outputSimple(entry: LogEntry): void {
    const timestamp = entry.timestamp.split('T')[1]?.split('.')[0] ?? entry.timestamp;
    const level = entry.level.toUpperCase().padEnd(5);
    let output = `${timestamp} ${level} ${entry.message}`;

    if (entry.error) {
      output += `\nError: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.metadata) {
      output += `\nMetadata: ${JSON.stringify(entry.metadata, null, 2)}`;
    }

    // stderr for every level: stdout carries the drill's status line
    console.error(output);
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger();
