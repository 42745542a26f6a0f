/**
 * Centralized logging service
 * Replaces direct console usage with environment-aware logging
 */

import { logger } from '../utils/logger.js';
import { getEnvironmentConfig } from '../config/environment.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface ContextLogger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const stringify = (arg: unknown): string => {
  if (arg instanceof Error) {
    return arg.stack ? `${arg.message}\n${arg.stack}` : arg.message;
  }
  return typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg);
};

export class LoggingService {
  private static instance: LoggingService | undefined;
  private logLevel: LogLevel;
  private isProduction: boolean;

  private constructor() {
    this.isProduction = getEnvironmentConfig().isProduction;
    this.logLevel = this.getLogLevelFromEnv();
  }

  static getInstance(): LoggingService {
    if (!LoggingService.instance) {
      LoggingService.instance = new LoggingService();
    }
    return LoggingService.instance;
  }

  private getLogLevelFromEnv(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    switch (envLevel) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      case 'NONE':
        return LogLevel.NONE;
      default:
        return this.isProduction ? LogLevel.WARN : LogLevel.INFO;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.logLevel;
  }

  debug(...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      logger.debug(args.map(stringify).join(' '));
    }
  }

  info(...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      logger.info(args.map(stringify).join(' '));
    }
  }

  warn(...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      logger.warn(args.map(stringify).join(' '));
    }
  }

  error(...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      logger.error(args.map(stringify).join(' '));
    }
  }

  /**
   * Set log level dynamically; DEBUG also opens the underlying logger
   */
  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    if (level === LogLevel.DEBUG) {
      logger.setLevel('debug');
    }
  }

  createLogger(context: string): ContextLogger {
    return {
      debug: (...args: unknown[]) => this.debug(`[${context}]`, ...args),
      info: (...args: unknown[]) => this.info(`[${context}]`, ...args),
      warn: (...args: unknown[]) => this.warn(`[${context}]`, ...args),
      error: (...args: unknown[]) => this.error(`[${context}]`, ...args),
    };
  }
}

export const loggingService = LoggingService.getInstance();

export const componentLoggers = {
  session: loggingService.createLogger('Session'),
  timedInput: loggingService.createLogger('TimedInput'),
  lineSource: loggingService.createLogger('LineSource'),
  config: loggingService.createLogger('Config'),
  ui: loggingService.createLogger('UI'),
};
