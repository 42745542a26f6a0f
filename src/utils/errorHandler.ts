/**
 * Centralized error handling utilities
 */

import { logger } from './logger.js';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  CONTRACT = 'contract',
  IO = 'io',
  UNKNOWN = 'unknown',
}

export interface ErrorContext {
  operation?: string;
  component?: string;
  cycle?: number;
  metadata?: Record<string, unknown>;
}

export class DrillError extends Error {
  public readonly severity: ErrorSeverity;
  public readonly category: ErrorCategory;
  public context?: ErrorContext;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;

  constructor(
    message: string,
    options?: {
      severity?: ErrorSeverity;
      category?: ErrorCategory;
      context?: ErrorContext;
      recoverable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'DrillError';
    this.severity = options?.severity || ErrorSeverity.MEDIUM;
    this.category = options?.category || ErrorCategory.UNKNOWN;
    this.context = options?.context;
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? true;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintain proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      severity: this.severity,
      category: this.category,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A caller broke a precondition (enqueue into a full buffer, dequeue from an
 * empty one, reading past an exhausted provider). Never recoverable.
 */
export class ContractViolationError extends DrillError {
  constructor(message: string, context?: ErrorContext) {
    super(message, {
      category: ErrorCategory.CONTRACT,
      severity: ErrorSeverity.CRITICAL,
      context,
      recoverable: false,
    });
    this.name = 'ContractViolationError';
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export const toError = (value: unknown): Error => {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
};

/**
 * Global error handler for uncaught errors
 */
export const handleError = (
  error: Error | DrillError,
  context?: ErrorContext
): void => {
  const severity = error instanceof DrillError
    ? error.severity
    : ErrorSeverity.HIGH;

  const details: Record<string, unknown> = { ...context };
  if (error instanceof DrillError) {
    details.category = error.category;
    details.recoverable = error.recoverable;
  }

  switch (severity) {
    case ErrorSeverity.CRITICAL:
      logger.error('Critical error occurred', error, details);
      break;
    case ErrorSeverity.HIGH:
      logger.error('Error occurred', error, details);
      break;
    case ErrorSeverity.MEDIUM:
      logger.warn(`Warning: ${error.message}`, details);
      break;
    case ErrorSeverity.LOW:
      logger.info(`Minor error occurred: ${error.message}`, details);
      break;
  }

  if (error instanceof DrillError && context && !error.context) {
    error.context = context;
  }
};

/**
 * Common error factories
 */
export const Errors = {
  configuration: (message: string, context?: ErrorContext) =>
    new DrillError(message, {
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.HIGH,
      context,
      recoverable: false,
    }),

  io: (message: string, cause?: unknown, context?: ErrorContext) =>
    new DrillError(message, {
      category: ErrorCategory.IO,
      severity: ErrorSeverity.CRITICAL,
      context,
      cause,
      recoverable: false,
    })
};
