/**
 * Error classification for the swap engine.
 *
 * Every external boundary (RPC, discovery service, database) converts its
 * failures into one of these classes before they reach the orchestrator.
 * Messages and context must never carry custody secrets.
 */

import { logger } from '../utils/logger';

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  VALIDATION = 'ERROR_VALIDATION',
  NOT_FOUND = 'ERROR_NOT_FOUND',
  FORBIDDEN = 'ERROR_FORBIDDEN',
  NETWORK = 'ERROR_NETWORK',
  QUOTE = 'ERROR_QUOTE',
  BALANCE = 'ERROR_BALANCE',
  SUBMISSION = 'ERROR_SUBMISSION',
  STORAGE = 'ERROR_STORAGE',
  SYSTEM = 'ERROR_SYSTEM'
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class with category and context
 */
export class CategorizedError extends Error {
  public readonly category: ErrorCategory;
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: number;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    category: ErrorCategory,
    code: string,
    context: ErrorContext = {},
    isRetryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();
    this.isRetryable = isRetryable;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Converts error to JSON format for logging and responses
   */
  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
      timestamp: this.timestamp,
      isRetryable: this.isRetryable,
      stack: this.stack
    };
  }
}

/**
 * Malformed address, non-positive amount, bad private key format
 */
export class ValidationError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.VALIDATION, 'VALIDATION_ERROR', context, false);
  }
}

export class NotFoundError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}, code: string = 'NOT_FOUND') {
    super(message, ErrorCategory.NOT_FOUND, code, context, false);
  }
}

/**
 * No tradeable pool for a token pair, in either ordering
 */
export class NoPoolError extends NotFoundError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context, 'NO_POOL');
  }
}

/**
 * Resource exists but belongs to another user
 */
export class ForbiddenError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.FORBIDDEN, 'FORBIDDEN', context, false);
  }
}

/**
 * RPC endpoint or discovery service unreachable, or a call timed out
 */
export class NetworkError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.NETWORK, 'NETWORK_ERROR', context, true);
  }
}

export class QuoteUnavailableError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.QUOTE, 'QUOTE_UNAVAILABLE', context, true);
  }
}

export class InsufficientBalanceError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.BALANCE, 'INSUFFICIENT_BALANCE', context, false);
  }
}

/**
 * Signed transaction rejected by the network
 */
export class SubmissionError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.SUBMISSION, 'SUBMISSION_ERROR', context, true);
  }
}

/**
 * Address is not a contract exposing the ERC-20 read interface
 */
export class InvalidTokenError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.VALIDATION, 'INVALID_TOKEN', context, false);
  }
}

export class StorageError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCategory.STORAGE, 'STORAGE_ERROR', context, true);
  }
}

export class SystemError extends CategorizedError {
  constructor(message: string, context: ErrorContext = {}, isRetryable: boolean = false) {
    super(message, ErrorCategory.SYSTEM, 'SYSTEM_ERROR', context, isRetryable);
  }
}

/**
 * Extracts a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Logs error with full context
 * @param error - The error to log
 * @param context - Additional context
 */
export function logError(error: Error, context: ErrorContext = {}): void {
  const errorData = error instanceof CategorizedError ? error.toJSON() : {
    name: error.name,
    message: error.message,
    stack: error.stack
  };

  logger.error({
    error: errorData,
    context,
    timestamp: Date.now()
  }, 'Error logged');
}

/**
 * Classifies an unknown error into a categorized error
 * @param error - The error to classify
 * @returns Categorized error
 */
export function classifyError(error: unknown): CategorizedError {
  if (error instanceof CategorizedError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const message = err.message.toLowerCase();

  if (message.includes('timeout') || message.includes('timed out') || message.includes('econnrefused') || message.includes('fetch failed')) {
    return new NetworkError(err.message, { originalError: err.name });
  }

  if (message.includes('invalid') || message.includes('required')) {
    return new ValidationError(err.message, { originalError: err.name });
  }

  if (message.includes('insufficient funds')) {
    return new InsufficientBalanceError(err.message, { originalError: err.name });
  }

  return new SystemError(err.message, { originalError: err.name });
}
