/**
 * bindwrap Error Hierarchy
 *
 * All errors extend BindWrapError which provides:
 * - Required error codes
 * - Timestamps
 * - Context preservation
 * - Serialization for logs and API responses
 * - Recovery hints
 *
 * @packageDocumentation
 */

import { getErrorCodeCategory } from './codes.js';

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** SQL statement that caused the error */
  sql?: string;
  /** Parameter key or placeholder token involved */
  parameter?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  /** Error class name */
  name: string;
  /** Machine-readable error code */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Timestamp when error occurred */
  timestamp: number;
  context?: ErrorContext;
  /** Stack trace (optional, may be omitted in production) */
  stack?: string;
  /** Serialized cause error */
  cause?: SerializedError;
}

/**
 * Log entry format for structured logging
 */
export interface ErrorLogEntry {
  level: 'error' | 'warn';
  /** ISO timestamp */
  timestamp: string;
  error: {
    name: string;
    code: string;
    message: string;
    stack?: string;
  };
  metadata: Record<string, unknown>;
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories for consistent handling by callers
 */
export enum ErrorCategory {
  /** Query execution errors */
  EXECUTION = 'EXECUTION',
  /** Input validation errors */
  VALIDATION = 'VALIDATION',
}

export interface BindWrapErrorOptions {
  cause?: unknown;
  context?: ErrorContext;
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for all bindwrap errors
 *
 * @example
 * ```typescript
 * try {
 *   db.execute('DELETE FROM tbl WHERE id IN(:ids)', { 'ids{i}': [1, 2] });
 * } catch (error) {
 *   if (error instanceof BindWrapError) {
 *     console.log(error.code);             // 'BIND_MALFORMED_NAME'
 *     logger.error(error.message, error, error.toLogEntry().metadata);
 *   }
 * }
 * ```
 */
export abstract class BindWrapError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  abstract readonly category: ErrorCategory;

  readonly timestamp: number;

  context?: ErrorContext;

  /** Recovery hint for developers */
  recoveryHint?: string;

  constructor(message: string, options?: BindWrapErrorOptions) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get a user-friendly error message
   * Override in subclasses for specific messages
   */
  toUserMessage(): string {
    return this.message;
  }

  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.context) {
      result.context = this.context;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause instanceof BindWrapError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        code: 'UNKNOWN',
        message: this.cause.message,
        timestamp: this.timestamp,
        stack: this.cause.stack,
      };
    }

    return result;
  }

  /**
   * Format error for structured logging
   */
  toLogEntry(): ErrorLogEntry {
    return {
      level: 'error',
      timestamp: new Date(this.timestamp).toISOString(),
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        stack: this.stack,
      },
      metadata: {
        category: this.category,
        codePrefix: getErrorCodeCategory(this.code),
        recoveryHint: this.recoveryHint,
        ...this.context,
      },
    };
  }

  /**
   * Merge additional context into the error
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  withRecoveryHint(hint: string): this {
    this.recoveryHint = hint;
    return this;
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
