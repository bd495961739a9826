/**
 * Statement Error Classes
 *
 * Errors raised by statement drivers while preparing or executing SQL.
 *
 * @packageDocumentation
 */

import {
  BindWrapError,
  ErrorCategory,
  type BindWrapErrorOptions,
} from './base.js';
import { StatementErrorCode } from './codes.js';

// =============================================================================
// Statement Error
// =============================================================================

/**
 * Error thrown when a statement cannot be prepared or executed
 *
 * @example
 * ```typescript
 * try {
 *   db.prepareBind('SELEC 1');
 * } catch (error) {
 *   if (error instanceof StatementError) {
 *     console.log(error.code);  // 'STMT_PREPARE'
 *     console.log(error.sql);   // 'SELEC 1'
 *   }
 * }
 * ```
 */
export class StatementError extends BindWrapError {
  readonly code: StatementErrorCode;
  readonly category = ErrorCategory.EXECUTION;

  /** SQL statement that caused the error */
  readonly sql?: string;

  constructor(
    code: StatementErrorCode,
    message: string,
    sql?: string,
    options?: BindWrapErrorOptions
  ) {
    super(message, options);
    this.name = 'StatementError';
    this.code = code;
    this.sql = sql;

    if (sql) {
      this.context = { ...this.context, sql };
    }

    switch (this.code) {
      case StatementErrorCode.PREPARE_FAILED:
        this.recoveryHint = 'Check the SQL syntax and that referenced tables exist';
        break;
      case StatementErrorCode.NOT_EXECUTED:
        this.recoveryHint = 'Call execute() before fetching rows';
        break;
    }
  }

  toUserMessage(): string {
    switch (this.code) {
      case StatementErrorCode.PREPARE_FAILED:
        return 'The SQL statement could not be prepared.';
      case StatementErrorCode.EXECUTION_ERROR:
        return 'The SQL statement failed to execute.';
      default:
        return this.message;
    }
  }
}

// =============================================================================
// Prepare Error
// =============================================================================

/**
 * Error when preparing a statement fails
 */
export class PrepareError extends StatementError {
  constructor(message: string, sql?: string, options?: BindWrapErrorOptions) {
    super(StatementErrorCode.PREPARE_FAILED, message, sql, options);
    this.name = 'PrepareError';
  }
}

// =============================================================================
// Execute Error
// =============================================================================

/**
 * Error when executing a statement fails
 */
export class ExecuteError extends StatementError {
  constructor(message: string, sql?: string, options?: BindWrapErrorOptions) {
    super(StatementErrorCode.EXECUTION_ERROR, message, sql, options);
    this.name = 'ExecuteError';
  }
}

/**
 * Create a StatementError for fetching from a statement that was never executed
 */
export function createNotExecutedError(sql?: string): StatementError {
  return new StatementError(
    StatementErrorCode.NOT_EXECUTED,
    'Statement must be executed before fetching',
    sql
  );
}

/**
 * Create a StatementError for a column index outside the result row
 */
export function createInvalidColumnError(column: number, sql?: string): StatementError {
  return new StatementError(
    StatementErrorCode.INVALID_COLUMN,
    `Invalid column index ${column}`,
    sql,
    { context: { metadata: { column } } }
  );
}
