/**
 * bindwrap Error Code Enumerations
 *
 * Standardized error codes following the pattern: CATEGORY_SPECIFIC
 *
 * @packageDocumentation
 */

// =============================================================================
// Binding Error Codes
// =============================================================================

/**
 * Error codes for parameter parsing and binding
 */
export enum BindingErrorCode {
  /** Parameter key does not match the `[:]name[<x>|[x]]` grammar */
  MALFORMED_NAME = 'BIND_MALFORMED_NAME',
  /** Empty array under an array suffix (strict mode only) */
  EMPTY_ARRAY = 'BIND_EMPTY_ARRAY',
  /** Value cannot be converted to the declared bind type */
  INVALID_TYPE = 'BIND_INVALID_TYPE',
  /** Driver refused a bind instruction */
  REJECTED = 'BIND_REJECTED',
}

// =============================================================================
// Statement Error Codes
// =============================================================================

/**
 * Error codes for statement operations
 */
export enum StatementErrorCode {
  /** Driver could not prepare the query */
  PREPARE_FAILED = 'STMT_PREPARE',
  /** Statement execution failed */
  EXECUTION_ERROR = 'STMT_EXECUTION',
  /** Fetch called before a successful execute */
  NOT_EXECUTED = 'STMT_NOT_EXECUTED',
  /** Column index outside the result row */
  INVALID_COLUMN = 'STMT_INVALID_COLUMN',
}

// =============================================================================
// Config Error Codes
// =============================================================================

export enum ConfigErrorCode {
  INVALID = 'CONFIG_INVALID',
}

/**
 * Union of all error codes
 */
export type BindWrapErrorCode = BindingErrorCode | StatementErrorCode | ConfigErrorCode;

/**
 * Get the category prefix of an error code (e.g. 'BIND' for 'BIND_REJECTED')
 */
export function getErrorCodeCategory(code: string): string {
  const underscore = code.indexOf('_');
  return underscore === -1 ? code : code.slice(0, underscore);
}
