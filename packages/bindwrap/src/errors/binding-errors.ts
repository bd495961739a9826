/**
 * Binding Error Classes
 *
 * Errors raised while parsing parameter keys and binding values.
 *
 * @packageDocumentation
 */

import {
  BindWrapError,
  ErrorCategory,
  type BindWrapErrorOptions,
} from './base.js';
import { BindingErrorCode } from './codes.js';

// =============================================================================
// Binding Error
// =============================================================================

/**
 * Error thrown when parameter parsing or binding fails
 *
 * @example
 * ```typescript
 * try {
 *   parseParams('SELECT * FROM tbl WHERE id = :id', { 'id x': 1 });
 * } catch (error) {
 *   if (error instanceof BindingError) {
 *     console.log(error.code);  // 'BIND_MALFORMED_NAME'
 *   }
 * }
 * ```
 */
export class BindingError extends BindWrapError {
  readonly code: BindingErrorCode;
  readonly category = ErrorCategory.VALIDATION;

  constructor(code: BindingErrorCode, message: string, options?: BindWrapErrorOptions) {
    super(message, options);
    this.name = 'BindingError';
    this.code = code;

    this.setRecoveryHint();
  }

  private setRecoveryHint(): void {
    switch (this.code) {
      case BindingErrorCode.MALFORMED_NAME:
        this.recoveryHint =
          'Use [:]name with an optional <i>, <s>, <b>, [i], [s] or [b] suffix, where name contains only letters, digits and underscores';
        break;
      case BindingErrorCode.EMPTY_ARRAY:
        this.recoveryHint = 'Pass at least one element or skip the IN() condition when the list is empty';
        break;
      case BindingErrorCode.INVALID_TYPE:
        this.recoveryHint = 'Pass a value compatible with the declared type, or flatten arrays with a [x] suffix';
        break;
      case BindingErrorCode.REJECTED:
        this.recoveryHint = 'Check that the placeholder exists in the query and the driver supports its token form';
        break;
    }
  }

  toUserMessage(): string {
    switch (this.code) {
      case BindingErrorCode.MALFORMED_NAME:
        return 'A query parameter has an invalid name.';
      case BindingErrorCode.EMPTY_ARRAY:
        return 'A list parameter is empty.';
      case BindingErrorCode.INVALID_TYPE:
        return 'One of the parameters has an unsupported type.';
      default:
        return this.message;
    }
  }
}

// =============================================================================
// Malformed Parameter Name Error
// =============================================================================

/**
 * Error when a named parameter key does not match the key grammar
 */
export class MalformedParameterNameError extends BindingError {
  /** The offending key, as supplied by the caller */
  readonly parameterName: string;

  constructor(parameterName: string, options?: BindWrapErrorOptions) {
    super(BindingErrorCode.MALFORMED_NAME, `Invalid param name: ${parameterName}`, options);
    this.name = 'MalformedParameterNameError';
    this.parameterName = parameterName;
    this.context = { ...this.context, parameter: parameterName };
  }
}

// =============================================================================
// Type Coercion Error
// =============================================================================

/**
 * Error when a bound value cannot be converted to its declared type
 */
export class TypeCoercionError extends BindingError {
  /** Description of the value that could not be converted */
  readonly valueType: string;

  /** Declared bind type */
  readonly targetType: string;

  constructor(valueType: string, targetType: string, options?: BindWrapErrorOptions) {
    super(
      BindingErrorCode.INVALID_TYPE,
      `Cannot bind value of type ${valueType} as ${targetType}`,
      options
    );
    this.name = 'TypeCoercionError';
    this.valueType = valueType;
    this.targetType = targetType;
    this.context = { ...this.context, metadata: { valueType, targetType } };
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an error for an empty array under an array suffix
 *
 * @example
 * ```typescript
 * parseParams('SELECT * FROM tbl WHERE id IN(:id)', { 'id[i]': [] }, { strictArrays: true });
 * // throws: "Empty array for list parameter :id"
 * ```
 */
export function createEmptyArrayError(name: string): BindingError {
  return new BindingError(
    BindingErrorCode.EMPTY_ARRAY,
    `Empty array for list parameter :${name}`,
    { context: { parameter: `:${name}` } }
  );
}

/**
 * Create an error for a value that is not a finite number
 */
export function createNonFiniteNumberError(value: number, targetType: string): TypeCoercionError {
  return new TypeCoercionError(`non-finite number ${value}`, targetType);
}

/**
 * Create an error for a binding the driver refused
 */
export function createBindRejectedError(token: string | number, sql?: string): BindingError {
  return new BindingError(
    BindingErrorCode.REJECTED,
    `Driver rejected binding for ${String(token)}`,
    { context: { sql, parameter: String(token) } }
  );
}
