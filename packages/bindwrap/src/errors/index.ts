/**
 * bindwrap Error Module
 *
 * @packageDocumentation
 */

// Base classes and types
export {
  BindWrapError,
  ErrorCategory,
  toError,
  type BindWrapErrorOptions,
  type ErrorContext,
  type SerializedError,
  type ErrorLogEntry,
} from './base.js';

// Error codes
export {
  BindingErrorCode,
  StatementErrorCode,
  ConfigErrorCode,
  getErrorCodeCategory,
  type BindWrapErrorCode,
} from './codes.js';

// Binding errors
export {
  BindingError,
  MalformedParameterNameError,
  TypeCoercionError,
  createEmptyArrayError,
  createNonFiniteNumberError,
  createBindRejectedError,
} from './binding-errors.js';

// Statement errors
export {
  StatementError,
  PrepareError,
  ExecuteError,
  createNotExecutedError,
  createInvalidColumnError,
} from './statement-errors.js';

export { ConfigError } from './config-errors.js';
