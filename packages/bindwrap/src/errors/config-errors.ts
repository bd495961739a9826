/**
 * Configuration Error Classes
 *
 * @packageDocumentation
 */

import { BindWrapError, ErrorCategory, type BindWrapErrorOptions } from './base.js';
import { ConfigErrorCode } from './codes.js';

/**
 * Error when configuration values fail validation
 */
export class ConfigError extends BindWrapError {
  readonly code = ConfigErrorCode.INVALID;
  readonly category = ErrorCategory.VALIDATION;

  /** Validation issues, one line per offending field */
  readonly issues: string[];

  constructor(issues: string[], options?: BindWrapErrorOptions) {
    super(`Invalid configuration: ${issues.join('; ')}`, options);
    this.name = 'ConfigError';
    this.issues = issues;
    this.recoveryHint = 'Check the option values and BINDWRAP_* environment variables';
  }
}
