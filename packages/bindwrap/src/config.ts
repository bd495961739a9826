/**
 * bindwrap Configuration
 *
 * Zod schemas for wrapper and SQLite options, plus loading from
 * BINDWRAP_* environment variables.
 */

import { z } from 'zod';

import { ConfigError } from './errors/index.js';
import { LOG_LEVELS } from './logging/index.js';

// =============================================================================
// Schemas
// =============================================================================

/**
 * Options of the wrapper itself
 */
export const BindWrapConfigSchema = z.object({
  /** Minimum level of the wrapper's logger; the logger's own level when unset */
  logLevel: z.enum(LOG_LEVELS).optional(),
  /** Reject empty lists under a [x] suffix */
  strictArrays: z.boolean().default(false),
});

export type BindWrapConfig = z.infer<typeof BindWrapConfigSchema>;
export type BindWrapConfigInput = z.input<typeof BindWrapConfigSchema>;

/**
 * Wrapper options plus those of the bundled SQLite driver
 */
export const SqliteConfigSchema = BindWrapConfigSchema.extend({
  /** How execute() reports failures */
  errorMode: z.enum(['silent', 'exception']).default('silent'),
  readonly: z.boolean().default(false),
});

export type SqliteConfig = z.infer<typeof SqliteConfigSchema>;
export type SqliteConfigInput = z.input<typeof SqliteConfigSchema>;

// =============================================================================
// Validation
// =============================================================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), { cause: result.error });
  }
  return result.data;
}

/**
 * Validate wrapper options and fill in defaults
 * @throws ConfigError when a value is invalid
 */
export function resolveConfig(input: unknown = {}): BindWrapConfig {
  return validate(BindWrapConfigSchema, input);
}

/**
 * Validate SQLite options and fill in defaults
 * @throws ConfigError when a value is invalid
 */
export function resolveSqliteConfig(input: unknown = {}): SqliteConfig {
  return validate(SqliteConfigSchema, input);
}

// =============================================================================
// Environment
// =============================================================================

export const ENV_VARS = {
  LOG_LEVEL: 'BINDWRAP_LOG_LEVEL',
  ERROR_MODE: 'BINDWRAP_ERROR_MODE',
  STRICT_ARRAYS: 'BINDWRAP_STRICT_ARRAYS',
} as const;

function parseFlag(value: string): boolean | string {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return value;
  }
}

/**
 * Read options from BINDWRAP_* environment variables.
 *
 * Unset variables are omitted so defaults apply; the result still needs
 * resolveConfig() / resolveSqliteConfig().
 *
 * @example
 * ```typescript
 * // BINDWRAP_ERROR_MODE=exception BINDWRAP_STRICT_ARRAYS=1
 * configFromEnv(); // { errorMode: 'exception', strictArrays: true }
 * ```
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const logLevel = env[ENV_VARS.LOG_LEVEL];
  if (logLevel) {
    config.logLevel = logLevel.trim().toLowerCase();
  }

  const errorMode = env[ENV_VARS.ERROR_MODE];
  if (errorMode) {
    config.errorMode = errorMode.trim().toLowerCase();
  }

  const strictArrays = env[ENV_VARS.STRICT_ARRAYS];
  if (strictArrays) {
    config.strictArrays = parseFlag(strictArrays);
  }

  return config;
}
