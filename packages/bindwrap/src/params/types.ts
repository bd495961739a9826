/**
 * Parameter Types for bindwrap
 */

// =============================================================================
// BIND VALUES
// =============================================================================

/**
 * Scalar values accepted for binding
 */
export type BindValue = string | number | bigint | boolean | null | Uint8Array | Date;

/**
 * A named parameter value: a scalar, or a list to flatten under a `[x]` suffix
 */
export type ParamValue = BindValue | readonly BindValue[];

/**
 * Positional parameters for `?` placeholders, bound in order
 */
export type PositionalParameters = readonly BindValue[];

/**
 * Named parameters for `:name` placeholders.
 *
 * Keys follow `[:]name[suffix]`, e.g. `id`, `:id`, `id<i>`, `:ids[i]`.
 * Use a Map when keys could look like array indices, since plain objects
 * list integer-like keys first.
 */
export type NamedParameters =
  | Readonly<Record<string, ParamValue>>
  | ReadonlyMap<string, ParamValue>;

/**
 * Parameters accepted by the parser: an array selects positional mode,
 * anything else named mode
 */
export type BindParameters = PositionalParameters | NamedParameters;

// =============================================================================
// BIND TYPES
// =============================================================================

/**
 * Declared type of a bound value
 */
export enum ParamType {
  STRING = 'string',
  INTEGER = 'integer',
  BOOLEAN = 'boolean',
}

/**
 * Placeholder token: 1-based position or `:name`
 */
export type PlaceholderToken = number | `:${string}`;

/**
 * One resolved binding, ready for a statement's bindValue()
 */
export interface BindInstruction {
  token: PlaceholderToken;
  value: ParamValue;
  type: ParamType;
}

/**
 * Result of parsing a query against its parameters
 */
export interface ParsedQuery {
  /** Query with list placeholders expanded */
  query: string;

  /** Bind instructions in parameter order */
  bindings: BindInstruction[];
}

/**
 * Options controlling the parser
 */
export interface ParseOptions {
  /**
   * Reject empty arrays under a `[x]` suffix instead of binding them
   * as a single value (default: false)
   */
  strictArrays?: boolean;
}
