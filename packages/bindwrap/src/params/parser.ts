/**
 * Parameter Parsing for bindwrap
 *
 * Turns a query plus caller parameters into a rewritten query and an
 * ordered list of bind instructions.
 *
 * - Positional (`?`): array of values, each bound as a string
 * - Named (`:name`): keys may carry a type suffix, `<x>` for a single
 *   value or `[x]` for a list that is flattened into `:name0,:name1,...`
 *
 * Type letters: `i` integer, `b` boolean, anything else string.
 */

import {
  ParamType,
  type BindInstruction,
  type BindValue,
  type NamedParameters,
  type ParamValue,
  type BindParameters,
  type ParseOptions,
  type ParsedQuery,
  type PositionalParameters,
} from './types.js';
import { replaceNamedPlaceholders } from './scanner.js';
import { MalformedParameterNameError, createEmptyArrayError } from '../errors/index.js';

// =============================================================================
// KEY GRAMMAR
// =============================================================================

/**
 * `[:]name` followed by an optional `<x>` or `[x]` suffix, `x` being zero or
 * one word character
 */
const PARAM_KEY_REGEX = /^:?([A-Za-z0-9_]+)(<[A-Za-z0-9_]?>|\[[A-Za-z0-9_]?\])?$/;

/**
 * Parsed form of a named parameter key
 */
export interface ParamKey {
  /** Placeholder name without colon or suffix */
  name: string;

  /** Declared bind type */
  type: ParamType;

  /** Whether the suffix used square brackets */
  list: boolean;
}

/**
 * Map a suffix type letter to a bind type
 */
export function resolveParamType(letter: string | undefined): ParamType {
  switch (letter) {
    case 'i':
      return ParamType.INTEGER;
    case 'b':
      return ParamType.BOOLEAN;
    default:
      return ParamType.STRING;
  }
}

/**
 * Parse a named parameter key such as `:ids[i]`
 *
 * @throws MalformedParameterNameError when the key does not match the grammar
 *
 * @example
 * ```typescript
 * parseParamKey(':ids[i]'); // { name: 'ids', type: ParamType.INTEGER, list: true }
 * parseParamKey('name<>');  // { name: 'name', type: ParamType.STRING, list: false }
 * ```
 */
export function parseParamKey(key: string): ParamKey {
  const match = PARAM_KEY_REGEX.exec(key);
  if (!match) {
    throw new MalformedParameterNameError(key);
  }

  const suffix = match[2];
  return {
    name: match[1],
    // suffix is '<x>' / '[x]' / '<>' / '[]'; the letter sits between the brackets
    type: resolveParamType(suffix && suffix.length === 3 ? suffix[1] : undefined),
    list: suffix !== undefined && suffix.startsWith('['),
  };
}

// =============================================================================
// PARAMETER SHAPES
// =============================================================================

/**
 * Check if parameters are positional (array) rather than named
 */
export function isPositionalParameters(params: BindParameters): params is PositionalParameters {
  return Array.isArray(params);
}

/**
 * Check if a parameter value is a list
 */
export function isArrayValue(value: ParamValue): value is readonly BindValue[] {
  return Array.isArray(value);
}

function isMapParameters(params: NamedParameters): params is ReadonlyMap<string, ParamValue> {
  return params instanceof Map;
}

function namedEntries(params: NamedParameters): Iterable<[string, ParamValue]> {
  return isMapParameters(params) ? params.entries() : Object.entries(params);
}

function hasEntries(params: BindParameters): boolean {
  if (isPositionalParameters(params)) {
    return params.length > 0;
  }
  return isMapParameters(params) ? params.size > 0 : Object.keys(params).length > 0;
}

// =============================================================================
// PARSING
// =============================================================================

function parsePositional(params: PositionalParameters): BindInstruction[] {
  const bindings: BindInstruction[] = [];
  // forEach skips holes, so sparse lists keep their 1-based positions
  params.forEach((value, index) => {
    bindings.push({ token: index + 1, value, type: ParamType.STRING });
  });
  return bindings;
}

function parseNamed(
  query: string,
  params: NamedParameters,
  options: ParseOptions
): ParsedQuery {
  const bindings: BindInstruction[] = [];
  const replacements = new Map<string, string>();

  for (const [key, value] of namedEntries(params)) {
    const { name, type, list } = parseParamKey(key);

    if (list && isArrayValue(value)) {
      if (value.length === 0) {
        if (options.strictArrays) {
          throw createEmptyArrayError(name);
        }
        // Left as a single binding; the driver reports the mismatch
        bindings.push({ token: `:${name}`, value, type });
        continue;
      }

      const tokens: string[] = [];
      value.forEach((element, index) => {
        const token = `:${name}${index}` as const;
        bindings.push({ token, value: element, type });
        tokens.push(token);
      });

      // First list registered for a name wins, later ones only add bindings
      if (!replacements.has(name)) {
        replacements.set(name, tokens.join(','));
      }
      continue;
    }

    bindings.push({ token: `:${name}`, value, type });
  }

  return {
    query: replaceNamedPlaceholders(query, replacements),
    bindings,
  };
}

/**
 * Parse parameters against a query
 *
 * Positional parameters keep the query as is and bind every value as a
 * string. Named parameters are typed from their key suffix, and lists under
 * a `[x]` suffix are expanded in the query.
 *
 * @param query - SQL with `?` or `:name` placeholders
 * @param params - values for the placeholders
 * @returns rewritten query and bind instructions
 * @throws MalformedParameterNameError for a named key outside the grammar
 *
 * @example
 * ```typescript
 * parseParams('SELECT col FROM tbl WHERE id IN(:id)', { ':id[i]': [5, 15] });
 * // {
 * //   query: 'SELECT col FROM tbl WHERE id IN(:id0,:id1)',
 * //   bindings: [
 * //     { token: ':id0', value: 5, type: ParamType.INTEGER },
 * //     { token: ':id1', value: 15, type: ParamType.INTEGER },
 * //   ],
 * // }
 * ```
 */
export function parseParams(
  query: string,
  params?: BindParameters | null,
  options: ParseOptions = {}
): ParsedQuery {
  if (!params || !hasEntries(params)) {
    return { query, bindings: [] };
  }

  if (isPositionalParameters(params)) {
    return { query, bindings: parsePositional(params) };
  }

  return parseNamed(query, params, options);
}
