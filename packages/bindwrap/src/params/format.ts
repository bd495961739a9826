/**
 * Debug formatting of parsed queries.
 *
 * Output is for logs only; bind parameters for actual execution.
 */

import type { BindValue, ParamValue, ParsedQuery, PlaceholderToken } from './types.js';
import { scanPlaceholders } from './scanner.js';
import { isArrayValue } from './parser.js';

/**
 * Escape a string value as a SQL literal
 */
export function escapeString(value: string): string {
  return "'" + value.replace(/'/g, "''") + "'";
}

function formatScalar(value: BindValue): string {
  if (value === null) {
    return 'NULL';
  }

  if (typeof value === 'string') {
    return escapeString(value);
  }

  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }

  if (value instanceof Uint8Array) {
    return `X'${Buffer.from(value).toString('hex')}'`;
  }

  if (value instanceof Date) {
    return escapeString(value.toISOString());
  }

  return String(value);
}

/**
 * Render a bound value as a SQL literal
 */
export function formatValue(value: ParamValue): string {
  if (isArrayValue(value)) {
    return value.map(formatScalar).join(', ');
  }
  return formatScalar(value);
}

/**
 * Inline bound values into a parsed query
 *
 * Placeholders without a binding are left in place.
 *
 * @example
 * ```typescript
 * formatBoundQuery(parseParams('SELECT * FROM t WHERE id IN(:id)', { 'id[i]': [1, 2] }));
 * // "SELECT * FROM t WHERE id IN(1,2)"
 * ```
 */
export function formatBoundQuery(parsed: ParsedQuery): string {
  const values = new Map<PlaceholderToken, ParamValue>();
  for (const binding of parsed.bindings) {
    values.set(binding.token, binding.value);
  }

  let result = '';
  let last = 0;
  let position = 0;

  for (const match of scanPlaceholders(parsed.query)) {
    const token: PlaceholderToken = match.kind === 'positional' ? ++position : `:${match.name ?? ''}`;
    const value = values.get(token);
    if (value === undefined) {
      continue;
    }
    result += parsed.query.slice(last, match.start) + formatValue(value);
    last = match.end;
  }

  return result + parsed.query.slice(last);
}
