/**
 * Conversion of bound values to what SQLite stores
 */

import { ParamType, type BindValue, type ParamValue } from '../params/types.js';
import { isArrayValue } from '../params/parser.js';
import { TypeCoercionError, createNonFiniteNumberError } from '../errors/index.js';
import type { ResultValue } from './types.js';

/**
 * Values better-sqlite3 accepts for binding
 */
export type SqliteValue = string | number | bigint | Uint8Array | null;

const INTEGER_STRING_REGEX = /^[+-]?\d+$/;

function describe(value: BindValue): string {
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (value instanceof Date) return 'Date';
  return typeof value;
}

function toText(value: BindValue): SqliteValue {
  if (value === null || typeof value === 'string' || value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function parseIntegerString(value: string): number | bigint | undefined {
  const trimmed = value.trim();
  if (!INTEGER_STRING_REGEX.test(trimmed)) {
    return undefined;
  }
  const big = BigInt(trimmed);
  if (big > BigInt(Number.MAX_SAFE_INTEGER) || big < BigInt(Number.MIN_SAFE_INTEGER)) {
    return big;
  }
  return Number(big);
}

function toInteger(value: BindValue): SqliteValue {
  if (value === null || typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw createNonFiniteNumberError(value, ParamType.INTEGER);
    }
    return Math.trunc(value);
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const parsed = parseIntegerString(value);
    if (parsed === undefined) {
      throw new TypeCoercionError(`string '${value}'`, ParamType.INTEGER);
    }
    return parsed;
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  throw new TypeCoercionError(describe(value), ParamType.INTEGER);
}

function toBoolean(value: BindValue): SqliteValue {
  if (value === null) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'number') {
    return value !== 0 ? 1 : 0;
  }
  if (typeof value === 'bigint') {
    return value !== 0n ? 1 : 0;
  }
  if (typeof value === 'string') {
    // '' and '0' are false, like most loosely typed SQL clients
    return value === '' || value === '0' ? 0 : 1;
  }
  throw new TypeCoercionError(describe(value), ParamType.BOOLEAN);
}

/**
 * Convert a bound value to its SQLite representation
 *
 * - STRING: text; blobs pass through, booleans become '1'/'0'
 * - INTEGER: integer number, or bigint outside the safe range
 * - BOOLEAN: 1 or 0
 *
 * null is kept as NULL for every type.
 *
 * @throws TypeCoercionError for lists and values with no representation
 */
export function coerceValue(value: ParamValue, type: ParamType): SqliteValue {
  if (isArrayValue(value)) {
    throw new TypeCoercionError(`array(${value.length})`, type);
  }

  switch (type) {
    case ParamType.INTEGER:
      return toInteger(value);
    case ParamType.BOOLEAN:
      return toBoolean(value);
    case ParamType.STRING:
      return toText(value);
  }
}

/**
 * Narrow a value returned by better-sqlite3
 */
export function toResultValue(value: unknown): ResultValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  return value === undefined ? null : String(value);
}
