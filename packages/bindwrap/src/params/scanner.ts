/**
 * Placeholder Scanner
 *
 * Finds `?` and `:name` placeholders in SQL text, skipping quoted strings,
 * quoted identifiers, comments and `::` type casts.
 */

// =============================================================================
// TOKEN TYPES
// =============================================================================

export type PlaceholderKind = 'positional' | 'named';

/**
 * A placeholder found in SQL text
 */
export interface PlaceholderMatch {
  kind: PlaceholderKind;

  /** Original text, e.g. '?' or ':name' */
  text: string;

  /** Name without the colon (named placeholders only) */
  name?: string;

  /** Start offset in the SQL string */
  start: number;

  /** End offset (exclusive) */
  end: number;
}

// =============================================================================
// CHARACTER CLASSES
// =============================================================================

const WORD_CHAR = /[A-Za-z0-9_]/;

/**
 * Letters, digits and underscore
 */
export function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char);
}

const QUOTE_CHARS = new Set(["'", '"', '`']);

// =============================================================================
// SCANNING
// =============================================================================

/**
 * Skip a quoted section starting at `start`; doubled quotes are escapes.
 * Returns the offset just past the closing quote, or the end of input.
 */
function skipQuoted(sql: string, start: number): number {
  const quote = sql[start];
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return i;
}

function skipLineComment(sql: string, start: number): number {
  const newline = sql.indexOf('\n', start);
  return newline === -1 ? sql.length : newline;
}

function skipBlockComment(sql: string, start: number): number {
  const close = sql.indexOf('*/', start + 2);
  return close === -1 ? sql.length : close + 2;
}

/**
 * Scan a SQL string for placeholders
 *
 * @example
 * ```typescript
 * scanPlaceholders("SELECT ':no' FROM t WHERE id = :id AND x = ?");
 * // [
 * //   { kind: 'named', text: ':id', name: 'id', start: 31, end: 34 },
 * //   { kind: 'positional', text: '?', start: 43, end: 44 }
 * // ]
 * ```
 */
export function scanPlaceholders(sql: string): PlaceholderMatch[] {
  const matches: PlaceholderMatch[] = [];
  let i = 0;

  while (i < sql.length) {
    const char = sql[i];

    if (QUOTE_CHARS.has(char)) {
      i = skipQuoted(sql, i);
      continue;
    }

    if (char === '-' && sql[i + 1] === '-') {
      i = skipLineComment(sql, i);
      continue;
    }

    if (char === '/' && sql[i + 1] === '*') {
      i = skipBlockComment(sql, i);
      continue;
    }

    if (char === '?') {
      matches.push({ kind: 'positional', text: '?', start: i, end: i + 1 });
      i++;
      continue;
    }

    if (char === ':') {
      // PostgreSQL cast (value::text) is not a placeholder
      if (sql[i + 1] === ':') {
        i += 2;
        while (isWordChar(sql[i])) {
          i++;
        }
        continue;
      }

      let end = i + 1;
      while (isWordChar(sql[end])) {
        end++;
      }
      if (end > i + 1) {
        const text = sql.slice(i, end);
        matches.push({ kind: 'named', text, name: text.slice(1), start: i, end });
        i = end;
        continue;
      }
    }

    i++;
  }

  return matches;
}

/**
 * Replace whole named placeholders in one pass.
 *
 * Only placeholders present in the original SQL are replaced, so text
 * inserted for one name is never matched again for another.
 *
 * @param sql - SQL text
 * @param replacements - placeholder name (without colon) to replacement text
 */
export function replaceNamedPlaceholders(
  sql: string,
  replacements: ReadonlyMap<string, string>
): string {
  if (replacements.size === 0) {
    return sql;
  }

  let result = '';
  let last = 0;

  for (const match of scanPlaceholders(sql)) {
    if (match.kind !== 'named' || match.name === undefined) {
      continue;
    }
    const replacement = replacements.get(match.name);
    if (replacement === undefined) {
      continue;
    }
    result += sql.slice(last, match.start) + replacement;
    last = match.end;
  }

  return result + sql.slice(last);
}
