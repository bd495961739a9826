/**
 * Parameter parsing, query rewriting and debug formatting
 */

export {
  ParamType,
  type BindValue,
  type ParamValue,
  type PositionalParameters,
  type NamedParameters,
  type BindParameters,
  type PlaceholderToken,
  type BindInstruction,
  type ParsedQuery,
  type ParseOptions,
} from './types.js';

export {
  parseParams,
  parseParamKey,
  resolveParamType,
  isPositionalParameters,
  isArrayValue,
  type ParamKey,
} from './parser.js';

export {
  scanPlaceholders,
  replaceNamedPlaceholders,
  isWordChar,
  type PlaceholderKind,
  type PlaceholderMatch,
} from './scanner.js';

export { formatBoundQuery, formatValue, escapeString } from './format.js';
