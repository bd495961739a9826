/**
 * bindwrap - typed parameter binding and list expansion for prepared statements
 *
 * @packageDocumentation
 */

export { BindWrap, type BindWrapOptions } from './wrap.js';
export { openSqlite, type OpenSqliteOptions } from './database.js';

export * from './params/index.js';

export type {
  StatementDriver,
  DriverStatement,
  FetchMode,
  ErrorMode,
  ResultValue,
  AssocRow,
  NumRow,
  BothRow,
  Row,
} from './driver/types.js';
export {
  SqliteDriver,
  SqliteStatement,
  type SqliteDriverOptions,
  type SqliteOpenOptions,
} from './driver/sqlite.js';
export { coerceValue, type SqliteValue } from './driver/coerce.js';

export {
  BindWrapConfigSchema,
  SqliteConfigSchema,
  resolveConfig,
  resolveSqliteConfig,
  configFromEnv,
  ENV_VARS,
  type BindWrapConfig,
  type BindWrapConfigInput,
  type SqliteConfig,
  type SqliteConfigInput,
} from './config.js';

export * from './errors/index.js';

export {
  createLogger,
  ConsoleSink,
  JsonSink,
  NoOpSink,
  type LogEntry,
  type LogSink,
  type LoggerConfig,
  type StructuredLogger,
} from './logging/index.js';
export type { LogLevel } from './logging/index.js';
