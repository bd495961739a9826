/**
 * Factory for a BindWrap over SQLite
 */

import { BindWrap } from './wrap.js';
import { SqliteDriver } from './driver/sqlite.js';
import { resolveSqliteConfig, type SqliteConfigInput } from './config.js';
import { createLogger, type StructuredLogger } from './logging/index.js';

export interface OpenSqliteOptions extends SqliteConfigInput {
  logger?: StructuredLogger;
}

/**
 * Open a SQLite database and wrap it
 *
 * @param filename - database file, ':memory:' by default
 * @throws ConfigError when an option is invalid
 *
 * @example
 * ```typescript
 * const db = openSqlite(':memory:', resolveSqliteConfig(configFromEnv()));
 * db.getDriver().exec('CREATE TABLE tbl (id INT, name TEXT)');
 * db.execute('INSERT INTO tbl VALUES (:id, :name)', { 'id<i>': 1, name: 'Jon' }); // 1
 * ```
 */
export function openSqlite(filename = ':memory:', options: OpenSqliteOptions = {}): BindWrap<SqliteDriver> {
  const { logger, ...input } = options;
  const config = resolveSqliteConfig(input);
  const baseLogger = logger ?? createLogger();

  const driver = SqliteDriver.open(filename, {
    readonly: config.readonly,
    errorMode: config.errorMode,
    logger: baseLogger,
    logLevel: config.logLevel,
  });

  return new BindWrap(driver, {
    logLevel: config.logLevel,
    strictArrays: config.strictArrays,
    logger: baseLogger,
  });
}
