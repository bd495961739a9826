/**
 * SQLite Statement Driver
 *
 * Implements the driver contract on top of better-sqlite3. Bindings are
 * collected by bindValue() and handed to better-sqlite3 on execute():
 * numeric tokens by position, `:name` tokens by name.
 */

import BetterSqlite3 from 'better-sqlite3';

import type { ParamType, ParamValue, PlaceholderToken } from '../params/types.js';
import {
  BindWrapError,
  ExecuteError,
  PrepareError,
  createInvalidColumnError,
  createNotExecutedError,
  toError,
} from '../errors/index.js';
import { createLogger, type LogLevel, type StructuredLogger } from '../logging/index.js';
import { coerceValue, toResultValue, type SqliteValue } from './coerce.js';
import type {
  DriverStatement,
  ErrorMode,
  FetchMode,
  ResultValue,
  Row,
  StatementDriver,
} from './types.js';

// =============================================================================
// OPTIONS
// =============================================================================

export interface SqliteDriverOptions {
  /** How execute() reports failures (default: 'silent') */
  errorMode?: ErrorMode;

  logger?: StructuredLogger;

  /** Overrides the logger's level for driver entries */
  logLevel?: LogLevel;
}

export interface SqliteOpenOptions extends SqliteDriverOptions {
  /** Open the database file read-only */
  readonly?: boolean;
}

interface Binding {
  value: ParamValue;
  type: ParamType;
}

// =============================================================================
// STATEMENT
// =============================================================================

/**
 * Prepared statement backed by a better-sqlite3 Statement
 */
export class SqliteStatement implements DriverStatement {
  readonly query: string;

  private readonly stmt: BetterSqlite3.Statement<unknown[]>;
  private readonly errorMode: ErrorMode;
  private readonly logger: StructuredLogger;

  private readonly positional = new Map<number, Binding>();
  private readonly named = new Map<string, Binding>();

  private columnNames: string[] = [];
  private rows: ResultValue[][] | null = null;
  private cursor = 0;
  private changes = 0;
  private failure: BindWrapError | undefined;

  constructor(
    stmt: BetterSqlite3.Statement<unknown[]>,
    query: string,
    errorMode: ErrorMode,
    logger: StructuredLogger
  ) {
    this.stmt = stmt;
    this.query = query;
    this.errorMode = errorMode;
    this.logger = logger;
  }

  bindValue(token: PlaceholderToken, value: ParamValue, type: ParamType): boolean {
    if (typeof token === 'number') {
      if (!Number.isInteger(token) || token < 1) {
        return false;
      }
      this.positional.set(token, { value, type });
      return true;
    }

    const name = token.slice(1);
    if (name.length === 0) {
      return false;
    }
    this.named.set(name, { value, type });
    return true;
  }

  /**
   * Build the better-sqlite3 argument list: positional values in order,
   * then one object with the named values
   */
  private buildArguments(): unknown[] {
    const args: unknown[] = [];

    const positions = [...this.positional.keys()].sort((a, b) => a - b);
    for (const position of positions) {
      const binding = this.positional.get(position);
      if (binding) {
        args.push(coerceValue(binding.value, binding.type));
      }
    }

    if (this.named.size > 0) {
      const named: Record<string, SqliteValue> = {};
      for (const [name, binding] of this.named) {
        named[name] = coerceValue(binding.value, binding.type);
      }
      args.push(named);
    }

    return args;
  }

  execute(): boolean {
    this.rows = null;
    this.cursor = 0;
    this.changes = 0;

    try {
      const args = this.buildArguments();

      if (this.stmt.reader) {
        this.columnNames = this.stmt.columns().map(column => column.name);
        this.rows = this.stmt
          .raw(true)
          .all(...args)
          .map(row => (Array.isArray(row) ? row.map(toResultValue) : [toResultValue(row)]));
        this.changes = this.rows.length;
      } else {
        this.changes = this.stmt.run(...args).changes;
        this.rows = [];
      }

      this.failure = undefined;
      return true;
    } catch (error) {
      const failure =
        error instanceof BindWrapError
          ? error.withContext({ sql: this.query })
          : new ExecuteError(toError(error).message, this.query, { cause: error });
      this.failure = failure;

      if (this.errorMode === 'exception') {
        throw failure;
      }

      this.logger.warn('Statement execution failed', { sql: this.query, code: failure.code }, failure);
      return false;
    }
  }

  private shape(row: ResultValue[], mode: FetchMode, column: number): Row {
    switch (mode) {
      case 'num':
        return [...row];
      case 'column': {
        if (!Number.isInteger(column) || column < 0 || column >= row.length) {
          throw createInvalidColumnError(column, this.query);
        }
        return row[column];
      }
      case 'assoc': {
        const result: Record<string, ResultValue> = {};
        this.columnNames.forEach((name, index) => {
          result[name] = row[index] ?? null;
        });
        return result;
      }
      case 'both': {
        const result: Record<string | number, ResultValue> = {};
        row.forEach((value, index) => {
          result[index] = value;
        });
        this.columnNames.forEach((name, index) => {
          result[name] = row[index] ?? null;
        });
        return result;
      }
    }
  }

  private pending(): ResultValue[][] {
    if (this.rows === null) {
      throw createNotExecutedError(this.query);
    }
    return this.rows;
  }

  fetchAll(mode: FetchMode = 'assoc', column = 0): Row[] {
    const rows = this.pending();
    const remaining = rows.slice(this.cursor);
    this.cursor = rows.length;
    return remaining.map(row => this.shape(row, mode, column));
  }

  fetch(mode: FetchMode = 'assoc', column = 0): Row | false {
    const rows = this.pending();
    if (this.cursor >= rows.length) {
      return false;
    }
    return this.shape(rows[this.cursor++], mode, column);
  }

  rowCount(): number {
    return this.changes;
  }

  closeCursor(): boolean {
    this.rows = null;
    this.cursor = 0;
    return true;
  }

  /**
   * Error from the last failed execute(), if any
   */
  lastError(): BindWrapError | undefined {
    return this.failure;
  }
}

// =============================================================================
// DRIVER
// =============================================================================

/**
 * Statement driver over a better-sqlite3 database
 *
 * @example
 * ```typescript
 * const driver = SqliteDriver.open(':memory:');
 * driver.exec('CREATE TABLE tbl (id INT, name TEXT)');
 * const stmt = driver.prepare('INSERT INTO tbl VALUES (?, ?)');
 * stmt.bindValue(1, 1, ParamType.STRING);
 * stmt.bindValue(2, 'Jon', ParamType.STRING);
 * stmt.execute(); // true
 * ```
 */
export class SqliteDriver implements StatementDriver {
  readonly db: BetterSqlite3.Database;

  private readonly errorMode: ErrorMode;
  private readonly logger: StructuredLogger;

  constructor(db: BetterSqlite3.Database, options: SqliteDriverOptions = {}) {
    this.db = db;
    this.errorMode = options.errorMode ?? 'silent';
    this.logger = (options.logger ?? createLogger()).child({ driver: 'sqlite', database: db.name });
    if (options.logLevel) {
      this.logger.setLevel(options.logLevel);
    }
  }

  /**
   * Open a database file, or an in-memory database for ':memory:'
   */
  static open(filename = ':memory:', options: SqliteOpenOptions = {}): SqliteDriver {
    const { readonly, ...driverOptions } = options;
    return new SqliteDriver(new BetterSqlite3(filename, { readonly: readonly ?? false }), driverOptions);
  }

  /**
   * @throws PrepareError when SQLite rejects the query
   */
  prepare(query: string): SqliteStatement {
    let stmt: BetterSqlite3.Statement<unknown[]>;
    try {
      stmt = this.db.prepare(query);
    } catch (error) {
      throw new PrepareError(toError(error).message, query, { cause: error });
    }
    this.logger.debug('Prepared statement', { sql: query, reader: stmt.reader });
    return new SqliteStatement(stmt, query, this.errorMode, this.logger);
  }

  /**
   * Run one or more statements without parameters (schema scripts)
   */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  close(): void {
    this.db.close();
  }
}
