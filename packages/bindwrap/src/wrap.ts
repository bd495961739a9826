/**
 * BindWrap: typed parameter binding in front of a statement driver
 *
 * @example
 * ```typescript
 * const db = new BindWrap(SqliteDriver.open());
 *
 * db.execute('INSERT INTO tbl (id, name) VALUES (?, ?), (?, ?)', [3, 'Romeo', 4, 'Juliette']); // 2
 * db.fetchAll('SELECT name FROM tbl WHERE id IN(:ids)', { 'ids[i]': [3, 4] }, 'column');
 * // ['Romeo', 'Juliette']
 * ```
 */

import { parseParams } from './params/parser.js';
import { formatBoundQuery } from './params/format.js';
import type { BindParameters, ParsedQuery } from './params/types.js';
import type {
  AssocRow,
  BothRow,
  DriverStatement,
  FetchMode,
  NumRow,
  ResultValue,
  Row,
  StatementDriver,
} from './driver/types.js';
import { resolveConfig, type BindWrapConfig, type BindWrapConfigInput } from './config.js';
import { createBindRejectedError } from './errors/index.js';
import { compareLogLevels, createLogger, type StructuredLogger } from './logging/index.js';

export interface BindWrapOptions extends BindWrapConfigInput {
  logger?: StructuredLogger;
}

/**
 * Wraps a statement driver with typed parameter parsing and list expansion
 */
export class BindWrap<D extends StatementDriver = StatementDriver> {
  private readonly driver: D;
  private readonly config: BindWrapConfig;
  private readonly logger: StructuredLogger;

  /**
   * @throws ConfigError when an option is invalid
   */
  constructor(driver: D, options: BindWrapOptions = {}) {
    const { logger, ...input } = options;
    this.driver = driver;
    this.config = resolveConfig(input);
    this.logger = (logger ?? createLogger()).child({ component: 'bindwrap' });
    if (this.config.logLevel) {
      this.logger.setLevel(this.config.logLevel);
    }
  }

  getDriver(): D {
    return this.driver;
  }

  /**
   * Parse parameters with this wrapper's options
   * @see parseParams
   */
  parse(query: string, params?: BindParameters | null): ParsedQuery {
    return parseParams(query, params, { strictArrays: this.config.strictArrays });
  }

  /**
   * Prepare the rewritten query and bind every parameter.
   *
   * The statement is returned unexecuted; the caller owns it.
   *
   * @throws MalformedParameterNameError for a named key outside the grammar
   * @throws BindingError when the driver rejects a binding
   * @throws whatever the driver's prepare() throws
   */
  prepareBind(query: string, params?: BindParameters | null): DriverStatement {
    const parsed = this.parse(query, params);

    const stmt = this.driver.prepare(parsed.query);
    for (const { token, value, type } of parsed.bindings) {
      if (!stmt.bindValue(token, value, type)) {
        throw createBindRejectedError(token, parsed.query);
      }
    }

    if (compareLogLevels(this.logger.getLevel(), 'debug') <= 0) {
      this.logger.debug('Bound statement', {
        sql: parsed.query,
        bindings: parsed.bindings.length,
        bound: formatBoundQuery(parsed),
      });
    }

    return stmt;
  }

  /**
   * Prepare, bind and execute a data-modifying query
   * @returns affected row count, or false when execution failed
   */
  execute(query: string, params?: BindParameters | null): number | false {
    const stmt = this.prepareBind(query, params);
    return stmt.execute() ? stmt.rowCount() : false;
  }

  /**
   * Prepare, bind, execute and fetch every row
   * @returns rows, or false when execution failed
   */
  fetchAll(query: string, params?: BindParameters | null, mode?: 'assoc'): AssocRow[] | false;
  fetchAll(query: string, params: BindParameters | null | undefined, mode: 'num'): NumRow[] | false;
  fetchAll(query: string, params: BindParameters | null | undefined, mode: 'both'): BothRow[] | false;
  fetchAll(
    query: string,
    params: BindParameters | null | undefined,
    mode: 'column',
    column?: number
  ): ResultValue[] | false;
  fetchAll(
    query: string,
    params?: BindParameters | null,
    mode?: FetchMode,
    column?: number
  ): Row[] | false {
    const stmt = this.prepareBind(query, params);
    return stmt.execute() ? stmt.fetchAll(mode, column) : false;
  }

  /**
   * Prepare, bind, execute and fetch the first row, then close the cursor
   * @returns the row, or false when execution failed or returned no rows
   */
  fetchOne(query: string, params?: BindParameters | null, mode?: 'assoc'): AssocRow | false;
  fetchOne(query: string, params: BindParameters | null | undefined, mode: 'num'): NumRow | false;
  fetchOne(query: string, params: BindParameters | null | undefined, mode: 'both'): BothRow | false;
  fetchOne(
    query: string,
    params: BindParameters | null | undefined,
    mode: 'column',
    column?: number
  ): ResultValue | false;
  fetchOne(
    query: string,
    params?: BindParameters | null,
    mode?: FetchMode,
    column?: number
  ): Row | false {
    const stmt = this.prepareBind(query, params);
    if (!stmt.execute()) {
      return false;
    }
    const row = stmt.fetch(mode, column);
    stmt.closeCursor();
    return row;
  }
}
