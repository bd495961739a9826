/**
 * SQLite driver tests against an in-memory database
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { SqliteDriver, SqliteStatement } from './sqlite.js';
import { ParamType } from '../params/types.js';
import {
  ExecuteError,
  PrepareError,
  StatementError,
  StatementErrorCode,
  TypeCoercionError,
} from '../errors/index.js';
import { createLogger, type LogEntry, type LogSink } from '../logging/index.js';

describe('SqliteDriver', () => {
  let logs: LogEntry[];
  let sink: LogSink;
  let driver: SqliteDriver;

  beforeEach(() => {
    logs = [];
    sink = {
      write(entry) {
        logs.push(entry);
      },
    };
    driver = SqliteDriver.open(':memory:', { logger: createLogger({ sink, level: 'debug' }) });
    driver.exec('CREATE TABLE tbl (id INT UNSIGNED, name VARCHAR(255))');
    driver.exec("INSERT INTO tbl (id, name) VALUES (1, 'Jon'), (2, 'Mary')");
  });

  afterEach(() => {
    driver.close();
  });

  // ===========================================================================
  // Prepare
  // ===========================================================================

  describe('prepare', () => {
    it('should return an unexecuted statement', () => {
      const stmt = driver.prepare('SELECT id FROM tbl');

      expect(stmt).toBeInstanceOf(SqliteStatement);
      expect(stmt.query).toBe('SELECT id FROM tbl');
      expect(() => stmt.fetch()).toThrow('Statement must be executed before fetching');
    });

    it('should log prepared statements at debug level', () => {
      driver.prepare('SELECT id FROM tbl');

      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        level: 'debug',
        message: 'Prepared statement',
        context: { driver: 'sqlite', sql: 'SELECT id FROM tbl', reader: true },
      });
    });

    it('should wrap syntax errors in PrepareError', () => {
      try {
        driver.prepare('SELEC 1');
        expect.unreachable('prepare should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(PrepareError);
        if (error instanceof PrepareError) {
          expect(error.code).toBe(StatementErrorCode.PREPARE_FAILED);
          expect(error.sql).toBe('SELEC 1');
          expect(error.cause).toBeInstanceOf(Error);
        }
      }
    });

    it('should reject unknown tables at prepare time', () => {
      expect(() => driver.prepare('SELECT * FROM missing')).toThrow(PrepareError);
    });
  });

  // ===========================================================================
  // Binding
  // ===========================================================================

  describe('bindValue', () => {
    it('should refuse positions below 1 and fractional positions', () => {
      const stmt = driver.prepare('SELECT ?');

      expect(stmt.bindValue(0, 1, ParamType.STRING)).toBe(false);
      expect(stmt.bindValue(1.5, 1, ParamType.STRING)).toBe(false);
      expect(stmt.bindValue(1, 1, ParamType.STRING)).toBe(true);
    });

    it('should refuse an empty name', () => {
      const stmt = driver.prepare('SELECT :a');

      expect(stmt.bindValue(':', 1, ParamType.STRING)).toBe(false);
      expect(stmt.bindValue(':a', 1, ParamType.STRING)).toBe(true);
    });

    it('should bind positional values as text', () => {
      const stmt = driver.prepare('SELECT ? AS v');
      stmt.bindValue(1, 5, ParamType.STRING);

      expect(stmt.execute()).toBe(true);
      expect(stmt.fetch('column')).toBe('5');
    });

    it('should bind positional values in position order', () => {
      const stmt = driver.prepare('SELECT ? AS a, ? AS b');
      stmt.bindValue(2, 'second', ParamType.STRING);
      stmt.bindValue(1, 'first', ParamType.STRING);

      expect(stmt.execute()).toBe(true);
      expect(stmt.fetch()).toEqual({ a: 'first', b: 'second' });
    });

    it('should coerce named values to their declared type', () => {
      const stmt = driver.prepare('SELECT :n AS n, :f AS f, :s AS s, :z AS z');
      stmt.bindValue(':n', '42', ParamType.INTEGER);
      stmt.bindValue(':f', true, ParamType.BOOLEAN);
      stmt.bindValue(':s', 7, ParamType.STRING);
      stmt.bindValue(':z', null, ParamType.BOOLEAN);

      expect(stmt.execute()).toBe(true);
      expect(stmt.fetch()).toEqual({ n: 42, f: 1, s: '7', z: null });
    });

    it('should keep the last value bound to a token', () => {
      const stmt = driver.prepare('SELECT :a AS a');
      stmt.bindValue(':a', 'old', ParamType.STRING);
      stmt.bindValue(':a', 'new', ParamType.STRING);

      stmt.execute();
      expect(stmt.fetch('column')).toBe('new');
    });

    it('should return blobs as bytes', () => {
      const stmt = driver.prepare('SELECT :b AS b');
      stmt.bindValue(':b', new Uint8Array([1, 2, 3]), ParamType.STRING);

      stmt.execute();
      const value = stmt.fetch('column');
      expect(value).toBeInstanceOf(Uint8Array);
      expect(value instanceof Uint8Array ? [...value] : []).toEqual([1, 2, 3]);
    });
  });

  // ===========================================================================
  // Execute
  // ===========================================================================

  describe('execute', () => {
    it('should report changed rows for writes', () => {
      const stmt = driver.prepare('UPDATE tbl SET name = :name WHERE id <= :id');
      stmt.bindValue(':name', 'X', ParamType.STRING);
      stmt.bindValue(':id', 2, ParamType.INTEGER);

      expect(stmt.execute()).toBe(true);
      expect(stmt.rowCount()).toBe(2);
      expect(stmt.fetchAll()).toEqual([]);
    });

    it('should report buffered rows for reads', () => {
      const stmt = driver.prepare('SELECT id FROM tbl');

      expect(stmt.execute()).toBe(true);
      expect(stmt.rowCount()).toBe(2);
    });

    it('should return false and keep the error in silent mode', () => {
      const stmt = driver.prepare('INSERT INTO tbl (id, name) VALUES (:id, :name)');
      stmt.bindValue(':id', 3, ParamType.INTEGER);

      expect(stmt.execute()).toBe(false);

      const failure = stmt.lastError();
      expect(failure).toBeInstanceOf(ExecuteError);
      expect(failure?.code).toBe(StatementErrorCode.EXECUTION_ERROR);
      expect(failure?.context?.sql).toBe('INSERT INTO tbl (id, name) VALUES (:id, :name)');
      expect(failure?.cause).toBeInstanceOf(Error);
    });

    it('should log silent failures as warnings', () => {
      const stmt = driver.prepare('INSERT INTO tbl (id, name) VALUES (:id, :name)');
      stmt.execute();

      const warnings = logs.filter(entry => entry.level === 'warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({
        message: 'Statement execution failed',
        context: {
          driver: 'sqlite',
          sql: 'INSERT INTO tbl (id, name) VALUES (:id, :name)',
          code: 'STMT_EXECUTION',
        },
        error: { name: 'ExecuteError', code: 'STMT_EXECUTION' },
      });
    });

    it('should drop warnings below its own logLevel', () => {
      const quiet = new SqliteDriver(driver.db, {
        logger: createLogger({ sink, level: 'debug' }),
        logLevel: 'error',
      });

      expect(quiet.prepare('INSERT INTO tbl (id, name) VALUES (:id, :name)').execute()).toBe(false);
      expect(logs).toEqual([]);
    });

    it('should throw in exception mode', () => {
      const strict = new SqliteDriver(driver.db, {
        errorMode: 'exception',
        logger: createLogger({ sink, level: 'debug' }),
      });
      const stmt = strict.prepare('INSERT INTO tbl (id, name) VALUES (:id, :name)');

      expect(() => stmt.execute()).toThrow(ExecuteError);
      expect(stmt.lastError()).toBeInstanceOf(ExecuteError);
      expect(logs.filter(entry => entry.level === 'warn')).toHaveLength(0);
    });

    it('should report coercion failures with the query attached', () => {
      const stmt = driver.prepare('SELECT * FROM tbl WHERE id = :id');
      stmt.bindValue(':id', 'abc', ParamType.INTEGER);

      expect(stmt.execute()).toBe(false);

      const failure = stmt.lastError();
      expect(failure).toBeInstanceOf(TypeCoercionError);
      expect(failure?.context).toEqual({
        metadata: { valueType: "string 'abc'", targetType: 'integer' },
        sql: 'SELECT * FROM tbl WHERE id = :id',
      });
    });

    it('should reject a list left unflattened', () => {
      const stmt = driver.prepare('SELECT * FROM tbl WHERE id IN(:id)');
      stmt.bindValue(':id', [], ParamType.INTEGER);

      expect(stmt.execute()).toBe(false);
      expect(stmt.lastError()?.message).toBe('Cannot bind value of type array(0) as integer');
    });

    it('should clear the last error after a successful run', () => {
      const stmt = driver.prepare('SELECT * FROM tbl WHERE id = :id');
      stmt.bindValue(':id', 'abc', ParamType.INTEGER);
      stmt.execute();
      stmt.bindValue(':id', 1, ParamType.INTEGER);

      expect(stmt.execute()).toBe(true);
      expect(stmt.lastError()).toBeUndefined();
    });
  });

  // ===========================================================================
  // Fetch
  // ===========================================================================

  describe('fetch', () => {
    let stmt: SqliteStatement;

    beforeEach(() => {
      stmt = driver.prepare('SELECT id, name FROM tbl ORDER BY id');
      stmt.execute();
    });

    it('should fetch associative rows by default', () => {
      expect(stmt.fetchAll()).toEqual([
        { id: 1, name: 'Jon' },
        { id: 2, name: 'Mary' },
      ]);
    });

    it('should fetch numeric rows', () => {
      expect(stmt.fetchAll('num')).toEqual([
        [1, 'Jon'],
        [2, 'Mary'],
      ]);
    });

    it('should fetch rows keyed by index and by name', () => {
      expect(stmt.fetchAll('both')).toEqual([
        { 0: 1, 1: 'Jon', id: 1, name: 'Jon' },
        { 0: 2, 1: 'Mary', id: 2, name: 'Mary' },
      ]);
    });

    it('should fetch a single column', () => {
      expect(stmt.fetchAll('column')).toEqual([1, 2]);
    });

    it('should fetch a column by index', () => {
      expect(stmt.fetchAll('column', 1)).toEqual(['Jon', 'Mary']);
    });

    it('should reject a column outside the row', () => {
      try {
        stmt.fetch('column', 2);
        expect.unreachable('fetch should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(StatementError);
        if (error instanceof StatementError) {
          expect(error.code).toBe(StatementErrorCode.INVALID_COLUMN);
          expect(error.message).toBe('Invalid column index 2');
        }
      }
    });

    it('should advance the cursor one row at a time', () => {
      expect(stmt.fetch('num')).toEqual([1, 'Jon']);
      expect(stmt.fetchAll('num')).toEqual([[2, 'Mary']]);
      expect(stmt.fetch('num')).toBe(false);
      expect(stmt.fetchAll('num')).toEqual([]);
    });

    it('should return false when there are no rows', () => {
      const empty = driver.prepare('SELECT id FROM tbl WHERE id > 10');
      empty.execute();

      expect(empty.fetch()).toBe(false);
      expect(empty.rowCount()).toBe(0);
    });

    it('should refuse to fetch after closeCursor', () => {
      expect(stmt.closeCursor()).toBe(true);

      expect(() => stmt.fetchAll()).toThrow(StatementError);
    });

    it('should restart from the first row when executed again', () => {
      stmt.fetchAll();

      expect(stmt.execute()).toBe(true);
      expect(stmt.fetch('column', 1)).toBe('Jon');
    });
  });
});
