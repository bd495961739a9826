/**
 * BindWrap tests against a recording driver
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { BindWrap } from './wrap.js';
import { ParamType, type BindValue, type ParamValue, type PlaceholderToken } from './params/types.js';
import type { DriverStatement, FetchMode, Row, StatementDriver } from './driver/types.js';
import { BindingError, BindingErrorCode, MalformedParameterNameError } from './errors/index.js';
import { createLogger, type LogEntry, type LogSink } from './logging/index.js';

// =============================================================================
// Recording driver
// =============================================================================

interface BindCall {
  token: PlaceholderToken;
  value: ParamValue;
  type: ParamType;
}

class RecordingStatement implements DriverStatement {
  readonly binds: BindCall[] = [];
  readonly fetchCalls: Array<{ mode?: FetchMode; column?: number }> = [];
  closed = 0;

  constructor(
    readonly query: string,
    private readonly rows: Row[],
    private readonly succeed: boolean,
    private readonly acceptBinds: boolean
  ) {}

  bindValue(token: PlaceholderToken, value: ParamValue, type: ParamType): boolean {
    this.binds.push({ token, value, type });
    return this.acceptBinds;
  }

  execute(): boolean {
    return this.succeed;
  }

  fetchAll(mode?: FetchMode, column?: number): Row[] {
    this.fetchCalls.push({ mode, column });
    return this.rows;
  }

  fetch(mode?: FetchMode, column?: number): Row | false {
    this.fetchCalls.push({ mode, column });
    return this.rows[0] ?? false;
  }

  rowCount(): number {
    return this.rows.length;
  }

  closeCursor(): boolean {
    this.closed++;
    return true;
  }
}

class RecordingDriver implements StatementDriver {
  readonly statements: RecordingStatement[] = [];
  rows: Row[] = [];
  succeed = true;
  acceptBinds = true;

  prepare(query: string): RecordingStatement {
    const stmt = new RecordingStatement(query, this.rows, this.succeed, this.acceptBinds);
    this.statements.push(stmt);
    return stmt;
  }

  last(): RecordingStatement {
    const stmt = this.statements.at(-1);
    if (!stmt) {
      throw new Error('no statement prepared');
    }
    return stmt;
  }
}

// =============================================================================
// Tests
// =============================================================================

describe('BindWrap', () => {
  let driver: RecordingDriver;
  let logs: LogEntry[];
  let sink: LogSink;
  let db: BindWrap<RecordingDriver>;

  beforeEach(() => {
    driver = new RecordingDriver();
    logs = [];
    sink = {
      write(entry) {
        logs.push(entry);
      },
    };
    db = new BindWrap(driver, { logger: createLogger({ sink, level: 'info' }) });
  });

  it('should expose the wrapped driver', () => {
    expect(db.getDriver()).toBe(driver);
  });

  describe('prepareBind', () => {
    it('should prepare the rewritten query and bind in order', () => {
      const stmt = db.prepareBind(
        'SELECT * FROM tbl WHERE id IN(:id) AND name = :name',
        { 'id[i]': [1, 2], name: 'Jon' }
      );

      expect(stmt.query).toBe('SELECT * FROM tbl WHERE id IN(:id0,:id1) AND name = :name');
      expect(driver.last().binds).toEqual([
        { token: ':id0', value: 1, type: ParamType.INTEGER },
        { token: ':id1', value: 2, type: ParamType.INTEGER },
        { token: ':name', value: 'Jon', type: ParamType.STRING },
      ]);
    });

    it('should bind positional values by position', () => {
      db.prepareBind('SELECT * FROM tbl WHERE id = ?', [7]);

      expect(driver.last().binds).toEqual([{ token: 1, value: 7, type: ParamType.STRING }]);
    });

    it('should bind only the present values of a sparse list', () => {
      const params: BindValue[] = [];
      params[1] = 5;

      db.prepareBind('SELECT ?, ?', params);

      expect(driver.last().binds).toEqual([{ token: 2, value: 5, type: ParamType.STRING }]);
    });

    it('should not execute the statement', () => {
      const execute = vi.spyOn(RecordingStatement.prototype, 'execute');

      db.prepareBind('SELECT 1');

      expect(execute).not.toHaveBeenCalled();
      execute.mockRestore();
    });

    it('should not prepare anything when a key is malformed', () => {
      const prepare = vi.spyOn(driver, 'prepare');

      expect(() => db.prepareBind('SELECT :a', { 'a b': 1 })).toThrow(MalformedParameterNameError);
      expect(prepare).not.toHaveBeenCalled();
    });

    it('should throw when the driver rejects a binding', () => {
      driver.acceptBinds = false;

      try {
        db.prepareBind('SELECT :a', { a: 1 });
        expect.unreachable('prepareBind should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(BindingError);
        if (error instanceof BindingError) {
          expect(error.code).toBe(BindingErrorCode.REJECTED);
          expect(error.message).toBe('Driver rejected binding for :a');
          expect(error.context?.sql).toBe('SELECT :a');
        }
      }
    });

    it('should propagate prepare errors', () => {
      vi.spyOn(driver, 'prepare').mockImplementation(() => {
        throw new Error('syntax error');
      });

      expect(() => db.prepareBind('SELEC 1')).toThrow('syntax error');
    });

    it('should log the bound query at debug level', () => {
      const debugDb = new BindWrap(driver, {
        logLevel: 'debug',
        logger: createLogger({ sink, level: 'info' }),
      });

      debugDb.prepareBind('SELECT * FROM t WHERE id IN(:id)', { 'id[i]': [1, 2] });

      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        level: 'debug',
        message: 'Bound statement',
        context: {
          component: 'bindwrap',
          sql: 'SELECT * FROM t WHERE id IN(:id0,:id1)',
          bindings: 2,
          bound: 'SELECT * FROM t WHERE id IN(1,2)',
        },
      });
    });

    it('should stay quiet above debug level', () => {
      db.prepareBind('SELECT :a', { a: 1 });

      expect(logs).toEqual([]);
    });
  });

  describe('strictArrays', () => {
    it('should pass an empty list through by default', () => {
      db.prepareBind('SELECT * FROM t WHERE id IN(:id)', { 'id[i]': [] });

      expect(driver.last().query).toBe('SELECT * FROM t WHERE id IN(:id)');
      expect(driver.last().binds).toEqual([{ token: ':id', value: [], type: ParamType.INTEGER }]);
    });

    it('should reject an empty list when enabled', () => {
      const strict = new BindWrap(driver, { strictArrays: true });

      expect(() => strict.prepareBind('SELECT * FROM t WHERE id IN(:id)', { 'id[i]': [] })).toThrow(
        'Empty array for list parameter :id'
      );
      expect(driver.statements).toHaveLength(0);
    });
  });

  describe('execute', () => {
    it('should return the affected row count', () => {
      driver.rows = [{ id: 1 }, { id: 2 }];

      expect(db.execute('DELETE FROM tbl WHERE id IN(:ids)', { 'ids[i]': [1, 2] })).toBe(2);
    });

    it('should return false when execution fails', () => {
      driver.succeed = false;

      expect(db.execute('DELETE FROM tbl')).toBe(false);
    });
  });

  describe('fetchAll', () => {
    it('should fetch with the requested mode and column', () => {
      driver.rows = ['Jon', 'Mary'];

      expect(db.fetchAll('SELECT id, name FROM tbl', null, 'column', 1)).toEqual(['Jon', 'Mary']);
      expect(driver.last().fetchCalls).toEqual([{ mode: 'column', column: 1 }]);
    });

    it('should leave the mode to the driver when omitted', () => {
      db.fetchAll('SELECT 1');

      expect(driver.last().fetchCalls).toEqual([{ mode: undefined, column: undefined }]);
    });

    it('should return false without fetching when execution fails', () => {
      driver.succeed = false;

      expect(db.fetchAll('SELECT 1')).toBe(false);
      expect(driver.last().fetchCalls).toEqual([]);
    });
  });

  describe('fetchOne', () => {
    it('should fetch the first row and close the cursor', () => {
      driver.rows = [[1, 'Jon']];

      expect(db.fetchOne('SELECT id, name FROM tbl', [], 'num')).toEqual([1, 'Jon']);
      expect(driver.last().fetchCalls).toEqual([{ mode: 'num', column: undefined }]);
      expect(driver.last().closed).toBe(1);
    });

    it('should pass the both mode to the driver', () => {
      driver.rows = [{ 0: 1, id: 1 }];

      expect(db.fetchOne('SELECT id FROM tbl', null, 'both')).toEqual({ 0: 1, id: 1 });
      expect(driver.last().fetchCalls).toEqual([{ mode: 'both', column: undefined }]);
    });

    it('should return false when there is no row', () => {
      expect(db.fetchOne('SELECT id FROM tbl WHERE 0')).toBe(false);
      expect(driver.last().closed).toBe(1);
    });

    it('should return false without fetching when execution fails', () => {
      driver.succeed = false;

      expect(db.fetchOne('SELECT 1')).toBe(false);
      expect(driver.last().fetchCalls).toEqual([]);
      expect(driver.last().closed).toBe(0);
    });
  });
});
