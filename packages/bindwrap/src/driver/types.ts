/**
 * Statement Driver Contract
 *
 * The prepared-statement API that bindwrap sits in front of. Any database
 * client can be wrapped by implementing these two interfaces.
 */

import type { ParamType, ParamValue, PlaceholderToken } from '../params/types.js';

// =============================================================================
// RESULT VALUES
// =============================================================================

/**
 * Values a driver returns in result rows
 */
export type ResultValue = string | number | bigint | Uint8Array | null;

/**
 * Row keyed by column name
 */
export type AssocRow = Record<string, ResultValue>;

/**
 * Row as an array in column order
 */
export type NumRow = ResultValue[];

/**
 * Row keyed by column index and by column name
 */
export type BothRow = Record<string | number, ResultValue>;

/**
 * Any fetched row shape
 */
export type Row = AssocRow | NumRow | BothRow | ResultValue;

/**
 * Row shape requested from fetch()/fetchAll()
 *
 * - `assoc`: object keyed by column name (default)
 * - `num`: array in column order
 * - `both`: object keyed by column index and by column name
 * - `column`: the value of a single column
 */
export type FetchMode = 'assoc' | 'num' | 'both' | 'column';

// =============================================================================
// DRIVER INTERFACES
// =============================================================================

/**
 * A prepared statement
 */
export interface DriverStatement {
  /** SQL the statement was prepared from */
  readonly query: string;

  /**
   * Bind a value to a placeholder
   * @returns false when the driver refuses the binding
   */
  bindValue(token: PlaceholderToken, value: ParamValue, type: ParamType): boolean;

  /**
   * Execute with the current bindings
   * @returns false when execution failed
   */
  execute(): boolean;

  /**
   * Fetch all remaining rows
   * @param column - column index for the `column` mode (default 0)
   */
  fetchAll(mode?: FetchMode, column?: number): Row[] | false;

  /**
   * Fetch the next row, or false when there are no more rows
   */
  fetch(mode?: FetchMode, column?: number): Row | false;

  /** Rows affected (writes) or produced (reads) by the last execute() */
  rowCount(): number;

  /** Release the pending result set so the statement can be executed again */
  closeCursor(): boolean;
}

/**
 * A connection that prepares statements
 */
export interface StatementDriver {
  prepare(query: string): DriverStatement;
}

/**
 * How a driver reports execution failures
 *
 * - `silent`: execute() returns false; the error is logged and kept
 * - `exception`: execute() throws
 */
export type ErrorMode = 'silent' | 'exception';
