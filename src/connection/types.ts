/**
 * Connection contract and row helpers shared by driver adapters.
 */

import type { Dialect } from '../dialect/index.js';
import type { BoundBatch, BoundValue } from '../types/index.js';

/**
 * Connection primitives consumed by the insert engine. The caller owns the
 * connection; the engine only borrows it for one call.
 */
export interface InsertConnection {
  /** Dialect profile of the backend */
  readonly dialect: Dialect;
  /** Executes a statement without parameters */
  execute(sql: string): Promise<void>;
  /** Executes a parameterized statement once per row of the batch */
  executeBatch(sql: string, batch: BoundBatch): Promise<void>;
  /** Whether every statement commits on its own */
  getAutoCommit(): Promise<boolean>;
  /** Turns auto-commit on or off. Turning it on commits pending work. */
  setAutoCommit(value: boolean): Promise<void>;
  /** Commits pending work when auto-commit is off */
  commit(): Promise<void>;
  /** Discards pending work when auto-commit is off */
  rollback(): Promise<void>;
  /** Connection-specific 64-bit integer round-trip check */
  validateInt64Transport?(): Promise<boolean>;
}

/**
 * Converts a column-oriented batch into driver parameter rows.
 */
export function batchRows(batch: BoundBatch): BoundValue[][] {
  const rows: BoundValue[][] = [];
  for (let r = 0; r < batch.rowCount; r++) {
    rows.push(batch.columns.map((column) => column.values[r] ?? null));
  }
  return rows;
}
