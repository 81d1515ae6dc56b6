/**
 * Batch Partitioning and Parameter Binding
 *
 * Splits a row range into ordered batches and converts each column slice into
 * the representation handed to the driver.
 * @module sql-table-insert/execution/binding
 */

import type { BoundBatch, BoundColumn, Column, TableData } from '../types/index.js';
import { formatDate, formatDateTime, isAbsent } from '../frame/index.js';
import { InvalidDataError } from '../errors/index.js';

/**
 * Default number of rows per batch.
 */
export const DEFAULT_BATCH_SIZE = 10000;

/**
 * Row range of one batch.
 */
export interface BatchRange {
  /** Zero-based batch number */
  index: number;
  /** First row (inclusive) */
  start: number;
  /** Last row (exclusive) */
  end: number;
}

/**
 * Splits `total` rows into consecutive ranges of at most `batchSize` rows.
 *
 * @example
 * ```typescript
 * partitionRows(25000, 10000).map((r) => r.end - r.start);
 * // [10000, 10000, 5000]
 * ```
 *
 * @throws {InvalidDataError} If the batch size is not a positive integer
 */
export function partitionRows(total: number, batchSize: number = DEFAULT_BATCH_SIZE): BatchRange[] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new InvalidDataError(`batchSize must be a positive integer, got ${batchSize}`, { batchSize });
  }

  const ranges: BatchRange[] = [];
  for (let start = 0, index = 0; start < total; start += batchSize, index++) {
    ranges.push({ index, start, end: Math.min(start + batchSize, total) });
  }
  return ranges;
}

// ============================================================================
// 64-bit Integers
// ============================================================================

/**
 * Driver representation of a 64-bit integer: its decimal text.
 */
export function encodeInt64(value: bigint): string {
  return value.toString();
}

/**
 * Inverse of {@link encodeInt64}.
 */
export function decodeInt64(encoded: string): bigint {
  return BigInt(encoded);
}

// ============================================================================
// Binding
// ============================================================================

/**
 * Binds rows `[start, end)` of one column. Non-finite floats bind as NULL.
 */
export function bindColumn(column: Column, start: number, end: number): BoundColumn {
  switch (column.type) {
    case 'integer32':
      return { kind: 'integer', values: column.values.slice(start, end).map((v) => (isAbsent(v) ? null : v)) };
    case 'integer64':
      return {
        kind: 'bigint',
        values: column.values.slice(start, end).map((v) => (isAbsent(v) ? null : encodeInt64(v))),
      };
    case 'float':
      return {
        kind: 'numeric',
        values: column.values.slice(start, end).map((v) => (isAbsent(v) || !Number.isFinite(v) ? null : v)),
      };
    case 'date':
      return { kind: 'date', values: column.values.slice(start, end).map((v) => (isAbsent(v) ? null : formatDate(v))) };
    case 'datetime':
      return {
        kind: 'datetime',
        values: column.values.slice(start, end).map((v) => (isAbsent(v) ? null : formatDateTime(v))),
      };
    case 'text':
      return { kind: 'string', values: column.values.slice(start, end).map((v) => (isAbsent(v) ? null : v)) };
  }
}

/**
 * Binds every column of one batch range.
 */
export function bindBatch(data: TableData, range: BatchRange): BoundBatch {
  return {
    index: range.index,
    start: range.start,
    end: range.end,
    rowCount: range.end - range.start,
    columns: data.columns.map((column) => bindColumn(column, range.start, range.end)),
  };
}
