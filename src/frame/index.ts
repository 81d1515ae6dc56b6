/**
 * Tabular Data
 *
 * Builders and validation for column-oriented table data.
 * @module sql-table-insert/frame
 */

import type { Column, TableData, TextColumn } from '../types/index.js';
import { InvalidDataError } from '../errors/index.js';
import { formatDateTime, isAbsent } from './format.js';

export { cellText, formatDate, formatDateTime, isAbsent } from './format.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

// ============================================================================
// Validation
// ============================================================================

/**
 * Validates table data and returns its row count.
 *
 * @throws {InvalidDataError} If there are no columns or the columns differ in length
 */
export function validateTableData(data: TableData): number {
  const [first, ...rest] = data.columns;
  if (first === undefined) {
    throw new InvalidDataError('data must have at least one column');
  }

  const rowCount = first.values.length;
  for (const column of rest) {
    if (column.values.length !== rowCount) {
      throw new InvalidDataError(
        `Column ${column.name} has ${column.values.length} rows, expected ${rowCount}`,
        { column: column.name }
      );
    }
  }
  return rowCount;
}

/**
 * Number of rows in the data (0 when there are no columns).
 */
export function rowCount(data: TableData): number {
  return data.columns[0]?.values.length ?? 0;
}

/**
 * Returns a copy of the data with every column renamed.
 */
export function renameColumns(data: TableData, rename: (name: string) => string): TableData {
  return {
    columns: data.columns.map((column) => ({ ...column, name: rename(column.name) })),
  };
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Builds table data from row records. Column order follows the keys of the
 * first record, unless `columnNames` is given.
 *
 * @example
 * ```typescript
 * const data = tableDataFromRecords([
 *   { id: 1, name: 'a' },
 *   { id: 2, name: null },
 * ]);
 * // id: integer32, name: text
 * ```
 */
export function tableDataFromRecords(
  records: readonly Record<string, unknown>[],
  columnNames?: readonly string[]
): TableData {
  const names = columnNames ?? Object.keys(records[0] ?? {});
  return {
    columns: names.map((name) => inferColumn(name, records.map((record) => record[name]))),
  };
}

/**
 * Builds table data from arrays of column values. Columns without a name are
 * called `V1`, `V2`, ... by position.
 */
export function tableDataFromArrays(
  arrays: readonly (readonly unknown[])[],
  names: readonly string[] = []
): TableData {
  return {
    columns: arrays.map((values, i) => inferColumn(names[i] ?? `V${i + 1}`, values)),
  };
}

/**
 * Builds single-column table data named `x` from a plain vector of values.
 */
export function tableDataFromValues(values: readonly unknown[]): TableData {
  return { columns: [inferColumn('x', values)] };
}

// ============================================================================
// Column Inference
// ============================================================================

/**
 * Infers the semantic column type of plain JavaScript values.
 *
 * Integers inside the 32-bit range become `integer32`; integers beyond it and
 * bigints become `integer64`; other numbers `float`; dates `datetime`;
 * everything else text.
 */
export function inferColumn(name: string, values: readonly unknown[]): Column {
  const present = values.filter((v) => !isAbsent(v));

  if (present.length > 0) {
    if (present.every((v) => typeof v === 'number' && Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX)) {
      return { name, type: 'integer32', values: values.map((v) => (typeof v === 'number' && !Number.isNaN(v) ? v : null)) };
    }

    if (present.every((v) => typeof v === 'bigint' || (typeof v === 'number' && Number.isSafeInteger(v)))) {
      return {
        name,
        type: 'integer64',
        values: values.map((v) => (typeof v === 'bigint' ? v : typeof v === 'number' && !Number.isNaN(v) ? BigInt(v) : null)),
      };
    }

    if (present.every((v) => typeof v === 'number')) {
      return { name, type: 'float', values: values.map((v) => (typeof v === 'number' ? v : null)) };
    }

    if (present.every((v) => v instanceof Date)) {
      return { name, type: 'datetime', values: values.map((v) => (v instanceof Date ? v : null)) };
    }
  }

  return textColumn(name, values);
}

function textColumn(name: string, values: readonly unknown[]): TextColumn {
  return {
    name,
    type: 'text',
    values: values.map((v) => (isAbsent(v) ? null : stringifyValue(v))),
  };
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) return formatDateTime(value);
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
