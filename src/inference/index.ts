/**
 * SQL Type Inference
 *
 * Maps semantic column types to the SQL column types used when creating the
 * destination table.
 * @module sql-table-insert/inference
 */

import type { Column, ColumnDescriptor, TableData } from '../types/index.js';

/** Width used for text columns that are short or have no data */
export const DEFAULT_VARCHAR_LENGTH = 255;

/**
 * Longest text length in a text column: the longest category label for
 * categorical columns, otherwise the longest present value. `undefined` when
 * there is nothing to measure.
 */
export function measureTextLength(column: Column): number | undefined {
  if (column.type !== 'text') return undefined;

  const candidates = column.levels ?? column.values;
  let longest: number | undefined;
  for (const value of candidates) {
    if (value === null || value === undefined) continue;
    // code points, not UTF-16 units
    longest = Math.max(longest ?? 0, Array.from(value).length);
  }
  return longest;
}

/**
 * Infers the SQL type of a column.
 *
 * @example
 * ```typescript
 * inferSqlType({ name: 'id', type: 'integer32', values: [1, 2] }); // 'INTEGER'
 * inferSqlType({ name: 'note', type: 'text', values: [null] });    // 'VARCHAR(255)'
 * ```
 */
export function inferSqlType(column: Column): string {
  switch (column.type) {
    case 'integer32':
      return 'INTEGER';
    case 'datetime':
      return 'DATETIME2';
    case 'date':
      return 'DATE';
    case 'integer64':
      return 'BIGINT';
    case 'float':
      return 'FLOAT';
    case 'text': {
      const length = measureTextLength(column);
      if (length === undefined || length <= DEFAULT_VARCHAR_LENGTH) {
        return `VARCHAR(${DEFAULT_VARCHAR_LENGTH})`;
      }
      return `VARCHAR(${length})`;
    }
  }
}

/**
 * Describes every column of the data in source order. Text columns with
 * nothing to measure get {@link DEFAULT_VARCHAR_LENGTH}.
 */
export function describeColumns(data: TableData): ColumnDescriptor[] {
  return data.columns.map((column) => {
    const descriptor: ColumnDescriptor = {
      name: column.name,
      semanticType: column.type,
      inferredSqlType: inferSqlType(column),
    };
    if (column.type === 'text') {
      descriptor.maxTextLength = measureTextLength(column) ?? DEFAULT_VARCHAR_LENGTH;
    }
    return descriptor;
  });
}
