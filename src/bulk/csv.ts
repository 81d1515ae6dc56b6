/**
 * Delimited Staging Files
 *
 * Renders table data as the delimited text each bulk loader reads.
 * @module sql-table-insert/bulk/csv
 */

import type { TableData } from '../types/index.js';
import { cellText, validateTableData } from '../frame/index.js';

/**
 * Delimited text options.
 */
export interface DelimitedOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Write a header row with the column names (default: true) */
  includeHeader?: boolean;
  /** Text written for absent cells (default: '') */
  nullValue?: string;
  /**
   * Quote character for CSV quoting, or `null` to write fields verbatim
   * (default: '"')
   */
  quoteChar?: string | null;
  /** Line terminator (default: '\n') */
  lineEnding?: string;
}

/**
 * Converts table data to delimited text.
 *
 * With CSV quoting on, fields containing the delimiter, a line break or the
 * quote character are quoted, and empty strings are written as `""` so they
 * stay distinct from absent cells.
 *
 * @example
 * ```typescript
 * const csv = tableDataToDelimited(data);
 * // id,name
 * // 1,Alice
 * // 2,
 * ```
 */
export function tableDataToDelimited(data: TableData, options: DelimitedOptions = {}): string {
  const total = validateTableData(data);
  const delimiter = options.delimiter ?? ',';
  const includeHeader = options.includeHeader ?? true;
  const nullValue = options.nullValue ?? '';
  const quoteChar = options.quoteChar === undefined ? '"' : options.quoteChar;
  const lineEnding = options.lineEnding ?? '\n';

  const field = (value: string): string => {
    if (quoteChar === null) return value;
    if (
      value === '' ||
      value.includes(delimiter) ||
      value.includes('\n') ||
      value.includes('\r') ||
      value.includes(quoteChar)
    ) {
      return `${quoteChar}${value.split(quoteChar).join(quoteChar + quoteChar)}${quoteChar}`;
    }
    return value;
  };

  const lines: string[] = [];
  if (includeHeader) {
    lines.push(data.columns.map((column) => field(column.name)).join(delimiter));
  }

  for (let row = 0; row < total; row++) {
    const values = data.columns.map((column) => {
      const text = cellText(column, row);
      return text === null ? nullValue : field(text);
    });
    lines.push(values.join(delimiter));
  }

  return lines.length > 0 ? lines.join(lineEnding) + lineEnding : '';
}
