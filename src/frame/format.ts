/**
 * Value formatting shared by parameter binding, literal rendering and staging files.
 * @module sql-table-insert/frame/format
 */

import type { Column } from '../types/index.js';

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats the UTC calendar date of a value as `YYYY-MM-DD`.
 */
export function formatDate(value: Date): string {
  return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

/**
 * Formats a timestamp in UTC as `YYYY-MM-DD HH:MM:SS`, adding `.mmm` only when
 * the value has a millisecond part.
 */
export function formatDateTime(value: Date): string {
  const time = `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
  const millis = value.getUTCMilliseconds();
  return `${formatDate(value)} ${time}${millis > 0 ? `.${pad(millis, 3)}` : ''}`;
}

/**
 * Checks whether a cell is absent (NULL on the server).
 */
export function isAbsent(value: unknown): value is null | undefined {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number' && Number.isNaN(value)) return true;
  return value instanceof Date && Number.isNaN(value.getTime());
}

/**
 * Text form of one cell as written to staging files and SQL literals, or
 * `null` when the cell is absent. Non-finite floats count as absent.
 */
export function cellText(column: Column, row: number): string | null {
  switch (column.type) {
    case 'integer32':
    case 'float': {
      const value = column.values[row];
      return isAbsent(value) || !Number.isFinite(value) ? null : String(value);
    }
    case 'integer64': {
      const value = column.values[row];
      return isAbsent(value) ? null : value.toString();
    }
    case 'date': {
      const value = column.values[row];
      return isAbsent(value) ? null : formatDate(value);
    }
    case 'datetime': {
      const value = column.values[row];
      return isAbsent(value) ? null : formatDateTime(value);
    }
    case 'text': {
      const value = column.values[row];
      return isAbsent(value) ? null : value;
    }
  }
}
