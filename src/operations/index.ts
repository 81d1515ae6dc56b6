/**
 * Public operations.
 * @module sql-table-insert/operations
 */

export { insertTable, type InsertTableOptions, type InsertTableResult } from './insert-table.js';
