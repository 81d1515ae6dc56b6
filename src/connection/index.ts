/**
 * Connection Collaborator
 *
 * The narrow interface the insert engine borrows from a live database
 * connection, and driver adapters implementing it.
 * @module sql-table-insert/connection
 */

export { batchRows, type InsertConnection } from './types.js';
export { PgInsertConnection, connectPg, type PgQueryable } from './pg.js';
export { MssqlInsertConnection, connectMssql } from './mssql.js';
