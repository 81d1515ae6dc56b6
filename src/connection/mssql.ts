/**
 * SQL Server / PDW connection adapter on top of `mssql`.
 *
 * Auto-commit off is an open `mssql.Transaction`; every statement runs on a
 * request bound to it.
 *
 * @module sql-table-insert/connection/mssql
 */

import mssql from 'mssql';
import type { ConnectionPool, ISqlType, Request, Transaction, config as MssqlConfig } from 'mssql';
import type { Dialect } from '../dialect/index.js';
import { PdwDialect, SqlServerDialect } from '../dialect/index.js';
import { encodeInt64 } from '../execution/binding.js';
import { INT64_PROBE_VALUES } from '../execution/int64.js';
import type { BindingKind, BoundBatch } from '../types/index.js';
import { batchRows, type InsertConnection } from './types.js';

// ============================================================================
// Type Mapping
// ============================================================================

/**
 * Driver type used to bind each column kind. Dates travel as ISO text and
 * are converted by the server.
 */
function sqlTypeFor(kind: BindingKind): () => ISqlType {
  switch (kind) {
    case 'integer':
      return mssql.Int;
    case 'bigint':
      return mssql.BigInt;
    case 'numeric':
      return mssql.Float;
    case 'date':
    case 'datetime':
    case 'string':
      return mssql.NVarChar;
  }
}

// ============================================================================
// Connection
// ============================================================================

/**
 * Insert connection backed by an `mssql` connection pool.
 */
export class MssqlInsertConnection implements InsertConnection {
  readonly dialect: Dialect;
  private readonly pool: ConnectionPool;
  private transaction?: Transaction;

  /**
   * @param pool - Connected pool
   * @param dialect - `sql server` (default) or `pdw`
   */
  constructor(pool: ConnectionPool, dialect: Dialect = new SqlServerDialect()) {
    this.pool = pool;
    this.dialect = dialect;
  }

  async execute(sql: string): Promise<void> {
    await this.request().batch(sql);
  }

  async executeBatch(sql: string, batch: BoundBatch): Promise<void> {
    const types = batch.columns.map((column) => sqlTypeFor(column.kind));
    for (const row of batchRows(batch)) {
      const request = this.request();
      row.forEach((value, i) => {
        request.input(`p${i + 1}`, types[i] ?? mssql.NVarChar, value);
      });
      await request.query(sql);
    }
  }

  async getAutoCommit(): Promise<boolean> {
    return this.transaction === undefined;
  }

  async setAutoCommit(value: boolean): Promise<void> {
    if (!value && !this.transaction) {
      const transaction = new mssql.Transaction(this.pool);
      await transaction.begin();
      this.transaction = transaction;
    } else if (value && this.transaction) {
      const transaction = this.transaction;
      this.transaction = undefined;
      await transaction.commit();
    }
  }

  async commit(): Promise<void> {
    if (!this.transaction) return;
    await this.transaction.commit();
    await this.transaction.begin();
  }

  async rollback(): Promise<void> {
    if (!this.transaction) return;
    await this.transaction.rollback();
    await this.transaction.begin();
  }

  /**
   * Binds each probe value as `mssql.BigInt` and reads it back as BIGINT.
   */
  async validateInt64Transport(): Promise<boolean> {
    for (const value of INT64_PROBE_VALUES) {
      const expected = encodeInt64(value);
      const result = await this.request()
        .input('p1', mssql.BigInt, expected)
        .query<{ value: string | number }>('SELECT CAST(@p1 AS BIGINT) AS value');
      const row = result.recordset[0];
      if (row === undefined || String(row.value) !== expected) return false;
    }
    return true;
  }

  private request(): Request {
    return this.transaction ? new mssql.Request(this.transaction) : new mssql.Request(this.pool);
  }
}

/**
 * Opens an `mssql` pool and wraps it.
 *
 * @returns The connection and a function closing the pool
 */
export async function connectMssql(
  config: MssqlConfig,
  options: { pdw?: boolean } = {}
): Promise<{ connection: MssqlInsertConnection; close: () => Promise<void> }> {
  const pool = await new mssql.ConnectionPool(config).connect();
  const dialect = options.pdw ? new PdwDialect() : new SqlServerDialect();
  return {
    connection: new MssqlInsertConnection(pool, dialect),
    close: () => pool.close(),
  };
}
