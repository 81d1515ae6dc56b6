/**
 * PostgreSQL / Redshift connection adapter on top of `pg`.
 *
 * `pg` has no auto-commit switch: turning auto-commit off opens a transaction
 * with `BEGIN`, turning it back on issues `COMMIT`.
 *
 * @module sql-table-insert/connection/pg
 */

import pg from 'pg';
import type { ClientConfig } from 'pg';
import type { Dialect } from '../dialect/index.js';
import { PostgresqlDialect, RedshiftDialect } from '../dialect/index.js';
import { encodeInt64 } from '../execution/binding.js';
import { INT64_PROBE_VALUES } from '../execution/int64.js';
import type { BoundBatch } from '../types/index.js';
import { batchRows, type InsertConnection } from './types.js';

/**
 * The part of a `pg` client used here. `pg.Client` and `pg.PoolClient` satisfy it.
 */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

function firstValue(rows: readonly unknown[]): unknown {
  const row = rows[0];
  return typeof row === 'object' && row !== null && 'value' in row ? row.value : undefined;
}

/**
 * Insert connection backed by a `pg` client.
 *
 * @example
 * ```typescript
 * const client = await pool.connect();
 * try {
 *   const connection = new PgInsertConnection(client);
 *   await insertTable(connection, { tableName: 'people', data });
 * } finally {
 *   client.release();
 * }
 * ```
 */
export class PgInsertConnection implements InsertConnection {
  readonly dialect: Dialect;
  private readonly client: PgQueryable;
  private inTransaction = false;

  /**
   * @param client - Connected `pg` client
   * @param dialect - `postgresql` (default) or `redshift`
   */
  constructor(client: PgQueryable, dialect: Dialect = new PostgresqlDialect()) {
    this.client = client;
    this.dialect = dialect;
  }

  async execute(sql: string): Promise<void> {
    await this.client.query(sql);
  }

  async executeBatch(sql: string, batch: BoundBatch): Promise<void> {
    for (const row of batchRows(batch)) {
      await this.client.query(sql, row);
    }
  }

  async getAutoCommit(): Promise<boolean> {
    return !this.inTransaction;
  }

  async setAutoCommit(value: boolean): Promise<void> {
    if (!value && !this.inTransaction) {
      await this.client.query('BEGIN');
      this.inTransaction = true;
    } else if (value && this.inTransaction) {
      this.inTransaction = false;
      await this.client.query('COMMIT');
    }
  }

  async commit(): Promise<void> {
    if (!this.inTransaction) return;
    await this.client.query('COMMIT');
    await this.client.query('BEGIN');
  }

  async rollback(): Promise<void> {
    if (!this.inTransaction) return;
    await this.client.query('ROLLBACK');
    await this.client.query('BEGIN');
  }

  /**
   * Sends each probe value as a BIGINT parameter and compares the server's
   * text rendering with the original.
   */
  async validateInt64Transport(): Promise<boolean> {
    for (const value of INT64_PROBE_VALUES) {
      const expected = encodeInt64(value);
      const result = await this.client.query('SELECT $1::bigint::text AS value', [expected]);
      if (firstValue(result.rows) !== expected) return false;
    }
    return true;
  }
}

/**
 * Opens a dedicated `pg` client and wraps it.
 *
 * @returns The connection and a function closing the client
 */
export async function connectPg(
  config: ClientConfig,
  options: { redshift?: boolean } = {}
): Promise<{ connection: PgInsertConnection; close: () => Promise<void> }> {
  const client = new pg.Client(config);
  await client.connect();
  const dialect = options.redshift ? new RedshiftDialect() : new PostgresqlDialect();
  return {
    connection: new PgInsertConnection(client, dialect),
    close: () => client.end(),
  };
}
