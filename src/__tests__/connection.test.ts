/**
 * Tests for the pg and mssql connection adapters, against in-process fakes.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import mssql from 'mssql';
import { batchRows, MssqlInsertConnection, PgInsertConnection } from '../connection/index.js';
import { PdwDialect, PostgresqlDialect, RedshiftDialect, SqlServerDialect } from '../dialect/index.js';
import { bindBatch } from '../execution/index.js';
import { tableDataFromRecords } from '../frame/index.js';

const mssqlLog = vi.hoisted(() => {
  const entries: string[] = [];
  return entries;
});

const mssqlServer = vi.hoisted(() => ({ readBack: (value: string): string | number => value }));

vi.mock('mssql', () => {
  class Transaction {
    constructor(readonly parent: unknown) {}
    async begin(): Promise<void> {
      mssqlLog.push('begin');
    }
    async commit(): Promise<void> {
      mssqlLog.push('commit');
    }
    async rollback(): Promise<void> {
      mssqlLog.push('rollback');
    }
  }

  class Request {
    private readonly inputs: string[] = [];
    private readonly values: unknown[] = [];
    constructor(readonly parent: unknown) {}
    input(name: string, type: unknown, value: unknown): this {
      const typeName = typeof type === 'function' ? type.name : String(type);
      this.inputs.push(`${name}:${typeName}=${String(value)}`);
      this.values.push(value);
      return this;
    }
    async batch(sql: string): Promise<void> {
      mssqlLog.push(`batch on ${this.target()}: ${sql}`);
    }
    async query(sql: string): Promise<{ recordset: Array<{ value: string | number }> }> {
      mssqlLog.push(`query on ${this.target()}: ${sql} [${this.inputs.join(', ')}]`);
      return { recordset: [{ value: mssqlServer.readBack(String(this.values[0])) }] };
    }
    private target(): string {
      return this.parent instanceof Transaction ? 'transaction' : 'pool';
    }
  }

  class ConnectionPool {
    constructor(readonly config: unknown) {}
    async connect(): Promise<this> {
      return this;
    }
    async close(): Promise<void> {}
  }

  function Int(): string {
    return 'Int';
  }
  function BigInt(): string {
    return 'BigInt';
  }
  function Float(): string {
    return 'Float';
  }
  function NVarChar(): string {
    return 'NVarChar';
  }

  return { default: { Int, BigInt, Float, NVarChar, Request, Transaction, ConnectionPool } };
});

const batch = bindBatch(
  tableDataFromRecords([
    { id: 1, name: 'a' },
    { id: 2, name: null },
  ]),
  { index: 0, start: 0, end: 2 }
);

describe('batchRows', () => {
  it('should turn bound columns into parameter rows', () => {
    expect(batchRows(batch)).toEqual([
      [1, 'a'],
      [2, null],
    ]);
  });
});

describe('PgInsertConnection', () => {
  function fakeClient(readBack: (value: string) => string = (value) => value) {
    return {
      query: vi.fn(async (text: string, values?: unknown[]) => ({
        rows: text.startsWith('SELECT') ? [{ value: readBack(String(values?.[0])) }] : [],
      })),
    };
  }

  it('should default to the PostgreSQL dialect', () => {
    expect(new PgInsertConnection(fakeClient()).dialect).toBeInstanceOf(PostgresqlDialect);
    expect(new PgInsertConnection(fakeClient(), new RedshiftDialect()).dialect.name).toBe('redshift');
  });

  it('should map auto-commit to an explicit transaction', async () => {
    const client = fakeClient();
    const connection = new PgInsertConnection(client);

    expect(await connection.getAutoCommit()).toBe(true);
    await connection.setAutoCommit(false);
    expect(await connection.getAutoCommit()).toBe(false);
    await connection.executeBatch('INSERT INTO people (id,name) VALUES ($1,$2)', batch);
    await connection.commit();
    await connection.setAutoCommit(true);

    expect(client.query.mock.calls).toEqual([
      ['BEGIN'],
      ['INSERT INTO people (id,name) VALUES ($1,$2)', [1, 'a']],
      ['INSERT INTO people (id,name) VALUES ($1,$2)', [2, null]],
      ['COMMIT'],
      ['BEGIN'],
      ['COMMIT'],
    ]);
    expect(await connection.getAutoCommit()).toBe(true);
  });

  it('should not open or close transactions twice', async () => {
    const client = fakeClient();
    const connection = new PgInsertConnection(client);

    await connection.setAutoCommit(true);
    await connection.commit();
    await connection.setAutoCommit(false);
    await connection.setAutoCommit(false);

    expect(client.query.mock.calls).toEqual([['BEGIN']]);
  });

  it('should execute plain statements', async () => {
    const client = fakeClient();
    await new PgInsertConnection(client).execute('DROP TABLE IF EXISTS people;');
    expect(client.query).toHaveBeenCalledWith('DROP TABLE IF EXISTS people;');
  });

  it('should roll back and reopen the transaction', async () => {
    const client = fakeClient();
    const connection = new PgInsertConnection(client);

    await connection.rollback();
    await connection.setAutoCommit(false);
    await connection.rollback();

    expect(client.query.mock.calls).toEqual([['BEGIN'], ['ROLLBACK'], ['BEGIN']]);
    expect(await connection.getAutoCommit()).toBe(false);
  });

  describe('validateInt64Transport', () => {
    it('should round-trip every probe value through the server', async () => {
      const client = fakeClient();

      expect(await new PgInsertConnection(client).validateInt64Transport()).toBe(true);
      expect(client.query.mock.calls).toEqual([
        ['SELECT $1::bigint::text AS value', ['1']],
        ['SELECT $1::bigint::text AS value', ['-1']],
        ['SELECT $1::bigint::text AS value', ['8589934592']],
        ['SELECT $1::bigint::text AS value', ['-8589934592']],
      ]);
    });

    it('should fail when values are truncated to 32 bits', async () => {
      const client = fakeClient((value) => String(Number(value) | 0));

      expect(await new PgInsertConnection(client).validateInt64Transport()).toBe(false);
      expect(client.query).toHaveBeenCalledTimes(3);
    });

    it('should fail when the server returns no row', async () => {
      const client = { query: vi.fn(async (_text: string, _values?: unknown[]) => ({ rows: [] })) };

      expect(await new PgInsertConnection(client).validateInt64Transport()).toBe(false);
    });
  });
});

describe('MssqlInsertConnection', () => {
  beforeEach(() => {
    mssqlLog.length = 0;
    mssqlServer.readBack = (value) => value;
  });

  it('should default to the SQL Server dialect', () => {
    const pool = new mssql.ConnectionPool({ server: 'localhost' });
    expect(new MssqlInsertConnection(pool).dialect).toBeInstanceOf(SqlServerDialect);
    expect(new MssqlInsertConnection(pool, new PdwDialect()).dialect.name).toBe('pdw');
  });

  it('should run statements on the pool while auto-commit is on', async () => {
    const connection = new MssqlInsertConnection(new mssql.ConnectionPool({ server: 'localhost' }));

    await connection.execute('CREATE TABLE people (id INTEGER);');

    expect(mssqlLog).toEqual(['batch on pool: CREATE TABLE people (id INTEGER);']);
  });

  it('should bind typed parameters inside a transaction', async () => {
    const connection = new MssqlInsertConnection(new mssql.ConnectionPool({ server: 'localhost' }));
    const sql = 'INSERT INTO people (id,name) VALUES (@p1,@p2)';

    await connection.setAutoCommit(false);
    expect(await connection.getAutoCommit()).toBe(false);
    await connection.executeBatch(sql, batch);
    await connection.commit();
    await connection.setAutoCommit(true);

    expect(mssqlLog).toEqual([
      'begin',
      `query on transaction: ${sql} [p1:Int=1, p2:NVarChar=a]`,
      `query on transaction: ${sql} [p1:Int=2, p2:NVarChar=null]`,
      'commit',
      'begin',
      'commit',
    ]);
    expect(await connection.getAutoCommit()).toBe(true);
  });

  it('should ignore commit and rollback without a transaction', async () => {
    const connection = new MssqlInsertConnection(new mssql.ConnectionPool({ server: 'localhost' }));
    await connection.commit();
    await connection.rollback();
    expect(mssqlLog).toEqual([]);
  });

  it('should roll back the open transaction and begin a new one', async () => {
    const connection = new MssqlInsertConnection(new mssql.ConnectionPool({ server: 'localhost' }));
    const sql = 'INSERT INTO people (id,name) VALUES (@p1,@p2)';

    await connection.setAutoCommit(false);
    await connection.executeBatch(sql, batch);
    await connection.rollback();
    await connection.setAutoCommit(true);

    expect(mssqlLog).toEqual([
      'begin',
      `query on transaction: ${sql} [p1:Int=1, p2:NVarChar=a]`,
      `query on transaction: ${sql} [p1:Int=2, p2:NVarChar=null]`,
      'rollback',
      'begin',
      'commit',
    ]);
  });

  describe('validateInt64Transport', () => {
    it('should bind every probe value as BigInt and read it back', async () => {
      const connection = new MssqlInsertConnection(new mssql.ConnectionPool({ server: 'localhost' }));
      const sql = 'SELECT CAST(@p1 AS BIGINT) AS value';

      expect(await connection.validateInt64Transport()).toBe(true);
      expect(mssqlLog).toEqual([
        `query on pool: ${sql} [p1:BigInt=1]`,
        `query on pool: ${sql} [p1:BigInt=-1]`,
        `query on pool: ${sql} [p1:BigInt=8589934592]`,
        `query on pool: ${sql} [p1:BigInt=-8589934592]`,
      ]);
    });

    it('should accept values read back as numbers', async () => {
      mssqlServer.readBack = (value) => Number(value);
      const connection = new MssqlInsertConnection(new mssql.ConnectionPool({ server: 'localhost' }));

      expect(await connection.validateInt64Transport()).toBe(true);
    });

    it('should fail when values are truncated to 32 bits', async () => {
      mssqlServer.readBack = (value) => Number(value) | 0;
      const connection = new MssqlInsertConnection(new mssql.ConnectionPool({ server: 'localhost' }));

      expect(await connection.validateInt64Transport()).toBe(false);
      expect(mssqlLog).toHaveLength(3);
    });
  });
});
