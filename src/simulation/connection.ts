/**
 * Recording Connection
 *
 * In-process connection that records every call, for tests and dry runs.
 * @module sql-table-insert/simulation/connection
 */

import type { InsertConnection } from '../connection/index.js';
import { batchRows } from '../connection/index.js';
import type { Dialect } from '../dialect/index.js';
import { GenericDialect } from '../dialect/index.js';
import type { BoundBatch, BoundValue } from '../types/index.js';

/**
 * One recorded connection call.
 */
export type ConnectionEvent =
  | { type: 'execute'; sql: string }
  | { type: 'batch'; sql: string; batch: BoundBatch; rows: BoundValue[][] }
  | { type: 'autoCommit'; value: boolean }
  | { type: 'commit' }
  | { type: 'rollback' };

/**
 * Recording connection options.
 */
export interface RecordingConnectionOptions {
  /** Dialect profile (default: generic) */
  dialect?: Dialect;
  /** Initial auto-commit setting (default: true) */
  autoCommit?: boolean;
  /** Zero-based batch index whose execution fails */
  failOnBatch?: number;
  /** Statements matching this pattern fail on `execute` */
  failOnStatement?: RegExp;
  /** Result of the 64-bit integer check; omitted means the connection has none */
  int64TransportValid?: boolean;
}

/**
 * Connection that records statements, batches and auto-commit changes
 * instead of talking to a server.
 *
 * @example
 * ```typescript
 * const connection = new RecordingConnection({ dialect: new PostgresqlDialect() });
 * await insertTable(connection, { tableName: 'people', data });
 * connection.statements(); // ['DROP TABLE IF EXISTS people;', 'CREATE TABLE ...']
 * ```
 */
export class RecordingConnection implements InsertConnection {
  readonly dialect: Dialect;
  readonly events: ConnectionEvent[] = [];
  readonly validateInt64Transport?: () => Promise<boolean>;
  private autoCommit: boolean;
  private readonly failOnBatch?: number;
  private readonly failOnStatement?: RegExp;

  constructor(options: RecordingConnectionOptions = {}) {
    this.dialect = options.dialect ?? new GenericDialect();
    this.autoCommit = options.autoCommit ?? true;
    this.failOnBatch = options.failOnBatch;
    this.failOnStatement = options.failOnStatement;

    const int64Valid = options.int64TransportValid;
    if (int64Valid !== undefined) {
      this.validateInt64Transport = async () => int64Valid;
    }
  }

  async execute(sql: string): Promise<void> {
    this.events.push({ type: 'execute', sql });
    if (this.failOnStatement?.test(sql)) {
      throw new Error(`Simulated failure executing: ${sql}`);
    }
  }

  async executeBatch(sql: string, batch: BoundBatch): Promise<void> {
    this.events.push({ type: 'batch', sql, batch, rows: batchRows(batch) });
    if (this.failOnBatch === batch.index) {
      throw new Error(`Simulated failure in batch ${batch.index}`);
    }
  }

  async getAutoCommit(): Promise<boolean> {
    return this.autoCommit;
  }

  async setAutoCommit(value: boolean): Promise<void> {
    this.events.push({ type: 'autoCommit', value });
    this.autoCommit = value;
  }

  async commit(): Promise<void> {
    this.events.push({ type: 'commit' });
  }

  async rollback(): Promise<void> {
    this.events.push({ type: 'rollback' });
  }

  /** Statements passed to `execute`, in order */
  statements(): string[] {
    return this.events.flatMap((event) => (event.type === 'execute' ? [event.sql] : []));
  }

  /** Batches passed to `executeBatch`, in order */
  batches(): Array<Extract<ConnectionEvent, { type: 'batch' }>> {
    return this.events.flatMap((event) => (event.type === 'batch' ? [event] : []));
  }

  /** Current auto-commit setting */
  get currentAutoCommit(): boolean {
    return this.autoCommit;
  }
}
