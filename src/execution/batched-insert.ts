/**
 * Batched Insert Executor
 *
 * Loads table data with one parameterized INSERT, bound batch by batch.
 * @module sql-table-insert/execution/batched-insert
 */

import type { InsertConnection } from '../connection/index.js';
import type { InsertPlan, ProgressCallback, TableData } from '../types/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { buildInsertSql } from '../sql/index.js';
import { validateTableData } from '../frame/index.js';
import { withAutoCommitSuspended } from './auto-commit.js';
import { bindBatch, DEFAULT_BATCH_SIZE, partitionRows } from './binding.js';
import { assertInt64Transport } from './int64.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Batched insert options.
 */
export interface BatchedInsertOptions {
  /** Rows per batch (default: 10000) */
  batchSize?: number;
  /** Receives the processed fraction after each batch */
  onProgress?: ProgressCallback;
  /** Logger */
  logger?: Logger;
}

/**
 * Result of a batched insert.
 */
export interface BatchedInsertResult {
  /** Rows sent to the server */
  rowsInserted: number;
  /** Batches executed */
  batchesProcessed: number;
}

// ============================================================================
// Executor
// ============================================================================

/**
 * Executes the direct-insert strategy.
 *
 * Batches run strictly in order. While auto-commit is suspended every
 * successful batch is committed; a failing batch stops the load and its error
 * propagates after auto-commit is restored.
 *
 * @example
 * ```typescript
 * const executor = new BatchedInsertExecutor(connection, { batchSize: 5000 });
 * const result = await executor.execute(plan, data);
 * console.log(`Inserted ${result.rowsInserted} rows`);
 * ```
 */
export class BatchedInsertExecutor {
  private readonly connection: InsertConnection;
  private readonly batchSize: number;
  private readonly onProgress?: ProgressCallback;
  private readonly logger: Logger;

  constructor(connection: InsertConnection, options: BatchedInsertOptions = {}) {
    this.connection = connection;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Inserts every row of `data` into the plan's table.
   *
   * @throws {Int64TransportError} If BIGINT values cannot be transported
   * @throws {InvalidDataError} If the batch size is invalid
   */
  async execute(plan: InsertPlan, data: TableData): Promise<BatchedInsertResult> {
    const total = validateTableData(data);
    const ranges = partitionRows(total, this.batchSize);
    const sql = this.connection.dialect.translatePlaceholders(buildInsertSql(plan));

    if (plan.columns.some((column) => column.semanticType === 'integer64')) {
      await assertInt64Transport(this.connection);
    }

    if (ranges.length === 0) {
      return { rowsInserted: 0, batchesProcessed: 0 };
    }

    return withAutoCommitSuspended(
      this.connection,
      async (suspended) => {
        let rowsInserted = 0;
        for (const range of ranges) {
          const batch = bindBatch(data, range);
          this.logger.debug('Executing insert batch', {
            batch: batch.index,
            rows: batch.rowCount,
            sql,
          });
          await this.connection.executeBatch(sql, batch);
          if (suspended) {
            await this.connection.commit();
          }
          rowsInserted += batch.rowCount;
          this.onProgress?.(rowsInserted / total);
        }
        return { rowsInserted, batchesProcessed: ranges.length };
      },
      this.logger
    );
  }
}
