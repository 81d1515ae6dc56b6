/**
 * Scoped auto-commit suspension.
 * @module sql-table-insert/execution/auto-commit
 */

import type { InsertConnection } from '../connection/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';

/**
 * Runs `fn` with auto-commit turned off and restores the original setting on
 * every exit path.
 *
 * `fn` receives whether auto-commit was actually suspended, i.e. whether it
 * owns committing its work. When the body fails, its uncommitted work is
 * rolled back before auto-commit is restored. Failures of either step are
 * logged and the body's error wins.
 *
 * @example
 * ```typescript
 * await withAutoCommitSuspended(connection, async (suspended) => {
 *   await connection.executeBatch(sql, batch);
 *   if (suspended) await connection.commit();
 * });
 * ```
 */
export async function withAutoCommitSuspended<T>(
  connection: InsertConnection,
  fn: (suspended: boolean) => Promise<T>,
  logger: Logger = new NoopLogger()
): Promise<T> {
  const original = await connection.getAutoCommit();
  if (!original) {
    return fn(false);
  }

  await connection.setAutoCommit(false);
  let result: T;
  try {
    result = await fn(true);
  } catch (error) {
    try {
      await connection.rollback();
    } catch (rollbackError) {
      logger.warn('Failed to roll back', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
    try {
      await connection.setAutoCommit(true);
    } catch (restoreError) {
      logger.warn('Failed to restore auto-commit', {
        error: restoreError instanceof Error ? restoreError.message : String(restoreError),
      });
    }
    throw error;
  }

  await connection.setAutoCommit(true);
  return result;
}
