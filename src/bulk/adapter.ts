/**
 * Bulk load adapter contract and helpers shared by the backend loaders.
 * @module sql-table-insert/bulk/adapter
 */

import { v4 as uuidv4 } from 'uuid';
import type { InsertConnection } from '../connection/index.js';
import type { BulkLoadConfig } from '../config/index.js';
import type { DialectName } from '../dialect/index.js';
import type { InsertPlan, TableData } from '../types/index.js';
import type { Logger } from '../observability/index.js';
import { BulkLoadError } from '../errors/index.js';
import type { BulkTransport, ProcessResult } from './transport.js';

/**
 * Everything a bulk loader needs besides the data.
 */
export interface BulkLoadContext {
  /** Connection the table lives on */
  connection: InsertConnection;
  /** Bulk load configuration; the loader validates its own section */
  config: BulkLoadConfig;
  /** Storage, file and process side effects */
  transport: BulkTransport;
  /** Logger */
  logger: Logger;
}

/**
 * Result of a bulk load.
 */
export interface BulkLoadResult {
  /** Rows handed to the loader */
  rowsLoaded: number;
}

/**
 * Staged bulk loader for one backend.
 */
export interface BulkLoadAdapter {
  /** Backend served */
  readonly dialect: DialectName;
  /**
   * Confirms that staging is reachable before any data moves.
   *
   * @throws {BulkLoadCredentialsError} If it is not
   */
  verify(): Promise<void>;
  /**
   * Stages the data and loads it into the plan's table. Staging artifacts
   * are removed on every exit path.
   */
  load(plan: InsertPlan, data: TableData): Promise<BulkLoadResult>;
}

/**
 * Unique name for a staging file or object.
 */
export function stagingName(extension: string): string {
  return `${uuidv4()}${extension}`;
}

/**
 * Embeds a value in a single-quoted SQL string by doubling quotes.
 */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Turns a non-zero exit into a {@link BulkLoadError}.
 */
export function assertProcessSucceeded(loader: string, result: ProcessResult): void {
  if (result.exitCode !== 0) {
    throw new BulkLoadError(`${loader} exited with code ${result.exitCode}: ${result.stderr.trim()}`, {
      exitCode: result.exitCode,
      stderr: result.stderr,
      context: { loader },
    });
  }
}

/**
 * Runs cleanup steps in order. Failures are logged, never thrown, so they
 * cannot hide the outcome of the load.
 */
export async function cleanUp(logger: Logger, steps: ReadonlyArray<() => Promise<void>>): Promise<void> {
  for (const step of steps) {
    try {
      await step();
    } catch (error) {
      logger.warn('Failed to remove bulk load staging artifact', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
