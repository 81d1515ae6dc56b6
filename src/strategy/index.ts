/**
 * Insert Strategy Selection
 *
 * Pure decision over dialect capabilities and call flags, plus the immutable
 * insert plan built from it.
 * @module sql-table-insert/strategy
 */

import type { Dialect, DialectName, TranslateOptions } from '../dialect/index.js';
import { escapeIdentifiers } from '../escaping/index.js';
import { InsertStrategy, type ColumnDescriptor, type InsertPlan, type TableTarget } from '../types/index.js';

/**
 * Dialects whose bulk loader only takes permanent tables.
 */
const PERMANENT_TABLE_BULK_DIALECTS: readonly DialectName[] = ['redshift', 'pdw', 'postgresql'];

/**
 * Inputs to {@link selectStrategy}.
 */
export interface StrategyInput {
  dialect: Pick<Dialect, 'name' | 'bulkLoad' | 'ctas'>;
  createTable: boolean;
  isTemporary: boolean;
  bulkLoadRequested: boolean;
  rowCount: number;
}

/**
 * Chooses exactly one execution strategy. First match wins:
 *
 * 1. bulk load, when requested and the backend can stage it: Hive only while
 *    creating the table, Redshift / PDW / PostgreSQL only for permanent tables
 * 2. create-as-select, for dialects that prefer it when creating a non-empty table
 * 3. parameterized batched insert
 */
export function selectStrategy(input: StrategyInput): InsertStrategy {
  const { dialect, createTable, isTemporary, bulkLoadRequested, rowCount } = input;

  const useBulkLoad =
    bulkLoadRequested &&
    dialect.bulkLoad &&
    ((dialect.name === 'hive' && createTable) ||
      (PERMANENT_TABLE_BULK_DIALECTS.includes(dialect.name) && !isTemporary));
  if (useBulkLoad) {
    return InsertStrategy.BulkLoad;
  }

  if (dialect.ctas && createTable && rowCount > 0) {
    return InsertStrategy.CtasHack;
  }

  return InsertStrategy.DirectInsert;
}

/**
 * Builds the frozen plan for one insert call.
 *
 * @throws {QuotingUnsupportedError} If a name needs quoting the dialect lacks
 */
export function buildInsertPlan(
  dialect: Dialect,
  target: TableTarget,
  columns: readonly ColumnDescriptor[],
  strategy: InsertStrategy,
  options: TranslateOptions = {}
): InsertPlan {
  const fieldNames = escapeIdentifiers(
    columns.map((c) => c.name),
    dialect.identifierQuote
  );

  return Object.freeze({
    target: Object.freeze({ ...target }),
    columns: Object.freeze(columns.map((c) => Object.freeze({ ...c }))),
    strategy,
    qualifiedName: dialect.qualifyTable(target, options),
    fieldNames: Object.freeze(fieldNames),
  });
}
