/**
 * Core Types
 *
 * Shared type definitions for the table insert engine: semantic column data,
 * table targets, column descriptors, insert plans and bound batches.
 * @module sql-table-insert/types
 */

// ============================================================================
// Semantic Column Data
// ============================================================================

/**
 * Semantic value type of a column, independent of any SQL dialect.
 */
export type SemanticType = 'integer32' | 'integer64' | 'float' | 'date' | 'datetime' | 'text';

/**
 * 32-bit integer column.
 */
export interface Integer32Column {
  name: string;
  type: 'integer32';
  values: ReadonlyArray<number | null | undefined>;
}

/**
 * 64-bit integer column. Values are carried as `bigint` to avoid precision loss.
 */
export interface Integer64Column {
  name: string;
  type: 'integer64';
  values: ReadonlyArray<bigint | null | undefined>;
}

/**
 * Floating point column. `NaN` is treated as an absent value.
 */
export interface FloatColumn {
  name: string;
  type: 'float';
  values: ReadonlyArray<number | null | undefined>;
}

/**
 * Date-only column. Only the UTC calendar date of each value is used.
 */
export interface DateColumn {
  name: string;
  type: 'date';
  values: ReadonlyArray<Date | null | undefined>;
}

/**
 * Timestamp column. Values are rendered in UTC.
 */
export interface DateTimeColumn {
  name: string;
  type: 'datetime';
  values: ReadonlyArray<Date | null | undefined>;
}

/**
 * Text column. When `levels` is present the column is categorical and its
 * width is taken from the longest category label.
 */
export interface TextColumn {
  name: string;
  type: 'text';
  values: ReadonlyArray<string | null | undefined>;
  levels?: readonly string[];
}

/**
 * A named, typed column of values.
 */
export type Column =
  | Integer32Column
  | Integer64Column
  | FloatColumn
  | DateColumn
  | DateTimeColumn
  | TextColumn;

/**
 * Column-oriented tabular data. All columns have the same number of rows.
 */
export interface TableData {
  columns: readonly Column[];
}

// ============================================================================
// Targets and Plans
// ============================================================================

/**
 * Identity of the destination table.
 */
export interface TableTarget {
  /** Database schema, if any */
  schema?: string;
  /** Table name, without any temp-table prefix */
  name: string;
  /** Whether the table is session-scoped */
  isTemporary: boolean;
}

/**
 * A column as it will be created and bound on the server.
 */
export interface ColumnDescriptor {
  name: string;
  semanticType: SemanticType;
  inferredSqlType: string;
  /** Longest observed text length; only set for text columns */
  maxTextLength?: number;
}

/**
 * Execution strategy chosen for one insert call.
 */
export enum InsertStrategy {
  DirectInsert = 'DIRECT_INSERT',
  BulkLoad = 'BULK_LOAD',
  CtasHack = 'CTAS_HACK',
}

/**
 * Immutable plan for one insert call.
 */
export interface InsertPlan {
  readonly target: Readonly<TableTarget>;
  readonly columns: readonly ColumnDescriptor[];
  readonly strategy: InsertStrategy;
  /** Escaped, dialect-qualified table name used in generated statements */
  readonly qualifiedName: string;
  /** Escaped column names in source order */
  readonly fieldNames: readonly string[];
}

// ============================================================================
// Bound Batches
// ============================================================================

/**
 * Driver-level binding kind of a column.
 */
export type BindingKind = 'integer' | 'bigint' | 'numeric' | 'date' | 'datetime' | 'string';

/**
 * Values of one column for one batch, already converted for binding.
 */
export type BoundColumn =
  | { kind: 'integer'; values: (number | null)[] }
  | { kind: 'bigint'; values: (string | null)[] }
  | { kind: 'numeric'; values: (number | null)[] }
  | { kind: 'date'; values: (string | null)[] }
  | { kind: 'datetime'; values: (string | null)[] }
  | { kind: 'string'; values: (string | null)[] };

/**
 * A bounded, ordered slice of rows bound column by column.
 */
export interface BoundBatch {
  /** Zero-based batch number */
  index: number;
  /** First source row (inclusive) */
  start: number;
  /** Last source row (exclusive) */
  end: number;
  /** Number of rows in the batch */
  rowCount: number;
  /** One entry per column, in column order */
  columns: BoundColumn[];
}

/**
 * A scalar value as passed to a driver.
 */
export type BoundValue = number | string | null;

/**
 * Progress callback receiving the processed fraction (0..1).
 */
export type ProgressCallback = (fraction: number) => void;
