/**
 * SQL Table Insert
 *
 * Sends column-oriented tabular data to a table on a SQL server:
 * - Column type inference and dialect-aware identifier escaping
 * - Drop / create of the destination table, including temp tables
 * - Batched parameterized inserts with scoped auto-commit
 * - Create-as-select materialization on warehouse backends
 * - Staged bulk loading for Redshift, PDW, PostgreSQL and Hive
 * - `pg` and `mssql` connection adapters
 * - In-process recording connection and transport for testing
 *
 * @module sql-table-insert
 *
 * @example
 * ```typescript
 * import { connectPg, insertTable, tableDataFromRecords } from 'sql-table-insert';
 *
 * const { connection, close } = await connectPg({ host: 'localhost', database: 'scratch' });
 * try {
 *   await insertTable(connection, {
 *     databaseSchema: 'public',
 *     tableName: 'people',
 *     data: tableDataFromRecords([
 *       { id: 1, name: 'Alice' },
 *       { id: 2, name: null },
 *     ]),
 *   });
 * } finally {
 *   await close();
 * }
 * ```
 */

// ============================================================================
// Operations - Main Entry Point
// ============================================================================

export { insertTable, type InsertTableOptions, type InsertTableResult } from './operations/index.js';

// ============================================================================
// Types
// ============================================================================

export {
  InsertStrategy,
  type SemanticType,
  type Integer32Column,
  type Integer64Column,
  type FloatColumn,
  type DateColumn,
  type DateTimeColumn,
  type TextColumn,
  type Column,
  type TableData,
  type TableTarget,
  type ColumnDescriptor,
  type InsertPlan,
  type BindingKind,
  type BoundColumn,
  type BoundBatch,
  type BoundValue,
  type ProgressCallback,
} from './types/index.js';

// ============================================================================
// Table Data
// ============================================================================

export {
  validateTableData,
  rowCount,
  renameColumns,
  tableDataFromRecords,
  tableDataFromArrays,
  tableDataFromValues,
  inferColumn,
  cellText,
  formatDate,
  formatDateTime,
  isAbsent,
} from './frame/index.js';

export { DEFAULT_VARCHAR_LENGTH, measureTextLength, inferSqlType, describeColumns } from './inference/index.js';

export {
  PLAIN_IDENTIFIER_PATTERN,
  needsQuoting,
  quoteValue,
  unescapeQuoted,
  escapeLiteral,
  escapeIdentifiers,
  escapeIdentifier,
  camelCaseToSnakeCase,
  findReservedWords,
  isReservedWord,
} from './escaping/index.js';

// ============================================================================
// Dialects and Planning
// ============================================================================

export {
  BaseDialect,
  SqlServerDialect,
  PdwDialect,
  PostgresqlDialect,
  RedshiftDialect,
  HiveDialect,
  BigQueryDialect,
  GenericDialect,
  createDialect,
  isDialectName,
  rewritePlaceholders,
  type Dialect,
  type DialectName,
  type SqlTranslator,
  type TempTableConvention,
  type TranslateOptions,
} from './dialect/index.js';

export { selectStrategy, buildInsertPlan, type StrategyInput } from './strategy/index.js';

export { buildDropTableSql, buildColumnDefinitions, buildCreateTableSql, buildInsertSql } from './sql/index.js';

// ============================================================================
// Execution
// ============================================================================

export {
  withAutoCommitSuspended,
  DEFAULT_BATCH_SIZE,
  partitionRows,
  encodeInt64,
  decodeInt64,
  bindColumn,
  bindBatch,
  INT64_PROBE_VALUES,
  checkInt64Encoding,
  assertInt64Transport,
  BatchedInsertExecutor,
  cellLiteral,
  buildCtasSql,
  CtasMaterializer,
  type BatchRange,
  type BatchedInsertOptions,
  type BatchedInsertResult,
  type CtasMaterializerOptions,
} from './execution/index.js';

// ============================================================================
// Bulk Loading
// ============================================================================

export {
  createBulkLoadAdapter,
  RedshiftBulkLoadAdapter,
  PdwBulkLoadAdapter,
  PostgresqlBulkLoadAdapter,
  HiveBulkLoadAdapter,
  NodeBulkTransport,
  tableDataToDelimited,
  buildRedshiftCopySql,
  buildDwloaderArgs,
  buildCopyCommand,
  buildHiveCreateSql,
  type BulkLoadAdapter,
  type BulkLoadContext,
  type BulkLoadResult,
  type BulkTransport,
  type NodeBulkTransportOptions,
  type ObjectStoreTarget,
  type PutObjectRequest,
  type ProcessRequest,
  type ProcessResult,
  type DelimitedOptions,
} from './bulk/index.js';

// ============================================================================
// Connections
// ============================================================================

export {
  batchRows,
  PgInsertConnection,
  connectPg,
  MssqlInsertConnection,
  connectMssql,
  type InsertConnection,
  type PgQueryable,
} from './connection/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  SSE_TYPES,
  RedshiftBulkConfigSchema,
  PdwBulkConfigSchema,
  PostgresqlBulkConfigSchema,
  HiveBulkConfigSchema,
  validateBulkLoadConfig,
  parseRedshiftBulkConfig,
  parsePdwBulkConfig,
  parsePostgresqlBulkConfig,
  parseHiveBulkConfig,
  BulkLoadConfigBuilder,
  parseFlag,
  bulkLoadConfigFromEnv,
  insertDefaultsFromEnv,
  type BulkLoadConfig,
  type BulkLoadSection,
  type RedshiftBulkConfig,
  type SseType,
  type PdwBulkConfig,
  type PostgresqlBulkConfig,
  type HiveBulkConfig,
  type Env,
  type InsertDefaults,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  TableInsertErrorCode,
  TableInsertError,
  InvalidDataError,
  ConfigurationError,
  QuotingUnsupportedError,
  Int64TransportError,
  BulkLoadCredentialsError,
  BulkLoadError,
  isTableInsertError,
} from './errors/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  warnRegularly,
  resetRegularWarnings,
  REGULAR_WARNING_INTERVAL_MS,
  type Logger,
  type LogEntry,
} from './observability/index.js';

// ============================================================================
// Simulation
// ============================================================================

export {
  RecordingConnection,
  RecordingBulkTransport,
  type ConnectionEvent,
  type RecordingConnectionOptions,
  type RecordingBulkTransportOptions,
  type RecordedObject,
} from './simulation/index.js';
