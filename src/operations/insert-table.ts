/**
 * Insert Table
 *
 * Sends tabular data to a table on the server: drops and creates the table
 * when asked, then fills it with the strategy the backend is best at.
 * @module sql-table-insert/operations/insert-table
 */

import type { InsertConnection } from '../connection/index.js';
import type { SqlTranslator } from '../dialect/index.js';
import type { BulkLoadAdapter, BulkTransport } from '../bulk/index.js';
import { createBulkLoadAdapter, NodeBulkTransport } from '../bulk/index.js';
import {
  bulkLoadConfigFromEnv,
  insertDefaultsFromEnv,
  parseFlag,
  type BulkLoadConfig,
  type Env,
} from '../config/index.js';
import { camelCaseToSnakeCase, findReservedWords } from '../escaping/index.js';
import { BatchedInsertExecutor, CtasMaterializer } from '../execution/index.js';
import { renameColumns, validateTableData } from '../frame/index.js';
import { describeColumns } from '../inference/index.js';
import type { Logger } from '../observability/index.js';
import { ConsoleLogger, warnRegularly } from '../observability/index.js';
import { InvalidDataError } from '../errors/index.js';
import { buildCreateTableSql, buildDropTableSql } from '../sql/index.js';
import { buildInsertPlan, selectStrategy } from '../strategy/index.js';
import { InsertStrategy, type ProgressCallback, type TableData, type TableTarget } from '../types/index.js';

// ============================================================================
// Options
// ============================================================================

/**
 * Options for {@link insertTable}.
 */
export interface InsertTableOptions {
  /** Schema of the table; ignored for temp tables */
  databaseSchema?: string;
  /** Table name. A leading `#` marks a temp table. */
  tableName: string;
  /** Data to insert */
  data: TableData;
  /** Drop the table first if it exists (default: true). Implies `createTable`. */
  dropTableIfExists?: boolean;
  /** Create the table; otherwise append to an existing one (default: true) */
  createTable?: boolean;
  /** Create a session-scoped table (default: false) */
  tempTable?: boolean;
  /** @deprecated Use `tempEmulationSchema` */
  oracleTempSchema?: string;
  /** Schema holding emulated temp tables on backends without real ones */
  tempEmulationSchema?: string;
  /**
   * Use the backend's staged bulk loader where one applies. `true` or the
   * text `TRUE` enables it (default: `TABLE_INSERT_BULK_LOAD`).
   */
  bulkLoad?: boolean | string;
  /** @deprecated Use `bulkLoad` (default: `USE_MPP_BULK_LOAD`) */
  useMppBulkLoad?: boolean | string;
  /** Log progress at info level when no `onProgress` callback is given */
  progressBar?: boolean;
  /** Receives the processed fraction (0..1) */
  onProgress?: ProgressCallback;
  /** Convert camelCase column names to snake_case */
  camelCaseToSnakeCase?: boolean;
  /** Rows per insert batch (default: 10000) */
  batchSize?: number;
  /** Logger (default: console at WARN) */
  logger?: Logger;
  /** Bulk loader settings (default: read from the environment) */
  bulkLoadConfig?: BulkLoadConfig;
  /** Side effects of bulk loading (default: {@link NodeBulkTransport}) */
  transport?: BulkTransport;
  /** Translates the drop and create statements (default: the connection's dialect) */
  translator?: SqlTranslator;
  /** Environment consulted for defaults (default: `process.env`) */
  env?: Env;
  /** Read-side option; has no effect on inserts */
  bigintAsNumber?: boolean;
}

/**
 * Outcome of {@link insertTable}.
 */
export interface InsertTableResult {
  /** Strategy that filled the table */
  strategy: InsertStrategy;
  /** Escaped, qualified table name */
  qualifiedName: string;
  /** Rows sent to the server */
  rowsInserted: number;
}

// ============================================================================
// Option Resolution
// ============================================================================

interface ResolvedOptions {
  target: TableTarget;
  data: TableData;
  createTable: boolean;
  dropTableIfExists: boolean;
  bulkLoad: boolean;
  tempEmulationSchema?: string;
}

function isSet(value: boolean | string | undefined): value is boolean | string {
  return value !== undefined && value !== '';
}

function resolveOptions(options: InsertTableOptions, logger: Logger): ResolvedOptions {
  const envDefaults = insertDefaultsFromEnv(options.env ?? process.env);

  let bulkLoad = options.bulkLoad ?? envDefaults.bulkLoad;
  const useMppBulkLoad = options.useMppBulkLoad ?? envDefaults.useMppBulkLoad;
  if (isSet(useMppBulkLoad)) {
    warnRegularly(logger, 'useMppBulkLoad', "The 'useMppBulkLoad' argument is deprecated. Use 'bulkLoad' instead.");
    bulkLoad = useMppBulkLoad;
  }

  let tempEmulationSchema = options.tempEmulationSchema;
  if (isSet(options.oracleTempSchema)) {
    warnRegularly(
      logger,
      'oracleTempSchema',
      "The 'oracleTempSchema' argument is deprecated. Use 'tempEmulationSchema' instead."
    );
    tempEmulationSchema = options.oracleTempSchema;
  }

  const data = options.camelCaseToSnakeCase ? renameColumns(options.data, camelCaseToSnakeCase) : options.data;

  let tempTable = options.tempTable ?? false;
  let name = options.tableName;
  if (name.startsWith('#')) {
    if (!tempTable) {
      tempTable = true;
      logger.warn('Temp table name detected, setting tempTable parameter to TRUE', { tableName: name });
    }
    name = name.slice(1);
  }

  let schema = options.databaseSchema;
  if (tempTable && schema) {
    logger.warn('Temp tables cannot be placed in a schema; ignoring databaseSchema', { databaseSchema: schema });
    schema = undefined;
  }

  if (options.batchSize !== undefined && (!Number.isInteger(options.batchSize) || options.batchSize <= 0)) {
    throw new InvalidDataError(`batchSize must be a positive integer, got ${options.batchSize}`, {
      batchSize: options.batchSize,
    });
  }

  const dropTableIfExists = options.dropTableIfExists ?? true;
  return {
    target: schema ? { schema, name, isTemporary: tempTable } : { name, isTemporary: tempTable },
    data,
    createTable: dropTableIfExists || (options.createTable ?? true),
    dropTableIfExists,
    bulkLoad: parseFlag(bulkLoad),
    tempEmulationSchema,
  };
}

function progressCallback(options: InsertTableOptions, logger: Logger): ProgressCallback | undefined {
  if (options.onProgress) return options.onProgress;
  if (!options.progressBar) return undefined;
  return (fraction) => logger.info(`Inserting data: ${Math.round(fraction * 100)}%`, { fraction });
}

// ============================================================================
// Insert Table
// ============================================================================

/**
 * Inserts tabular data into a table on the server.
 *
 * Steps, in order: resolve options and warnings, infer column types, choose
 * a strategy, verify the bulk loader if one is used, drop and create the
 * table, then fill it. Any failure propagates; connection auto-commit is
 * restored before it does.
 *
 * @example
 * ```typescript
 * const connection = new PgInsertConnection(client);
 * await insertTable(connection, {
 *   databaseSchema: 'scratch',
 *   tableName: 'people',
 *   data: tableDataFromRecords([{ id: 1, name: 'Alice' }, { id: 2, name: null }]),
 * });
 * ```
 *
 * @throws {InvalidDataError} If the data has no columns or ragged columns
 * @throws {QuotingUnsupportedError} If a name needs quoting the connection lacks
 * @throws {Int64TransportError} If BIGINT values cannot be transported
 * @throws {BulkLoadCredentialsError} If the bulk loader cannot be confirmed
 * @throws {BulkLoadError} If the bulk loader fails
 */
export async function insertTable(
  connection: InsertConnection,
  options: InsertTableOptions
): Promise<InsertTableResult> {
  const baseLogger = options.logger ?? new ConsoleLogger();
  const resolved = resolveOptions(options, baseLogger);
  const { target, data, createTable, dropTableIfExists } = resolved;
  const logger = baseLogger.child({ table: target.name });
  const dialect = connection.dialect;
  const translator = options.translator ?? dialect;
  const translateOptions = { tempEmulationSchema: resolved.tempEmulationSchema };

  const rows = validateTableData(data);

  const reserved = findReservedWords([target.name, ...data.columns.map((column) => column.name)]);
  if (reserved.length > 0) {
    logger.warn(`The following names are SQL reserved words: ${reserved.join(', ')}`, { reserved });
  }

  const strategy = selectStrategy({
    dialect,
    createTable,
    isTemporary: target.isTemporary,
    bulkLoadRequested: resolved.bulkLoad,
    rowCount: rows,
  });
  const plan = buildInsertPlan(dialect, target, describeColumns(data), strategy, translateOptions);
  logger.debug('Insert plan ready', { strategy, table: plan.qualifiedName, rows });

  let bulkLoader: BulkLoadAdapter | undefined;
  if (strategy === InsertStrategy.BulkLoad) {
    const config = options.bulkLoadConfig ?? bulkLoadConfigFromEnv(options.env);
    bulkLoader = createBulkLoadAdapter(dialect.name, {
      connection,
      config,
      transport: options.transport ?? new NodeBulkTransport({ stagingDir: config.localStagingDir }),
      logger,
    });
    await bulkLoader.verify();
  }

  if (dropTableIfExists) {
    const sql = translator.translate(buildDropTableSql(plan), translateOptions);
    logger.debug('Dropping table', { sql });
    await connection.execute(sql);
  }

  const loaderCreatesTable = strategy === InsertStrategy.BulkLoad && dialect.name === 'hive';
  if (createTable && strategy !== InsertStrategy.CtasHack && !loaderCreatesTable) {
    const sql = translator.translate(buildCreateTableSql(dialect, plan), translateOptions);
    logger.debug('Creating table', { sql });
    await connection.execute(sql);
  }

  const onProgress = progressCallback(options, logger);
  let rowsInserted: number;
  if (bulkLoader) {
    logger.info('Attempting to use bulk loading...');
    rowsInserted = (await bulkLoader.load(plan, data)).rowsLoaded;
    onProgress?.(1);
  } else if (strategy === InsertStrategy.CtasHack) {
    rowsInserted = await new CtasMaterializer(connection, { onProgress, logger }).materialize(plan, data);
  } else {
    const result = await new BatchedInsertExecutor(connection, {
      batchSize: options.batchSize,
      onProgress,
      logger,
    }).execute(plan, data);
    rowsInserted = result.rowsInserted;
  }

  return { strategy, qualifiedName: plan.qualifiedName, rowsInserted };
}
