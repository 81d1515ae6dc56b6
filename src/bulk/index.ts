/**
 * Bulk loading: staged loaders per backend and the transport they run on.
 * @module sql-table-insert/bulk
 */

import type { DialectName } from '../dialect/index.js';
import { ConfigurationError } from '../errors/index.js';
import type { BulkLoadAdapter, BulkLoadContext } from './adapter.js';
import { HiveBulkLoadAdapter } from './hive.js';
import { PdwBulkLoadAdapter } from './pdw.js';
import { PostgresqlBulkLoadAdapter } from './postgresql.js';
import { RedshiftBulkLoadAdapter } from './redshift.js';

export {
  stagingName,
  sqlString,
  assertProcessSucceeded,
  cleanUp,
  type BulkLoadAdapter,
  type BulkLoadContext,
  type BulkLoadResult,
} from './adapter.js';
export { tableDataToDelimited, type DelimitedOptions } from './csv.js';
export {
  NodeBulkTransport,
  type BulkTransport,
  type NodeBulkTransportOptions,
  type ObjectStoreTarget,
  type PutObjectRequest,
  type ProcessRequest,
  type ProcessResult,
} from './transport.js';
export { RedshiftBulkLoadAdapter, buildRedshiftCopySql, redshiftObjectKey } from './redshift.js';
export { PdwBulkLoadAdapter, buildDwloaderArgs, PDW_FIELD_DELIMITER } from './pdw.js';
export { PostgresqlBulkLoadAdapter, buildCopyCommand, psqlExecutable } from './postgresql.js';
export { HiveBulkLoadAdapter, buildHiveCreateSql } from './hive.js';

const BULK_LOAD_ADAPTERS: Partial<Record<DialectName, (context: BulkLoadContext) => BulkLoadAdapter>> = {
  redshift: (context) => new RedshiftBulkLoadAdapter(context),
  pdw: (context) => new PdwBulkLoadAdapter(context),
  postgresql: (context) => new PostgresqlBulkLoadAdapter(context),
  hive: (context) => new HiveBulkLoadAdapter(context),
};

/**
 * Creates the bulk loader for a backend. Its configuration section is
 * validated immediately.
 *
 * @throws {ConfigurationError} If the backend has no bulk loader
 * @throws {BulkLoadCredentialsError} If its configuration is incomplete
 */
export function createBulkLoadAdapter(dialect: DialectName, context: BulkLoadContext): BulkLoadAdapter {
  const factory = BULK_LOAD_ADAPTERS[dialect];
  if (!factory) {
    throw new ConfigurationError(`No bulk loader for dialect: ${dialect}`, { dialect });
  }
  return factory(context);
}
