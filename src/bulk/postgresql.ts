/**
 * PostgreSQL Bulk Loader
 *
 * Stages a CSV file and loads it with psql's client-side `\copy`.
 * @module sql-table-insert/bulk/postgresql
 */

import { join } from 'path';
import type { InsertPlan, TableData } from '../types/index.js';
import type { DialectName } from '../dialect/index.js';
import { parsePostgresqlBulkConfig, type PostgresqlBulkConfig } from '../config/index.js';
import { BulkLoadCredentialsError } from '../errors/index.js';
import { validateTableData } from '../frame/index.js';
import {
  assertProcessSucceeded,
  cleanUp,
  sqlString,
  stagingName,
  type BulkLoadAdapter,
  type BulkLoadContext,
  type BulkLoadResult,
} from './adapter.js';
import { tableDataToDelimited } from './csv.js';

/**
 * Full path of the psql executable in a bin directory.
 */
export function psqlExecutable(binPath: string, platform: NodeJS.Platform = process.platform): string {
  return join(binPath, platform === 'win32' ? 'psql.exe' : 'psql');
}

/**
 * The `\copy` meta-command loading a staged CSV file.
 */
export function buildCopyCommand(plan: InsertPlan, file: string): string {
  const path = file.replace(/\\/g, '/');
  return (
    `\\copy ${plan.qualifiedName} (${plan.fieldNames.join(',')}) FROM ${sqlString(path)} ` +
    `NULL AS '' DELIMITER ',' CSV HEADER;`
  );
}

/**
 * Bulk loader for PostgreSQL.
 */
export class PostgresqlBulkLoadAdapter implements BulkLoadAdapter {
  readonly dialect: DialectName = 'postgresql';
  private readonly context: BulkLoadContext;
  private readonly config: PostgresqlBulkConfig;

  /**
   * @throws {BulkLoadCredentialsError} If the PostgreSQL section is incomplete
   */
  constructor(context: BulkLoadContext) {
    this.context = context;
    this.config = parsePostgresqlBulkConfig(context.config);
  }

  async verify(): Promise<void> {
    const psql = psqlExecutable(this.config.binPath);
    if (!(await this.context.transport.executableExists(psql))) {
      throw new BulkLoadCredentialsError(
        `Bulk load credentials could not be confirmed: psql not found at ${psql}`,
        ['postgresql.binPath']
      );
    }
  }

  async load(plan: InsertPlan, data: TableData): Promise<BulkLoadResult> {
    const rows = validateTableData(data);
    const { transport, logger } = this.context;
    const file = await transport.writeStagingFile(stagingName('.csv'), tableDataToDelimited(data));

    try {
      logger.debug('Running psql \\copy', { table: plan.qualifiedName, file });
      const result = await transport.runProcess({
        command: psqlExecutable(this.config.binPath),
        args: [
          '-h', this.config.host,
          '-p', String(this.config.port),
          '-d', this.config.database,
          '-U', this.config.user,
          '-c', buildCopyCommand(plan, file),
        ],
        env: this.config.password !== undefined ? { PGPASSWORD: this.config.password } : undefined,
      });
      assertProcessSucceeded('psql', result);
    } finally {
      await cleanUp(logger, [() => transport.removeStagingFile(file)]);
    }

    return { rowsLoaded: rows };
  }
}
