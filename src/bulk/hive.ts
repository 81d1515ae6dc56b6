/**
 * Hive Bulk Loader
 *
 * Puts a `\001`-delimited text file into HDFS and creates the table over it.
 * @module sql-table-insert/bulk/hive
 */

import { join } from 'path';
import type { InsertPlan, TableData } from '../types/index.js';
import type { Dialect, DialectName } from '../dialect/index.js';
import { parseHiveBulkConfig, type HiveBulkConfig } from '../config/index.js';
import { BulkLoadCredentialsError } from '../errors/index.js';
import { validateTableData } from '../frame/index.js';
import { buildColumnDefinitions } from '../sql/index.js';
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
import type { ProcessRequest } from './transport.js';

/**
 * CREATE TABLE over a staged HDFS directory.
 */
export function buildHiveCreateSql(dialect: Dialect, plan: InsertPlan, location: string): string {
  return (
    `${dialect.createTableKeyword(plan.target)} ${plan.qualifiedName} (${buildColumnDefinitions(dialect, plan)}) ` +
    `ROW FORMAT DELIMITED FIELDS TERMINATED BY '\\001' STORED AS TEXTFILE LOCATION ${sqlString(location)}`
  );
}

/**
 * Bulk loader for Apache Hive. Creates the table itself.
 */
export class HiveBulkLoadAdapter implements BulkLoadAdapter {
  readonly dialect: DialectName = 'hive';
  private readonly context: BulkLoadContext;
  private readonly config: HiveBulkConfig;

  /**
   * @throws {BulkLoadCredentialsError} If the Hive section is incomplete
   */
  constructor(context: BulkLoadContext) {
    this.context = context;
    this.config = parseHiveBulkConfig(context.config);
  }

  private get hdfs(): string {
    return join(this.config.hadoopPath, 'hdfs');
  }

  async verify(): Promise<void> {
    if (!(await this.context.transport.executableExists(this.hdfs))) {
      throw new BulkLoadCredentialsError(
        `Bulk load credentials could not be confirmed: hdfs client not found at ${this.hdfs}`,
        ['hive.hadoopPath']
      );
    }
  }

  async load(plan: InsertPlan, data: TableData): Promise<BulkLoadResult> {
    const rows = validateTableData(data);
    const { connection, transport, logger } = this.context;
    const contents = tableDataToDelimited(data, {
      delimiter: '\u0001',
      includeHeader: false,
      nullValue: '\\N',
      quoteChar: null,
    });
    const name = stagingName('');
    const location = `${this.config.stagingDir.replace(/\/+$/, '')}/${name}`;
    const file = await transport.writeStagingFile(`${name}.txt`, contents);

    try {
      try {
        logger.debug('Copying staging file to HDFS', { file, location });
        assertProcessSucceeded('hdfs', await transport.runProcess(this.dfs(['-mkdir', '-p', location])));
        assertProcessSucceeded('hdfs', await transport.runProcess(this.dfs(['-put', file, `${location}/`])));
      } finally {
        await cleanUp(logger, [() => transport.removeStagingFile(file)]);
      }
      await connection.execute(buildHiveCreateSql(connection.dialect, plan, location));
    } catch (error) {
      // the table owns the location only once it exists
      await cleanUp(logger, [() => this.removeLocation(location)]);
      throw error;
    }

    return { rowsLoaded: rows };
  }

  private async removeLocation(location: string): Promise<void> {
    assertProcessSucceeded('hdfs', await this.context.transport.runProcess(this.dfs(['-rm', '-r', '-f', location])));
  }

  private dfs(args: string[]): ProcessRequest {
    return {
      command: this.hdfs,
      args: ['dfs', ...args],
      env: this.config.hadoopUser !== undefined ? { HADOOP_USER_NAME: this.config.hadoopUser } : undefined,
    };
  }
}
