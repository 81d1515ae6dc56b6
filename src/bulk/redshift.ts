/**
 * Redshift Bulk Loader
 *
 * Stages a gzipped CSV in S3 and loads it with COPY.
 * @module sql-table-insert/bulk/redshift
 */

import { gzipSync } from 'zlib';
import type { InsertPlan, TableData } from '../types/index.js';
import type { DialectName } from '../dialect/index.js';
import { parseRedshiftBulkConfig, type RedshiftBulkConfig } from '../config/index.js';
import { BulkLoadCredentialsError } from '../errors/index.js';
import { validateTableData } from '../frame/index.js';
import { cleanUp, sqlString, stagingName, type BulkLoadAdapter, type BulkLoadContext, type BulkLoadResult } from './adapter.js';
import { tableDataToDelimited } from './csv.js';
import type { ObjectStoreTarget } from './transport.js';

/**
 * Builds the COPY statement for a staged object.
 *
 * @example
 * ```typescript
 * buildRedshiftCopySql('scratch.people', ['id', 'name'], 'load/1.csv.gz', config);
 * // COPY scratch.people (id,name) FROM 's3://staging/load/1.csv.gz' CREDENTIALS
 * //   'aws_access_key_id=...;aws_secret_access_key=...' REGION 'us-east-1'
 * //   DELIMITER ',' CSV GZIP IGNOREHEADER 1 EMPTYASNULL;
 * ```
 */
export function buildRedshiftCopySql(
  table: string,
  columns: readonly string[],
  key: string,
  config: RedshiftBulkConfig
): string {
  const credentials = `aws_access_key_id=${config.accessKeyId};aws_secret_access_key=${config.secretAccessKey}`;
  return (
    `COPY ${table} (${columns.join(',')}) FROM ${sqlString(`s3://${config.bucketName}/${key}`)} ` +
    `CREDENTIALS ${sqlString(credentials)} REGION ${sqlString(config.region)} ` +
    `DELIMITER ',' CSV GZIP IGNOREHEADER 1 EMPTYASNULL;`
  );
}

/**
 * Object key for a staged file under the configured prefix.
 */
export function redshiftObjectKey(prefix: string, name: string): string {
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  return trimmed ? `${trimmed}/${name}` : name;
}

/**
 * Bulk loader for Amazon Redshift.
 */
export class RedshiftBulkLoadAdapter implements BulkLoadAdapter {
  readonly dialect: DialectName = 'redshift';
  private readonly context: BulkLoadContext;
  private readonly config: RedshiftBulkConfig;
  private readonly target: ObjectStoreTarget;

  /**
   * @throws {BulkLoadCredentialsError} If the Redshift section is incomplete
   */
  constructor(context: BulkLoadContext) {
    this.context = context;
    this.config = parseRedshiftBulkConfig(context.config);
    this.target = {
      bucket: this.config.bucketName,
      region: this.config.region,
      accessKeyId: this.config.accessKeyId,
      secretAccessKey: this.config.secretAccessKey,
      endpoint: this.config.endpoint,
    };
  }

  async verify(): Promise<void> {
    if (!(await this.context.transport.bucketExists(this.target))) {
      throw new BulkLoadCredentialsError(
        `Bulk load credentials could not be confirmed: bucket ${this.config.bucketName} is not reachable`
      );
    }
  }

  async load(plan: InsertPlan, data: TableData): Promise<BulkLoadResult> {
    const rows = validateTableData(data);
    const { connection, transport, logger } = this.context;
    const key = redshiftObjectKey(this.config.objectKey, stagingName('.csv.gz'));
    const body = gzipSync(Buffer.from(tableDataToDelimited(data), 'utf8'));

    logger.debug('Uploading staging object', { bucket: this.config.bucketName, key, bytes: body.length });
    await transport.putObject(this.target, {
      key,
      body,
      contentType: 'application/gzip',
      serverSideEncryption: this.config.sseType,
    });

    try {
      logger.debug('Executing COPY', { table: plan.qualifiedName, key });
      await connection.execute(buildRedshiftCopySql(plan.qualifiedName, plan.fieldNames, key, this.config));
    } finally {
      await cleanUp(logger, [() => transport.deleteObject(this.target, key)]);
    }

    return { rowsLoaded: rows };
  }
}
