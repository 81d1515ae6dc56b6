/**
 * Dialect Variants
 *
 * One class per supported backend.
 * @module sql-table-insert/dialect/dialects
 */

import type { TableTarget } from '../types/index.js';
import { BaseDialect, type DialectName, type TempTableConvention } from './base.js';

/**
 * Microsoft SQL Server. Parameters are bound as `@p1`, `@p2`, ...
 */
export class SqlServerDialect extends BaseDialect {
  override readonly name: DialectName = 'sql server';

  override translatePlaceholders(sql: string): string {
    return this.rewritePlaceholders(sql, (i) => `@p${i}`);
  }
}

/**
 * Parallel Data Warehouse. Supports dwloader bulk loads and create-as-select.
 */
export class PdwDialect extends SqlServerDialect {
  override readonly name: DialectName = 'pdw';
  override readonly bulkLoad = true;
  override readonly ctas = true;

  override ctasTableOptions(): string {
    return ' WITH (DISTRIBUTION = ROUND_ROBIN)';
  }
}

/**
 * PostgreSQL. Parameters are bound as `$1`, `$2`, ...
 */
export class PostgresqlDialect extends BaseDialect {
  override readonly name: DialectName = 'postgresql';
  override readonly tempTableConvention: TempTableConvention = 'temp-keyword';
  override readonly bulkLoad = true;
  protected override readonly dropIfExists = true;
  protected override readonly typeNames: Readonly<Record<string, string>> = {
    DATETIME2: 'TIMESTAMP',
  };

  override translatePlaceholders(sql: string): string {
    return this.rewritePlaceholders(sql, (i) => `$${i}`);
  }
}

/**
 * Amazon Redshift. Supports S3 COPY bulk loads and create-as-select.
 */
export class RedshiftDialect extends PostgresqlDialect {
  override readonly name: DialectName = 'redshift';
  override readonly ctas = true;
}

/**
 * Apache Hive. Loads through HDFS staging; temp tables are `TEMPORARY`.
 */
export class HiveDialect extends BaseDialect {
  override readonly name: DialectName = 'hive';
  override readonly tempTableConvention: TempTableConvention = 'temp-keyword';
  override readonly bulkLoad = true;
  override readonly ctas = true;
  protected override readonly dropIfExists = true;
  protected override readonly typeNames: Readonly<Record<string, string>> = {
    DATETIME2: 'TIMESTAMP',
    FLOAT: 'DOUBLE',
  };

  constructor() {
    super('`');
  }

  override createTableKeyword(target: TableTarget): string {
    return target.isTemporary ? 'CREATE TEMPORARY TABLE' : 'CREATE TABLE';
  }
}

/**
 * Google BigQuery. Temp tables live in the temp emulation schema.
 */
export class BigQueryDialect extends BaseDialect {
  override readonly name: DialectName = 'bigquery';
  override readonly tempTableConvention: TempTableConvention = 'emulated';
  override readonly ctas = true;
  protected override readonly dropIfExists = true;
  protected override readonly typeNames: Readonly<Record<string, string>> = {
    INTEGER: 'INT64',
    BIGINT: 'INT64',
    FLOAT: 'FLOAT64',
    DATETIME2: 'DATETIME',
    VARCHAR: 'STRING',
  };

  constructor() {
    super('`');
  }
}

/**
 * Any other backend. Statements are passed through untouched.
 */
export class GenericDialect extends BaseDialect {
  override readonly name: DialectName = 'generic';

  /**
   * @param identifierQuote - Quote character, or `null` when unsupported
   */
  constructor(identifierQuote: string | null = '"') {
    super(identifierQuote);
  }
}
