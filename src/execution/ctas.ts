/**
 * Create-as-select materializer: creates and fills a table with one statement
 * whose source rows are literal SELECTs joined by UNION ALL.
 * @module sql-table-insert/execution/ctas
 */

import type { InsertConnection } from '../connection/index.js';
import type { Dialect } from '../dialect/index.js';
import type { Column, InsertPlan, ProgressCallback, TableData } from '../types/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { escapeLiteral } from '../escaping/index.js';
import { cellText, validateTableData } from '../frame/index.js';

/**
 * SQL literal of one cell: quoted for text and temporal columns, bare for
 * numbers, `NULL` when absent.
 */
export function cellLiteral(column: Column, row: number): string {
  const text = cellText(column, row);
  if (text === null) return 'NULL';
  switch (column.type) {
    case 'integer32':
    case 'integer64':
    case 'float':
      return text;
    case 'date':
    case 'datetime':
    case 'text':
      return escapeLiteral(text);
  }
}

/**
 * Builds the create-as-select statement. Cells of the first row are wrapped
 * in `CAST(... AS <type>)` so every column gets its inferred type even when
 * the first value is NULL.
 *
 * @example
 * ```typescript
 * buildCtasSql(new RedshiftDialect(), plan, data);
 * // CREATE TABLE people AS SELECT * FROM (SELECT CAST(1 AS INTEGER) AS id,
 * //   CAST('a' AS VARCHAR(255)) AS name UNION ALL SELECT 2, NULL) t;
 * ```
 */
export function buildCtasSql(dialect: Dialect, plan: InsertPlan, data: TableData): string {
  const total = validateTableData(data);
  const selects: string[] = [];

  for (let row = 0; row < total; row++) {
    const cells = data.columns.map((column, i) => {
      const literal = cellLiteral(column, row);
      if (row > 0) return literal;
      const sqlType = dialect.translateType(plan.columns[i]?.inferredSqlType ?? 'VARCHAR(255)');
      return `CAST(${literal} AS ${sqlType}) AS ${plan.fieldNames[i] ?? column.name}`;
    });
    selects.push(`SELECT ${cells.join(', ')}`);
  }

  return (
    `${dialect.createTableKeyword(plan.target)} ${plan.qualifiedName}${dialect.ctasTableOptions()} ` +
    `AS SELECT * FROM (${selects.join(' UNION ALL ')}) t;`
  );
}

/**
 * CTAS materializer options.
 */
export interface CtasMaterializerOptions {
  /** Called with 1 once the table is filled */
  onProgress?: ProgressCallback;
  /** Logger */
  logger?: Logger;
}

/**
 * Executes the create-as-select strategy.
 */
export class CtasMaterializer {
  private readonly connection: InsertConnection;
  private readonly onProgress?: ProgressCallback;
  private readonly logger: Logger;

  constructor(connection: InsertConnection, options: CtasMaterializerOptions = {}) {
    this.connection = connection;
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Creates the plan's table from `data`.
   *
   * @returns Number of rows materialized
   */
  async materialize(plan: InsertPlan, data: TableData): Promise<number> {
    const sql = buildCtasSql(this.connection.dialect, plan, data);
    const rows = validateTableData(data);
    this.logger.debug('Executing create-as-select', { table: plan.qualifiedName, rows });
    await this.connection.execute(sql);
    this.onProgress?.(1);
    return rows;
  }
}
