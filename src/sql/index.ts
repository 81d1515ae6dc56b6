/**
 * Statement Templates
 *
 * Generic statements issued by an insert call, before dialect translation.
 * @module sql-table-insert/sql
 */

import type { Dialect } from '../dialect/index.js';
import type { InsertPlan } from '../types/index.js';

/**
 * Drop-if-exists statement. Temp tables are looked up in the session catalog.
 *
 * @example
 * ```typescript
 * buildDropTableSql(plan);
 * // IF OBJECT_ID('scratch.people', 'U') IS NOT NULL DROP TABLE scratch.people;
 * ```
 */
export function buildDropTableSql(plan: InsertPlan): string {
  const catalog = plan.target.isTemporary ? 'tempdb..' : '';
  const objectName = `${catalog}${plan.qualifiedName}`.replace(/'/g, "''");
  return `IF OBJECT_ID('${objectName}', 'U') IS NOT NULL DROP TABLE ${plan.qualifiedName};`;
}

/**
 * Column definitions, e.g. `id INTEGER, name VARCHAR(255)`.
 */
export function buildColumnDefinitions(dialect: Dialect, plan: InsertPlan): string {
  return plan.columns
    .map((column, i) => `${plan.fieldNames[i] ?? column.name} ${dialect.translateType(column.inferredSqlType)}`)
    .join(', ');
}

/**
 * CREATE TABLE statement with the inferred column types.
 */
export function buildCreateTableSql(dialect: Dialect, plan: InsertPlan): string {
  return `${dialect.createTableKeyword(plan.target)} ${plan.qualifiedName} (${buildColumnDefinitions(dialect, plan)});`;
}

/**
 * Parameterized INSERT with one `?` per column.
 */
export function buildInsertSql(plan: InsertPlan): string {
  const placeholders = plan.fieldNames.map(() => '?').join(',');
  return `INSERT INTO ${plan.qualifiedName} (${plan.fieldNames.join(',')}) VALUES (${placeholders})`;
}
