/**
 * SQL Dialects
 *
 * Dialect profiles and the factory selecting one by name.
 * @module sql-table-insert/dialect
 *
 * @example
 * ```typescript
 * const dialect = createDialect('redshift');
 * dialect.translatePlaceholders('INSERT INTO t (a,b) VALUES (?,?)');
 * // INSERT INTO t (a,b) VALUES ($1,$2)
 * ```
 */

import { ConfigurationError } from '../errors/index.js';
import type { Dialect, DialectName } from './base.js';
import {
  BigQueryDialect,
  GenericDialect,
  HiveDialect,
  PdwDialect,
  PostgresqlDialect,
  RedshiftDialect,
  SqlServerDialect,
} from './dialects.js';

export {
  BaseDialect,
  type Dialect,
  type DialectName,
  type SqlTranslator,
  type TempTableConvention,
  type TranslateOptions,
} from './base.js';
export {
  BigQueryDialect,
  GenericDialect,
  HiveDialect,
  PdwDialect,
  PostgresqlDialect,
  RedshiftDialect,
  SqlServerDialect,
} from './dialects.js';
export { rewritePlaceholders } from './placeholders.js';

const DIALECT_FACTORIES: Record<DialectName, () => Dialect> = {
  'sql server': () => new SqlServerDialect(),
  pdw: () => new PdwDialect(),
  postgresql: () => new PostgresqlDialect(),
  redshift: () => new RedshiftDialect(),
  hive: () => new HiveDialect(),
  bigquery: () => new BigQueryDialect(),
  generic: () => new GenericDialect(),
};

/**
 * Checks whether a string names a supported dialect.
 */
export function isDialectName(name: string): name is DialectName {
  return Object.prototype.hasOwnProperty.call(DIALECT_FACTORIES, name);
}

/**
 * Creates the dialect profile for a backend name (case-insensitive).
 *
 * @throws {ConfigurationError} If the dialect is unknown
 */
export function createDialect(name: string): Dialect {
  const normalized = name.trim().toLowerCase();
  if (!isDialectName(normalized)) {
    throw new ConfigurationError(`Unsupported dialect: ${name}`, { dialect: name });
  }
  return DIALECT_FACTORIES[normalized]();
}
