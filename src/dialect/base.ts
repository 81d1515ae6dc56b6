/**
 * SQL Dialect Base
 *
 * Capability profile of a SQL backend: identifier quoting, temp-table naming,
 * bulk-load and create-as-select eligibility, placeholder and type translation.
 * @module sql-table-insert/dialect/base
 */

import type { TableTarget } from '../types/index.js';
import { escapeIdentifier, needsQuoting } from '../escaping/index.js';
import { ConfigurationError } from '../errors/index.js';
import { rewritePlaceholders } from './placeholders.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Supported dialect names.
 */
export type DialectName = 'sql server' | 'pdw' | 'postgresql' | 'redshift' | 'hive' | 'bigquery' | 'generic';

/**
 * How a dialect names session-scoped tables.
 *
 * - `hash-prefix`: `#name`, created with a plain `CREATE TABLE`
 * - `temp-keyword`: plain name, created with `CREATE TEMP TABLE` (or `TEMPORARY`)
 * - `emulated`: a regular table in the temp emulation schema
 */
export type TempTableConvention = 'hash-prefix' | 'temp-keyword' | 'emulated';

/**
 * Options for statement translation.
 */
export interface TranslateOptions {
  /** Schema holding emulated temp tables */
  tempEmulationSchema?: string;
}

/**
 * Rewrites a generated statement for a target backend.
 */
export interface SqlTranslator {
  translate(sql: string, options?: TranslateOptions): string;
}

/**
 * Polymorphic dialect profile, chosen once per connection.
 */
export interface Dialect extends SqlTranslator {
  /** Dialect identifier */
  readonly name: DialectName;
  /** Identifier quote character, or `null` when quoting is unsupported */
  readonly identifierQuote: string | null;
  /** Temp-table naming convention */
  readonly tempTableConvention: TempTableConvention;
  /** Whether a staged bulk loader exists for this backend */
  readonly bulkLoad: boolean;
  /** Whether freshly created tables are filled with one create-as-select */
  readonly ctas: boolean;

  /** Escaped, qualified name of a table */
  qualifyTable(target: TableTarget, options?: TranslateOptions): string;
  /** Leading keywords of a CREATE statement for the target */
  createTableKeyword(target: TableTarget): string;
  /** Table options placed between the table name and `AS SELECT` */
  ctasTableOptions(): string;
  /** Rewrites generic `?` markers into the driver's parameter syntax */
  translatePlaceholders(sql: string): string;
  /** Maps an inferred SQL type to this backend's type name */
  translateType(sqlType: string): string;
}

// ============================================================================
// Base Dialect
// ============================================================================

const DROP_IF_EXISTS_PATTERN = /^IF OBJECT_ID\('(?:[^']|'')*', 'U'\) IS NOT NULL DROP TABLE (.+);$/s;

/**
 * Default behaviour shared by all dialects: double-quoted identifiers,
 * hash-prefixed temp tables, `?` placeholders and no type mapping.
 */
export abstract class BaseDialect implements Dialect {
  abstract readonly name: DialectName;
  readonly identifierQuote: string | null;
  readonly tempTableConvention: TempTableConvention = 'hash-prefix';
  readonly bulkLoad: boolean = false;
  readonly ctas: boolean = false;

  /** Whether `DROP TABLE IF EXISTS` replaces the OBJECT_ID idiom */
  protected readonly dropIfExists: boolean = false;
  /** Type name replacements applied by {@link translateType} */
  protected readonly typeNames: Readonly<Record<string, string>> = {};

  /**
   * @param identifierQuote - Quote character, or `null` when unsupported
   */
  constructor(identifierQuote: string | null = '"') {
    this.identifierQuote = identifierQuote;
  }

  qualifyTable(target: TableTarget, options: TranslateOptions = {}): string {
    if (!target.isTemporary) {
      const name = escapeIdentifier(target.name, this.identifierQuote);
      return target.schema ? `${escapeIdentifier(target.schema, this.identifierQuote)}.${name}` : name;
    }

    switch (this.tempTableConvention) {
      case 'hash-prefix':
        return needsQuoting(target.name)
          ? escapeIdentifier(`#${target.name}`, this.identifierQuote)
          : `#${target.name}`;
      case 'temp-keyword':
        return escapeIdentifier(target.name, this.identifierQuote);
      case 'emulated': {
        const schema = options.tempEmulationSchema;
        if (!schema) {
          throw new ConfigurationError(
            `A tempEmulationSchema is required for temp tables on ${this.name}`,
            { dialect: this.name }
          );
        }
        return `${escapeIdentifier(schema, this.identifierQuote)}.${escapeIdentifier(target.name, this.identifierQuote)}`;
      }
    }
  }

  createTableKeyword(target: TableTarget): string {
    return target.isTemporary && this.tempTableConvention === 'temp-keyword' ? 'CREATE TEMP TABLE' : 'CREATE TABLE';
  }

  ctasTableOptions(): string {
    return '';
  }

  translatePlaceholders(sql: string): string {
    return sql;
  }

  translateType(sqlType: string): string {
    const varchar = /^VARCHAR\((\d+)\)$/.exec(sqlType);
    if (varchar && this.typeNames['VARCHAR'] !== undefined) {
      return this.typeNames['VARCHAR'].replace('{n}', varchar[1] ?? '');
    }
    return this.typeNames[sqlType] ?? sqlType;
  }

  translate(sql: string, _options: TranslateOptions = {}): string {
    if (this.dropIfExists) {
      const drop = DROP_IF_EXISTS_PATTERN.exec(sql);
      if (drop) {
        return `DROP TABLE IF EXISTS ${drop[1] ?? ''};`;
      }
    }
    return sql;
  }

  /**
   * Rewrites placeholders with a marker generator, skipping quoted sections.
   */
  protected rewritePlaceholders(sql: string, marker: (index: number) => string): string {
    return rewritePlaceholders(sql, marker, this.identifierQuote);
  }
}
