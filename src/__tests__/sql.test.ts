import { describe, it, expect } from 'vitest';
import { buildColumnDefinitions, buildCreateTableSql, buildDropTableSql, buildInsertSql } from '../sql/index.js';
import { buildInsertPlan } from '../strategy/index.js';
import { HiveDialect, PostgresqlDialect, SqlServerDialect, type Dialect } from '../dialect/index.js';
import { InsertStrategy, type ColumnDescriptor, type TableTarget } from '../types/index.js';

const columns: ColumnDescriptor[] = [
  { name: 'id', semanticType: 'integer32', inferredSqlType: 'INTEGER' },
  { name: 'seen_at', semanticType: 'datetime', inferredSqlType: 'DATETIME2' },
  { name: 'my col', semanticType: 'float', inferredSqlType: 'FLOAT' },
];

function plan(dialect: Dialect, target: TableTarget) {
  return buildInsertPlan(dialect, target, columns, InsertStrategy.DirectInsert);
}

describe('Statement templates', () => {
  describe('buildDropTableSql', () => {
    it('should look up permanent tables by qualified name', () => {
      const p = plan(new SqlServerDialect(), { schema: 'scratch', name: 'people', isTemporary: false });
      expect(buildDropTableSql(p)).toBe(
        "IF OBJECT_ID('scratch.people', 'U') IS NOT NULL DROP TABLE scratch.people;"
      );
    });

    it('should look up temp tables in tempdb', () => {
      const p = plan(new SqlServerDialect(), { name: 'scratch', isTemporary: true });
      expect(buildDropTableSql(p)).toBe("IF OBJECT_ID('tempdb..#scratch', 'U') IS NOT NULL DROP TABLE #scratch;");
    });
  });

  describe('buildCreateTableSql', () => {
    it('should declare columns with translated types', () => {
      const dialect = new PostgresqlDialect();
      const p = plan(dialect, { name: 'people', isTemporary: false });
      expect(buildColumnDefinitions(dialect, p)).toBe('id INTEGER, seen_at TIMESTAMP, "my col" FLOAT');
      expect(buildCreateTableSql(dialect, p)).toBe(
        'CREATE TABLE people (id INTEGER, seen_at TIMESTAMP, "my col" FLOAT);'
      );
    });

    it('should use the temp keyword of the dialect', () => {
      const dialect = new HiveDialect();
      const p = plan(dialect, { name: 'people', isTemporary: true });
      expect(buildCreateTableSql(dialect, p)).toBe(
        'CREATE TEMPORARY TABLE people (id INTEGER, seen_at TIMESTAMP, `my col` DOUBLE);'
      );
    });
  });

  describe('buildInsertSql', () => {
    it('should emit one marker per column', () => {
      const p = plan(new SqlServerDialect(), { name: 'people', isTemporary: false });
      expect(buildInsertSql(p)).toBe('INSERT INTO people (id,seen_at,"my col") VALUES (?,?,?)');
    });
  });
});
