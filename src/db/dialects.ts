import type { Dialect, Row } from './types.js';

function doubleQuote(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function bracket(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`;
}

export const sqliteDialect: Dialect = {
  name: 'sqlite',
  provisioning: 'native-script',
  // SQLITE_MAX_VARIABLE_NUMBER of builds older than 3.32
  maxParameters: 999,
  quoteIdentifier: doubleQuote,
  placeholder: () => '?',
};

export const postgresDialect: Dialect = {
  name: 'postgres',
  provisioning: 'native-script',
  maxParameters: 65535,
  quoteIdentifier: doubleQuote,
  placeholder: (position) => `$${position}`,
};

export const sqlServerDialect: Dialect = {
  name: 'sqlserver',
  provisioning: 'converted-statements',
  maxParameters: 2099,
  maxRowsPerInsert: 1000,
  quoteIdentifier: bracket,
  placeholder: (position) => `@p${position}`,
};

export type InsertStatement = {
  sql: string;
  params: string[];
};

export function rowsPerStatement(dialect: Dialect, columnCount: number): number {
  const byParameters = Math.max(1, Math.floor(dialect.maxParameters / columnCount));
  return dialect.maxRowsPerInsert ? Math.min(byParameters, dialect.maxRowsPerInsert) : byParameters;
}

/**
 * Builds the multi-row INSERT statements for one batch. A batch larger than the
 * engine's parameter ceiling is split into consecutive statements; row order is kept.
 */
export function buildInsertStatements(
  dialect: Dialect,
  table: string,
  columns: readonly string[],
  rows: readonly Row[]
): InsertStatement[] {
  const chunkSize = rowsPerStatement(dialect, columns.length);
  const target = `${dialect.quoteIdentifier(table)} (${columns.map((column) => dialect.quoteIdentifier(column)).join(', ')})`;
  const statements: InsertStatement[] = [];

  for (let start = 0; start < rows.length; start += chunkSize) {
    const chunk = rows.slice(start, start + chunkSize);
    const params: string[] = [];
    const tuples = chunk.map((row) => {
      const placeholders = columns.map((_, index) => {
        params.push(row[index] ?? '');
        return dialect.placeholder(params.length);
      });
      return `(${placeholders.join(', ')})`;
    });
    statements.push({ sql: `INSERT INTO ${target} VALUES ${tuples.join(', ')}`, params });
  }

  return statements;
}
