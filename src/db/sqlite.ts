import { promises as fsp } from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { buildInsertStatements, sqliteDialect } from './dialects.js';
import type { DatabaseConnection, Row, SqlValue } from './types.js';

export class SqliteConnection implements DatabaseConnection {
  readonly dialect = sqliteDialect;
  private readonly statements = new Map<string, Database.Statement>();

  constructor(private readonly db: Database.Database) {}

  private prepare(sql: string): Database.Statement {
    let statement = this.statements.get(sql);
    if (!statement) {
      statement = this.db.prepare(sql);
      this.statements.set(sql, statement);
    }
    return statement;
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<void> {
    this.db.prepare(sql).run(...params);
  }

  async executeScript(script: string): Promise<void> {
    this.db.exec(script);
  }

  async insertRows(table: string, columns: readonly string[], rows: readonly Row[]): Promise<void> {
    for (const statement of buildInsertStatements(this.dialect, table, columns, rows)) {
      this.prepare(statement.sql).run(...statement.params);
    }
  }

  async begin(): Promise<void> {
    this.db.exec('begin');
  }

  async commit(): Promise<void> {
    this.db.exec('commit');
  }

  async rollback(): Promise<void> {
    if (this.db.inTransaction) {
      this.db.exec('rollback');
    }
  }

  async close(): Promise<void> {
    this.statements.clear();
    this.db.close();
  }
}

export async function openSqliteConnection(dbPath: string): Promise<SqliteConnection> {
  if (dbPath !== ':memory:') {
    await fsp.mkdir(path.dirname(dbPath), { recursive: true });
  }
  return new SqliteConnection(new Database(dbPath));
}
