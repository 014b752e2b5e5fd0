import { Pool } from 'pg';
import { buildInsertStatements, postgresDialect } from './dialects.js';
import type { DatabaseConnection, Row, SqlValue } from './types.js';

export type PostgresQueryFn = (text: string, params?: unknown[]) => Promise<unknown>;

export type PostgresSettings = {
  engine: 'postgres';
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
};

/**
 * A single checked-out client held for the whole run. All statements, the
 * schema script included, go through the same client so they share one transaction.
 */
export class PostgresConnection implements DatabaseConnection {
  readonly dialect = postgresDialect;

  constructor(
    private readonly queryFn: PostgresQueryFn,
    private readonly releaseFn: () => Promise<void> = async () => undefined
  ) {}

  async execute(sql: string, params?: readonly SqlValue[]): Promise<void> {
    await this.queryFn(sql, params ? [...params] : undefined);
  }

  // The simple query protocol accepts several statements when no parameters are bound.
  async executeScript(script: string): Promise<void> {
    await this.queryFn(script);
  }

  async insertRows(table: string, columns: readonly string[], rows: readonly Row[]): Promise<void> {
    for (const statement of buildInsertStatements(this.dialect, table, columns, rows)) {
      await this.queryFn(statement.sql, statement.params);
    }
  }

  async begin(): Promise<void> {
    await this.queryFn('begin');
  }

  async commit(): Promise<void> {
    await this.queryFn('commit');
  }

  async rollback(): Promise<void> {
    await this.queryFn('rollback');
  }

  async close(): Promise<void> {
    await this.releaseFn();
  }
}

export async function openPostgresConnection(settings: PostgresSettings): Promise<PostgresConnection> {
  const pool = new Pool({
    host: settings.host,
    port: settings.port,
    user: settings.username,
    password: settings.password,
    database: settings.database,
    max: 1,
  });
  const client = await pool.connect();
  return new PostgresConnection(
    (text, params) => client.query(text, params),
    async () => {
      client.release();
      await pool.end();
    }
  );
}
