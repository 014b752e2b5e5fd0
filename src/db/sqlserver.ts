import mssql from 'mssql';
import { buildInsertStatements, sqlServerDialect } from './dialects.js';
import type { DatabaseConnection, Row, SqlValue } from './types.js';

export type SqlServerSettings = {
  engine: 'sqlserver';
  server: string;
  port?: number;
  database: string;
  /** Integrated (Windows) authentication instead of a SQL login. */
  trusted: boolean;
  username?: string;
  password?: string;
  encrypt: boolean;
  trustServerCertificate: boolean;
};

/** The few mssql operations the connection needs; parameters bind as @p1..@pn. */
export interface SqlServerDriver {
  query(sql: string, params: readonly SqlValue[]): Promise<void>;
  batch(script: string): Promise<void>;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export class SqlServerConnection implements DatabaseConnection {
  readonly dialect = sqlServerDialect;

  constructor(private readonly driver: SqlServerDriver) {}

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<void> {
    await this.driver.query(sql, params);
  }

  async executeScript(script: string): Promise<void> {
    await this.driver.batch(script);
  }

  async insertRows(table: string, columns: readonly string[], rows: readonly Row[]): Promise<void> {
    for (const statement of buildInsertStatements(this.dialect, table, columns, rows)) {
      await this.driver.query(statement.sql, statement.params);
    }
  }

  begin(): Promise<void> {
    return this.driver.begin();
  }

  commit(): Promise<void> {
    return this.driver.commit();
  }

  rollback(): Promise<void> {
    return this.driver.rollback();
  }

  close(): Promise<void> {
    return this.driver.close();
  }
}

export class MssqlDriver implements SqlServerDriver {
  private transaction: mssql.Transaction | null = null;

  constructor(private readonly pool: mssql.ConnectionPool) {}

  private request(): mssql.Request {
    return this.transaction ? new mssql.Request(this.transaction) : new mssql.Request(this.pool);
  }

  async query(sql: string, params: readonly SqlValue[]): Promise<void> {
    const request = this.request();
    params.forEach((value, index) => {
      const name = `p${index + 1}`;
      if (typeof value === 'string') {
        request.input(name, mssql.NVarChar(mssql.MAX), value);
      } else {
        request.input(name, value);
      }
    });
    await request.query(sql);
  }

  async batch(script: string): Promise<void> {
    await this.request().batch(script);
  }

  async begin(): Promise<void> {
    const transaction = new mssql.Transaction(this.pool);
    await transaction.begin();
    this.transaction = transaction;
  }

  async commit(): Promise<void> {
    if (!this.transaction) return;
    await this.transaction.commit();
    this.transaction = null;
  }

  async rollback(): Promise<void> {
    if (!this.transaction) return;
    const transaction = this.transaction;
    this.transaction = null;
    await transaction.rollback();
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}

export function buildSqlServerConfig(settings: SqlServerSettings): mssql.config {
  const config: mssql.config = {
    server: settings.server,
    port: settings.port,
    database: settings.database,
    options: {
      encrypt: settings.encrypt,
      trustServerCertificate: settings.trustServerCertificate,
      trustedConnection: settings.trusted,
    },
  };
  if (!settings.trusted) {
    config.user = settings.username;
    config.password = settings.password;
  }
  return config;
}

export async function openSqlServerConnection(settings: SqlServerSettings): Promise<SqlServerConnection> {
  const pool = new mssql.ConnectionPool(buildSqlServerConfig(settings));
  await pool.connect();
  return new SqlServerConnection(new MssqlDriver(pool));
}
