import { openPostgresConnection, type PostgresSettings } from './postgres.js';
import { openSqliteConnection } from './sqlite.js';
import { openSqlServerConnection, type SqlServerSettings } from './sqlserver.js';
import type { DatabaseConnection } from './types.js';

export type SqliteSettings = {
  engine: 'sqlite';
  dbPath: string;
};

export type ConnectionSettings = SqliteSettings | PostgresSettings | SqlServerSettings;

export async function openConnection(settings: ConnectionSettings): Promise<DatabaseConnection> {
  switch (settings.engine) {
    case 'sqlite':
      return openSqliteConnection(settings.dbPath);
    case 'postgres':
      return openPostgresConnection(settings);
    case 'sqlserver':
      return openSqlServerConnection(settings);
  }
}

export async function withTransaction<T>(
  connection: DatabaseConnection,
  fn: (connection: DatabaseConnection) => Promise<T>
): Promise<T> {
  await connection.begin();
  try {
    const result = await fn(connection);
    await connection.commit();
    return result;
  } catch (error) {
    await connection.rollback();
    throw error;
  }
}

export type { PostgresSettings } from './postgres.js';
export type { SqlServerSettings } from './sqlserver.js';
export type { DatabaseConnection, Dialect, DialectName, Row, SqlValue } from './types.js';
