import { describe, expect, it, vi } from 'vitest';
import { buildSqlServerConfig, SqlServerConnection, type SqlServerSettings } from './sqlserver.js';

const SETTINGS: SqlServerSettings = {
  engine: 'sqlserver',
  server: 'db.local',
  port: 1433,
  database: 'registry',
  trusted: false,
  username: 'loader',
  password: 'test-secret',
  encrypt: true,
  trustServerCertificate: false,
};

function fakeDriver() {
  return {
    query: vi.fn().mockResolvedValue(undefined),
    batch: vi.fn().mockResolvedValue(undefined),
    begin: vi.fn().mockResolvedValue(undefined),
    commit: vi.fn().mockResolvedValue(undefined),
    rollback: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe('buildSqlServerConfig', () => {
  it('passes the login for SQL authentication', () => {
    expect(buildSqlServerConfig(SETTINGS)).toEqual({
      server: 'db.local',
      port: 1433,
      database: 'registry',
      user: 'loader',
      password: 'test-secret',
      options: { encrypt: true, trustServerCertificate: false, trustedConnection: false },
    });
  });

  it('leaves the login out for a trusted connection', () => {
    const config = buildSqlServerConfig({ ...SETTINGS, trusted: true });
    expect(config.options?.trustedConnection).toBe(true);
    expect('user' in config).toBe(false);
    expect('password' in config).toBe(false);
  });
});

describe('SqlServerConnection', () => {
  it('sends each insert chunk through the driver with named placeholders', async () => {
    const driver = fakeDriver();
    await new SqlServerConnection(driver).insertRows('PEOPLE', ['ID', 'NAME'], [['1', 'Alice'], ['2', 'Bob']]);

    expect(driver.query.mock.calls).toEqual([
      ['INSERT INTO [PEOPLE] ([ID], [NAME]) VALUES (@p1, @p2), (@p3, @p4)', ['1', 'Alice', '2', 'Bob']],
    ]);
  });

  it('delegates transactions and scripts to the driver', async () => {
    const driver = fakeDriver();
    const connection = new SqlServerConnection(driver);

    await connection.begin();
    await connection.executeScript('SELECT 1');
    await connection.rollback();
    await connection.close();

    expect(driver.begin).toHaveBeenCalledTimes(1);
    expect(driver.batch).toHaveBeenCalledWith('SELECT 1');
    expect(driver.rollback).toHaveBeenCalledTimes(1);
    expect(driver.commit).not.toHaveBeenCalled();
    expect(driver.close).toHaveBeenCalledTimes(1);
  });
});
