import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defineTable } from '../catalog.js';
import { SqliteConnection } from '../db/sqlite.js';
import { ArchiveMemberNotFoundError, ConfigurationError } from '../errors.js';
import { createMemoryLogger, memoryArchive } from '../test-utils.js';
import { loadTable } from './table-loader.js';

const PEOPLE = defineTable('PEOPLE', ['ID', 'NAME', 'CITY']);

describe('loadTable', () => {
  let db: Database.Database;
  let connection: SqliteConnection;

  const storedRows = () => db.prepare('SELECT "ID", "NAME", "CITY" FROM "PEOPLE" ORDER BY rowid').raw().all();

  beforeEach(() => {
    db = new Database(':memory:');
    db.exec('CREATE TABLE "PEOPLE" ("ID" TEXT, "NAME" TEXT, "CITY" TEXT)');
    connection = new SqliteConnection(db);
  });

  afterEach(() => {
    db.close();
  });

  it('keeps the first record for each key and counts the rest as skipped', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': 'ID,NAME,CITY\n1,Alice,Paris\n2,Bob,Rome\n1,Alicia,Oslo\n' });
    const logger = createMemoryLogger();

    const counts = await loadTable(archive, PEOPLE, connection, { logger });

    expect(counts).toEqual({ inserted: 2, skipped: 1 });
    expect(storedRows()).toEqual([
      ['1', 'Alice', 'Paris'],
      ['2', 'Bob', 'Rome'],
    ]);
    expect(logger.lines).toEqual([{ level: 'info', message: 'loaded 2 rows into PEOPLE (skipped 1)' }]);
  });

  it('skips records whose key is empty or blank', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': 'ID,NAME,CITY\n,Nobody,X\n   ,Blank,Y\n3,Carol,Z\n' });

    const counts = await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(counts).toEqual({ inserted: 1, skipped: 2 });
    expect(storedRows()).toEqual([['3', 'Carol', 'Z']]);
  });

  it('trims values, fills missing columns and ignores unknown ones', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': 'ID,NAME,EXTRA\n 7 ,  Dana  ,ignored\n' });

    await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(storedRows()).toEqual([['7', 'Dana', '']]);
  });

  it('treats keys that differ only by padding as duplicates', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': 'ID,NAME,CITY\nN12,A,B\n N12 ,C,D\n' });

    const counts = await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(counts).toEqual({ inserted: 1, skipped: 1 });
  });

  it('drops a byte-order mark in front of the header', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': '\uFEFFID,NAME,CITY\n1,Alice,Paris\n' });

    const counts = await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(counts).toEqual({ inserted: 1, skipped: 0 });
    expect(storedRows()).toEqual([['1', 'Alice', 'Paris']]);
  });

  it('drops a byte-order mark in front of a quoted header', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': '\uFEFF"ID","NAME","CITY"\n1,Alice,Paris\n2,Bob,Rome\n' });

    const counts = await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(counts).toEqual({ inserted: 2, skipped: 0 });
    expect(storedRows()).toEqual([
      ['1', 'Alice', 'Paris'],
      ['2', 'Bob', 'Rome'],
    ]);
  });

  it('drops a byte-order mark that arrives in a chunk of its own', async () => {
    const archive = memoryArchive({
      'PEOPLE.txt': [Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('"ID",NAME,CITY\n1,Alice,Paris\n', 'utf8')],
    });

    const counts = await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(counts).toEqual({ inserted: 1, skipped: 0 });
  });

  it('keeps commas inside quoted fields', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': 'ID,NAME,CITY\n1,"Smith, John","New York"\n' });

    await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(storedRows()).toEqual([['1', 'Smith, John', 'New York']]);
  });

  it('decodes characters split across stream chunks', async () => {
    const content = Buffer.from('ID,NAME,CITY\n1,Zoë,Québec\n', 'utf8');
    const cut = content.indexOf(Buffer.from('ë', 'utf8')) + 1;
    const archive = memoryArchive({ 'PEOPLE.txt': [content.subarray(0, cut), content.subarray(cut)] });

    await loadTable(archive, PEOPLE, connection, { logger: createMemoryLogger() });

    expect(storedRows()).toEqual([['1', 'Zoë', 'Québec']]);
  });

  it('flushes full batches and the remainder in source order', async () => {
    const lines = Array.from({ length: 12 }, (_, index) => `${index + 1},name${index + 1},city`);
    const archive = memoryArchive({ 'PEOPLE.txt': ['ID,NAME,CITY', ...lines].join('\n') });
    const insertRows = vi.spyOn(connection, 'insertRows');

    const counts = await loadTable(archive, PEOPLE, connection, { batchSize: 5, logger: createMemoryLogger() });

    expect(counts).toEqual({ inserted: 12, skipped: 0 });
    expect(insertRows.mock.calls.map(([, , rows]) => rows.length)).toEqual([5, 5, 2]);
    expect(db.prepare('SELECT "ID" FROM "PEOPLE" ORDER BY rowid').pluck().all()).toEqual(lines.map((line) => line.split(',')[0]));
  });

  it('stores the same rows whatever the batch size', async () => {
    const content = 'ID,NAME,CITY\n1,a,x\n2,b,y\n2,c,z\n3,d,w\n';
    const results: unknown[][] = [];

    for (const batchSize of [1, 2, 5000]) {
      db.exec('DELETE FROM "PEOPLE"');
      await loadTable(memoryArchive({ 'PEOPLE.txt': content }), PEOPLE, connection, {
        batchSize,
        logger: createMemoryLogger(),
      });
      results.push(storedRows());
    }

    expect(results[0]).toEqual([
      ['1', 'a', 'x'],
      ['2', 'b', 'y'],
      ['3', 'd', 'w'],
    ]);
    expect(results[1]).toEqual(results[0]);
    expect(results[2]).toEqual(results[0]);
  });

  it('inserts nothing for a member with only a header', async () => {
    const insertRows = vi.spyOn(connection, 'insertRows');

    const counts = await loadTable(memoryArchive({ 'PEOPLE.txt': 'ID,NAME,CITY\n' }), PEOPLE, connection, {
      logger: createMemoryLogger(),
    });

    expect(counts).toEqual({ inserted: 0, skipped: 0 });
    expect(insertRows).not.toHaveBeenCalled();
  });

  it('fails when the member is missing from the archive', async () => {
    await expect(loadTable(memoryArchive({}), PEOPLE, connection, { logger: createMemoryLogger() })).rejects.toThrow(
      ArchiveMemberNotFoundError
    );
  });

  it('rejects a batch size below one', async () => {
    const archive = memoryArchive({ 'PEOPLE.txt': 'ID,NAME,CITY\n1,a,b\n' });

    await expect(loadTable(archive, PEOPLE, connection, { batchSize: 0 })).rejects.toThrow(ConfigurationError);
    await expect(loadTable(archive, PEOPLE, connection, { batchSize: 0 })).rejects.toThrow(
      'batch size must be a positive integer, got 0'
    );
  });
});
