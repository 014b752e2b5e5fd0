import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { buildCatalog, defineTable, loadCatalog } from './catalog.js';
import { DEFAULTS } from './config.js';
import { ConfigurationError } from './errors.js';
import { makeTempDir } from './test-utils.js';

describe('loadCatalog', () => {
  it('reads the registry tables in load order', async () => {
    const catalog = await loadCatalog(DEFAULTS.catalogPath);

    expect(catalog.map((table) => table.name)).toEqual([
      'ACFTREF',
      'DEALER',
      'DEREG',
      'DOCINDEX',
      'ENGINE',
      'MASTER',
      'RESERVED',
    ]);
    const master = catalog.find((table) => table.name === 'MASTER');
    expect(master?.keyColumn).toBe('N-NUMBER');
    expect(master?.columns[0]).toBe('N-NUMBER');
  });

  it('rejects a file that is not JSON', async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, 'tables.json');
    await fsp.writeFile(file, '{ tables: ');
    try {
      await expect(loadCatalog(file)).rejects.toThrow(`catalog ${file} is not valid JSON`);
    } finally {
      await fsp.rm(dir, { recursive: true, force: true });
    }
  });
});

describe('buildCatalog', () => {
  it('takes the first column as the key and freezes the result', () => {
    const catalog = buildCatalog({ tables: [{ name: 'ENGINE', columns: ['CODE', 'MFR'] }] });

    expect(catalog).toEqual([{ name: 'ENGINE', columns: ['CODE', 'MFR'], keyColumn: 'CODE' }]);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog[0])).toBe(true);
    expect(Object.isFrozen(catalog[0].columns)).toBe(true);
  });

  it('rejects malformed documents', () => {
    expect(() => buildCatalog({ tables: [] })).toThrow(ConfigurationError);
    expect(() => buildCatalog({ tables: [{ name: 'A', columns: [] }] })).toThrow('invalid table catalog');
    expect(() => buildCatalog([])).toThrow('invalid table catalog');
  });

  it('rejects a table declared twice', () => {
    const document = {
      tables: [
        { name: 'A', columns: ['X'] },
        { name: 'A', columns: ['Y'] },
      ],
    };
    expect(() => buildCatalog(document)).toThrow('table A is declared twice');
  });
});

describe('defineTable', () => {
  it('rejects empty and repeated column lists', () => {
    expect(() => defineTable('A', [])).toThrow('table A declares no columns');
    expect(() => defineTable('A', ['X', 'Y', 'X'])).toThrow('table A declares a column twice');
  });
});
