import { promises as fsp } from 'node:fs';
import { z } from 'zod';
import { describeError, invalidConfiguration } from './errors.js';

/** A table of the snapshot. The first column doubles as the deduplication key. */
export type TableSpec = {
  readonly name: string;
  readonly columns: readonly string[];
  readonly keyColumn: string;
};

export type Catalog = readonly TableSpec[];

const catalogSchema = z.object({
  tables: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        columns: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
});

export function defineTable(name: string, columns: readonly string[]): TableSpec {
  const keyColumn = columns[0];
  if (keyColumn === undefined) {
    throw invalidConfiguration(`table ${name} declares no columns`);
  }
  if (new Set(columns).size !== columns.length) {
    throw invalidConfiguration(`table ${name} declares a column twice`);
  }
  return Object.freeze({ name, columns: Object.freeze([...columns]), keyColumn });
}

export function buildCatalog(document: unknown): Catalog {
  const parsed = catalogSchema.safeParse(document);
  if (!parsed.success) {
    throw invalidConfiguration('invalid table catalog', parsed.error.flatten());
  }

  const seen = new Set<string>();
  const tables = parsed.data.tables.map((table) => {
    if (seen.has(table.name)) {
      throw invalidConfiguration(`table ${table.name} is declared twice`);
    }
    seen.add(table.name);
    return defineTable(table.name, table.columns);
  });
  return Object.freeze(tables);
}

export async function loadCatalog(catalogPath: string): Promise<Catalog> {
  const raw = await fsp.readFile(catalogPath, 'utf8');
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw invalidConfiguration(`catalog ${catalogPath} is not valid JSON`, { parseError: describeError(error) });
  }
  return buildCatalog(document);
}

