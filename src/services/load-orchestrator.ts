import { performance } from 'node:perf_hooks';
import { ZipArchive } from '../archive.js';
import type { Catalog } from '../catalog.js';
import { withTransaction } from '../db/index.js';
import type { DatabaseConnection } from '../db/types.js';
import { provisionSchema } from '../schema/provision.js';
import { createConsoleLogger, formatCount, formatSeconds, type Logger } from '../utils/logger.js';
import { assertBatchSize, DEFAULT_BATCH_SIZE, loadTable } from './table-loader.js';

export type LoadPhase = 'idle' | 'provisioning' | 'truncating' | 'loading' | 'committed' | 'aborted';

export type TableLoadResult = {
  table: string;
  inserted: number;
  skipped: number;
  elapsedMs: number;
};

export type LoaderOptions = {
  batchSize?: number;
  logger?: Logger;
};

export type ImportSnapshotOptions = LoaderOptions & {
  catalog: Catalog;
  archivePath: string;
  connection: DatabaseConnection;
  schemaScript: string;
  onPhaseChange?: (phase: LoadPhase, table?: string) => void;
};

export type ImportSummary = {
  tables: TableLoadResult[];
  inserted: number;
  skipped: number;
  elapsedMs: number;
};

/** Deletes every row of every catalog table. The tables themselves stay. */
export async function truncateTables(connection: DatabaseConnection, catalog: Catalog, logger?: Logger): Promise<void> {
  for (const table of catalog) {
    await connection.execute(`DELETE FROM ${connection.dialect.quoteIdentifier(table.name)}`);
  }
  logger?.info(`truncated ${catalog.length} tables`);
}

/**
 * Replaces the contents of every catalog table with the archive's snapshot:
 * all tables are emptied first, then loaded one at a time in catalog order.
 */
export async function runLoader(
  catalog: Catalog,
  archivePath: string,
  connection: DatabaseConnection,
  options: LoaderOptions & { onTableStart?: (table: string) => void } = {}
): Promise<TableLoadResult[]> {
  const logger = options.logger ?? createConsoleLogger('loader');
  const batchSize = assertBatchSize(options.batchSize ?? DEFAULT_BATCH_SIZE);

  await truncateTables(connection, catalog, logger);

  const archive = await ZipArchive.open(archivePath);
  try {
    const results: TableLoadResult[] = [];
    for (const table of catalog) {
      options.onTableStart?.(table.name);
      const start = performance.now();
      const counts = await loadTable(archive, table, connection, { batchSize, logger });
      const elapsedMs = performance.now() - start;
      logger.info(`${table.name} loaded in ${formatSeconds(elapsedMs)} seconds`);
      results.push({ table: table.name, ...counts, elapsedMs });
    }
    return results;
  } finally {
    await archive.close();
  }
}

/**
 * Provisions the schema, empties and reloads every table, and commits only once
 * all of them succeeded. Any failure rolls the whole run back and is rethrown.
 */
export async function importSnapshot(options: ImportSnapshotOptions): Promise<ImportSummary> {
  const logger = options.logger ?? createConsoleLogger('loader');
  const { connection, catalog } = options;
  let phase: LoadPhase = 'idle';
  const enter = (next: LoadPhase, table?: string) => {
    phase = next;
    options.onPhaseChange?.(next, table);
  };

  const start = performance.now();
  try {
    const tables = await withTransaction(connection, async () => {
      enter('provisioning');
      await provisionSchema(connection, options.schemaScript);
      logger.info(`schema initialized (${connection.dialect.name})`);

      enter('truncating');
      return runLoader(catalog, options.archivePath, connection, {
        batchSize: options.batchSize,
        logger,
        onTableStart: (table) => enter('loading', table),
      });
    });
    enter('committed');

    const summary: ImportSummary = {
      tables,
      inserted: tables.reduce((total, table) => total + table.inserted, 0),
      skipped: tables.reduce((total, table) => total + table.skipped, 0),
      elapsedMs: performance.now() - start,
    };
    logger.info(`import committed: ${formatCount(summary.inserted)} rows in ${formatSeconds(summary.elapsedMs)} seconds`);
    return summary;
  } catch (error) {
    logger.error(`import aborted during ${phase}`);
    enter('aborted');
    throw error;
  }
}
