import { Readable } from 'node:stream';
import Papa from 'papaparse';
import { memberNameFor, type ArchiveSource } from '../archive.js';
import type { TableSpec } from '../catalog.js';
import type { DatabaseConnection, Row } from '../db/types.js';
import { invalidConfiguration } from '../errors.js';
import { createConsoleLogger, formatCount, type Logger } from '../utils/logger.js';

export const DEFAULT_BATCH_SIZE = 5000;

export type TableLoadOptions = {
  batchSize?: number;
  logger?: Logger;
};

export type TableLoadCounts = {
  inserted: number;
  skipped: number;
};

const BYTE_ORDER_MARK = /^\uFEFF/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(record: Record<string, unknown>, column: string): string {
  const value = record[column];
  return typeof value === 'string' ? value.trim() : '';
}

export function assertBatchSize(batchSize: number): number {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw invalidConfiguration(`batch size must be a positive integer, got ${batchSize}`);
  }
  return batchSize;
}

/** Decodes the stream as UTF-8 and drops a byte-order mark at its start. */
async function* decodeText(input: Readable): AsyncGenerator<string> {
  input.setEncoding('utf8');
  let atStart = true;
  for await (const chunk of input) {
    const raw = String(chunk);
    if (!raw) continue;
    const text = atStart ? raw.replace(BYTE_ORDER_MARK, '') : raw;
    atStart = false;
    if (text) yield text;
  }
}

/**
 * Yields one object per data line of a header-delimited text stream. The header
 * row names the keys.
 */
export async function* readRecords(input: Readable): AsyncGenerator<Record<string, unknown>> {
  const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
  });
  const source = Readable.from(decodeText(input));
  source.once('error', (error) => parser.destroy(error));
  source.pipe(parser);

  try {
    for await (const record of parser) {
      if (isRecord(record)) {
        yield record;
      }
    }
  } finally {
    source.destroy();
    input.destroy();
  }
}

/**
 * Streams `<table>.txt` out of the archive into the table. Records whose key is
 * empty or was already seen are skipped; the rest are inserted in batches, in
 * source order. Values are stored as trimmed strings.
 */
export async function loadTable(
  archive: ArchiveSource,
  table: TableSpec,
  connection: DatabaseConnection,
  options: TableLoadOptions = {}
): Promise<TableLoadCounts> {
  const batchSize = assertBatchSize(options.batchSize ?? DEFAULT_BATCH_SIZE);
  const logger = options.logger ?? createConsoleLogger('loader');

  const seenKeys = new Set<string>();
  let batch: Row[] = [];
  let inserted = 0;
  let skipped = 0;

  const flush = async (): Promise<void> => {
    await connection.insertRows(table.name, table.columns, batch);
    inserted += batch.length;
    batch = [];
  };

  const input = archive.openMember(memberNameFor(table.name));
  for await (const record of readRecords(input)) {
    const key = field(record, table.keyColumn);
    if (!key || seenKeys.has(key)) {
      skipped += 1;
      continue;
    }
    seenKeys.add(key);
    batch.push(table.columns.map((column) => field(record, column)));
    if (batch.length >= batchSize) {
      await flush();
    }
  }

  if (batch.length) {
    await flush();
  }

  logger.info(`loaded ${formatCount(inserted)} rows into ${table.name} (skipped ${formatCount(skipped)})`);
  return { inserted, skipped };
}
