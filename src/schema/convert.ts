import { sqlServerDialect } from '../db/dialects.js';
import { SchemaSyntaxError } from '../errors.js';

/**
 * Converts the database-agnostic schema script into T-SQL for SQL Server.
 *
 * The accepted grammar is narrow, one construct per line:
 *
 *   DROP TABLE IF EXISTS "<table>";
 *   CREATE TABLE IF NOT EXISTS "<table>" (
 *       "<column>" <TYPE>[ <constraints>],
 *       ...
 *   );
 *
 * Any other line inside a CREATE block (a table-level constraint such as
 * `PRIMARY KEY ("A", "B")`) is copied through unchanged; SQL Server reads its
 * double-quoted identifiers as long as QUOTED_IDENTIFIER is on.
 * A constraint spread over several lines is not recognised as one unit; each of
 * its lines is copied on its own.
 */

export type ColumnDef = {
  name: string;
  declaredType: string;
  isPrimaryKey: boolean;
  /** Everything after the type, e.g. ` PRIMARY KEY` or ` NOT NULL`. */
  extras: string;
};

const TYPE_MAP: Record<string, string> = {
  TEXT: 'NVARCHAR(MAX)',
  INTEGER: 'INT',
  DATE: 'DATE',
};

// Keyed text columns are bounded so they can be indexed.
const KEYED_TEXT_TYPE = 'NVARCHAR(255)';

const DROP_HEADER = /^DROP TABLE IF EXISTS\b/i;
const DROP_STATEMENT = /^DROP TABLE IF EXISTS\s+(?:"([^"]+)"|(\w+))\s*;/i;
const CREATE_HEADER = /^CREATE TABLE IF NOT EXISTS\b/i;
const CREATE_STATEMENT = /^CREATE TABLE IF NOT EXISTS\s+(?:"([^"]+)"|(\w+))/i;
const COLUMN_LINE = /^"(.+?)"\s+(\w+)(.*)$/;
const BLOCK_END = ');';

const bracketIdentifier = (name: string) => sqlServerDialect.quoteIdentifier(name);

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function convertType(declaredType: string, isPrimaryKey = false): string {
  const normalized = declaredType.toUpperCase();
  if (normalized === 'TEXT') {
    return isPrimaryKey ? KEYED_TEXT_TYPE : TYPE_MAP.TEXT;
  }
  return TYPE_MAP[normalized] ?? declaredType;
}

export function parseColumnLine(line: string): ColumnDef | null {
  const match = COLUMN_LINE.exec(line.trim().replace(/,+$/, ''));
  if (!match) return null;
  const [, name, declaredType, rest] = match;
  const extras = rest.trimEnd();
  return {
    name,
    declaredType,
    // Substring test on the constraint text, not a parse of it.
    isPrimaryKey: extras.toUpperCase().includes('PRIMARY KEY'),
    extras,
  };
}

export function renderColumn(column: ColumnDef): string {
  return `    ${bracketIdentifier(column.name)} ${convertType(column.declaredType, column.isPrimaryKey)}${column.extras},`;
}

function tableName(match: RegExpExecArray): string {
  return match[1] ?? match[2];
}

export function convertSchema(script: string): string {
  const output: string[] = [];
  let insideCreate = false;

  script.split(/\r?\n/).forEach((line, index) => {
    const stripped = line.trim();

    if (DROP_HEADER.test(stripped)) {
      const match = DROP_STATEMENT.exec(stripped);
      if (match) {
        const table = tableName(match);
        output.push(`IF OBJECT_ID(${quoteLiteral(table)}, 'U') IS NOT NULL DROP TABLE ${bracketIdentifier(table)};`);
      }
      return;
    }

    if (CREATE_HEADER.test(stripped)) {
      const match = CREATE_STATEMENT.exec(stripped);
      if (!match) {
        throw new SchemaSyntaxError('CREATE TABLE header without a table name', index + 1);
      }
      output.push(`CREATE TABLE ${bracketIdentifier(tableName(match))} (`);
      insideCreate = true;
      return;
    }

    if (!insideCreate || !stripped) return;

    if (stripped === BLOCK_END) {
      output.push(BLOCK_END);
      insideCreate = false;
      return;
    }

    const column = parseColumnLine(stripped);
    output.push(column ? renderColumn(column) : `    ${stripped}`);
  });

  for (let index = 0; index < output.length - 1; index += 1) {
    if (output[index].trimEnd().endsWith(',') && output[index + 1].trim() === BLOCK_END) {
      output[index] = output[index].trimEnd().replace(/,+$/, '');
    }
  }

  return output.join('\n');
}

/** Splits a converted script into its statements, dropping empty fragments. */
export function splitStatements(script: string): string[] {
  return script
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}
