import { promises as fsp } from 'node:fs';
import type { DatabaseConnection } from '../db/types.js';
import { convertSchema, splitStatements } from './convert.js';

export async function loadSchemaScript(schemaPath: string): Promise<string> {
  return fsp.readFile(schemaPath, 'utf8');
}

/**
 * Applies the schema script to the connection using the strategy its dialect
 * carries. Errors propagate as-is; the caller owns the transaction.
 */
export async function provisionSchema(connection: DatabaseConnection, schemaScript: string): Promise<void> {
  switch (connection.dialect.provisioning) {
    case 'native-script':
      await connection.executeScript(schemaScript);
      return;
    case 'converted-statements': {
      const statements = splitStatements(convertSchema(schemaScript));
      for (const statement of statements) {
        await connection.execute(statement);
      }
      return;
    }
  }
}
