export type SqlValue = string | number | null;

/** One record aligned with its table's column list. */
export type Row = readonly string[];

export type DialectName = 'sqlite' | 'postgres' | 'sqlserver';

/**
 * How the database-agnostic schema script reaches the engine: run verbatim as one
 * multi-statement script, or converted and executed one statement at a time.
 */
export type ProvisioningStrategy = 'native-script' | 'converted-statements';

export interface Dialect {
  readonly name: DialectName;
  readonly provisioning: ProvisioningStrategy;
  /** Most bound parameters a single statement may carry. */
  readonly maxParameters: number;
  /** Most rows a single VALUES list may carry, where the engine caps it. */
  readonly maxRowsPerInsert?: number;
  quoteIdentifier(name: string): string;
  placeholder(position: number): string;
}

export interface DatabaseConnection {
  readonly dialect: Dialect;
  execute(sql: string, params?: readonly SqlValue[]): Promise<void>;
  executeScript(script: string): Promise<void>;
  insertRows(table: string, columns: readonly string[], rows: readonly Row[]): Promise<void>;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}
