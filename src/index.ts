export { ZipArchive, memberNameFor, type ArchiveSource } from './archive.js';
export { buildCatalog, defineTable, loadCatalog, type Catalog, type TableSpec } from './catalog.js';
export { resolveConfig, DEFAULTS, type ConfigFlags, type LoaderConfig } from './config.js';
export {
  openConnection,
  withTransaction,
  type ConnectionSettings,
  type DatabaseConnection,
  type Dialect,
  type DialectName,
  type Row,
} from './db/index.js';
export { buildInsertStatements, postgresDialect, sqliteDialect, sqlServerDialect } from './db/dialects.js';
export { SqliteConnection } from './db/sqlite.js';
export { PostgresConnection } from './db/postgres.js';
export { SqlServerConnection, buildSqlServerConfig } from './db/sqlserver.js';
export * from './errors.js';
export { convertSchema, convertType, splitStatements } from './schema/convert.js';
export { loadSchemaScript, provisionSchema } from './schema/provision.js';
export { downloadArchive } from './services/download.js';
export {
  importSnapshot,
  runLoader,
  truncateTables,
  type ImportSummary,
  type LoadPhase,
  type TableLoadResult,
} from './services/load-orchestrator.js';
export { DEFAULT_BATCH_SIZE, loadTable, readRecords } from './services/table-loader.js';
export { checkEnvironment, formatEnvironmentReport } from './utils/environment.js';
export { createConsoleLogger, type Logger } from './utils/logger.js';
