import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ConnectionSettings } from './db/index.js';
import { invalidConfiguration } from './errors.js';
import { DEFAULT_BATCH_SIZE } from './services/table-loader.js';

export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export const DEFAULTS = {
  url: 'https://registry.faa.gov/database/ReleasableAircraft.zip',
  zipPath: path.join(PROJECT_ROOT, 'data', 'ReleasableAircraft.zip'),
  dbPath: path.join(PROJECT_ROOT, 'db', 'faa_registry.db'),
  schemaPath: path.join(PROJECT_ROOT, 'db', 'schema.sql'),
  catalogPath: path.join(PROJECT_ROOT, 'config', 'tables.json'),
  postgresPort: 5432,
};

/** Values as they arrive from the command line; anything unset falls back to the environment. */
export type ConfigFlags = {
  engine?: string;
  dbPath?: string;
  server?: string;
  port?: string;
  database?: string;
  username?: string;
  password?: string;
  trusted?: boolean;
  batchSize?: string;
  zipPath?: string;
  schemaPath?: string;
  catalogPath?: string;
  url?: string;
  download?: boolean;
};

export type LoaderConfig = {
  connection: ConnectionSettings;
  batchSize: number;
  zipPath: string;
  schemaPath: string;
  catalogPath: string;
  url: string;
  download: boolean;
};

const flag = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => {
    if (value === undefined) return false;
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    return normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on';
  });

// dotenv hands over `KEY=` as an empty string.
const blankAsUnset = (value: unknown) => (typeof value === 'string' && !value.trim() ? undefined : value);

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length ? value.trim() : undefined));

const configSchema = z
  .object({
    engine: z.preprocess(blankAsUnset, z.enum(['sqlite', 'postgres', 'sqlserver']).default('sqlite')),
    dbPath: z.string().min(1),
    server: optionalText,
    port: z.preprocess(blankAsUnset, z.coerce.number().int().positive().max(65535).optional()),
    database: optionalText,
    username: optionalText,
    password: z.string().optional(),
    trusted: flag,
    encrypt: flag,
    trustServerCertificate: flag,
    batchSize: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE)),
    zipPath: z.string().min(1),
    schemaPath: z.string().min(1),
    catalogPath: z.string().min(1),
    url: z.string().url(),
    download: flag,
  })
  .superRefine((config, ctx) => {
    if (config.engine === 'sqlite') return;
    if (!config.server) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['server'], message: `--server is required for ${config.engine}` });
    }
    if (!config.database) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['database'], message: `--database is required for ${config.engine}` });
    }
    const needsLogin = config.engine === 'postgres' || !config.trusted;
    if (needsLogin && !config.username) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['username'], message: '--username is required unless --trusted is set' });
    }
  });

type ParsedConfig = z.output<typeof configSchema>;

function connectionSettings(config: ParsedConfig): ConnectionSettings {
  switch (config.engine) {
    case 'sqlite':
      return { engine: 'sqlite', dbPath: config.dbPath };
    case 'postgres':
      return {
        engine: 'postgres',
        host: config.server ?? 'localhost',
        port: config.port ?? DEFAULTS.postgresPort,
        database: config.database ?? '',
        username: config.username ?? '',
        password: config.password ?? '',
      };
    case 'sqlserver':
      return {
        engine: 'sqlserver',
        server: config.server ?? '',
        port: config.port,
        database: config.database ?? '',
        trusted: config.trusted,
        username: config.trusted ? undefined : config.username,
        password: config.trusted ? undefined : config.password,
        encrypt: config.encrypt,
        trustServerCertificate: config.trustServerCertificate,
      };
  }
}

function resolvePath(value: string | undefined, fallback: string): string {
  return value ? path.resolve(value) : fallback;
}

/**
 * Merges command-line flags over environment variables over built-in defaults
 * and validates the result.
 */
export function resolveConfig(flags: ConfigFlags = {}, env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  const parsed = configSchema.safeParse({
    engine: flags.engine ?? env.DB_ENGINE,
    dbPath: resolvePath(flags.dbPath ?? env.FAA_DB_PATH, DEFAULTS.dbPath),
    server: flags.server ?? env.DB_SERVER,
    port: flags.port ?? env.DB_PORT,
    database: flags.database ?? env.DB_NAME,
    username: flags.username ?? env.DB_USER,
    password: flags.password ?? env.DB_PASSWORD,
    trusted: flags.trusted || env.DB_TRUSTED,
    encrypt: env.DB_ENCRYPT,
    trustServerCertificate: env.DB_TRUST_SERVER_CERTIFICATE,
    batchSize: flags.batchSize ?? env.FAA_BATCH_SIZE,
    zipPath: resolvePath(flags.zipPath ?? env.FAA_ZIP_PATH, DEFAULTS.zipPath),
    schemaPath: resolvePath(flags.schemaPath ?? env.FAA_SCHEMA_PATH, DEFAULTS.schemaPath),
    catalogPath: resolvePath(flags.catalogPath ?? env.FAA_CATALOG_PATH, DEFAULTS.catalogPath),
    url: flags.url ?? (env.FAA_URL || DEFAULTS.url),
    download: flags.download || env.FAA_DOWNLOAD,
  });
  if (!parsed.success) {
    throw invalidConfiguration('invalid configuration', parsed.error.flatten());
  }

  const config = parsed.data;
  return {
    connection: connectionSettings(config),
    batchSize: config.batchSize,
    zipPath: config.zipPath,
    schemaPath: config.schemaPath,
    catalogPath: config.catalogPath,
    url: config.url,
    download: config.download,
  };
}
