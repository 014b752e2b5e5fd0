#!/usr/bin/env node
import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { loadCatalog } from './catalog.js';
import { resolveConfig, type ConfigFlags, type LoaderConfig } from './config.js';
import { openConnection, type ConnectionSettings, type DatabaseConnection } from './db/index.js';
import { describeError, invalidConfiguration, LoaderError } from './errors.js';
import { loadSchemaScript } from './schema/provision.js';
import { downloadArchive } from './services/download.js';
import { importSnapshot, type ImportSummary } from './services/load-orchestrator.js';
import { checkEnvironment, formatEnvironmentReport } from './utils/environment.js';
import { createConsoleLogger, type Logger } from './utils/logger.js';

const COMMANDS = ['load', 'download', 'check-env'] as const;

export type Command = (typeof COMMANDS)[number];

export type CliDependencies = {
  logger: Logger;
  env: NodeJS.ProcessEnv;
  openConnection: (settings: ConnectionSettings) => Promise<DatabaseConnection>;
  downloadArchive: typeof downloadArchive;
};

const USAGE = `Usage: faa-registry-loader [load|download|check-env] [options]

Options:
  --engine <sqlite|postgres|sqlserver>  target database (default: sqlite)
  --db-path <file>                      SQLite database file
  --server <host>                       database server
  --port <port>                         database port
  --database <name>                     database name
  --username <user>                     login name
  --password <password>                 login password
  --trusted                             SQL Server integrated authentication
  --batch-size <n>                      rows per insert batch (default: 5000)
  --zip-path <file>                     registry archive location
  --schema-path <file>                  schema script
  --catalog-path <file>                 table catalog
  --url <url>                           archive download URL
  --download                            download the archive before loading
  -h, --help                            show this message`;

export type ParsedCommandLine = {
  command: Command;
  flags: ConfigFlags;
  help: boolean;
};

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

const OPTIONS = {
  engine: { type: 'string' },
  'db-path': { type: 'string' },
  server: { type: 'string' },
  port: { type: 'string' },
  database: { type: 'string' },
  username: { type: 'string' },
  password: { type: 'string' },
  trusted: { type: 'boolean' },
  'batch-size': { type: 'string' },
  'zip-path': { type: 'string' },
  'schema-path': { type: 'string' },
  'catalog-path': { type: 'string' },
  url: { type: 'string' },
  download: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS });
  } catch (error) {
    throw invalidConfiguration(describeError(error));
  }
}

export function parseCommandLine(argv: string[]): ParsedCommandLine {
  const parsed = readArgs(argv);
  const [name = 'load', ...extra] = parsed.positionals;
  if (!isCommand(name)) {
    throw invalidConfiguration(`unknown command: ${name}`);
  }
  if (extra.length) {
    throw invalidConfiguration(`unexpected arguments: ${extra.join(' ')}`);
  }

  const { values } = parsed;
  return {
    command: name,
    help: values.help ?? false,
    flags: {
      engine: values.engine,
      dbPath: values['db-path'],
      server: values.server,
      port: values.port,
      database: values.database,
      username: values.username,
      password: values.password,
      trusted: values.trusted,
      batchSize: values['batch-size'],
      zipPath: values['zip-path'],
      schemaPath: values['schema-path'],
      catalogPath: values['catalog-path'],
      url: values.url,
      download: values.download,
    },
  };
}

async function runLoad(config: LoaderConfig, deps: CliDependencies): Promise<ImportSummary> {
  if (config.download) {
    await deps.downloadArchive(config.url, config.zipPath, { logger: deps.logger });
  }

  const catalog = await loadCatalog(config.catalogPath);
  const schemaScript = await loadSchemaScript(config.schemaPath);
  const connection = await deps.openConnection(config.connection);
  try {
    return await importSnapshot({
      catalog,
      archivePath: config.zipPath,
      connection,
      schemaScript,
      batchSize: config.batchSize,
      logger: deps.logger,
    });
  } finally {
    await connection.close();
  }
}

/** Runs one command and returns the process exit status. */
export async function main(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = {
    logger: overrides.logger ?? createConsoleLogger('loader'),
    env: overrides.env ?? process.env,
    openConnection: overrides.openConnection ?? openConnection,
    downloadArchive: overrides.downloadArchive ?? downloadArchive,
  };

  try {
    const { command, flags, help } = parseCommandLine(argv);
    if (help) {
      deps.logger.info(USAGE);
      return 0;
    }

    if (command === 'check-env') {
      const report = checkEnvironment();
      formatEnvironmentReport(report).forEach((line) => deps.logger.info(line));
      return report.missing.length ? 1 : 0;
    }

    const config = resolveConfig(flags, deps.env);
    if (command === 'download') {
      await deps.downloadArchive(config.url, config.zipPath, { logger: deps.logger });
      return 0;
    }

    await runLoad(config, deps);
    return 0;
  } catch (error) {
    deps.logger.error(describeError(error));
    if (error instanceof LoaderError && error.details !== undefined) {
      deps.logger.error(JSON.stringify(error.details));
    }
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
