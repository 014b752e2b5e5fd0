export type LoaderErrorCode =
  | 'configuration_invalid'
  | 'schema_syntax'
  | 'archive_member_missing'
  | 'archive_member_ambiguous'
  | 'download_failed';

export class LoaderError extends Error {
  readonly code: LoaderErrorCode;
  readonly details?: unknown;

  constructor(code: LoaderErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigurationError extends LoaderError {
  constructor(message: string, details?: unknown) {
    super('configuration_invalid', message, details);
  }
}

export class SchemaSyntaxError extends LoaderError {
  readonly line: number;

  constructor(message: string, line: number) {
    super('schema_syntax', `${message} (line ${line})`, { line });
    this.line = line;
  }
}

export class ArchiveMemberNotFoundError extends LoaderError {
  readonly member: string;

  constructor(member: string) {
    super('archive_member_missing', `archive member ${member} not found`, { member });
    this.member = member;
  }
}

export class AmbiguousArchiveMemberError extends LoaderError {
  readonly member: string;

  constructor(member: string, paths: string[]) {
    super('archive_member_ambiguous', `archive member ${member} appears more than once`, { member, paths });
    this.member = member;
  }
}

export class DownloadError extends LoaderError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super('download_failed', message, statusCode === undefined ? undefined : { statusCode });
    this.statusCode = statusCode;
  }
}

export function invalidConfiguration(message: string, details?: unknown): ConfigurationError {
  return new ConfigurationError(message, details);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
