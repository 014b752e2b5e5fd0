import { createWriteStream, promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import archiver from 'archiver';
import type { ArchiveSource } from './archive.js';
import { ArchiveMemberNotFoundError } from './errors.js';
import type { Logger, LogLevel } from './utils/logger.js';

export type CapturedLogLine = {
  level: LogLevel;
  message: string;
};

export function createMemoryLogger(): Logger & { lines: CapturedLogLine[] } {
  const lines: CapturedLogLine[] = [];
  return {
    lines,
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
  };
}

export async function makeTempDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), 'faa-registry-test-'));
}

export async function writeZip(destination: string, members: Record<string, string | Buffer>): Promise<void> {
  await fsp.mkdir(path.dirname(destination), { recursive: true });

  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(destination);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', resolve);
    output.on('error', reject);
    archive.on('error', reject);

    archive.pipe(output);

    for (const [name, content] of Object.entries(members)) {
      archive.append(content, { name });
    }

    void archive.finalize();
  });
}

/** Serves members straight from memory, each split into the given chunks. */
export function memoryArchive(members: Record<string, string | Buffer[]>): ArchiveSource {
  return {
    openMember: (name) => {
      const content = members[name];
      if (content === undefined) {
        throw new ArchiveMemberNotFoundError(name);
      }
      const chunks = typeof content === 'string' ? [Buffer.from(content, 'utf8')] : content;
      return Readable.from(chunks, { objectMode: false });
    },
  };
}

export async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}
