import { createReadStream, promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Readable } from 'node:stream';
import extract from 'extract-zip';
import { AmbiguousArchiveMemberError, ArchiveMemberNotFoundError } from './errors.js';

/** A container of named members, each readable as a byte stream. */
export interface ArchiveSource {
  openMember(name: string): Readable;
}

async function readDirectoryRecursive(root: string): Promise<string[]> {
  const entries = await fsp.readdir(root, { withFileTypes: true });
  const results: string[] = [];
  for (const entry of entries) {
    const resolved = path.join(root, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await readDirectoryRecursive(resolved)));
    } else {
      results.push(resolved);
    }
  }
  return results;
}

function memberKey(name: string): string {
  return path.basename(name).toUpperCase();
}

/**
 * A ZIP archive unpacked once into a private temporary directory. Members are
 * looked up by file name, case-insensitively, wherever they sit in the archive.
 * Two members sharing a file name make the archive unusable.
 */
export class ZipArchive implements ArchiveSource {
  private constructor(
    readonly zipPath: string,
    private readonly extractDir: string,
    private readonly files: Map<string, string>
  ) {}

  static async open(zipPath: string): Promise<ZipArchive> {
    const source = path.resolve(zipPath);
    const extractDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'faa-registry-'));
    try {
      await extract(source, { dir: extractDir });
      const files = new Map<string, string>();
      for (const file of await readDirectoryRecursive(extractDir)) {
        const key = memberKey(file);
        const existing = files.get(key);
        if (existing) {
          throw new AmbiguousArchiveMemberError(path.basename(file), [
            path.relative(extractDir, existing),
            path.relative(extractDir, file),
          ]);
        }
        files.set(key, file);
      }
      return new ZipArchive(source, extractDir, files);
    } catch (error) {
      await fsp.rm(extractDir, { recursive: true, force: true });
      throw error;
    }
  }

  openMember(name: string): Readable {
    const file = this.files.get(memberKey(name));
    if (!file) {
      throw new ArchiveMemberNotFoundError(name);
    }
    return createReadStream(file);
  }

  async close(): Promise<void> {
    this.files.clear();
    await fsp.rm(this.extractDir, { recursive: true, force: true });
  }
}

export function memberNameFor(table: string): string {
  return `${table}.txt`;
}
