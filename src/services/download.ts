import { createWriteStream, promises as fsp } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { Agent, request, type Dispatcher } from 'undici';
import { DownloadError } from '../errors.js';
import { createConsoleLogger, formatCount, type Logger } from '../utils/logger.js';

export type DownloadOptions = {
  /** Defaults to an agent that only opens IPv4 connections. */
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  logger?: Logger;
};

export type DownloadResult = {
  path: string;
  sizeBytes: number;
};

// The registry host stalls on IPv6 from some networks and rejects requests
// without a browser-like user agent.
const USER_AGENT = 'Mozilla/5.0';
const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_REDIRECTIONS = 5;

export function createIpv4Agent(timeoutMs = DEFAULT_TIMEOUT_MS): Agent {
  return new Agent({ connect: { family: 4, timeout: timeoutMs } });
}

export async function downloadArchive(
  url: string,
  destination: string,
  options: DownloadOptions = {}
): Promise<DownloadResult> {
  const logger = options.logger ?? createConsoleLogger('download');
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const ownAgent = options.dispatcher ? null : createIpv4Agent(timeoutMs);
  const dispatcher = options.dispatcher ?? ownAgent ?? undefined;

  logger.info(`downloading ${url}`);
  try {
    const response = await request(url, {
      method: 'GET',
      headers: { 'user-agent': USER_AGENT },
      maxRedirections: MAX_REDIRECTIONS,
      dispatcher,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    });

    if (response.statusCode < 200 || response.statusCode >= 300) {
      await response.body.dump();
      throw new DownloadError(`GET ${url} failed with HTTP ${response.statusCode}`, response.statusCode);
    }

    await fsp.mkdir(path.dirname(destination), { recursive: true });
    const partial = `${destination}.part`;
    try {
      await pipeline(response.body, createWriteStream(partial));
      await fsp.rename(partial, destination);
    } catch (error) {
      await fsp.rm(partial, { force: true });
      throw error;
    }

    const { size } = await fsp.stat(destination);
    logger.info(`download complete (${formatCount(size)} bytes)`);
    return { path: destination, sizeBytes: size };
  } finally {
    await ownAgent?.close();
  }
}
