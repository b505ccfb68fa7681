/**
 * Tune cache
 * All tunes of a directory tree kept in one blob, keyed by tune id.
 *
 * Blob format: repeated records of
 *   u32 LE tune id | u32 LE byte length | tune bytes
 */

import { readdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { decodeBuffer } from '../file';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';

const RECORD_HEADER_SIZE = 8;

/** Scan progress is logged after every this many files */
export const SCAN_PROGRESS_INTERVAL = 10000;

export interface CacheEntry {
  id: number;
  /** Offset of the tune bytes within the blob */
  offset: number;
  length: number;
}

export class CacheFormatError extends Error {
  constructor(
    message: string,
    public readonly offset: number
  ) {
    super(message);
    this.name = 'CacheFormatError';
  }
}

// ============================================================
// In-memory cache
// ============================================================

export class TuneCache {
  private readonly tunes = new Map<number, Buffer>();

  get size(): number {
    return this.tunes.size;
  }

  has(id: number): boolean {
    return this.tunes.has(id);
  }

  get(id: number): Buffer | undefined {
    return this.tunes.get(id);
  }

  getText(id: number): string | undefined {
    const bytes = this.tunes.get(id);
    return bytes ? decodeBuffer(bytes) : undefined;
  }

  set(id: number, bytes: Uint8Array | string): void {
    this.tunes.set(id, typeof bytes === 'string' ? Buffer.from(bytes, 'utf-8') : Buffer.from(bytes));
  }

  /** Ids in ascending order */
  ids(): number[] {
    return [...this.tunes.keys()].sort((a, b) => a - b);
  }

  maxId(): number {
    let max = 0;
    for (const id of this.tunes.keys()) {
      max = Math.max(max, id);
    }
    return max;
  }
}

// ============================================================
// Blob codec
// ============================================================

/**
 * Build the `(id, offset, length)` index of a blob without copying tunes.
 */
export function indexCache(bytes: Uint8Array): CacheEntry[] {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const entries: CacheEntry[] = [];
  let position = 0;

  while (position < buffer.length) {
    if (buffer.length - position < RECORD_HEADER_SIZE) {
      throw new CacheFormatError(`Truncated record header at byte ${position}`, position);
    }
    const id = buffer.readUInt32LE(position);
    const length = buffer.readUInt32LE(position + 4);
    const offset = position + RECORD_HEADER_SIZE;
    if (offset + length > buffer.length) {
      throw new CacheFormatError(
        `Record for tune ${id} needs ${length} bytes but only ${buffer.length - offset} remain`,
        position
      );
    }
    entries.push({ id, offset, length });
    position = offset + length;
  }

  return entries;
}

export interface DecodeCacheOptions {
  /** Skip tunes with a higher id */
  maxId?: number;
}

export function decodeCache(bytes: Uint8Array, options: DecodeCacheOptions = {}): TuneCache {
  const cache = new TuneCache();
  for (const entry of indexCache(bytes)) {
    if (options.maxId !== undefined && entry.id > options.maxId) continue;
    cache.set(entry.id, bytes.subarray(entry.offset, entry.offset + entry.length));
  }
  return cache;
}

/** Encode a cache as a blob, records in ascending id order. */
export function encodeCache(cache: TuneCache): Buffer {
  const chunks: Buffer[] = [];
  for (const id of cache.ids()) {
    const bytes = cache.get(id) ?? Buffer.alloc(0);
    const header = Buffer.alloc(RECORD_HEADER_SIZE);
    header.writeUInt32LE(id, 0);
    header.writeUInt32LE(bytes.length, 4);
    chunks.push(header, bytes);
  }
  return Buffer.concat(chunks);
}

// ============================================================
// Files
// ============================================================

export interface CacheFileOptions extends DecodeCacheOptions {
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load a cache blob. A missing file gives an empty cache.
 */
export async function loadCacheFile(filePath: string, options: CacheFileOptions = {}): Promise<TuneCache> {
  const logger = options.logger ?? silentLogger;
  if (options.maxId !== undefined) {
    logger.info(`Using DEBUG_MAX_ID ${options.maxId}`);
  }

  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (error) {
    if (isMissingFile(error)) {
      logger.info('No pre-existing tune cache file found, starting from scratch.');
      return new TuneCache();
    }
    throw error;
  }

  const cache = decodeCache(data, options);
  logger.info(`Loaded ${cache.size} tunes`);
  return cache;
}

export async function saveCacheFile(
  cache: TuneCache,
  filePath: string,
  options: { logger?: Logger } = {}
): Promise<void> {
  const logger = options.logger ?? silentLogger;
  logger.info(`Saving ${cache.size} tunes`);
  await writeFile(filePath, encodeCache(cache));
}

// ============================================================
// Directory scan
// ============================================================

/**
 * Tune id from a file name: the part of the base name before the first
 * `.`, when it is a whole number that fits in 32 bits.
 */
export function tuneIdFromFilename(filePath: string): number | undefined {
  const first = path.basename(filePath).split('.')[0];
  if (!/^\d+$/.test(first)) return undefined;
  const id = Number(first);
  return id <= 0xffffffff ? id : undefined;
}

async function collectAbcFiles(directory: string, into: string[]): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      await collectAbcFiles(fullPath, into);
    } else if (entry.isFile() && entry.name.endsWith('.abc')) {
      into.push(fullPath);
    }
  }
}

export interface ScanResult {
  scanned: number;
  indexed: number;
}

/**
 * Add every `*.abc` file under `base` whose id the cache does not hold yet.
 * Files already cached are not read again.
 */
export async function scanDirectory(
  cache: TuneCache,
  base: string,
  options: { logger?: Logger } = {}
): Promise<ScanResult> {
  const logger = options.logger ?? silentLogger;
  const files: string[] = [];
  await collectAbcFiles(base, files);

  let scanned = 0;
  let indexed = 0;
  for (const filePath of files) {
    const id = tuneIdFromFilename(filePath);
    if (id === undefined) {
      logger.warn(`Failed to get tune id for path: ${filePath}`);
    } else if (!cache.has(id)) {
      cache.set(id, await readFile(filePath));
      indexed++;
    }

    scanned++;
    if (scanned % SCAN_PROGRESS_INTERVAL === 0) {
      logger.info(`Scanned ${scanned} tunes, indexed ${indexed}`);
    }
  }

  logger.debug(`Scan of ${base} finished: ${scanned} files, ${indexed} new tunes`);
  return { scanned, indexed };
}
