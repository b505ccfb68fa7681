import { readFile, writeFile } from 'fs/promises';
import { parseAbc } from './parser';
import { serializeAll } from './serializer';
import type { ParseResult, Tune } from './types';

export interface ParsedBytes extends ParseResult {
  id?: number;
  source: string;
}

export interface ParsedFile extends ParseResult {
  path: string;
  source: string;
}

/**
 * Decode ABC file bytes to text. A byte order mark selects UTF-8 or
 * UTF-16 (either endianness); without one the bytes are read as UTF-8.
 */
export function decodeBuffer(bytes: Uint8Array): string {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf) {
    return buffer.subarray(3).toString('utf-8');
  }
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return buffer.subarray(2).toString('utf16le');
  }
  if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
    const body = buffer.subarray(2, buffer.length - (buffer.length % 2));
    return Buffer.from(body).swap16().toString('utf16le');
  }
  return buffer.toString('utf-8');
}

/**
 * Parse the raw bytes of one stored tune or file
 * @param id - Tune id carried through to the result, e.g. from the tune cache
 */
export function parseBytes(bytes: Uint8Array, id?: number): ParsedBytes {
  const source = decodeBuffer(bytes);
  const result: ParsedBytes = { ...parseAbc(source), source };
  if (id !== undefined) result.id = id;
  return result;
}

/**
 * Parse an ABC file from disk
 */
export async function parseFile(filePath: string): Promise<ParsedFile> {
  const data = await readFile(filePath);
  const source = decodeBuffer(data);
  return { ...parseAbc(source), path: filePath, source };
}

/**
 * Serialize tunes to an ABC file, separated by blank lines
 */
export async function serializeToFile(tunes: Tune[], filePath: string): Promise<void> {
  await writeFile(filePath, serializeAll(tunes), 'utf-8');
}
