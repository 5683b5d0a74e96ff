import { open, type FileHandle } from 'node:fs/promises';
import { detect, matchExtension, matchMime, READ_LIMIT } from './detect.js';
import { SourceUnavailableError } from './errors.js';
import type { FileFormat } from './format.js';

export type ByteSource = AsyncIterable<Uint8Array | string>;

export interface ReadOptions {
  /** Maximum number of bytes to read (default: `READ_LIMIT`) */
  limit?: number;
  /** Name used in error messages (default: `stream`) */
  label?: string;
}

/**
 * Read up to `limit` bytes from a chunked source such as a Node `Readable`.
 *
 * Iteration stops as soon as the budget is filled; a source that ends
 * early yields whatever it produced.
 */
export async function readPrefix(source: ByteSource, options: ReadOptions = {}): Promise<Uint8Array> {
  const limit = options.limit ?? READ_LIMIT;
  const chunks: Buffer[] = [];
  let total = 0;

  try {
    for await (const chunk of source) {
      if (total >= limit) {
        break;
      }
      const bytes =
        typeof chunk === 'string'
          ? Buffer.from(chunk)
          : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
      const take = Math.min(bytes.length, limit - total);
      chunks.push(bytes.subarray(0, take));
      total += take;
      if (total >= limit) {
        break;
      }
    }
  } catch (err) {
    throw new SourceUnavailableError(options.label ?? 'stream', err);
  }

  const combined = Buffer.concat(chunks, total);
  return new Uint8Array(combined.buffer, combined.byteOffset, combined.byteLength);
}

/**
 * Read up to `limit` bytes from the start of a file
 */
export async function readFilePrefix(path: string, limit = READ_LIMIT): Promise<Uint8Array> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    throw new SourceUnavailableError(path, err);
  }

  try {
    const data = new Uint8Array(limit);
    let total = 0;
    while (total < limit) {
      const { bytesRead } = await handle.read(data, total, limit - total, total);
      if (bytesRead === 0) {
        break;
      }
      total += bytesRead;
    }
    return data.subarray(0, total);
  } catch (err) {
    throw new SourceUnavailableError(path, err);
  } finally {
    await handle.close();
  }
}

export async function detectFile(path: string): Promise<FileFormat> {
  return detect(await readFilePrefix(path));
}

export async function detectStream(source: ByteSource, label?: string): Promise<FileFormat> {
  return detect(await readPrefix(source, { label }));
}

export async function matchFile(path: string, mime: string): Promise<boolean> {
  return matchMime(await readFilePrefix(path), mime);
}

export async function matchStream(source: ByteSource, mime: string, label?: string): Promise<boolean> {
  return matchMime(await readPrefix(source, { label }), mime);
}

export async function matchFileExtension(path: string, extension: string): Promise<boolean> {
  return matchExtension(await readFilePrefix(path), extension);
}

export async function matchStreamExtension(
  source: ByteSource,
  extension: string,
  label?: string
): Promise<boolean> {
  return matchExtension(await readPrefix(source, { label }), extension);
}
