import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import {
  detectFile,
  detectStream,
  matchFile,
  matchFileExtension,
  matchStream,
  matchStreamExtension,
  readFilePrefix,
  readPrefix,
} from '../../src/node.js';
import { READ_LIMIT } from '../../src/detect.js';
import { SourceUnavailableError } from '../../src/errors.js';
import { png, utf8 } from '../helpers/fixtures.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'bytesniff-node-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

function writeTmp(name: string, data: Uint8Array): string {
  const path = join(tmpDir, name);
  writeFileSync(path, data);
  return path;
}

async function* failingSource(): AsyncGenerator<Uint8Array> {
  yield utf8('partial');
  throw new Error('connection reset');
}

describe('readFilePrefix', () => {
  it('should read at most READ_LIMIT bytes', async () => {
    const path = writeTmp('big.bin', new Uint8Array(READ_LIMIT + 500).fill(7));

    const data = await readFilePrefix(path);
    expect(data.length).toBe(READ_LIMIT);
    expect(data[READ_LIMIT - 1]).toBe(7);
  });

  it('should honor a smaller limit', async () => {
    const path = writeTmp('small.bin', utf8('abcdef'));

    expect(Array.from(await readFilePrefix(path, 3))).toEqual([0x61, 0x62, 0x63]);
  });

  it('should return short files whole', async () => {
    const path = writeTmp('short.txt', utf8('hi'));

    expect((await readFilePrefix(path)).length).toBe(2);
  });

  it('should wrap a missing file in SourceUnavailableError', async () => {
    const path = join(tmpDir, 'missing.bin');

    const error = await readFilePrefix(path).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SourceUnavailableError);
    if (error instanceof SourceUnavailableError) {
      expect(error.source).toBe(path);
      expect(error.code).toBe('ENOENT');
    }
  });
});

describe('readPrefix', () => {
  it('should stop once the limit is reached', async () => {
    const source = Readable.from([utf8('abc'), utf8('def'), utf8('ghi')]);

    const data = await readPrefix(source, { limit: 5 });
    expect(new TextDecoder().decode(data)).toBe('abcde');
  });

  it('should accept string chunks', async () => {
    const data = await readPrefix(Readable.from(['hello ', 'world'], { objectMode: true }));

    expect(new TextDecoder().decode(data)).toBe('hello world');
  });

  it('should return an empty array for an empty source', async () => {
    expect((await readPrefix(Readable.from([]))).length).toBe(0);
  });

  it('should wrap source failures with the given label', async () => {
    await expect(readPrefix(failingSource(), { label: 'upload' })).rejects.toThrow(
      'Cannot read upload: connection reset'
    );
  });

  it('should label failures "stream" by default', async () => {
    await expect(readPrefix(failingSource())).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(readPrefix(failingSource())).rejects.toThrow('Cannot read stream: connection reset');
  });
});

describe('file and stream detection', () => {
  it('should detect a file', async () => {
    const path = writeTmp('image.dat', png());

    expect((await detectFile(path)).mime).toBe('image/png');
    expect(await matchFile(path, 'image/png')).toBe(true);
    expect(await matchFile(path, 'image/gif')).toBe(false);
    expect(await matchFileExtension(path, '.png')).toBe(true);
  });

  it('should detect a stream', async () => {
    expect((await detectStream(Readable.from([png()]))).mime).toBe('image/png');
    expect(await matchStream(Readable.from([utf8('%PDF-1.4')]), 'application/pdf')).toBe(true);
    expect(await matchStreamExtension(Readable.from([utf8('%PDF-1.4')]), '.pdf')).toBe(true);
  });

  it('should detect an empty file as octet-stream', async () => {
    const path = writeTmp('empty', new Uint8Array(0));

    expect((await detectFile(path)).mime).toBe('application/octet-stream');
  });
});
