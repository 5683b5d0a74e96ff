/**
 * Builders for small synthetic inputs carrying real format signatures
 */

import { fromAscii } from '../../src/binary/buffer.js';

function concat(...parts: Uint8Array[]): Uint8Array {
  return new Uint8Array(Buffer.concat(parts));
}

export function bytes(...parts: Array<string | number[] | Uint8Array>): Uint8Array {
  return concat(
    ...parts.map((part) =>
      typeof part === 'string' ? fromAscii(part) : part instanceof Uint8Array ? part : Uint8Array.from(part)
    )
  );
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function utf16(text: string, bigEndian: boolean): Uint8Array {
  const out = new Uint8Array(2 + text.length * 2);
  out.set(bigEndian ? [0xfe, 0xff] : [0xff, 0xfe]);
  const view = new DataView(out.buffer);
  for (let i = 0; i < text.length; i++) {
    view.setUint16(2 + i * 2, text.charCodeAt(i), !bigEndian);
  }
  return out;
}

export function png(): Uint8Array {
  return bytes([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], [0x00, 0x00, 0x00, 0x0d], 'IHDR', new Uint8Array(17));
}

/** PNG whose second chunk is an animation control chunk */
export function apng(): Uint8Array {
  return bytes(png(), [0x00, 0x00, 0x00, 0x08], 'acTL');
}

export interface ZipEntry {
  name: string;
  data?: string;
}

/** Local file headers only; no central directory */
export function zip(entries: ZipEntry[]): Uint8Array {
  return concat(
    ...entries.map((entry) => {
      const header = new Uint8Array(30);
      header.set([0x50, 0x4b, 0x03, 0x04]);
      const view = new DataView(header.buffer);
      view.setUint16(26, entry.name.length, true);
      view.setUint16(28, 0, true);
      return bytes(header, entry.name, entry.data ?? '');
    })
  );
}

/**
 * Version 3 compound file whose directory starts at sector 0, so the root
 * entry CLSID sits at offset 512 + 80.
 */
export function ole(clsid: number[], size = 1536): Uint8Array {
  const data = new Uint8Array(size);
  data.set([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);
  data[26] = 0x03;
  data.set(clsid, 592);
  return data;
}

function writeAscii(target: Uint8Array, offset: number, text: string): void {
  target.set(fromAscii(text), offset);
}

/** A single ustar header record with a valid checksum */
export function tar(name = 'hello.txt'): Uint8Array {
  const record = new Uint8Array(512);
  writeAscii(record, 0, name);
  writeAscii(record, 100, '0000644\0');
  writeAscii(record, 108, '0000000\0');
  writeAscii(record, 116, '0000000\0');
  writeAscii(record, 124, '00000000000\0');
  writeAscii(record, 136, '00000000000\0');
  writeAscii(record, 156, '0');
  writeAscii(record, 257, 'ustar\0');
  writeAscii(record, 263, '00');

  writeAscii(record, 148, '        ');
  const sum = record.reduce((acc, byte) => acc + byte, 0);
  writeAscii(record, 148, `${sum.toString(8).padStart(6, '0')}\0 `);
  return record;
}

/** ISO base media file starting with an ftyp box of the given brand */
export function ftyp(brand: string): Uint8Array {
  return bytes([0x00, 0x00, 0x00, 0x14], 'ftyp', brand, [0x00, 0x00, 0x00, 0x00], brand);
}

/** EBML header carrying a DocType element */
export function ebml(docType: string): Uint8Array {
  return bytes(
    [0x1a, 0x45, 0xdf, 0xa3, 0x93],
    [0x42, 0x86, 0x81, 0x01],
    [0x42, 0x82, 0x80 | docType.length],
    docType
  );
}

/** First Ogg page with a codec identification header */
export function ogg(codec: string): Uint8Array {
  const page = new Uint8Array(28);
  page.set(fromAscii('OggS'));
  return bytes(page, codec, new Uint8Array(16));
}
