import { describe, it, expect } from 'vitest';
import {
  readUint16BE,
  readUint16LE,
  readUint32BE,
  readUint32LE,
  readUint16,
} from '../../src/binary/dataview.js';
import { BufferOverflowError } from '../../src/errors.js';

describe('readUint16BE', () => {
  it('should read big-endian uint16', () => {
    expect(readUint16BE(new Uint8Array([0x12, 0x34]), 0)).toBe(0x1234);
  });

  it('should throw on overflow', () => {
    expect(() => readUint16BE(new Uint8Array([0x12]), 0)).toThrow(BufferOverflowError);
  });
});

describe('readUint16LE', () => {
  it('should read little-endian uint16', () => {
    expect(readUint16LE(new Uint8Array([0x34, 0x12]), 0)).toBe(0x1234);
  });
});

describe('readUint32BE', () => {
  it('should read big-endian uint32', () => {
    expect(readUint32BE(new Uint8Array([0x12, 0x34, 0x56, 0x78]), 0)).toBe(0x12345678);
  });

  it('should read values above 2^31 as unsigned', () => {
    expect(readUint32BE(new Uint8Array([0xfe, 0xed, 0xfa, 0xce]), 0)).toBe(0xfeedface);
  });
});

describe('readUint32LE', () => {
  it('should read little-endian uint32 at an offset', () => {
    expect(readUint32LE(new Uint8Array([0x00, 0x78, 0x56, 0x34, 0x12]), 1)).toBe(0x12345678);
  });

  it('should throw with the requested and available sizes', () => {
    try {
      readUint32LE(new Uint8Array(3), 0);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BufferOverflowError);
      if (err instanceof BufferOverflowError) {
        expect(err.requested).toBe(4);
        expect(err.available).toBe(3);
      }
    }
  });

  it('should reject negative offsets', () => {
    expect(() => readUint32LE(new Uint8Array(8), -1)).toThrow(BufferOverflowError);
  });
});

describe('readUint16', () => {
  it('should honour the endianness flag', () => {
    const data = new Uint8Array([0x01, 0x02, 0x03, 0x04]);
    expect(readUint16(data, 0, true)).toBe(0x0201);
    expect(readUint16(data, 0, false)).toBe(0x0102);
  });

  it('should read from a subarray view', () => {
    const data = new Uint8Array([0xff, 0xff, 0xab, 0xcd]).subarray(2);
    expect(readUint16BE(data, 0)).toBe(0xabcd);
  });
});
