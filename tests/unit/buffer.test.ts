import { describe, it, expect } from 'vitest';
import { startsWith, indexOf, matchesAt, fromAscii, toAscii } from '../../src/binary/buffer.js';

describe('startsWith', () => {
  it('should return true when data starts with pattern', () => {
    const data = new Uint8Array([0xff, 0xd8, 0xff, 0xe0]);
    const pattern = new Uint8Array([0xff, 0xd8, 0xff]);
    expect(startsWith(data, pattern)).toBe(true);
  });

  it('should return false when data does not start with pattern', () => {
    const data = new Uint8Array([0xff, 0xd8, 0xff, 0xe0]);
    expect(startsWith(data, [0x89, 0x50, 0x4e])).toBe(false);
  });

  it('should accept an ASCII string pattern', () => {
    expect(startsWith(fromAscii('%PDF-1.7'), '%PDF-')).toBe(true);
  });

  it('should return false when data is shorter than pattern', () => {
    expect(startsWith(new Uint8Array([0xff]), [0xff, 0xd8])).toBe(false);
    expect(startsWith(new Uint8Array(0), 'GIF')).toBe(false);
  });
});

describe('matchesAt', () => {
  it('should match at an offset', () => {
    const data = fromAscii('RIFF\x00\x00\x00\x00WEBP');
    expect(matchesAt(data, 8, 'WEBP')).toBe(true);
    expect(matchesAt(data, 7, 'WEBP')).toBe(false);
  });

  it('should return false for out-of-range offsets', () => {
    const data = fromAscii('abc');
    expect(matchesAt(data, -1, 'a')).toBe(false);
    expect(matchesAt(data, 2, 'cd')).toBe(false);
    expect(matchesAt(data, 100, 'a')).toBe(false);
  });
});

describe('indexOf', () => {
  it('should find pattern in data', () => {
    const data = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(indexOf(data, [4, 5, 6])).toBe(3);
  });

  it('should return -1 when pattern not found', () => {
    expect(indexOf(new Uint8Array([1, 2, 3, 4, 5]), [6, 7])).toBe(-1);
  });

  it('should start searching from the given offset', () => {
    const data = new Uint8Array([1, 2, 1, 2]);
    expect(indexOf(data, [1, 2], 1)).toBe(2);
  });

  it('should not match past the end bound', () => {
    const data = new Uint8Array([0, 0, 0, 7, 8]);
    expect(indexOf(data, [7, 8], 0, 4)).toBe(-1);
    expect(indexOf(data, [7, 8], 0, 5)).toBe(3);
  });
});

describe('fromAscii / toAscii', () => {
  it('should convert between strings and bytes', () => {
    expect(Array.from(fromAscii('PK'))).toEqual([0x50, 0x4b]);
    expect(toAscii(new Uint8Array([0x50, 0x4b, 0x03]), 0, 2)).toBe('PK');
  });

  it('should clamp the length to the data', () => {
    expect(toAscii(fromAscii('abc'), 1, 10)).toBe('bc');
  });
});
