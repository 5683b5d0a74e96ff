/**
 * Byte-pattern helpers shared by the signature matchers.
 *
 * Every helper is total: out-of-range offsets and short inputs yield
 * `false` or `-1`, never an exception.
 */

export type BytePattern = Uint8Array | readonly number[];

function toBytes(pattern: BytePattern | string): Uint8Array {
  if (typeof pattern === 'string') {
    return fromAscii(pattern);
  }
  return pattern instanceof Uint8Array ? pattern : Uint8Array.from(pattern);
}

/**
 * Check if data starts with a specific pattern (bytes or an ASCII string)
 */
export function startsWith(data: Uint8Array, pattern: BytePattern | string): boolean {
  return matchesAt(data, 0, pattern);
}

/**
 * Check if pattern exists at a specific offset
 */
export function matchesAt(
  data: Uint8Array,
  offset: number,
  pattern: BytePattern | string
): boolean {
  const bytes = toBytes(pattern);
  if (offset < 0 || offset + bytes.length > data.length) {
    return false;
  }
  for (let i = 0; i < bytes.length; i++) {
    if (data[offset + i] !== bytes[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Find a pattern in data, scanning no further than `end` (exclusive)
 */
export function indexOf(
  data: Uint8Array,
  pattern: BytePattern | string,
  startOffset = 0,
  end = data.length
): number {
  const bytes = toBytes(pattern);
  const maxOffset = Math.min(end, data.length) - bytes.length;

  for (let i = Math.max(0, startOffset); i <= maxOffset; i++) {
    if (matchesAt(data, i, bytes)) {
      return i;
    }
  }
  return -1;
}

/**
 * Convert a string to Uint8Array using ASCII encoding
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Convert Uint8Array to ASCII string
 */
export function toAscii(data: Uint8Array, offset = 0, length?: number): string {
  const end = length !== undefined ? Math.min(offset + length, data.length) : data.length;
  let result = '';
  for (let i = Math.max(0, offset); i < end; i++) {
    result += String.fromCharCode(data[i] ?? 0);
  }
  return result;
}
