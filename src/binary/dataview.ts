import { BufferOverflowError } from '../errors.js';

function view(data: Uint8Array, offset: number, width: number): DataView {
  if (offset < 0 || offset + width > data.length) {
    throw new BufferOverflowError(offset + width, data.length);
  }
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Read an unsigned 16-bit integer (big-endian)
 */
export function readUint16BE(data: Uint8Array, offset: number): number {
  return view(data, offset, 2).getUint16(offset, false);
}

/**
 * Read an unsigned 16-bit integer (little-endian)
 */
export function readUint16LE(data: Uint8Array, offset: number): number {
  return view(data, offset, 2).getUint16(offset, true);
}

/**
 * Read an unsigned 32-bit integer (big-endian)
 */
export function readUint32BE(data: Uint8Array, offset: number): number {
  return view(data, offset, 4).getUint32(offset, false);
}

/**
 * Read an unsigned 32-bit integer (little-endian)
 */
export function readUint32LE(data: Uint8Array, offset: number): number {
  return view(data, offset, 4).getUint32(offset, true);
}

/**
 * Read 16-bit integer with configurable endianness
 */
export function readUint16(data: Uint8Array, offset: number, littleEndian: boolean): number {
  return littleEndian ? readUint16LE(data, offset) : readUint16BE(data, offset);
}
