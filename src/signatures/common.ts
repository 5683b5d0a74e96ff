import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';

/**
 * Shared building blocks for the format matchers: container walkers
 * (ZIP, OLE, ISO base media) and text heuristics.
 */

/**
 * Matcher accepting input that starts with any of the patterns
 */
export function prefixes(...patterns: Array<string | readonly number[]>): (input: Uint8Array) => boolean {
  return (input) => patterns.some((pattern) => buffer.startsWith(input, pattern));
}

const ZIP_LOCAL_HEADER = [0x50, 0x4b, 0x03, 0x04];
const ZIP_HEADER_SIZE = 30;

export interface ZipEntryRule {
  name: string;
  /** Match any entry whose name starts with `name` */
  prefix?: boolean;
}

/**
 * Names of the ZIP local file entries found in the prefix, in order
 */
export function* zipEntryNames(input: Uint8Array): Generator<string> {
  let pos = 0;
  for (;;) {
    const header = buffer.indexOf(input, ZIP_LOCAL_HEADER, pos);
    if (header === -1 || header + ZIP_HEADER_SIZE > input.length) {
      return;
    }
    const nameLength = dataview.readUint16LE(input, header + 26);
    const extraLength = dataview.readUint16LE(input, header + 28);
    const nameStart = header + ZIP_HEADER_SIZE;
    if (nameStart + nameLength > input.length) {
      return;
    }
    yield buffer.toAscii(input, nameStart, nameLength);
    pos = nameStart + nameLength + extraLength;
  }
}

function entryMatches(name: string, rules: readonly ZipEntryRule[]): boolean {
  return rules.some((rule) => (rule.prefix ? name.startsWith(rule.name) : name === rule.name));
}

/**
 * True when one of the first `stopAfter` ZIP entries matches a rule
 */
export function zipHas(input: Uint8Array, rules: readonly ZipEntryRule[], stopAfter: number): boolean {
  let seen = 0;
  for (const name of zipEntryNames(input)) {
    if (seen++ >= stopAfter) {
      break;
    }
    if (entryMatches(name, rules)) {
      return true;
    }
  }
  return false;
}

const OOXML_FIRST_ENTRIES = [
  '[Content_Types].xml',
  '_rels/.rels',
  'docProps',
  'customXml',
  '[trash]',
];

/**
 * Office Open XML check: like `zipHas`, but the package is rejected when its
 * first entry is not one an OOXML writer produces.
 */
export function msoxml(input: Uint8Array, rules: readonly ZipEntryRule[], stopAfter: number): boolean {
  let index = 0;
  for (const name of zipEntryNames(input)) {
    if (index >= stopAfter) {
      break;
    }
    if (entryMatches(name, rules)) {
      return true;
    }
    if (index === 0 && !OOXML_FIRST_ENTRIES.includes(name)) {
      return false;
    }
    index++;
  }
  return false;
}

/**
 * OpenDocument packages store an uncompressed `mimetype` entry first, so the
 * format string sits at a fixed offset.
 */
export function openDocument(input: Uint8Array, mime: string): boolean {
  return buffer.matchesAt(input, 30, `mimetype${mime}`);
}

export const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

/**
 * Compare the CLSID of the root storage entry of a compound file.
 * Shorter `clsid` values are compared as a prefix.
 */
export function oleClsid(input: Uint8Array, clsid: readonly number[]): boolean {
  if (!buffer.startsWith(input, OLE_SIGNATURE) || input.length < 52) {
    return false;
  }
  // v4 compound files use 4096-byte sectors, v3 use 512
  const sectorLength = input[26] === 0x04 && input[27] === 0x00 ? 4096 : 512;
  if (input.length < sectorLength) {
    return false;
  }
  const firstSector = dataview.readUint32LE(input, 48);
  const offset = sectorLength * (1 + firstSector) + 80;
  return buffer.matchesAt(input, offset, clsid.slice(0, 16));
}

/**
 * ISO base media file: `ftyp` box at offset 4 whose major brand is one of `brands`
 */
export function isoBrand(input: Uint8Array, brands: readonly string[]): boolean {
  if (input.length < 12 || !buffer.matchesAt(input, 4, 'ftyp')) {
    return false;
  }
  const brand = buffer.toAscii(input, 8, 4);
  return brands.includes(brand);
}

/**
 * Valid UTF-8 with no binary control bytes. A multi-byte sequence cut off at
 * the end of the prefix is accepted.
 */
export function isUtf8Text(input: Uint8Array): boolean {
  for (const byte of input) {
    if (
      byte <= 0x08 ||
      byte === 0x0b ||
      (byte >= 0x0e && byte <= 0x1a) ||
      (byte >= 0x1c && byte <= 0x1f)
    ) {
      return false;
    }
  }
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(input, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Decode UTF-16 text, skipping a byte order mark that agrees with `bigEndian`.
 * Returns `undefined` for odd-length or malformed input.
 */
export function decodeUtf16(input: Uint8Array, bigEndian: boolean): string | undefined {
  const bom = bigEndian ? [0xfe, 0xff] : [0xff, 0xfe];
  const content = buffer.startsWith(input, bom) ? input.subarray(2) : input;
  if (content.length < 2 || content.length % 2 !== 0) {
    return undefined;
  }
  const units: number[] = [];
  for (let i = 0; i < content.length; i += 2) {
    units.push(dataview.readUint16(content, i, !bigEndian));
  }
  for (let i = 0; i < units.length; i++) {
    const unit = units[i] ?? 0;
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const next = units[i + 1];
      // a high surrogate cut off at the end of the prefix is tolerated
      if (next === undefined) break;
      if (next < 0xdc00 || next > 0xdfff) return undefined;
      i++;
    } else if (unit >= 0xdc00 && unit <= 0xdfff) {
      return undefined;
    }
  }
  return String.fromCharCode(...units);
}

/**
 * Brace and bracket balance over the first 512 characters, ignoring string
 * contents. Not a parser: it only rules out text that cannot be JSON.
 */
export function looksLikeJson(text: string): boolean {
  let braces = 0;
  let brackets = 0;
  let inString = false;
  let escaped = false;

  for (const ch of text.slice(0, 512)) {
    if (escaped) {
      escaped = false;
      continue;
    }
    switch (ch) {
      case '\\':
        if (inString) escaped = true;
        break;
      case '"':
        inString = !inString;
        break;
      case '{':
        if (!inString) braces++;
        break;
      case '}':
        if (!inString) braces--;
        break;
      case '[':
        if (!inString) brackets++;
        break;
      case ']':
        if (!inString) brackets--;
        break;
    }
    if (braces < 0 || brackets < 0) {
      return false;
    }
  }
  return braces === 0 && brackets === 0 && (text.includes('{') || text.includes('['));
}

/**
 * Delimiter-separated values: at least two lines, all with the same
 * non-zero count of `separator` in the first five lines.
 */
export function looksLikeDelimited(lines: readonly string[], separator: string): boolean {
  const sample = lines.slice(0, 5);
  const first = sample[0];
  if (first === undefined) {
    return false;
  }
  const expected = first.split(separator).length - 1;
  if (expected === 0) {
    return false;
  }
  return sample.length >= 2 && sample.every((line) => line.split(separator).length - 1 === expected);
}
