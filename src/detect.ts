import { FileFormat, normalizeMime } from './format.js';
import { extensionRegistry, mimeRegistry } from './registry.js';
import { matchBytes } from './traverse.js';
import { allFormats, getRootFormat } from './tree.js';
import type { Matcher } from './types.js';

/**
 * Number of leading bytes any detection looks at
 */
export const READ_LIMIT = 3072;

function limit(data: Uint8Array): Uint8Array {
  return data.length > READ_LIMIT ? data.subarray(0, READ_LIMIT) : data;
}

/**
 * Detect the most specific format of `data`.
 *
 * Only the first `READ_LIMIT` bytes are inspected. Input that matches no
 * signature, including empty input, is `application/octet-stream`.
 */
export function detect(data: Uint8Array): FileFormat {
  return matchBytes(getRootFormat(), limit(data));
}

/**
 * Compare a detected format, or a format string, with `target`.
 * Parameters such as `; charset=utf-8` are ignored on both sides and
 * aliases of known formats count as equal.
 */
export function equals(candidate: FileFormat | string, target: string): boolean {
  if (candidate instanceof FileFormat) {
    return candidate.is(target);
  }
  if (normalizeMime(candidate) === normalizeMime(target)) {
    return true;
  }
  // several nodes share a format string; any one of them may carry the alias
  return allFormats().some((format) => format.is(candidate) && format.is(target));
}

export function equalsAny(candidate: FileFormat | string, targets: readonly string[]): boolean {
  return targets.some((target) => equals(candidate, target));
}

/**
 * Add a matcher for a format string. Matchers accumulate; registering the
 * same string twice keeps both.
 */
export function registerMime(mime: string, matcher: Matcher): void {
  mimeRegistry.register(mime, matcher);
}

/**
 * Add a matcher for a file extension, e.g. `.png`
 */
export function registerExtension(extension: string, matcher: Matcher): void {
  extensionRegistry.register(extension, matcher);
}

/** True when a matcher is registered for `mime`, built-in formats included */
export function isSupported(mime: string): boolean {
  getRootFormat();
  return mimeRegistry.isRegistered(mime);
}

/** True when a matcher is registered for `extension`, built-in formats included */
export function isSupportedExtension(extension: string): boolean {
  getRootFormat();
  return extensionRegistry.isRegistered(extension);
}

/**
 * Check `data` against every matcher registered for `mime`
 */
export function matchMime(data: Uint8Array, mime: string): boolean {
  getRootFormat();
  return mimeRegistry.matches(mime, limit(data));
}

/**
 * Check `data` against every matcher registered for `extension`
 */
export function matchExtension(data: Uint8Array, extension: string): boolean {
  getRootFormat();
  return extensionRegistry.matches(extension, limit(data));
}
