import { normalizeMime } from './format.js';
import type { Matcher } from './types.js';

export interface MatcherRegistryOptions {
  /** Applied to keys on registration and on lookup */
  normalizeKey?: (key: string) => string;
}

/**
 * Append-only mapping from a key (format string or extension) to the
 * matchers registered for it, in registration order.
 *
 * Lookups run over a copy of the list taken when the lookup starts, so a
 * matcher that registers more matchers does not change the lookup in
 * progress.
 */
export class MatcherRegistry {
  private readonly entries = new Map<string, Matcher[]>();
  private readonly normalizeKey: (key: string) => string;

  constructor(options: MatcherRegistryOptions = {}) {
    this.normalizeKey = options.normalizeKey ?? ((key) => key);
  }

  register(key: string, matcher: Matcher): void {
    const normalized = this.normalizeKey(key);
    const list = this.entries.get(normalized);
    if (list) {
      list.push(matcher);
    } else {
      this.entries.set(normalized, [matcher]);
    }
  }

  isRegistered(key: string): boolean {
    return (this.entries.get(this.normalizeKey(key))?.length ?? 0) > 0;
  }

  /**
   * True when any matcher registered for `key` accepts `input`.
   * Unknown keys never match.
   */
  matches(key: string, input: Uint8Array): boolean {
    const list = this.entries.get(this.normalizeKey(key));
    if (!list) {
      return false;
    }
    return list.slice().some((matcher) => matcher(input));
  }

  /** Number of matchers registered for `key` */
  count(key: string): number {
    return this.entries.get(this.normalizeKey(key))?.length ?? 0;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}

/** Process-wide registry keyed by format string */
export const mimeRegistry = new MatcherRegistry({ normalizeKey: normalizeMime });

/** Process-wide registry keyed by file extension */
export const extensionRegistry = new MatcherRegistry();
