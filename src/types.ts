import type { FileFormat } from './format.js';
import type { FormatKind } from './kind.js';

/**
 * Detection predicate over a bounded byte prefix.
 *
 * Must be pure and total: short or empty input returns `false`, never throws.
 */
export type Matcher = (input: Uint8Array) => boolean;

/**
 * Everything needed to declare one node of the detection tree
 */
export interface FormatDefinition {
  /** Canonical format string, e.g. `image/png` */
  mime: string;
  /** Canonical extension with its leading dot; `''` when there is none */
  extension: string;
  matcher: Matcher;
  /** More specific sub-formats, tried in order */
  children?: readonly FileFormat[];
  /** Format strings that compare equal to `mime` */
  aliases?: readonly string[];
  extensionAliases?: readonly string[];
  kind?: FormatKind;
}

/**
 * JSON shape of a detection result, as printed by the CLI
 */
export interface DetectionReport {
  /** Input label: a path or `-` for stdin */
  source: string;
  mime: string;
  extension: string;
  kind: string;
  /** Set when the run checked the input against a format or extension */
  matched?: boolean;
}
