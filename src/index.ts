/**
 * bytesniff - content-based file format detection
 *
 * Identify a file's format from its leading bytes by walking a tree of
 * magic-number signatures, from generic containers to specific formats.
 *
 * @packageDocumentation
 */

// Main API
export {
  READ_LIMIT,
  detect,
  equals,
  equalsAny,
  registerMime,
  registerExtension,
  isSupported,
  isSupportedExtension,
  matchMime,
  matchExtension,
} from './detect.js';

// Detection tree
export { FileFormat, normalizeMime } from './format.js';
export { FormatKind } from './kind.js';
export { OCTET_STREAM, buildTree, getRootFormat, allFormats, lookupFormat } from './tree.js';
export { matchBytes, flatten, depth } from './traverse.js';
export { MatcherRegistry, mimeRegistry, extensionRegistry } from './registry.js';
export type { MatcherRegistryOptions } from './registry.js';

// Types
export type { Matcher, FormatDefinition, DetectionReport } from './types.js';

// Error classes
export { BytesniffError, BufferOverflowError, SourceUnavailableError } from './errors.js';

// Binary utilities for custom matchers
export * as buffer from './binary/buffer.js';
export * as dataview from './binary/dataview.js';

// Default export for convenience
import { detect } from './detect.js';
export default detect;
