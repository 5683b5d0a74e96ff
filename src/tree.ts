import { FileFormat } from './format.js';
import { extensionRegistry, mimeRegistry } from './registry.js';
import { flatten } from './traverse.js';
import * as archive from './signatures/archive.js';
import * as binary from './signatures/binary.js';
import * as document from './signatures/document.js';
import * as image from './signatures/image.js';
import * as media from './signatures/media.js';
import * as text from './signatures/text.js';

export const OCTET_STREAM = 'application/octet-stream';

/**
 * Build the detection tree. Top-level order is detection priority:
 * containers and formats with distinctive magic numbers come first, and
 * UTF-8 text is the last resort before the root itself.
 */
export function buildTree(): FileFormat {
  return new FileFormat({
    mime: OCTET_STREAM,
    extension: '',
    matcher: () => true,
    children: [
      image.buildXpm(),
      archive.build7z(),
      archive.buildZip(),
      document.buildPdf(),
      document.buildFdf(),
      document.buildOle(),
      text.buildUtf8Bom(),
      text.buildUtf16Be(),
      text.buildUtf16Le(),
      document.buildPostScript(),
      image.buildPsd(),
      image.buildNetpbm(),
      media.buildOgg(),
      image.buildPng(),
      image.buildJpeg(),
      image.buildJpegXl(),
      image.buildJpeg2000(),
      image.buildGif(),
      image.buildWebp(),
      binary.buildExe(),
      binary.buildElf(),
      archive.buildAr(),
      archive.buildTar(),
      archive.buildBzip2(),
      image.buildTiff(),
      image.buildBmp(),
      image.buildIco(),
      media.buildMp3(),
      media.buildFlac(),
      media.buildMidi(),
      media.buildAmr(),
      media.buildWav(),
      media.buildAiff(),
      media.buildAu(),
      media.buildMpeg(),
      media.buildQuickTime(),
      media.buildIsoBaseMedia(),
      media.buildWebm(),
      media.buildAvi(),
      media.buildFlv(),
      media.buildMatroska(),
      media.buildAsf(),
      media.buildAac(),
      archive.buildGzip(),
      binary.buildJavaClass(),
      binary.buildSwf(),
      archive.buildCrx(),
      ...binary.buildFonts(),
      binary.buildWasm(),
      archive.buildRar(),
      binary.buildSqlite(),
      binary.buildMachO(),
      archive.buildZstd(),
      archive.buildCab(),
      archive.buildRpm(),
      archive.buildXz(),
      archive.buildLzip(),
      archive.buildTorrent(),
      archive.buildCpio(),
      binary.buildGlb(),
      binary.buildParquet(),
      text.buildUtf8Text(),
    ],
  });
}

/**
 * Make every node reachable through the registries under its format
 * strings and extensions.
 */
function registerBuiltins(root: FileFormat): void {
  for (const node of flatten(root)) {
    const matcher = node.matcher;
    for (const mime of [node.mime, ...node.aliases]) {
      mimeRegistry.register(mime, matcher);
    }
    for (const extension of [node.extension, ...node.extensionAliases]) {
      if (extension !== '') {
        extensionRegistry.register(extension, matcher);
      }
    }
  }
}

let root: FileFormat | undefined;
let preOrder: readonly FileFormat[] = [];

/**
 * The shared detection tree, built and registered on first call.
 * `root` is assigned only once both steps are complete.
 */
export function getRootFormat(): FileFormat {
  if (root === undefined) {
    const tree = buildTree();
    registerBuiltins(tree);
    preOrder = Object.freeze(flatten(tree));
    root = tree;
  }
  return root;
}

/** Every node of the shared tree in depth-first pre-order */
export function allFormats(): readonly FileFormat[] {
  getRootFormat();
  return preOrder;
}

/** First node, in pre-order, whose `is(mime)` holds */
export function lookupFormat(mime: string): FileFormat | undefined {
  return allFormats().find((format) => format.is(mime));
}
