import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FileFormat } from '../format.js';
import { FormatKind } from '../kind.js';
import { zipHas } from './common.js';
import { buildEpub, buildOfficeOpenXml, buildOpenDocument } from './document.js';

const TAR_RECORD_SIZE = 512;
const TAR_CHECKSUM_OFFSET = 148;
const TAR_CHECKSUM_LENGTH = 8;

export function isZip(input: Uint8Array): boolean {
  return (
    buffer.startsWith(input, 'PK\x03\x04') ||
    buffer.startsWith(input, 'PK\x05\x06') ||
    buffer.startsWith(input, 'PK\x07\x08')
  );
}

/**
 * Octal number in a tar header field, skipping leading spaces and NULs and
 * stopping at the first space or NUL after the digits.
 */
function parseOctal(field: Uint8Array): number | undefined {
  let i = 0;
  while (i < field.length && (field[i] === 0x20 || field[i] === 0x00)) {
    i++;
  }
  let value = 0;
  let digits = 0;
  for (; i < field.length; i++) {
    const byte = field[i] ?? 0;
    if (byte === 0x20 || byte === 0x00) {
      break;
    }
    if (byte < 0x30 || byte > 0x37) {
      return undefined;
    }
    value = value * 8 + (byte - 0x30);
    digits++;
  }
  return digits > 0 ? value : undefined;
}

/**
 * POSIX tar has no magic number, so the header checksum is recomputed.
 * Some writers sum signed bytes, so both sums are accepted.
 */
export function isTar(input: Uint8Array): boolean {
  if (input.length < TAR_RECORD_SIZE) {
    return false;
  }
  const record = input.subarray(0, TAR_RECORD_SIZE);
  // Gentoo binary packages are tar files with their own type
  if (buffer.indexOf(record, '/gpkg-1\x00', 0, 100) !== -1) {
    return false;
  }
  const recorded = parseOctal(
    record.subarray(TAR_CHECKSUM_OFFSET, TAR_CHECKSUM_OFFSET + TAR_CHECKSUM_LENGTH)
  );
  if (recorded === undefined) {
    return false;
  }

  let unsigned = 0;
  let signed = 0;
  for (let i = 0; i < record.length; i++) {
    const inField = i >= TAR_CHECKSUM_OFFSET && i < TAR_CHECKSUM_OFFSET + TAR_CHECKSUM_LENGTH;
    const byte = inField ? 0x20 : (record[i] ?? 0);
    unsigned += byte;
    signed += byte > 0x7f ? byte - 0x100 : byte;
  }
  return recorded === unsigned || recorded === signed;
}

function isCpio(input: Uint8Array): boolean {
  if (input.length < 6) {
    return false;
  }
  const magic = dataview.readUint16LE(input, 0);
  if (magic === 0o70707 || magic === 0xc7c7) {
    return true;
  }
  return (
    buffer.startsWith(input, '070701') ||
    buffer.startsWith(input, '070702') ||
    buffer.startsWith(input, '070707')
  );
}

function isZstd(input: Uint8Array): boolean {
  if (input.length < 4) {
    return false;
  }
  const magic = dataview.readUint32LE(input, 0);
  // frames and skippable frames
  return (magic >= 0xfd2fb522 && magic <= 0xfd2fb528) || (magic >= 0x184d2a50 && magic <= 0x184d2a5f);
}

/**
 * Chrome extension: a Cr24 header followed by key and signature blobs, then a ZIP
 */
function isCrx(input: Uint8Array): boolean {
  if (input.length < 16 || !buffer.startsWith(input, 'Cr24')) {
    return false;
  }
  const zipOffset = 16 + dataview.readUint32LE(input, 8) + dataview.readUint32LE(input, 12);
  return zipOffset <= input.length && isZip(input.subarray(zipOffset));
}

/**
 * A JAR whose first entry carries the 0xCAFE extra field marks it executable
 */
function isExecutableJar(input: Uint8Array): boolean {
  if (input.length < 30) {
    return false;
  }
  const marker = 30 + dataview.readUint16LE(input, 26);
  return marker + 2 <= input.length && dataview.readUint16LE(input, marker) === 0xcafe;
}

function isJar(input: Uint8Array): boolean {
  return (
    isExecutableJar(input) ||
    zipHas(input, [{ name: 'META-INF/MANIFEST.MF' }, { name: 'META-INF/', prefix: true }], 1)
  );
}

function isApk(input: Uint8Array): boolean {
  return zipHas(
    input,
    [
      { name: 'AndroidManifest.xml' },
      { name: 'META-INF/com/android/build/gradle/app-metadata.properties' },
      { name: 'classes.dex' },
      { name: 'resources.arsc' },
      { name: 'res/drawable', prefix: true },
    ],
    100
  );
}

export function buildZip(): FileFormat {
  return new FileFormat({
    mime: 'application/zip',
    extension: '.zip',
    aliases: ['application/x-zip', 'application/x-zip-compressed'],
    kind: FormatKind.ARCHIVE,
    matcher: isZip,
    children: [
      ...buildOfficeOpenXml(),
      buildEpub(),
      new FileFormat({
        mime: 'application/java-archive',
        extension: '.jar',
        aliases: ['application/jar', 'application/x-java-archive'],
        kind: FormatKind.APPLICATION,
        matcher: isJar,
      }),
      new FileFormat({
        mime: 'application/vnd.android.package-archive',
        extension: '.apk',
        kind: FormatKind.APPLICATION,
        matcher: isApk,
      }),
      ...buildOpenDocument(),
      new FileFormat({
        mime: 'application/vnd.google-earth.kmz',
        extension: '.kmz',
        kind: FormatKind.MODEL,
        matcher: (input) => zipHas(input, [{ name: 'doc.kml' }], 100),
      }),
    ],
  });
}

export function build7z(): FileFormat {
  return new FileFormat({
    mime: 'application/x-7z-compressed',
    extension: '.7z',
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c]),
  });
}

export function buildAr(): FileFormat {
  return new FileFormat({
    mime: 'application/x-archive',
    extension: '.a',
    aliases: ['application/x-unix-archive'],
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, '!<arch>'),
    children: [
      new FileFormat({
        mime: 'application/vnd.debian.binary-package',
        extension: '.deb',
        kind: FormatKind.APPLICATION,
        matcher: (input) => input.length > 21 && buffer.matchesAt(input, 8, 'debian-binary'),
      }),
    ],
  });
}

export function buildTar(): FileFormat {
  return new FileFormat({
    mime: 'application/x-tar',
    extension: '.tar',
    kind: FormatKind.ARCHIVE,
    matcher: isTar,
  });
}

export function buildBzip2(): FileFormat {
  return new FileFormat({
    mime: 'application/x-bzip2',
    extension: '.bz2',
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, 'BZh'),
  });
}

export function buildGzip(): FileFormat {
  return new FileFormat({
    mime: 'application/gzip',
    extension: '.gz',
    aliases: ['application/x-gzip', 'application/x-gunzip', 'application/gzipped'],
    extensionAliases: ['.tgz', '.taz'],
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, [0x1f, 0x8b]),
  });
}

export function buildCrx(): FileFormat {
  return new FileFormat({
    mime: 'application/x-chrome-extension',
    extension: '.crx',
    kind: FormatKind.ARCHIVE,
    matcher: isCrx,
  });
}

export function buildRar(): FileFormat {
  return new FileFormat({
    mime: 'application/x-rar-compressed',
    extension: '.rar',
    aliases: ['application/x-rar', 'application/vnd.rar'],
    kind: FormatKind.ARCHIVE,
    matcher: (input) =>
      buffer.startsWith(input, 'Rar!\x1a\x07\x00') || buffer.startsWith(input, 'Rar!\x1a\x07\x01\x00'),
  });
}

export function buildZstd(): FileFormat {
  return new FileFormat({
    mime: 'application/zstd',
    extension: '.zst',
    kind: FormatKind.ARCHIVE,
    matcher: isZstd,
  });
}

export function buildCab(): FileFormat {
  return new FileFormat({
    mime: 'application/vnd.ms-cab-compressed',
    extension: '.cab',
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, 'MSCF'),
  });
}

export function buildRpm(): FileFormat {
  return new FileFormat({
    mime: 'application/x-rpm',
    extension: '.rpm',
    aliases: ['application/x-redhat-package-manager'],
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, [0xed, 0xab, 0xee, 0xdb]),
  });
}

export function buildXz(): FileFormat {
  return new FileFormat({
    mime: 'application/x-xz',
    extension: '.xz',
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]),
  });
}

export function buildLzip(): FileFormat {
  return new FileFormat({
    mime: 'application/lzip',
    extension: '.lz',
    aliases: ['application/x-lzip'],
    kind: FormatKind.ARCHIVE,
    matcher: (input) => buffer.startsWith(input, 'LZIP'),
  });
}

export function buildTorrent(): FileFormat {
  return new FileFormat({
    mime: 'application/x-bittorrent',
    extension: '.torrent',
    kind: FormatKind.APPLICATION,
    matcher: (input) =>
      buffer.startsWith(input, 'd8:announce') ||
      buffer.startsWith(input, 'd7:comment') ||
      buffer.startsWith(input, 'd4:info'),
  });
}

export function buildCpio(): FileFormat {
  return new FileFormat({
    mime: 'application/x-cpio',
    extension: '.cpio',
    kind: FormatKind.ARCHIVE,
    matcher: isCpio,
  });
}
