import * as buffer from '../binary/buffer.js';
import { FileFormat } from '../format.js';
import { FormatKind } from '../kind.js';
import { msoxml, OLE_SIGNATURE, oleClsid, openDocument } from './common.js';

// Root storage CLSIDs of compound files
const CLSID = {
  word97: [0x06, 0x09, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0xc0, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x46],
  word6: [0x00, 0x09, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0xc0, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x46],
  wordPicture: [0x07, 0x09, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0xc0, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x46],
  excel5: [0x10, 0x08, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00],
  excel7: [0x20, 0x08, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00],
  powerPoint4: [0x10, 0x8d, 0x81, 0x64, 0x9b, 0x4f, 0xcf, 0x11, 0x86, 0xea, 0x00, 0xaa, 0x00, 0xb9, 0x29, 0xe8],
  powerPoint7: [0x70, 0xae, 0x7b, 0xea, 0x3b, 0xfb, 0xcd, 0x11, 0xa9, 0x03, 0x00, 0xaa, 0x00, 0x51, 0x0e, 0xa3],
  installer: [0x84, 0x10, 0x0c, 0x00, 0x00, 0x00, 0x00, 0x00, 0xc0, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x46],
  outlookMessage: [0x0b, 0x0d, 0x02, 0x00, 0x00, 0x00, 0x00, 0x00, 0xc0, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x46],
} as const;

const XLS_SUB_HEADERS = [
  [0x09, 0x08, 0x10, 0x00, 0x00, 0x06, 0x05, 0x00],
  [0xfd, 0xff, 0xff, 0xff, 0x10],
  [0xfd, 0xff, 0xff, 0xff, 0x1f],
  [0xfd, 0xff, 0xff, 0xff, 0x22],
  [0xfd, 0xff, 0xff, 0xff, 0x23],
  [0xfd, 0xff, 0xff, 0xff, 0x28],
  [0xfd, 0xff, 0xff, 0xff, 0x29],
];

const PPT_SUB_HEADERS = [
  [0xa0, 0x46, 0x1d, 0xf0],
  [0x00, 0x6e, 0x1e, 0xf0],
  [0x0f, 0x00, 0xe8, 0x03],
];

// Offset of the second sector in a v3 compound file
const SECOND_SECTOR = 512;
const DIRECTORY_SCAN_START = 1152;
const DIRECTORY_SCAN_END = 4096;

function utf16le(text: string): number[] {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    bytes.push(text.charCodeAt(i) & 0xff, text.charCodeAt(i) >> 8);
  }
  return bytes;
}

const WORKBOOK_STREAM = utf16le('WksSSWorkBook');
const POWERPOINT_STREAM = utf16le('PowerPoint Document');

function isOle(input: Uint8Array): boolean {
  return buffer.startsWith(input, OLE_SIGNATURE);
}

/** Look for a directory entry name in the sectors after the header */
function hasDirectoryName(input: Uint8Array, name: readonly number[]): boolean {
  return (
    input.length > DIRECTORY_SCAN_START &&
    buffer.indexOf(input, name, DIRECTORY_SCAN_START, DIRECTORY_SCAN_END) !== -1
  );
}

function subHeaderAt512(input: Uint8Array, headers: readonly (readonly number[])[]): boolean {
  return headers.some(
    (header) => input.length > SECOND_SECTOR + header.length && buffer.matchesAt(input, SECOND_SECTOR, header)
  );
}

function isDoc(input: Uint8Array): boolean {
  return [CLSID.word97, CLSID.word6, CLSID.wordPicture].some((clsid) => oleClsid(input, clsid));
}

function isXls(input: Uint8Array): boolean {
  if (!isOle(input)) {
    return false;
  }
  if (oleClsid(input, CLSID.excel5) || oleClsid(input, CLSID.excel7)) {
    return true;
  }
  return subHeaderAt512(input, XLS_SUB_HEADERS) || hasDirectoryName(input, WORKBOOK_STREAM);
}

function isPpt(input: Uint8Array): boolean {
  if (!isOle(input)) {
    return false;
  }
  if (oleClsid(input, CLSID.powerPoint4) || oleClsid(input, CLSID.powerPoint7)) {
    return true;
  }
  if (subHeaderAt512(input, PPT_SUB_HEADERS)) {
    return true;
  }
  if (
    input.length > 519 &&
    buffer.matchesAt(input, SECOND_SECTOR, [0xfd, 0xff, 0xff, 0xff]) &&
    input[518] === 0x00 &&
    input[519] === 0x00
  ) {
    return true;
  }
  return hasDirectoryName(input, POWERPOINT_STREAM);
}

export function buildPdf(): FileFormat {
  return new FileFormat({
    mime: 'application/pdf',
    extension: '.pdf',
    aliases: ['application/x-pdf'],
    kind: FormatKind.DOCUMENT,
    matcher: (input) => buffer.startsWith(input, '%PDF-'),
  });
}

export function buildFdf(): FileFormat {
  return new FileFormat({
    mime: 'application/vnd.fdf',
    extension: '.fdf',
    kind: FormatKind.DOCUMENT,
    matcher: (input) => buffer.startsWith(input, '%FDF-'),
  });
}

export function buildPostScript(): FileFormat {
  return new FileFormat({
    mime: 'application/postscript',
    extension: '.ps',
    kind: FormatKind.DOCUMENT,
    matcher: (input) => buffer.startsWith(input, '%!PS-Adobe-'),
  });
}

/**
 * Compound File Binary container and the legacy Office formats stored in it
 */
export function buildOle(): FileFormat {
  return new FileFormat({
    mime: 'application/x-ole-storage',
    extension: '',
    kind: FormatKind.ARCHIVE,
    matcher: isOle,
    children: [
      new FileFormat({
        mime: 'application/x-ms-installer',
        extension: '.msi',
        aliases: ['application/x-windows-installer', 'application/x-msi'],
        kind: FormatKind.EXECUTABLE,
        matcher: (input) => oleClsid(input, CLSID.installer),
      }),
      new FileFormat({
        mime: 'application/vnd.ms-outlook',
        extension: '.msg',
        kind: FormatKind.DOCUMENT,
        matcher: (input) => oleClsid(input, CLSID.outlookMessage),
      }),
      new FileFormat({
        mime: 'application/vnd.ms-excel',
        extension: '.xls',
        aliases: ['application/msexcel'],
        kind: FormatKind.SPREADSHEET,
        matcher: isXls,
      }),
      new FileFormat({
        mime: 'application/vnd.ms-powerpoint',
        extension: '.ppt',
        aliases: ['application/mspowerpoint'],
        kind: FormatKind.PRESENTATION,
        matcher: isPpt,
      }),
      new FileFormat({
        mime: 'application/msword',
        extension: '.doc',
        aliases: ['application/vnd.ms-word'],
        kind: FormatKind.DOCUMENT,
        matcher: isDoc,
      }),
    ],
  });
}

/** DOCX, XLSX and PPTX, in that order */
export function buildOfficeOpenXml(): FileFormat[] {
  return [
    new FileFormat({
      mime: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      extension: '.docx',
      kind: FormatKind.DOCUMENT,
      matcher: (input) => msoxml(input, [{ name: 'word/', prefix: true }], 100),
    }),
    new FileFormat({
      mime: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
      extension: '.xlsx',
      kind: FormatKind.SPREADSHEET,
      matcher: (input) => msoxml(input, [{ name: 'xl/', prefix: true }], 100),
    }),
    new FileFormat({
      mime: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
      extension: '.pptx',
      kind: FormatKind.PRESENTATION,
      matcher: (input) => msoxml(input, [{ name: 'ppt/', prefix: true }], 100),
    }),
  ];
}

export function buildEpub(): FileFormat {
  return new FileFormat({
    mime: 'application/epub+zip',
    extension: '.epub',
    kind: FormatKind.DOCUMENT,
    matcher: (input) => openDocument(input, 'application/epub+zip'),
  });
}

/** ODT, ODS, ODP and ODG */
export function buildOpenDocument(): FileFormat[] {
  const entries: Array<[string, string, FormatKind]> = [
    ['application/vnd.oasis.opendocument.text', '.odt', FormatKind.DOCUMENT],
    ['application/vnd.oasis.opendocument.spreadsheet', '.ods', FormatKind.SPREADSHEET],
    ['application/vnd.oasis.opendocument.presentation', '.odp', FormatKind.PRESENTATION],
    ['application/vnd.oasis.opendocument.graphics', '.odg', FormatKind.IMAGE],
  ];
  return entries.map(
    ([mime, extension, kind]) =>
      new FileFormat({ mime, extension, kind, matcher: (input) => openDocument(input, mime) })
  );
}
