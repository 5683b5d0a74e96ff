import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FileFormat } from '../format.js';
import { FormatKind } from '../kind.js';
import { prefixes } from './common.js';

// e_type values in the ELF header
const ELF_RELOCATABLE = 1;
const ELF_EXECUTABLE = 2;
const ELF_SHARED_OBJECT = 3;
const ELF_CORE = 4;

const MACHO_MAGIC = new Set([0xfeedface, 0xfeedfacf, 0xcafebabe, 0xcffaedfe, 0xcefaedfe]);

function isElf(input: Uint8Array): boolean {
  return buffer.startsWith(input, '\x7fELF');
}

function elfType(type: number) {
  return (input: Uint8Array): boolean =>
    input.length >= 18 && isElf(input) && input[16] === type && input[17] === 0x00;
}

function isMachO(input: Uint8Array): boolean {
  return input.length >= 4 && MACHO_MAGIC.has(dataview.readUint32LE(input, 0));
}

/** Embedded OpenType: 34 zero bytes of header padding, then the `LP` magic */
function isEot(input: Uint8Array): boolean {
  if (input.length < 36) {
    return false;
  }
  for (let i = 0; i < 34; i++) {
    if (input[i] !== 0x00) {
      return false;
    }
  }
  return buffer.matchesAt(input, 34, 'LP');
}

export function buildExe(): FileFormat {
  return new FileFormat({
    mime: 'application/vnd.microsoft.portable-executable',
    extension: '.exe',
    aliases: ['application/x-msdownload', 'application/x-dosexec'],
    extensionAliases: ['.dll'],
    kind: FormatKind.EXECUTABLE,
    matcher: prefixes('MZ'),
  });
}

export function buildElf(): FileFormat {
  return new FileFormat({
    mime: 'application/x-elf',
    extension: '',
    kind: FormatKind.EXECUTABLE,
    matcher: isElf,
    children: [
      new FileFormat({ mime: 'application/x-object', extension: '.o', matcher: elfType(ELF_RELOCATABLE) }),
      new FileFormat({ mime: 'application/x-executable', extension: '', matcher: elfType(ELF_EXECUTABLE) }),
      new FileFormat({
        mime: 'application/x-sharedlib',
        extension: '.so',
        matcher: elfType(ELF_SHARED_OBJECT),
      }),
      new FileFormat({ mime: 'application/x-coredump', extension: '', matcher: elfType(ELF_CORE) }),
    ],
  });
}

export function buildJavaClass(): FileFormat {
  return new FileFormat({
    mime: 'application/x-java-applet',
    extension: '.class',
    aliases: ['application/java-vm'],
    kind: FormatKind.EXECUTABLE,
    matcher: prefixes([0xca, 0xfe, 0xba, 0xbe]),
  });
}

export function buildSwf(): FileFormat {
  return new FileFormat({
    mime: 'application/x-shockwave-flash',
    extension: '.swf',
    aliases: ['application/vnd.adobe.flash-movie'],
    kind: FormatKind.APPLICATION,
    matcher: prefixes('FWS', 'CWS', 'ZWS'),
  });
}

export function buildWasm(): FileFormat {
  return new FileFormat({
    mime: 'application/wasm',
    extension: '.wasm',
    kind: FormatKind.EXECUTABLE,
    matcher: prefixes('\x00asm'),
  });
}

export function buildMachO(): FileFormat {
  return new FileFormat({
    mime: 'application/x-mach-binary',
    extension: '.macho',
    kind: FormatKind.EXECUTABLE,
    matcher: isMachO,
  });
}

export function buildFonts(): FileFormat[] {
  return [
    new FileFormat({
      mime: 'font/ttf',
      extension: '.ttf',
      aliases: ['font/sfnt', 'application/x-font-ttf', 'application/font-sfnt'],
      kind: FormatKind.FONT,
      matcher: prefixes([0x00, 0x01, 0x00, 0x00], 'true', 'typ1'),
    }),
    new FileFormat({ mime: 'font/woff', extension: '.woff', kind: FormatKind.FONT, matcher: prefixes('wOFF') }),
    new FileFormat({ mime: 'font/woff2', extension: '.woff2', kind: FormatKind.FONT, matcher: prefixes('wOF2') }),
    new FileFormat({ mime: 'font/otf', extension: '.otf', kind: FormatKind.FONT, matcher: prefixes('OTTO') }),
    new FileFormat({ mime: 'font/collection', extension: '.ttc', kind: FormatKind.FONT, matcher: prefixes('ttcf') }),
    new FileFormat({
      mime: 'application/vnd.ms-fontobject',
      extension: '.eot',
      kind: FormatKind.FONT,
      matcher: isEot,
    }),
  ];
}

export function buildSqlite(): FileFormat {
  return new FileFormat({
    mime: 'application/vnd.sqlite3',
    extension: '.sqlite',
    aliases: ['application/x-sqlite3'],
    extensionAliases: ['.db', '.sqlite3'],
    kind: FormatKind.DATABASE,
    matcher: prefixes('SQLite format 3\x00'),
  });
}

export function buildGlb(): FileFormat {
  return new FileFormat({
    mime: 'model/gltf-binary',
    extension: '.glb',
    kind: FormatKind.MODEL,
    matcher: prefixes('glTF\x02\x00\x00\x00', 'glTF\x01\x00\x00\x00'),
  });
}

export function buildParquet(): FileFormat {
  return new FileFormat({
    mime: 'application/vnd.apache.parquet',
    extension: '.parquet',
    aliases: ['application/x-parquet'],
    kind: FormatKind.DATABASE,
    matcher: prefixes('PAR1'),
  });
}
