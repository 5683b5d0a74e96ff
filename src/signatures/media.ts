import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FileFormat } from '../format.js';
import { FormatKind } from '../kind.js';
import { isoBrand, prefixes } from './common.js';

const EBML_HEADER = [0x1a, 0x45, 0xdf, 0xa3];
const EBML_DOCTYPE_ID = [0x42, 0x82];
const EBML_SCAN_LIMIT = 4096;

const ASF_GUID = [
  0x30, 0x26, 0xb2, 0x75, 0x8e, 0x66, 0xcf, 0x11, 0xa6, 0xd9, 0x00, 0xaa, 0x00, 0x62, 0xce, 0x6c,
];

// First Ogg page payload begins at offset 28
const OGG_CODEC_OFFSET = 28;
const OGG_AUDIO_CODECS = ['\x7fFLAC', '\x01vorbis', 'OpusHead', 'Speex   '];
const OGG_VIDEO_CODECS = ['\x80theora', 'fishead\x00', '\x01video\x00\x00\x00'];

function oggCodec(codecs: readonly string[]) {
  return (input: Uint8Array): boolean =>
    input.length >= 37 && codecs.some((codec) => buffer.matchesAt(input, OGG_CODEC_OFFSET, codec));
}

function isMp3(input: Uint8Array): boolean {
  if (input.length < 3) {
    return false;
  }
  if (buffer.startsWith(input, 'ID3')) {
    return true;
  }
  // MPEG audio frame sync, ignoring the protection bit
  const header = dataview.readUint16BE(input, 0) & 0xfffe;
  return header === 0xfffa || header === 0xfff2 || header === 0xffe2;
}

/** Length in bytes of an EBML variable-size integer, from its first byte */
function vintWidth(first: number): number {
  let mask = 0x80;
  let width = 1;
  while (width < 8 && (first & mask) === 0) {
    mask >>= 1;
    width++;
  }
  return width;
}

/**
 * Matroska family: read the EBML DocType element and compare its value
 */
function matroskaDocType(docType: string) {
  return (input: Uint8Array): boolean => {
    if (!buffer.startsWith(input, EBML_HEADER)) {
      return false;
    }
    const id = buffer.indexOf(input, EBML_DOCTYPE_ID, 0, EBML_SCAN_LIMIT);
    if (id === -1) {
      return false;
    }
    const size = id + 2;
    const first = input[size];
    if (first === undefined) {
      return false;
    }
    return buffer.matchesAt(input, size + vintWidth(first), docType);
  };
}

/**
 * ISO base media file: a plausible leading box whose type is `ftyp`
 */
function isIsoBaseMedia(input: Uint8Array): boolean {
  if (input.length < 12) {
    return false;
  }
  const boxSize = dataview.readUint32BE(input, 0);
  if (boxSize < 12 || boxSize % 4 !== 0 || boxSize > input.length) {
    return false;
  }
  return buffer.matchesAt(input, 4, 'ftyp');
}

function riff(form: string) {
  return (input: Uint8Array): boolean => buffer.startsWith(input, 'RIFF') && buffer.matchesAt(input, 8, form);
}

export function buildOgg(): FileFormat {
  return new FileFormat({
    mime: 'application/ogg',
    extension: '.ogg',
    aliases: ['application/x-ogg'],
    kind: FormatKind.AUDIO,
    matcher: prefixes('OggS'),
    children: [
      new FileFormat({
        mime: 'audio/ogg',
        extension: '.oga',
        extensionAliases: ['.opus', '.spx'],
        kind: FormatKind.AUDIO,
        matcher: oggCodec(OGG_AUDIO_CODECS),
      }),
      new FileFormat({
        mime: 'video/ogg',
        extension: '.ogv',
        kind: FormatKind.VIDEO,
        matcher: oggCodec(OGG_VIDEO_CODECS),
      }),
    ],
  });
}

export function buildMp3(): FileFormat {
  return new FileFormat({
    mime: 'audio/mpeg',
    extension: '.mp3',
    aliases: ['audio/x-mpeg', 'audio/mp3'],
    kind: FormatKind.AUDIO,
    matcher: isMp3,
  });
}

export function buildFlac(): FileFormat {
  return new FileFormat({ mime: 'audio/flac', extension: '.flac', kind: FormatKind.AUDIO, matcher: prefixes('fLaC') });
}

export function buildMidi(): FileFormat {
  return new FileFormat({
    mime: 'audio/midi',
    extension: '.mid',
    aliases: ['audio/mid', 'audio/sp-midi', 'audio/x-mid', 'audio/x-midi'],
    extensionAliases: ['.midi'],
    kind: FormatKind.AUDIO,
    matcher: prefixes('MThd'),
  });
}

export function buildAmr(): FileFormat {
  return new FileFormat({
    mime: 'audio/amr',
    extension: '.amr',
    aliases: ['audio/amr-nb'],
    kind: FormatKind.AUDIO,
    matcher: prefixes('#!AMR'),
  });
}

export function buildWav(): FileFormat {
  return new FileFormat({
    mime: 'audio/wav',
    extension: '.wav',
    aliases: ['audio/x-wav', 'audio/vnd.wave', 'audio/wave'],
    kind: FormatKind.AUDIO,
    matcher: riff('WAVE'),
  });
}

export function buildAiff(): FileFormat {
  return new FileFormat({
    mime: 'audio/aiff',
    extension: '.aiff',
    aliases: ['audio/x-aiff'],
    extensionAliases: ['.aif'],
    kind: FormatKind.AUDIO,
    matcher: (input) => buffer.startsWith(input, 'FORM') && buffer.matchesAt(input, 8, 'AIFF'),
  });
}

export function buildAu(): FileFormat {
  return new FileFormat({
    mime: 'audio/basic',
    extension: '.au',
    aliases: ['audio/x-au'],
    kind: FormatKind.AUDIO,
    matcher: prefixes('.snd'),
  });
}

export function buildMpeg(): FileFormat {
  return new FileFormat({
    mime: 'video/mpeg',
    extension: '.mpeg',
    extensionAliases: ['.mpg'],
    kind: FormatKind.VIDEO,
    matcher: (input) => {
      const streamId = input[3];
      return (
        buffer.startsWith(input, [0x00, 0x00, 0x01]) &&
        streamId !== undefined &&
        streamId >= 0xb0 &&
        streamId <= 0xbf
      );
    },
  });
}

export function buildQuickTime(): FileFormat {
  return new FileFormat({
    mime: 'video/quicktime',
    extension: '.mov',
    kind: FormatKind.VIDEO,
    matcher: (input) => isoBrand(input, ['qt  ']),
  });
}

/**
 * ISO base media files, refined by the major brand in the ftyp box
 */
export function buildIsoBaseMedia(): FileFormat {
  const brand = (
    mime: string,
    extension: string,
    brands: string[],
    kind: FormatKind,
    aliases: string[] = []
  ): FileFormat => new FileFormat({ mime, extension, kind, aliases, matcher: (input) => isoBrand(input, brands) });

  return new FileFormat({
    mime: 'video/mp4',
    extension: '.mp4',
    aliases: ['application/mp4'],
    kind: FormatKind.VIDEO,
    matcher: isIsoBaseMedia,
    children: [
      brand('image/avif', '.avif', ['avif', 'avis'], FormatKind.IMAGE),
      brand('video/3gpp', '.3gp', ['3gp4', '3gp5', '3gp6', '3gp7', '3gp8', '3gp9', '3gpa', '3gpp'], FormatKind.VIDEO, [
        'video/3gp',
        'audio/3gpp',
      ]),
      brand(
        'video/3gpp2',
        '.3g2',
        ['3g24', '3g25', '3g26', '3g27', '3g28', '3g29', '3g2a', '3g2b', '3g2c'],
        FormatKind.VIDEO,
        ['video/3g2', 'audio/3gpp2']
      ),
      brand('audio/x-m4a', '.m4a', ['M4A '], FormatKind.AUDIO, ['audio/m4a']),
      brand('video/x-m4v', '.m4v', ['M4V '], FormatKind.VIDEO),
      brand('image/heic', '.heic', ['heic', 'heix'], FormatKind.IMAGE),
      brand('image/heif', '.heif', ['mif1', 'msf1'], FormatKind.IMAGE),
    ],
  });
}

export function buildWebm(): FileFormat {
  return new FileFormat({
    mime: 'video/webm',
    extension: '.webm',
    aliases: ['audio/webm'],
    kind: FormatKind.VIDEO,
    matcher: matroskaDocType('webm'),
  });
}

export function buildMatroska(): FileFormat {
  return new FileFormat({
    mime: 'video/x-matroska',
    extension: '.mkv',
    extensionAliases: ['.mka', '.mks', '.mk3d'],
    kind: FormatKind.VIDEO,
    matcher: matroskaDocType('matroska'),
  });
}

export function buildAvi(): FileFormat {
  return new FileFormat({
    mime: 'video/x-msvideo',
    extension: '.avi',
    aliases: ['video/avi', 'video/msvideo'],
    kind: FormatKind.VIDEO,
    matcher: (input) => input.length > 16 && riff('AVI LIST')(input),
  });
}

export function buildFlv(): FileFormat {
  return new FileFormat({ mime: 'video/x-flv', extension: '.flv', kind: FormatKind.VIDEO, matcher: prefixes('FLV') });
}

export function buildAsf(): FileFormat {
  return new FileFormat({
    mime: 'video/x-ms-asf',
    extension: '.asf',
    aliases: ['video/asf', 'video/x-ms-wmv'],
    extensionAliases: ['.wmv', '.wma'],
    kind: FormatKind.VIDEO,
    matcher: prefixes(ASF_GUID),
  });
}

export function buildAac(): FileFormat {
  return new FileFormat({
    mime: 'audio/aac',
    extension: '.aac',
    kind: FormatKind.AUDIO,
    matcher: prefixes([0xff, 0xf1], [0xff, 0xf9]),
  });
}
