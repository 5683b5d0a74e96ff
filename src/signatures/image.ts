import * as buffer from '../binary/buffer.js';
import { FileFormat } from '../format.js';
import { FormatKind } from '../kind.js';
import { prefixes } from './common.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];
const JXL_CONTAINER = [0x00, 0x00, 0x00, 0x0c, 0x4a, 0x58, 0x4c, 0x20, 0x0d, 0x0a, 0x87, 0x0a];

function isPng(input: Uint8Array): boolean {
  return buffer.startsWith(input, PNG_SIGNATURE);
}

/** Animated PNG: the acTL chunk follows IHDR directly */
function isApng(input: Uint8Array): boolean {
  return input.length >= 41 && isPng(input) && buffer.matchesAt(input, 37, 'acTL');
}

function isJpeg2000(input: Uint8Array): boolean {
  if (input.length < 24) {
    return false;
  }
  if (!buffer.matchesAt(input, 4, 'jP  ') && !buffer.matchesAt(input, 4, 'jP2 ')) {
    return false;
  }
  return buffer.matchesAt(input, 20, 'jp2 ');
}

interface ImageOptions {
  aliases?: string[];
  extensionAliases?: string[];
  children?: FileFormat[];
}

function image(
  mime: string,
  extension: string,
  matcher: (input: Uint8Array) => boolean,
  options: ImageOptions = {}
): FileFormat {
  return new FileFormat({ mime, extension, matcher, kind: FormatKind.IMAGE, ...options });
}

export function buildXpm(): FileFormat {
  return image('image/x-xpixmap', '.xpm', prefixes('/* XPM */'));
}

export function buildPsd(): FileFormat {
  return image('image/vnd.adobe.photoshop', '.psd', prefixes('8BPS'), {
    aliases: ['image/x-psd', 'application/photoshop'],
  });
}

/** Netpbm family, split by magic number */
export function buildNetpbm(): FileFormat {
  return image('image/x-portable-anymap', '.pnm', prefixes('P1', 'P2', 'P3', 'P4', 'P5', 'P6', 'P7'), {
    children: [
      image('image/x-portable-bitmap', '.pbm', prefixes('P1', 'P4')),
      image('image/x-portable-graymap', '.pgm', prefixes('P2', 'P5')),
      image('image/x-portable-pixmap', '.ppm', prefixes('P3', 'P6')),
      image('image/x-portable-arbitrarymap', '.pam', prefixes('P7')),
    ],
  });
}

export function buildPng(): FileFormat {
  return image('image/png', '.png', isPng, {
    children: [image('image/vnd.mozilla.apng', '.apng', isApng)],
  });
}

export function buildJpeg(): FileFormat {
  return image('image/jpeg', '.jpg', prefixes(JPEG_SIGNATURE), {
    extensionAliases: ['.jpeg', '.jpe', '.jif', '.jfif', '.jfi'],
  });
}

export function buildJpegXl(): FileFormat {
  return image('image/jxl', '.jxl', prefixes([0xff, 0x0a], JXL_CONTAINER));
}

export function buildJpeg2000(): FileFormat {
  return image('image/jp2', '.jp2', isJpeg2000);
}

export function buildGif(): FileFormat {
  return image('image/gif', '.gif', prefixes('GIF87a', 'GIF89a'));
}

export function buildWebp(): FileFormat {
  return image(
    'image/webp',
    '.webp',
    (input) => buffer.startsWith(input, 'RIFF') && buffer.matchesAt(input, 8, 'WEBP')
  );
}

export function buildTiff(): FileFormat {
  return image('image/tiff', '.tiff', prefixes('II*\x00', 'MM\x00*'), { extensionAliases: ['.tif'] });
}

export function buildBmp(): FileFormat {
  return image('image/bmp', '.bmp', prefixes('BM'), { aliases: ['image/x-bmp', 'image/x-ms-bmp'] });
}

export function buildIco(): FileFormat {
  return image('image/x-icon', '.ico', prefixes([0x00, 0x00, 0x01, 0x00]), {
    aliases: ['image/vnd.microsoft.icon'],
  });
}
