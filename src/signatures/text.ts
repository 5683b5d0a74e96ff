import * as buffer from '../binary/buffer.js';
import { FileFormat } from '../format.js';
import { FormatKind } from '../kind.js';
import { decodeUtf16, isUtf8Text, looksLikeDelimited, looksLikeJson } from './common.js';

/**
 * Text formats. Content checks run on decoded text so the same rules serve
 * UTF-8 input and UTF-16 input behind a byte order mark.
 */

type TextCheck = (text: string) => boolean;

const UTF8_BOM = [0xef, 0xbb, 0xbf];
const UTF16_BE_BOM = [0xfe, 0xff];
const UTF16_LE_BOM = [0xff, 0xfe];

const HTML_TAGS = [
  '<!doctype html',
  '<html',
  '<head',
  '<script',
  '<iframe',
  '<h1',
  '<div',
  '<font',
  '<table',
  '<a',
  '<style',
  '<title',
  '<b',
  '<body',
  '<br',
  '<p',
];

const JS_KEYWORDS = ['function', 'var ', 'let ', 'const ', 'class ', 'import ', 'export '];

const utf8Decoder = new TextDecoder('utf-8');

function trimLeft(text: string): string {
  return text.replace(/^[\s\uFEFF]+/, '');
}

/**
 * Lines of the text without line terminators. A trailing empty segment
 * after the last newline is not a line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export const isHtml: TextCheck = (text) => {
  const trimmed = trimLeft(text);
  const lower = trimmed.slice(0, 16).toLowerCase();
  return HTML_TAGS.some((tag) => {
    if (!lower.startsWith(tag)) {
      return false;
    }
    const next = trimmed.charAt(tag.length);
    return next === ' ' || next === '>' || next === '\t' || next === '\n';
  });
};

export const isXml: TextCheck = (text) => trimLeft(text).startsWith('<?xml');

export const isSvg: TextCheck = (text) => {
  const trimmed = trimLeft(text);
  if (trimmed.startsWith('<?xml')) {
    return trimmed.includes('<svg') || trimmed.includes('http://www.w3.org/2000/svg');
  }
  return trimmed.startsWith('<svg');
};

export const isJson: TextCheck = (text) => {
  const trimmed = trimLeft(text);
  return (trimmed.startsWith('{') || trimmed.startsWith('[')) && looksLikeJson(trimmed);
};

const isGeoJson: TextCheck = (text) =>
  isJson(text) &&
  text.includes('"type"') &&
  text.includes('"FeatureCollection"') &&
  text.includes('"features"');

const isNdjson: TextCheck = (text) => {
  const lines = text.split('\n').slice(0, 3);
  return lines.length > 1 && lines.every((line) => line.trim() === '' || isJson(line));
};

const isCsv: TextCheck = (text) => looksLikeDelimited(splitLines(text), ',');
const isTsv: TextCheck = (text) => looksLikeDelimited(splitLines(text), '\t');

const isRtf: TextCheck = (text) => text.startsWith('{\\rtf');

const isSrt: TextCheck = (text) => {
  const trimmed = trimLeft(text);
  if (!trimmed.startsWith('1\n') && !trimmed.startsWith('1\r\n')) {
    return false;
  }
  const timing = splitLines(trimmed)[1];
  return timing !== undefined && timing.includes(' --> ');
};

const isVtt: TextCheck = (text) => {
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  if (!body.startsWith('WEBVTT')) {
    return false;
  }
  const next = body.charAt(6);
  return next === '' || next === '\n' || next === '\r' || next === ' ' || next === '\t';
};

const isVcard: TextCheck = (text) => text.slice(0, 11).toUpperCase() === 'BEGIN:VCARD';
const isIcalendar: TextCheck = (text) => text.slice(0, 15).toUpperCase() === 'BEGIN:VCALENDAR';

const isPhp: TextCheck = (text) =>
  text.startsWith('<?php') || text.startsWith('<?\n') || text.startsWith('<?\r') || text.startsWith('<? ');

const isJavaScript: TextCheck = (text) => {
  if (
    text.startsWith('#!/usr/bin/env node') ||
    text.startsWith('#!/usr/bin/node') ||
    text.startsWith('/*') ||
    text.startsWith('//')
  ) {
    return true;
  }
  const sample = text.slice(0, 256);
  return JS_KEYWORDS.some((keyword) => sample.includes(keyword));
};

function shebang(...prefixes: string[]): TextCheck {
  return (text) => prefixes.some((prefix) => text.startsWith(prefix));
}

const isPython = shebang('#!/usr/bin/env python', '#!/usr/bin/python', '#!python', '# -*- coding:');
const isPerl = shebang('#!/usr/bin/env perl', '#!/usr/bin/perl', '#!perl');
const isRuby = shebang('#!/usr/bin/env ruby', '#!/usr/bin/ruby', '#!ruby');
const isLua = shebang('#!/usr/bin/env lua', '#!/usr/bin/lua', '#!lua', '\x1bLua');
const isShell = shebang('#!/bin/sh', '#!/bin/bash', '#!/usr/bin/env bash', '#!/bin/zsh');
const isTcl = shebang('#!/usr/bin/env tclsh', '#!/usr/bin/tclsh', '#!tclsh');

function xmlRoot(...needles: string[]): TextCheck {
  return (text) => needles.some((needle) => text.includes(needle));
}

/** Lift a text check to a byte matcher over UTF-8 input */
function utf8(check: TextCheck) {
  return (input: Uint8Array): boolean => check(utf8Decoder.decode(input));
}

/** Lift a text check to a byte matcher over UTF-16 input */
function utf16(check: TextCheck, bigEndian: boolean) {
  return (input: Uint8Array): boolean => {
    const text = decodeUtf16(input, bigEndian);
    return text !== undefined && check(text);
  };
}

export function buildUtf8Text(): FileFormat {
  const json = new FileFormat({
    mime: 'application/json',
    extension: '.json',
    matcher: utf8(isJson),
    children: [
      new FileFormat({ mime: 'application/geo+json', extension: '.geojson', matcher: utf8(isGeoJson) }),
      new FileFormat({
        mime: 'application/x-ndjson',
        extension: '.ndjson',
        matcher: utf8(isNdjson),
        aliases: ['application/jsonl'],
        extensionAliases: ['.jsonl'],
      }),
    ],
  });

  const xml = new FileFormat({
    mime: 'text/xml; charset=utf-8',
    extension: '.xml',
    matcher: utf8(isXml),
    aliases: ['application/xml'],
    children: [
      new FileFormat({ mime: 'application/rss+xml', extension: '.rss', matcher: utf8(xmlRoot('<rss')) }),
      new FileFormat({ mime: 'application/atom+xml', extension: '.atom', matcher: utf8(xmlRoot('<feed')) }),
      new FileFormat({
        mime: 'application/vnd.google-earth.kml+xml',
        extension: '.kml',
        matcher: utf8(xmlRoot('<kml')),
      }),
      new FileFormat({ mime: 'application/gpx+xml', extension: '.gpx', matcher: utf8(xmlRoot('<gpx')) }),
      new FileFormat({
        mime: 'application/xhtml+xml',
        extension: '.xhtml',
        matcher: utf8(xmlRoot('http://www.w3.org/1999/xhtml')),
      }),
    ],
  });

  return new FileFormat({
    mime: 'text/plain; charset=utf-8',
    extension: '.txt',
    aliases: ['text/plain'],
    kind: FormatKind.TEXT,
    matcher: (input) =>
      input.length > 0 &&
      (buffer.startsWith(input, UTF8_BOM) ||
        buffer.startsWith(input, UTF16_BE_BOM) ||
        buffer.startsWith(input, UTF16_LE_BOM) ||
        isUtf8Text(input)),
    children: [
      new FileFormat({
        mime: 'text/html; charset=utf-8',
        extension: '.html',
        extensionAliases: ['.htm'],
        matcher: utf8(isHtml),
      }),
      new FileFormat({
        mime: 'image/svg+xml',
        extension: '.svg',
        kind: FormatKind.IMAGE,
        matcher: utf8(isSvg),
      }),
      xml,
      new FileFormat({ mime: 'text/rtf', extension: '.rtf', kind: FormatKind.DOCUMENT, matcher: utf8(isRtf) }),
      new FileFormat({ mime: 'text/x-php', extension: '.php', matcher: utf8(isPhp) }),
      new FileFormat({
        mime: 'text/javascript',
        extension: '.js',
        aliases: ['application/javascript'],
        extensionAliases: ['.mjs'],
        matcher: utf8(isJavaScript),
      }),
      new FileFormat({
        mime: 'text/x-python',
        extension: '.py',
        aliases: ['text/x-script.python', 'application/x-python'],
        matcher: utf8(isPython),
      }),
      new FileFormat({ mime: 'text/x-perl', extension: '.pl', matcher: utf8(isPerl) }),
      new FileFormat({ mime: 'text/x-ruby', extension: '.rb', matcher: utf8(isRuby) }),
      new FileFormat({ mime: 'text/x-lua', extension: '.lua', matcher: utf8(isLua) }),
      new FileFormat({
        mime: 'text/x-shellscript',
        extension: '.sh',
        aliases: ['text/x-sh', 'application/x-shellscript', 'application/x-sh'],
        matcher: utf8(isShell),
      }),
      new FileFormat({ mime: 'text/x-tcl', extension: '.tcl', aliases: ['application/x-tcl'], matcher: utf8(isTcl) }),
      json,
      new FileFormat({ mime: 'text/csv', extension: '.csv', kind: FormatKind.SPREADSHEET, matcher: utf8(isCsv) }),
      new FileFormat({
        mime: 'text/tab-separated-values',
        extension: '.tsv',
        kind: FormatKind.SPREADSHEET,
        matcher: utf8(isTsv),
      }),
      new FileFormat({
        mime: 'application/x-subrip',
        extension: '.srt',
        aliases: ['application/x-srt', 'text/x-srt'],
        matcher: utf8(isSrt),
      }),
      new FileFormat({ mime: 'text/vtt', extension: '.vtt', matcher: utf8(isVtt) }),
      new FileFormat({
        mime: 'text/vcard',
        extension: '.vcf',
        extensionAliases: ['.vcard'],
        matcher: utf8(isVcard),
      }),
      new FileFormat({
        mime: 'text/calendar',
        extension: '.ics',
        extensionAliases: ['.ical', '.icalendar'],
        matcher: utf8(isIcalendar),
      }),
    ],
  });
}

export function buildUtf8Bom(): FileFormat {
  return new FileFormat({
    mime: 'text/plain; charset=utf-8',
    extension: '.txt',
    kind: FormatKind.TEXT,
    matcher: (input) => buffer.startsWith(input, UTF8_BOM),
  });
}

function buildUtf16(bigEndian: boolean): FileFormat {
  const child = (mime: string, extension: string, check: TextCheck, kind?: FormatKind) =>
    new FileFormat({ mime: `${mime}; charset=utf-16`, extension, matcher: utf16(check, bigEndian), kind });

  return new FileFormat({
    mime: bigEndian ? 'text/plain; charset=utf-16be' : 'text/plain; charset=utf-16le',
    extension: '.txt',
    kind: FormatKind.TEXT,
    matcher: (input) => buffer.startsWith(input, bigEndian ? UTF16_BE_BOM : UTF16_LE_BOM),
    children: [
      child('text/html', '.html', isHtml),
      child('image/svg+xml', '.svg', isSvg, FormatKind.IMAGE),
      child('text/xml', '.xml', isXml),
      child('application/json', '.json', isJson),
      child('text/csv', '.csv', isCsv, FormatKind.SPREADSHEET),
      child('text/tab-separated-values', '.tsv', isTsv, FormatKind.SPREADSHEET),
      child('application/x-subrip', '.srt', isSrt),
      child('text/vtt', '.vtt', isVtt),
      child('text/vcard', '.vcf', isVcard),
      child('text/calendar', '.ics', isIcalendar),
      child('text/rtf', '.rtf', isRtf, FormatKind.DOCUMENT),
    ],
  });
}

export function buildUtf16Be(): FileFormat {
  return buildUtf16(true);
}

export function buildUtf16Le(): FileFormat {
  return buildUtf16(false);
}
