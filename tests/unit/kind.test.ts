import { describe, it, expect } from 'vitest';
import { FormatKind } from '../../src/kind.js';

describe('FormatKind', () => {
  it('should combine flags with union', () => {
    const kind = FormatKind.DOCUMENT.union(FormatKind.ARCHIVE);

    expect(kind.isDocument()).toBe(true);
    expect(kind.isArchive()).toBe(true);
    expect(kind.isImage()).toBe(false);
  });

  it('should return the same instance when union adds nothing', () => {
    const kind = FormatKind.of(FormatKind.AUDIO, FormatKind.VIDEO);
    expect(kind.union(FormatKind.AUDIO)).toBe(kind);
  });

  it('should treat UNKNOWN as the empty set', () => {
    expect(FormatKind.IMAGE.contains(FormatKind.UNKNOWN)).toBe(true);
    expect(FormatKind.UNKNOWN.contains(FormatKind.IMAGE)).toBe(false);
    expect(FormatKind.of()).toBe(FormatKind.UNKNOWN);
  });

  it('should compare by value', () => {
    expect(FormatKind.of(FormatKind.TEXT, FormatKind.FONT).equals(FormatKind.FONT.union(FormatKind.TEXT))).toBe(
      true
    );
    expect(FormatKind.TEXT.equals(FormatKind.FONT)).toBe(false);
  });

  it('should print flag names in declaration order', () => {
    expect(FormatKind.of(FormatKind.SPREADSHEET, FormatKind.ARCHIVE).toString()).toBe('ARCHIVE | SPREADSHEET');
    expect(FormatKind.TEXT.toString()).toBe('TEXT');
    expect(FormatKind.UNKNOWN.toString()).toBe('UNKNOWN');
  });

  it('should expose a predicate for every flag', () => {
    const all = FormatKind.of(
      FormatKind.ARCHIVE,
      FormatKind.VIDEO,
      FormatKind.AUDIO,
      FormatKind.IMAGE,
      FormatKind.DOCUMENT,
      FormatKind.TEXT,
      FormatKind.FONT,
      FormatKind.EXECUTABLE,
      FormatKind.APPLICATION,
      FormatKind.MODEL,
      FormatKind.DATABASE,
      FormatKind.SPREADSHEET,
      FormatKind.PRESENTATION
    );

    expect([
      all.isArchive(),
      all.isVideo(),
      all.isAudio(),
      all.isImage(),
      all.isDocument(),
      all.isText(),
      all.isFont(),
      all.isExecutable(),
      all.isApplication(),
      all.isModel(),
      all.isDatabase(),
      all.isSpreadsheet(),
      all.isPresentation(),
    ]).toEqual(Array(13).fill(true));
  });
});
