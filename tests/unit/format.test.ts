import { describe, it, expect } from 'vitest';
import { FileFormat, normalizeMime } from '../../src/format.js';
import { FormatKind } from '../../src/kind.js';
import { BytesniffError } from '../../src/errors.js';
import { matchBytes, flatten, depth } from '../../src/traverse.js';

const always = (): boolean => true;
const never = (): boolean => false;
const firstByte = (value: number) => (input: Uint8Array): boolean => input[0] === value;

describe('normalizeMime', () => {
  it('should drop parameters and surrounding whitespace', () => {
    expect(normalizeMime('text/plain; charset=utf-8')).toBe('text/plain');
    expect(normalizeMime('  image/png  ')).toBe('image/png');
    expect(normalizeMime('text/html ;charset=utf-16')).toBe('text/html');
  });
});

describe('FileFormat', () => {
  it('should set the parent of its children', () => {
    const child = new FileFormat({ mime: 'x/child', extension: '.c', matcher: always });
    const parent = new FileFormat({ mime: 'x/parent', extension: '', matcher: always, children: [child] });

    expect(child.parent).toBe(parent);
    expect(parent.parent).toBeUndefined();
  });

  it('should refuse a child that already has another parent', () => {
    const child = new FileFormat({ mime: 'x/child', extension: '', matcher: always });
    new FileFormat({ mime: 'x/first', extension: '', matcher: always, children: [child] });

    expect(
      () => new FileFormat({ mime: 'x/second', extension: '', matcher: always, children: [child] })
    ).toThrow(BytesniffError);
  });

  it('should inherit kinds from ancestors', () => {
    const docx = new FileFormat({ mime: 'x/docx', extension: '.docx', matcher: always, kind: FormatKind.DOCUMENT });
    new FileFormat({ mime: 'x/zip', extension: '.zip', matcher: always, kind: FormatKind.ARCHIVE, children: [docx] });

    expect(docx.ownKind.equals(FormatKind.DOCUMENT)).toBe(true);
    expect(docx.kind.toString()).toBe('ARCHIVE | DOCUMENT');
  });

  it('should compare format strings without parameters and through aliases', () => {
    const format = new FileFormat({
      mime: 'text/plain; charset=utf-8',
      extension: '.txt',
      matcher: always,
      aliases: ['text/x-plain'],
    });

    expect(format.is('text/plain')).toBe(true);
    expect(format.is('text/plain; charset=utf-16')).toBe(true);
    expect(format.is(' text/x-plain ')).toBe(true);
    expect(format.is('text/html')).toBe(false);
    expect(format.is('TEXT/PLAIN')).toBe(false);
  });

  it('should freeze its lists', () => {
    const format = new FileFormat({ mime: 'x/y', extension: '', matcher: always, aliases: ['x/z'] });

    expect(Object.isFrozen(format.aliases)).toBe(true);
    expect(Object.isFrozen(format.children)).toBe(true);
  });

  it('should print its format string', () => {
    expect(String(new FileFormat({ mime: 'image/png', extension: '.png', matcher: always }))).toBe('image/png');
  });
});

describe('matchBytes', () => {
  const a1 = new FileFormat({ mime: 'x/a1', extension: '', matcher: firstByte(1) });
  const a = new FileFormat({ mime: 'x/a', extension: '', matcher: (input) => input.length > 0, children: [a1] });
  const b = new FileFormat({ mime: 'x/b', extension: '', matcher: firstByte(2) });
  const root = new FileFormat({ mime: 'x/root', extension: '', matcher: always, children: [a, b] });

  it('should return the deepest matching node', () => {
    expect(matchBytes(root, new Uint8Array([1]))).toBe(a1);
  });

  it('should stop at a node whose children do not match', () => {
    expect(matchBytes(root, new Uint8Array([3]))).toBe(a);
  });

  it('should not backtrack into later siblings', () => {
    // b would match, but a is tried first and wins
    expect(matchBytes(root, new Uint8Array([2]))).toBe(a);
  });

  it('should fall back to the starting node', () => {
    expect(matchBytes(root, new Uint8Array(0))).toBe(root);
  });

  it('should ignore the starting node predicate', () => {
    const lonely = new FileFormat({ mime: 'x/lonely', extension: '', matcher: never });
    expect(matchBytes(lonely, new Uint8Array([1]))).toBe(lonely);
  });
});

describe('flatten / depth', () => {
  it('should list nodes in pre-order and measure depth', () => {
    const leaf = new FileFormat({ mime: 'x/leaf', extension: '', matcher: always });
    const mid = new FileFormat({ mime: 'x/mid', extension: '', matcher: always, children: [leaf] });
    const other = new FileFormat({ mime: 'x/other', extension: '', matcher: always });
    const root = new FileFormat({ mime: 'x/root', extension: '', matcher: always, children: [mid, other] });

    expect(flatten(root).map(String)).toEqual(['x/root', 'x/mid', 'x/leaf', 'x/other']);
    expect(depth(root)).toBe(0);
    expect(depth(leaf)).toBe(2);
  });
});
