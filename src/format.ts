import { BytesniffError } from './errors.js';
import { FormatKind } from './kind.js';
import type { FormatDefinition, Matcher } from './types.js';

/**
 * Strip any parameter segment (`; charset=...`) and surrounding whitespace.
 */
export function normalizeMime(mime: string): string {
  const separator = mime.indexOf(';');
  return (separator === -1 ? mime : mime.slice(0, separator)).trim();
}

/**
 * One node of the detection tree.
 *
 * Nodes are built bottom-up: a node adopts its children when it is
 * constructed, which fixes each child's `parent`. Nothing about a node
 * changes after that.
 */
export class FileFormat {
  readonly mime: string;
  readonly extension: string;
  readonly aliases: readonly string[];
  readonly extensionAliases: readonly string[];
  readonly matcher: Matcher;
  readonly children: readonly FileFormat[];
  readonly ownKind: FormatKind;

  private _parent: FileFormat | undefined;

  constructor(definition: FormatDefinition) {
    this.mime = definition.mime;
    this.extension = definition.extension;
    this.matcher = definition.matcher;
    this.aliases = Object.freeze([...(definition.aliases ?? [])]);
    this.extensionAliases = Object.freeze([...(definition.extensionAliases ?? [])]);
    this.ownKind = definition.kind ?? FormatKind.UNKNOWN;
    this.children = Object.freeze([...(definition.children ?? [])]);

    for (const child of this.children) {
      child.adopt(this);
    }
  }

  private adopt(parent: FileFormat): void {
    if (this._parent !== undefined && this._parent !== parent) {
      throw new BytesniffError(`${this.mime} already belongs to ${this._parent.mime}`);
    }
    this._parent = parent;
  }

  /** The node whose `children` contains this one */
  get parent(): FileFormat | undefined {
    return this._parent;
  }

  /** Own kind merged with every ancestor's kind */
  get kind(): FormatKind {
    return this._parent ? this.ownKind.union(this._parent.kind) : this.ownKind;
  }

  /**
   * Compare against a format string, ignoring parameters. Aliases count as equal.
   */
  is(expected: string): boolean {
    const target = normalizeMime(expected);
    if (normalizeMime(this.mime) === target) {
      return true;
    }
    return this.aliases.some((alias) => normalizeMime(alias) === target);
  }

  /** Evaluate this node's own predicate */
  matches(input: Uint8Array): boolean {
    return this.matcher(input);
  }

  toString(): string {
    return this.mime;
  }
}
