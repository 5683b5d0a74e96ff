/**
 * Category flags attached to formats. A format can carry several at once
 * (a DOCX is both a DOCUMENT and, through its ZIP parent, an ARCHIVE).
 */
export class FormatKind {
  static readonly UNKNOWN = new FormatKind(0);
  static readonly ARCHIVE = new FormatKind(1 << 0);
  static readonly VIDEO = new FormatKind(1 << 1);
  static readonly AUDIO = new FormatKind(1 << 2);
  static readonly IMAGE = new FormatKind(1 << 3);
  static readonly DOCUMENT = new FormatKind(1 << 4);
  static readonly TEXT = new FormatKind(1 << 5);
  static readonly FONT = new FormatKind(1 << 6);
  static readonly EXECUTABLE = new FormatKind(1 << 7);
  static readonly APPLICATION = new FormatKind(1 << 8);
  static readonly MODEL = new FormatKind(1 << 9);
  static readonly DATABASE = new FormatKind(1 << 10);
  static readonly SPREADSHEET = new FormatKind(1 << 11);
  static readonly PRESENTATION = new FormatKind(1 << 12);

  private constructor(readonly bits: number) {}

  /** Combine any number of kinds */
  static of(...kinds: FormatKind[]): FormatKind {
    return kinds.reduce((acc, kind) => acc.union(kind), FormatKind.UNKNOWN);
  }

  contains(other: FormatKind): boolean {
    return (this.bits & other.bits) === other.bits;
  }

  union(other: FormatKind): FormatKind {
    const bits = this.bits | other.bits;
    return bits === this.bits ? this : new FormatKind(bits);
  }

  equals(other: FormatKind): boolean {
    return this.bits === other.bits;
  }

  isArchive(): boolean { return this.contains(FormatKind.ARCHIVE); }
  isVideo(): boolean { return this.contains(FormatKind.VIDEO); }
  isAudio(): boolean { return this.contains(FormatKind.AUDIO); }
  isImage(): boolean { return this.contains(FormatKind.IMAGE); }
  isDocument(): boolean { return this.contains(FormatKind.DOCUMENT); }
  isText(): boolean { return this.contains(FormatKind.TEXT); }
  isFont(): boolean { return this.contains(FormatKind.FONT); }
  isExecutable(): boolean { return this.contains(FormatKind.EXECUTABLE); }
  isApplication(): boolean { return this.contains(FormatKind.APPLICATION); }
  isModel(): boolean { return this.contains(FormatKind.MODEL); }
  isDatabase(): boolean { return this.contains(FormatKind.DATABASE); }
  isSpreadsheet(): boolean { return this.contains(FormatKind.SPREADSHEET); }
  isPresentation(): boolean { return this.contains(FormatKind.PRESENTATION); }

  /** Flag names joined with ` | `, e.g. `ARCHIVE | DOCUMENT` */
  toString(): string {
    const names = KIND_NAMES.filter(([, kind]) => kind.bits !== 0 && this.contains(kind)).map(
      ([name]) => name
    );
    return names.length > 0 ? names.join(' | ') : 'UNKNOWN';
  }
}

const KIND_NAMES: ReadonlyArray<readonly [string, FormatKind]> = [
  ['ARCHIVE', FormatKind.ARCHIVE],
  ['VIDEO', FormatKind.VIDEO],
  ['AUDIO', FormatKind.AUDIO],
  ['IMAGE', FormatKind.IMAGE],
  ['DOCUMENT', FormatKind.DOCUMENT],
  ['TEXT', FormatKind.TEXT],
  ['FONT', FormatKind.FONT],
  ['EXECUTABLE', FormatKind.EXECUTABLE],
  ['APPLICATION', FormatKind.APPLICATION],
  ['MODEL', FormatKind.MODEL],
  ['DATABASE', FormatKind.DATABASE],
  ['SPREADSHEET', FormatKind.SPREADSHEET],
  ['PRESENTATION', FormatKind.PRESENTATION],
];
