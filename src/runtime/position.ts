import type { LineColumn } from '../utils/types';

/** Outcome of one match attempt: where the cursor ended up, or where it gave up. */
export type MatchResult =
  | { ok: true; pos: Position }
  | { ok: false; pos: Position };

export const ok = (pos: Position): MatchResult => ({ ok: true, pos });
export const err = (pos: Position): MatchResult => ({ ok: false, pos });

/**
 * Immutable cursor into an input string. Every matcher returns a new
 * position on success and this one, unchanged, on failure.
 */
export class Position {
  readonly input: string;
  readonly offset: number;

  private constructor(input: string, offset: number) {
    this.input = input;
    this.offset = offset;
  }

  static fromStart(input: string): Position {
    return new Position(input, 0);
  }

  static at(input: string, offset: number): Position | null {
    return offset >= 0 && offset <= input.length ? new Position(input, offset) : null;
  }

  private moveTo(offset: number): Position {
    return new Position(this.input, offset);
  }

  span(end: Position): Span {
    return new Span(this, end);
  }

  /** Offset of the first character on this position's line. */
  private lineStart(): number {
    return this.offset === 0 ? 0 : this.input.lastIndexOf('\n', this.offset - 1) + 1;
  }

  /** 1-based line and column; columns count UTF-16 code units. */
  lineCol(): LineColumn {
    const start = this.lineStart();
    let line = 1;
    for (let i = this.input.indexOf('\n'); i !== -1 && i < start; i = this.input.indexOf('\n', i + 1)) {
      line++;
    }
    return { line, column: this.offset - start + 1, offset: this.offset };
  }

  /** The line of input this position sits on, without its line break. */
  lineOf(): string {
    const end = this.input.indexOf('\n', this.offset);
    return this.input.slice(this.lineStart(), end === -1 ? this.input.length : end).replace(/\r$/, '');
  }

  /** The end of the previous line, or null on the first line. */
  previousLine(): Position | null {
    const start = this.lineStart();
    return start === 0 ? null : this.moveTo(start - 1);
  }

  /** Start of the next line, or null on the last line. */
  nextLine(): Position | null {
    const end = this.input.indexOf('\n', this.offset);
    return end === -1 ? null : this.moveTo(end + 1);
  }

  compare(other: Position): number {
    return this.offset - other.offset;
  }

  equals(other: Position): boolean {
    return this.input === other.input && this.offset === other.offset;
  }

  atStart(): MatchResult {
    return this.offset === 0 ? ok(this) : err(this);
  }

  atEnd(): MatchResult {
    return this.offset === this.input.length ? ok(this) : err(this);
  }

  /** Advance `count` code points. */
  skip(count: number): MatchResult {
    let offset = this.offset;
    for (let i = 0; i < count; i++) {
      const codePoint = this.input.codePointAt(offset);
      if (codePoint === undefined) return err(this);
      offset += codePoint > 0xffff ? 2 : 1;
    }
    return ok(this.moveTo(offset));
  }

  /** Move to the start of the next occurrence of `text`. */
  skipUntil(text: string): MatchResult {
    const index = this.input.indexOf(text, this.offset);
    return index === -1 ? err(this) : ok(this.moveTo(index));
  }

  matchString(text: string): MatchResult {
    return this.input.startsWith(text, this.offset) ? ok(this.moveTo(this.offset + text.length)) : err(this);
  }

  matchInsensitive(text: string): MatchResult {
    const slice = this.input.slice(this.offset, this.offset + text.length);
    return slice.length === text.length && slice.toLowerCase() === text.toLowerCase()
      ? ok(this.moveTo(this.offset + text.length))
      : err(this);
  }

  /** Match one code point between `low` and `high`, both inclusive. */
  matchRange(low: string, high: string): MatchResult {
    const codePoint = this.input.codePointAt(this.offset);
    const lowPoint = low.codePointAt(0);
    const highPoint = high.codePointAt(0);
    if (codePoint === undefined || lowPoint === undefined || highPoint === undefined) return err(this);
    if (codePoint < lowPoint || codePoint > highPoint) return err(this);
    return ok(this.moveTo(this.offset + (codePoint > 0xffff ? 2 : 1)));
  }

  optional(f: (pos: Position) => MatchResult): MatchResult {
    const result = f(this);
    return result.ok ? result : ok(this);
  }

  /** Apply `f` while it succeeds and advances. Never fails. */
  repeat(f: (pos: Position) => MatchResult): MatchResult {
    let current: Position = this;
    for (;;) {
      const result = f(current);
      if (!result.ok || result.pos.offset <= current.offset) return ok(current);
      current = result.pos;
    }
  }

  /** Run `f`; on failure report this position rather than wherever `f` stopped. */
  sequence(f: (pos: Position) => MatchResult): MatchResult {
    const result = f(this);
    return result.ok ? result : err(this);
  }

  /** Run `f` without consuming: the outcome is kept, the movement is not. */
  lookahead(positive: boolean, f: (pos: Position) => MatchResult): MatchResult {
    const result = f(this);
    return result.ok === positive ? ok(this) : err(this);
  }

  toString(): string {
    const { line, column } = this.lineCol();
    return `${line}:${column}`;
  }
}

/** A range of input between two positions over the same string. */
export class Span {
  readonly start: Position;
  readonly end: Position;

  constructor(start: Position, end: Position) {
    this.start = start;
    this.end = end;
  }

  asStr(): string {
    return this.start.input.slice(this.start.offset, this.end.offset);
  }

  get length(): number {
    return this.end.offset - this.start.offset;
  }

  contains(other: Span): boolean {
    return this.start.offset <= other.start.offset && other.end.offset <= this.end.offset;
  }

  toString(): string {
    return `${this.start.offset}..${this.end.offset}`;
  }
}
