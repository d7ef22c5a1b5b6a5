import { CaptureStack } from './stack';
import { Position, Span, type MatchResult } from './position';

export type Atomicity = 'non-atomic' | 'atomic' | 'compound-atomic';

type Lookahead = 'none' | 'positive' | 'negative';

/** Start/end markers of matched rules, in document order. */
export type QueueToken =
  | { kind: 'start'; rule: string; pos: Position; pair: number }
  | { kind: 'end'; rule: string; pos: Position; pair: number };

export interface RuleAttempts {
  position: Position;
  /** Rules that failed to match at `position`. */
  expected: string[];
  /** Rules that matched at `position` inside a negative lookahead. */
  unexpected: string[];
}

export interface TraceEvent {
  type: 'enter' | 'match' | 'fail';
  rule: string;
  offset: number;
  depth: number;
}

export interface ParserTracer {
  trace(event: TraceEvent): void;
}

export interface ParseOptions {
  /** Receives an event for every rule dispatch, built-ins included. */
  tracer?: ParserTracer;
  /** Maximum nesting of rule calls before the parse is aborted. */
  maxDepth?: number;
}

/**
 * Mutable state owned by a single parse: atomicity, lookahead, capture
 * stack, emitted tokens and failure bookkeeping. Every scope helper undoes
 * its own side effects when the wrapped attempt fails.
 */
export class ParserState {
  atomicity: Atomicity = 'non-atomic';
  depth = 0;

  readonly stack = new CaptureStack<Span>();
  readonly queue: QueueToken[] = [];

  private lookaheadMode: Lookahead = 'none';
  private furthest: Position;
  private attemptPos: Position;
  private positives: string[] = [];
  private negatives: string[] = [];

  readonly options: ParseOptions;

  constructor(input: string, options: ParseOptions = {}) {
    this.options = options;
    this.furthest = Position.fromStart(input);
    this.attemptPos = Position.fromStart(input);
  }

  /** Furthest position at which any match attempt failed. */
  get furthestFailure(): Position {
    return this.furthest;
  }

  get attempts(): RuleAttempts {
    return {
      position: this.attemptPos,
      expected: dedupe(this.positives),
      unexpected: dedupe(this.negatives),
    };
  }

  /** Note a failed attempt; keeps the furthest one. */
  fail(result: MatchResult): MatchResult {
    if (!result.ok && result.pos.offset > this.furthest.offset) {
      this.furthest = result.pos;
    }
    return result;
  }

  /**
   * Run `f` as the body of rule `name`. Emits a start/end token pair around
   * a successful match when the current context produces tokens, and records
   * the attempt for error reporting unless `tracked` is false.
   */
  rule(
    name: string,
    pos: Position,
    f: (state: ParserState, pos: Position) => MatchResult,
    tracked = true
  ): MatchResult {
    const index = this.queue.length;
    const emit = this.lookaheadMode === 'none' && this.atomicity !== 'atomic';
    const sameSpot = pos.offset === this.attemptPos.offset;
    const positivesIndex = sameSpot ? this.positives.length : 0;
    const negativesIndex = sameSpot ? this.negatives.length : 0;
    const prevAttempts = this.attemptsAt(pos);

    if (emit) {
      this.queue.push({ kind: 'start', rule: name, pos, pair: -1 });
    }

    const result = f(this, pos);

    if (result.ok) {
      if (tracked && this.lookaheadMode === 'negative') {
        this.track(name, pos, positivesIndex, negativesIndex, prevAttempts, false);
      }
      if (emit) {
        const endIndex = this.queue.length;
        this.queue.push({ kind: 'end', rule: name, pos: result.pos, pair: index });
        const start = this.queue[index];
        if (start.kind === 'start') start.pair = endIndex;
      }
    } else {
      if (tracked && this.lookaheadMode !== 'negative') {
        this.track(name, pos, positivesIndex, negativesIndex, prevAttempts, true);
      }
      this.queue.length = index;
    }

    return result;
  }

  /** Run `f` with `atomicity` in effect, restoring the previous mode afterwards. */
  atomic(atomicity: Atomicity, f: (state: ParserState) => MatchResult): MatchResult {
    if (this.atomicity === atomicity) return f(this);

    const previous = this.atomicity;
    this.atomicity = atomicity;
    try {
      return f(this);
    } finally {
      this.atomicity = previous;
    }
  }

  /** Run `f`; if it fails, drop every token and capture change it made. */
  sequence(f: (state: ParserState) => MatchResult): MatchResult {
    const index = this.queue.length;
    const mark = this.stack.snapshot();

    const result = f(this);

    if (!result.ok) {
      this.queue.length = index;
      this.stack.restore(mark);
    }
    return result;
  }

  /**
   * Run `f` as a lookahead. Tokens are suppressed and capture changes are
   * always undone; a negative lookahead inside a negative one is positive.
   */
  lookahead(positive: boolean, f: (state: ParserState) => MatchResult): MatchResult {
    const previous = this.lookaheadMode;
    const mark = this.stack.snapshot();

    if (positive) {
      this.lookaheadMode = previous === 'negative' ? 'negative' : 'positive';
    } else {
      this.lookaheadMode = previous === 'negative' ? 'positive' : 'negative';
    }

    try {
      return f(this);
    } finally {
      this.stack.restore(mark);
      this.lookaheadMode = previous;
    }
  }

  private attemptsAt(pos: Position): number {
    return pos.offset === this.attemptPos.offset ? this.positives.length + this.negatives.length : 0;
  }

  private track(
    name: string,
    pos: Position,
    positivesIndex: number,
    negativesIndex: number,
    prevAttempts: number,
    positive: boolean
  ): void {
    if (this.atomicity === 'atomic') return;

    // A single nested attempt at the same spot is more precise than this rule; keep it.
    const currAttempts = this.attemptsAt(pos);
    if (currAttempts > prevAttempts && currAttempts - prevAttempts === 1) return;

    if (pos.offset === this.attemptPos.offset) {
      this.positives.length = Math.min(this.positives.length, positivesIndex);
      this.negatives.length = Math.min(this.negatives.length, negativesIndex);
    }

    if (pos.offset > this.attemptPos.offset) {
      this.positives = [];
      this.negatives = [];
      this.attemptPos = pos;
    }

    if (pos.offset === this.attemptPos.offset) {
      if (positive) {
        this.positives.push(name);
      } else {
        this.negatives.push(name);
      }
    }
  }
}

function dedupe(names: string[]): string[] {
  return Array.from(new Set(names)).sort();
}
