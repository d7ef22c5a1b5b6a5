import type { Position, Span } from './position';
import type { QueueToken } from './state';

export interface Token {
  kind: 'start' | 'end';
  rule: string;
  pos: Position;
}

export interface PairJSON {
  rule: string;
  start: number;
  end: number;
  text: string;
  inner: PairJSON[];
}

/** One matched rule: its name, its span, and the rules matched inside it. */
export class Pair {
  private readonly queue: readonly QueueToken[];
  private readonly startIndex: number;

  constructor(queue: readonly QueueToken[], startIndex: number) {
    this.queue = queue;
    this.startIndex = startIndex;
  }

  private get endIndex(): number {
    return this.queue[this.startIndex].pair;
  }

  get rule(): string {
    return this.queue[this.startIndex].rule;
  }

  get span(): Span {
    return this.queue[this.startIndex].pos.span(this.queue[this.endIndex].pos);
  }

  asStr(): string {
    return this.span.asStr();
  }

  inner(): Pairs {
    return new Pairs(this.queue, this.startIndex + 1, this.endIndex);
  }

  toJSON(): PairJSON {
    const span = this.span;
    return {
      rule: this.rule,
      start: span.start.offset,
      end: span.end.offset,
      text: span.asStr(),
      inner: this.inner().toJSON(),
    };
  }

  toString(): string {
    return `${this.rule}@${this.span.toString()}`;
  }
}

/**
 * The pairs found in a range of the token queue. Nothing is built until
 * iterated, and every iteration starts over from the first pair.
 */
export class Pairs implements Iterable<Pair> {
  private readonly queue: readonly QueueToken[];
  private readonly start: number;
  private readonly end: number;

  constructor(queue: readonly QueueToken[], start = 0, end = queue.length) {
    this.queue = queue;
    this.start = start;
    this.end = end;
  }

  *[Symbol.iterator](): Iterator<Pair> {
    let index = this.start;
    while (index < this.end) {
      yield new Pair(this.queue, index);
      index = this.queue[index].pair + 1;
    }
  }

  /** Every pair at any depth, in document order. */
  *flatten(): IterableIterator<Pair> {
    for (let index = this.start; index < this.end; index++) {
      if (this.queue[index].kind === 'start') {
        yield new Pair(this.queue, index);
      }
    }
  }

  /** The raw start/end token stream. */
  *tokens(): IterableIterator<Token> {
    for (let index = this.start; index < this.end; index++) {
      const { kind, rule, pos } = this.queue[index];
      yield { kind, rule, pos };
    }
  }

  get length(): number {
    let count = 0;
    for (const _pair of this) count++;
    return count;
  }

  get isEmpty(): boolean {
    return this.start >= this.end;
  }

  first(): Pair | undefined {
    return this.isEmpty ? undefined : new Pair(this.queue, this.start);
  }

  toArray(): Pair[] {
    return Array.from(this);
  }

  toJSON(): PairJSON[] {
    return this.toArray().map((pair) => pair.toJSON());
  }

  /** Indented outline, one pair per line. */
  print(indent = 0): string {
    const lines: string[] = [];
    for (const pair of this) {
      lines.push(`${'  '.repeat(indent)}${pair.toString()} ${JSON.stringify(pair.asStr())}`);
      const inner = pair.inner();
      if (!inner.isEmpty) lines.push(inner.print(indent + 1));
    }
    return lines.join('\n');
  }
}
