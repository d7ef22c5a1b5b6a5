type StackOp<T> = { kind: 'push' } | { kind: 'pop'; value: T };

/**
 * LIFO stack whose changes can be undone back to any earlier mark.
 * Every push and pop is journaled; `restore` replays the journal backwards.
 */
export class CaptureStack<T> {
  private items: T[] = [];
  private journal: StackOp<T>[] = [];

  get length(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(value: T): void {
    this.items.push(value);
    this.journal.push({ kind: 'push' });
  }

  peek(): T | undefined {
    return this.items[this.items.length - 1];
  }

  pop(): T | undefined {
    const value = this.items.pop();
    if (value !== undefined) {
      this.journal.push({ kind: 'pop', value });
    }
    return value;
  }

  /** A mark to pass to `restore`. */
  snapshot(): number {
    return this.journal.length;
  }

  restore(mark: number): void {
    while (this.journal.length > mark) {
      const op = this.journal.pop();
      if (op === undefined) break;
      if (op.kind === 'push') {
        this.items.pop();
      } else {
        this.items.push(op.value);
      }
    }
  }

  toArray(): T[] {
    return this.items.slice();
  }
}
