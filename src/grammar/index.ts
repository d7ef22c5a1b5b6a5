import { RESERVED_RULES, walkExpr, type Expr, type Rule } from './ast';
import { unescape, unescapeChar } from './literal';
import { DuplicateRuleError, InvalidGrammarError, LiteralDecodeError, ReservedRuleError } from '../vm/errors';

export * from './ast';
export { unescape, unescapeChar } from './literal';

/**
 * An immutable rule table. Building one validates names and counts, copies
 * and freezes every rule, and decodes every literal up front, so a parse
 * never sees an undecodable literal.
 */
export class Grammar {
  private readonly table: ReadonlyMap<string, Rule>;
  private readonly literals: ReadonlyMap<string, string>;
  private readonly chars: ReadonlyMap<string, string>;

  readonly hasWhitespace: boolean;
  readonly hasComment: boolean;

  constructor(rules: Iterable<Rule>) {
    const table = new Map<string, Rule>();
    const literals = new Map<string, string>();
    const chars = new Map<string, string>();

    for (const source of rules) {
      if (RESERVED_RULES.includes(source.name)) {
        throw new ReservedRuleError(source.name);
      }
      if (table.has(source.name)) {
        throw new DuplicateRuleError(source.name);
      }

      const rule = Object.freeze<Rule>({
        name: source.name,
        kind: source.kind,
        body: freezeExpr(source.body, `${source.name}.body`),
      });
      table.set(rule.name, rule);

      walkExpr(rule.body, (node) => {
        for (const raw of literalsOf(node)) {
          if (literals.has(raw)) continue;
          const decoded = unescape(raw);
          if (decoded === null) throw new LiteralDecodeError(raw, rule.name);
          literals.set(raw, decoded);
        }
        if (node.type === 'range') {
          for (const raw of [node.from, node.to]) {
            if (chars.has(raw)) continue;
            const decoded = unescapeChar(raw);
            if (decoded === null) throw new LiteralDecodeError(raw, rule.name);
            chars.set(raw, decoded);
          }
        }
      });
    }

    this.table = table;
    this.literals = literals;
    this.chars = chars;
    this.hasWhitespace = table.has('whitespace');
    this.hasComment = table.has('comment');
  }

  get(name: string): Rule | undefined {
    return this.table.get(name);
  }

  has(name: string): boolean {
    return this.table.has(name);
  }

  get ruleNames(): string[] {
    return Array.from(this.table.keys());
  }

  get rules(): Rule[] {
    return Array.from(this.table.values());
  }

  /** Decoded text of a literal that appears in this grammar. */
  literal(raw: string): string {
    const decoded = this.literals.get(raw);
    if (decoded === undefined) throw new LiteralDecodeError(raw);
    return decoded;
  }

  /** Decoded character of a range bound that appears in this grammar. */
  char(raw: string): string {
    const decoded = this.chars.get(raw);
    if (decoded === undefined) throw new LiteralDecodeError(raw);
    return decoded;
  }

  /** Rules referenced somewhere in the grammar but never defined. */
  undefinedReferences(): string[] {
    const missing = new Set<string>();
    for (const rule of this.table.values()) {
      walkExpr(rule.body, (node) => {
        if (node.type === 'ident' && !RESERVED_RULES.includes(node.name) && !this.table.has(node.name)) {
          missing.add(node.name);
        }
      });
    }
    return Array.from(missing);
  }
}

/** Whether `value` can serve as a repetition count. */
export function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function count(value: number, key: string, path: string): number {
  if (!isCount(value)) {
    throw new InvalidGrammarError(`expected non-negative integer "${key}"`, path);
  }
  return value;
}

/** Validated, frozen copy of an expression tree. */
function freezeExpr(expr: Expr, path: string): Expr {
  switch (expr.type) {
    case 'literal':
    case 'insensitive':
      return Object.freeze<Expr>({ type: expr.type, value: expr.value });
    case 'range':
      return Object.freeze<Expr>({ type: 'range', from: expr.from, to: expr.to });
    case 'ident':
      return Object.freeze<Expr>({ type: 'ident', name: expr.name });
    case 'sequence':
    case 'choice':
      return Object.freeze<Expr>({
        type: expr.type,
        lhs: freezeExpr(expr.lhs, `${path}.lhs`),
        rhs: freezeExpr(expr.rhs, `${path}.rhs`),
      });
    case 'positive-lookahead':
    case 'negative-lookahead':
    case 'optional':
    case 'repeat':
    case 'repeat-once':
    case 'push':
      return Object.freeze<Expr>({ type: expr.type, expr: freezeExpr(expr.expr, `${path}.expr`) });
    case 'repeat-exact':
      return Object.freeze<Expr>({
        type: 'repeat-exact',
        expr: freezeExpr(expr.expr, `${path}.expr`),
        count: count(expr.count, 'count', path),
      });
    case 'repeat-min':
      return Object.freeze<Expr>({
        type: 'repeat-min',
        expr: freezeExpr(expr.expr, `${path}.expr`),
        min: count(expr.min, 'min', path),
      });
    case 'repeat-max':
      return Object.freeze<Expr>({
        type: 'repeat-max',
        expr: freezeExpr(expr.expr, `${path}.expr`),
        max: count(expr.max, 'max', path),
      });
    case 'repeat-min-max': {
      const min = count(expr.min, 'min', path);
      const max = count(expr.max, 'max', path);
      if (max < min) throw new InvalidGrammarError('"max" is smaller than "min"', path);
      return Object.freeze<Expr>({ type: 'repeat-min-max', expr: freezeExpr(expr.expr, `${path}.expr`), min, max });
    }
    case 'skip':
      if (expr.literals.length === 0) {
        throw new InvalidGrammarError('expected non-empty "literals"', path);
      }
      return Object.freeze<Expr>({ type: 'skip', literals: Object.freeze([...expr.literals]) });
  }
}

function literalsOf(node: Expr): readonly string[] {
  switch (node.type) {
    case 'literal':
    case 'insensitive':
      return [node.value];
    case 'skip':
      return node.literals;
    default:
      return [];
  }
}
