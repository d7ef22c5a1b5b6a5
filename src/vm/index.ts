import { Grammar, type Expr, type Rule } from '../grammar/index';
import { Pairs } from '../runtime/pairs';
import { Position, err, ok, type MatchResult } from '../runtime/position';
import { ParserState, type ParseOptions, type RuleAttempts } from '../runtime/state';
import { EmptyStackError, RecursionLimitError, UndefinedRuleError } from './errors';

export * from './errors';
export type { ParseOptions, ParserTracer, TraceEvent, RuleAttempts } from '../runtime/state';

export interface ParseSuccess {
  success: true;
  pairs: Pairs;
  /** Where the start rule stopped; not necessarily the end of input. */
  end: Position;
}

export interface ParseFailure {
  success: false;
  /** Furthest position any attempt reached before the parse failed. */
  position: Position;
  attempts: RuleAttempts;
  input: string;
}

export type ParseResult = ParseSuccess | ParseFailure;

/**
 * Interprets a grammar against input strings. A Vm holds nothing but the
 * grammar, so one instance can serve any number of parses.
 */
export class Vm {
  readonly grammar: Grammar;

  constructor(grammar: Grammar | Iterable<Rule>) {
    this.grammar = grammar instanceof Grammar ? grammar : new Grammar(grammar);
  }

  parse(rule: string, input: string, options: ParseOptions = {}): ParseResult {
    const state = new ParserState(input, options);
    const result = this.parseRule(rule, Position.fromStart(input), state);

    if (result.ok) {
      return { success: true, pairs: new Pairs(state.queue), end: result.pos };
    }

    const furthest = state.furthestFailure;
    return {
      success: false,
      position: furthest.offset >= result.pos.offset ? furthest : result.pos,
      attempts: state.attempts,
      input,
    };
  }

  private parseRule(name: string, pos: Position, state: ParserState): MatchResult {
    const { tracer, maxDepth } = state.options;
    if (maxDepth !== undefined && state.depth >= maxDepth) {
      throw new RecursionLimitError(name, maxDepth);
    }

    state.depth++;
    try {
      tracer?.trace({ type: 'enter', rule: name, offset: pos.offset, depth: state.depth });
      const result = this.dispatch(name, pos, state);
      tracer?.trace({ type: result.ok ? 'match' : 'fail', rule: name, offset: result.pos.offset, depth: state.depth });
      return result;
    } finally {
      state.depth--;
    }
  }

  private dispatch(name: string, pos: Position, state: ParserState): MatchResult {
    switch (name) {
      case 'any':
        return state.fail(pos.skip(1));
      case 'eoi':
        return state.rule('eoi', pos, (s, p) => s.fail(p.atEnd()));
      case 'soi':
        return state.fail(pos.atStart());
      case 'peek': {
        const top = state.stack.peek();
        if (top === undefined) throw new EmptyStackError('peek');
        return state.fail(pos.matchString(top.asStr()));
      }
      case 'pop': {
        const top = state.stack.peek();
        if (top === undefined) throw new EmptyStackError('pop');
        const result = state.fail(pos.matchString(top.asStr()));
        if (result.ok) state.stack.pop();
        return result;
      }
      default:
        break;
    }

    const rule = this.grammar.get(name);
    if (!rule) throw new UndefinedRuleError(name);

    const body = (s: ParserState, p: Position): MatchResult => this.parseExpr(rule.body, p, s);

    if (name === 'whitespace' || name === 'comment') {
      if (rule.kind === 'normal' || rule.kind === 'atomic') {
        return state.rule(name, pos, (s, p) => s.atomic('atomic', (inner) => body(inner, p)), false);
      }
      return state.atomic('atomic', (s) => body(s, pos));
    }

    switch (rule.kind) {
      case 'normal':
        return state.rule(name, pos, body);
      case 'silent':
        return body(state, pos);
      case 'atomic':
        return state.rule(name, pos, (s, p) => s.atomic('atomic', (inner) => body(inner, p)));
      case 'compound-atomic':
        return state.atomic('compound-atomic', (s) => s.rule(name, pos, body));
      case 'non-atomic':
        return state.atomic('non-atomic', (s) => s.rule(name, pos, body));
    }
  }

  private parseExpr(expr: Expr, pos: Position, state: ParserState): MatchResult {
    switch (expr.type) {
      case 'literal':
        return state.fail(pos.matchString(this.grammar.literal(expr.value)));
      case 'insensitive':
        return state.fail(pos.matchInsensitive(this.grammar.literal(expr.value)));
      case 'range':
        return state.fail(pos.matchRange(this.grammar.char(expr.from), this.grammar.char(expr.to)));
      case 'ident':
        return this.parseRule(expr.name, pos, state);
      case 'positive-lookahead':
        return state.lookahead(true, (s) => pos.lookahead(true, (p) => this.parseExpr(expr.expr, p, s)));
      case 'negative-lookahead':
        return state.lookahead(false, (s) => pos.lookahead(false, (p) => this.parseExpr(expr.expr, p, s)));
      case 'sequence':
        return state.sequence((s) =>
          pos.sequence((p) => {
            const lhs = this.parseExpr(expr.lhs, p, s);
            if (!lhs.ok) return lhs;
            const skipped = this.skip(lhs.pos, s);
            if (!skipped.ok) return skipped;
            return this.parseExpr(expr.rhs, skipped.pos, s);
          })
        );
      case 'choice': {
        const lhs = state.sequence((s) => this.parseExpr(expr.lhs, pos, s));
        if (lhs.ok) return lhs;
        return state.sequence((s) => this.parseExpr(expr.rhs, pos, s));
      }
      case 'optional':
        return pos.optional((p) => state.sequence((s) => this.parseExpr(expr.expr, p, s)));
      case 'repeat':
        return this.repeat(expr.expr, 0, undefined, pos, state);
      case 'repeat-once':
        return this.repeat(expr.expr, 1, undefined, pos, state);
      case 'repeat-exact':
        return this.repeat(expr.expr, expr.count, expr.count, pos, state);
      case 'repeat-min':
        return this.repeat(expr.expr, expr.min, undefined, pos, state);
      case 'repeat-max':
        return this.repeat(expr.expr, 0, expr.max, pos, state);
      case 'repeat-min-max':
        return this.repeat(expr.expr, expr.min, expr.max, pos, state);
      case 'push': {
        const result = this.parseExpr(expr.expr, pos, state);
        if (result.ok) state.stack.push(pos.span(result.pos));
        return result;
      }
      case 'skip':
        return this.skipToAny(expr.literals, pos, state);
    }
  }

  /**
   * Greedy repetition. The first `min` occurrences are mandatory; after that
   * occurrences are taken until `max` is reached, an attempt fails, or an
   * occurrence consumes nothing. Separators are skipped between occurrences;
   * an optional occurrence that consumes nothing is dropped along with the
   * separators before it.
   */
  private repeat(expr: Expr, min: number, max: number | undefined, pos: Position, state: ParserState): MatchResult {
    return state.sequence((s) =>
      pos.sequence((start) => {
        let current = start;
        let count = 0;

        const separated = (from: Position): MatchResult => (count === 0 ? ok(from) : this.skip(from, s));

        while (count < min) {
          const from = separated(current);
          if (!from.ok) return from;
          const result = this.parseExpr(expr, from.pos, s);
          if (!result.ok) return result;
          current = result.pos;
          count++;
        }

        while (max === undefined || count < max) {
          const result = s.sequence(() => {
            const from = separated(current);
            if (!from.ok) return from;
            const occurrence = this.parseExpr(expr, from.pos, s);
            return occurrence.ok && occurrence.pos.offset === from.pos.offset ? err(from.pos) : occurrence;
          });
          if (!result.ok) break;

          current = result.pos;
          count++;
        }

        return ok(current);
      })
    );
  }

  /** Consume implicit whitespace and comments between two atoms. Never fails. */
  private skip(pos: Position, state: ParserState): MatchResult {
    if (state.atomicity !== 'non-atomic') return ok(pos);

    const { hasWhitespace, hasComment } = this.grammar;
    if (!hasWhitespace && !hasComment) return ok(pos);
    if (!hasComment) return this.separators('whitespace', pos, state);
    if (!hasWhitespace) return this.separators('comment', pos, state);

    const leading = this.separators('whitespace', pos, state);
    return leading.pos.repeat((p) =>
      this.advancing(p, state, (s) => {
        const comment = this.parseRule('comment', p, s);
        return comment.ok ? this.separators('whitespace', comment.pos, s) : comment;
      })
    );
  }

  /** `rule*` over a separator rule. */
  private separators(rule: 'whitespace' | 'comment', pos: Position, state: ParserState): MatchResult {
    return pos.repeat((p) => this.advancing(p, state, (s) => this.parseRule(rule, p, s)));
  }

  /** Run `f` as a sequence that counts as failed unless it moves past `pos`. */
  private advancing(pos: Position, state: ParserState, f: (state: ParserState) => MatchResult): MatchResult {
    return state.sequence((s) => {
      const result = f(s);
      return result.ok && result.pos.offset === pos.offset ? err(pos) : result;
    });
  }

  /** Move to the closest occurrence of any of `literals`. */
  private skipToAny(literals: readonly string[], pos: Position, state: ParserState): MatchResult {
    let best: Position | undefined;
    let firstFailure: MatchResult | undefined;

    for (const literal of literals) {
      const result = pos.skipUntil(this.grammar.literal(literal));
      if (result.ok) {
        if (best === undefined || result.pos.offset < best.offset) best = result.pos;
      } else if (firstFailure === undefined) {
        firstFailure = result;
      }
    }

    if (best !== undefined) return ok(best);
    return state.fail(firstFailure ?? err(pos));
  }
}
