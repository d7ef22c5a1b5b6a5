// grammar/ast.ts
// Rule and expression tree consumed by the VM

export type RuleKind = 'normal' | 'silent' | 'atomic' | 'compound-atomic' | 'non-atomic';

export const RULE_KINDS: readonly RuleKind[] = ['normal', 'silent', 'atomic', 'compound-atomic', 'non-atomic'];

export type Expr =
  | { type: 'literal'; value: string }
  | { type: 'insensitive'; value: string }
  | { type: 'range'; from: string; to: string }
  | { type: 'ident'; name: string }
  | { type: 'positive-lookahead'; expr: Expr }
  | { type: 'negative-lookahead'; expr: Expr }
  | { type: 'sequence'; lhs: Expr; rhs: Expr }
  | { type: 'choice'; lhs: Expr; rhs: Expr }
  | { type: 'optional'; expr: Expr }
  | { type: 'repeat'; expr: Expr }
  | { type: 'repeat-once'; expr: Expr }
  | { type: 'repeat-exact'; expr: Expr; count: number }
  | { type: 'repeat-min'; expr: Expr; min: number }
  | { type: 'repeat-max'; expr: Expr; max: number }
  | { type: 'repeat-min-max'; expr: Expr; min: number; max: number }
  | { type: 'push'; expr: Expr }
  | { type: 'skip'; literals: readonly string[] };

export type ExprType = Expr['type'];

export interface Rule {
  name: string;
  kind: RuleKind;
  body: Expr;
}

/** Names handled by the VM itself; user rules may not use them. */
export const RESERVED_RULES: readonly string[] = ['any', 'eoi', 'soi', 'peek', 'pop'];

// --------------------------
// Builders
// --------------------------
// Literal text is raw grammar syntax: escapes are decoded when the grammar is built.

export const str = (value: string): Expr => ({ type: 'literal', value });
export const insens = (value: string): Expr => ({ type: 'insensitive', value });
export const range = (from: string, to: string): Expr => ({ type: 'range', from, to });
export const ident = (name: string): Expr => ({ type: 'ident', name });
export const ahead = (expr: Expr): Expr => ({ type: 'positive-lookahead', expr });
export const not = (expr: Expr): Expr => ({ type: 'negative-lookahead', expr });
export const opt = (expr: Expr): Expr => ({ type: 'optional', expr });
export const rep = (expr: Expr): Expr => ({ type: 'repeat', expr });
export const rep1 = (expr: Expr): Expr => ({ type: 'repeat-once', expr });
export const repExact = (expr: Expr, count: number): Expr => ({ type: 'repeat-exact', expr, count });
export const repMin = (expr: Expr, min: number): Expr => ({ type: 'repeat-min', expr, min });
export const repMax = (expr: Expr, max: number): Expr => ({ type: 'repeat-max', expr, max });
export const repMinMax = (expr: Expr, min: number, max: number): Expr => ({ type: 'repeat-min-max', expr, min, max });
export const push = (expr: Expr): Expr => ({ type: 'push', expr });
export const skipTo = (...literals: string[]): Expr => ({ type: 'skip', literals });

/** Right-fold `a ~ b ~ c` into nested binary sequences. */
export function seq(first: Expr, ...rest: Expr[]): Expr {
  if (rest.length === 0) return first;
  return { type: 'sequence', lhs: first, rhs: seq(rest[0], ...rest.slice(1)) };
}

/** Right-fold `a | b | c` into nested binary choices. */
export function choice(first: Expr, ...rest: Expr[]): Expr {
  if (rest.length === 0) return first;
  return { type: 'choice', lhs: first, rhs: choice(rest[0], ...rest.slice(1)) };
}

export function rule(name: string, kind: RuleKind, body: Expr): Rule {
  return { name, kind, body };
}

/**
 * Visit every node of an expression tree, parents before children.
 */
export function walkExpr(expr: Expr, visit: (node: Expr) => void): void {
  visit(expr);
  switch (expr.type) {
    case 'sequence':
    case 'choice':
      walkExpr(expr.lhs, visit);
      walkExpr(expr.rhs, visit);
      break;
    case 'positive-lookahead':
    case 'negative-lookahead':
    case 'optional':
    case 'repeat':
    case 'repeat-once':
    case 'repeat-exact':
    case 'repeat-min':
    case 'repeat-max':
    case 'repeat-min-max':
    case 'push':
      walkExpr(expr.expr, visit);
      break;
    default:
      break;
  }
}
