import fs from 'node:fs/promises';
import { Grammar, isCount } from './index';
import { RULE_KINDS, type Expr, type Rule, type RuleKind } from './ast';
import { InvalidGrammarError } from '../vm/errors';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRuleKind(value: unknown): value is RuleKind {
  return typeof value === 'string' && (RULE_KINDS as readonly string[]).includes(value);
}

function stringField(node: JsonObject, key: string, path: string): string {
  const value = node[key];
  if (typeof value !== 'string') {
    throw new InvalidGrammarError(`expected string "${key}"`, path);
  }
  return value;
}

function countField(node: JsonObject, key: string, path: string): number {
  const value = node[key];
  if (!isCount(value)) {
    throw new InvalidGrammarError(`expected non-negative integer "${key}"`, path);
  }
  return value;
}

function exprField(node: JsonObject, key: string, path: string): Expr {
  return toExpr(node[key], `${path}.${key}`);
}

/** Validate one serialized expression node. */
export function toExpr(value: unknown, path = '$'): Expr {
  if (!isObject(value)) {
    throw new InvalidGrammarError('expected expression object', path);
  }

  const type = value.type;
  if (typeof type !== 'string') {
    throw new InvalidGrammarError('expected string "type"', path);
  }

  switch (type) {
    case 'literal':
    case 'insensitive':
      return { type, value: stringField(value, 'value', path) };
    case 'range':
      return { type, from: stringField(value, 'from', path), to: stringField(value, 'to', path) };
    case 'ident':
      return { type, name: stringField(value, 'name', path) };
    case 'sequence':
    case 'choice':
      return { type, lhs: exprField(value, 'lhs', path), rhs: exprField(value, 'rhs', path) };
    case 'positive-lookahead':
    case 'negative-lookahead':
    case 'optional':
    case 'repeat':
    case 'repeat-once':
    case 'push':
      return { type, expr: exprField(value, 'expr', path) };
    case 'repeat-exact':
      return { type, expr: exprField(value, 'expr', path), count: countField(value, 'count', path) };
    case 'repeat-min':
      return { type, expr: exprField(value, 'expr', path), min: countField(value, 'min', path) };
    case 'repeat-max':
      return { type, expr: exprField(value, 'expr', path), max: countField(value, 'max', path) };
    case 'repeat-min-max': {
      const min = countField(value, 'min', path);
      const max = countField(value, 'max', path);
      if (max < min) throw new InvalidGrammarError('"max" is smaller than "min"', path);
      return { type, expr: exprField(value, 'expr', path), min, max };
    }
    case 'skip': {
      const literals = value.literals;
      if (!Array.isArray(literals) || literals.length === 0) {
        throw new InvalidGrammarError('expected non-empty "literals"', path);
      }
      return {
        type,
        literals: literals.map((literal, index) => {
          if (typeof literal !== 'string') {
            throw new InvalidGrammarError('expected string literal', `${path}.literals[${index}]`);
          }
          return literal;
        }),
      };
    }
    default:
      throw new InvalidGrammarError(`unknown expression type ${JSON.stringify(type)}`, path);
  }
}

/** Validate a serialized rule list. */
export function toRules(value: unknown): Rule[] {
  const list = isObject(value) ? value.rules : value;
  const path = isObject(value) ? '$.rules' : '$';
  if (!Array.isArray(list)) {
    throw new InvalidGrammarError('expected an array of rules', path);
  }

  return list.map((item, index) => {
    const rulePath = `${path}[${index}]`;
    if (!isObject(item)) throw new InvalidGrammarError('expected rule object', rulePath);
    const kind = item.kind ?? 'normal';
    if (!isRuleKind(kind)) {
      throw new InvalidGrammarError(`unknown rule kind ${JSON.stringify(kind)}`, rulePath);
    }
    return {
      name: stringField(item, 'name', rulePath),
      kind,
      body: exprField(item, 'body', rulePath),
    };
  });
}

/** Build a grammar from its JSON form: a rule array, or `{ "rules": [...] }`. */
export function loadGrammar(json: string): Grammar {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidGrammarError(`malformed JSON (${reason})`, '$');
  }
  return new Grammar(toRules(value));
}

export async function loadGrammarFromFile(filePath: string): Promise<Grammar> {
  const json = await fs.readFile(filePath, 'utf-8');
  return loadGrammar(json);
}
