import fs from 'node:fs';
import path from 'node:path';
import {
  Grammar,
  choice,
  ident,
  range,
  repExact,
  repMax,
  repMin,
  repMinMax,
  rule,
  seq,
  skipTo,
  str,
} from '../src/grammar/index';
import { loadGrammar } from '../src/grammar/json';
import {
  DuplicateRuleError,
  InvalidGrammarError,
  LiteralDecodeError,
  ReservedRuleError,
} from '../src/vm/errors';
import { Vm } from '../src/vm/index';

describe('Grammar construction', () => {
  it('indexes rules by name', () => {
    const grammar = new Grammar([rule('a', 'normal', str('a')), rule('whitespace', 'silent', str(' '))]);
    expect(grammar.ruleNames).toEqual(['a', 'whitespace']);
    expect(grammar.get('a')?.kind).toBe('normal');
    expect(grammar.has('b')).toBe(false);
    expect(grammar.hasWhitespace).toBe(true);
    expect(grammar.hasComment).toBe(false);
  });

  it('rejects duplicate rule names', () => {
    expect(() => new Grammar([rule('a', 'normal', str('a')), rule('a', 'silent', str('b'))])).toThrow(
      DuplicateRuleError
    );
  });

  it('rejects rules named after built-ins', () => {
    for (const name of ['any', 'eoi', 'soi', 'peek', 'pop']) {
      expect(() => new Grammar([rule(name, 'normal', str('x'))])).toThrow(ReservedRuleError);
    }
  });

  it('rejects literals that do not decode', () => {
    expect(() => new Grammar([rule('a', 'normal', str('\\q'))])).toThrow(LiteralDecodeError);
    expect(() => new Grammar([rule('a', 'normal', range('', 'z'))])).toThrow(LiteralDecodeError);
  });

  it('decodes literals once and serves them by raw text', () => {
    const grammar = new Grammar([rule('a', 'normal', seq(str('\\t'), range('\\x41', '\\x5A')))]);
    expect(grammar.literal('\\t')).toBe('\t');
    expect(grammar.char('\\x41')).toBe('A');
    expect(grammar.char('\\x5A')).toBe('Z');
  });

  it('only serves literals that appear in the grammar', () => {
    const grammar = new Grammar([rule('a', 'normal', str('a'))]);
    expect(() => grammar.literal('b')).toThrow(LiteralDecodeError);
    expect(() => grammar.char('b')).toThrow(LiteralDecodeError);
  });

  it('rejects repetition counts that are out of bounds', () => {
    expect(() => new Grammar([rule('r', 'normal', repMinMax(str('a'), 4, 2))])).toThrow(
      '"max" is smaller than "min" at r.body'
    );
    expect(() => new Grammar([rule('r', 'normal', repExact(str('a'), -1))])).toThrow(
      'expected non-negative integer "count" at r.body'
    );
    expect(() => new Grammar([rule('r', 'normal', repMin(str('a'), 1.5))])).toThrow(InvalidGrammarError);
    expect(() => new Grammar([rule('r', 'normal', seq(str('x'), repMax(str('a'), -2)))])).toThrow(
      'expected non-negative integer "max" at r.body.rhs'
    );
    expect(() => new Vm([rule('r', 'normal', repMinMax(str('a'), 4, 2))])).toThrow(InvalidGrammarError);
  });

  it('rejects a scan with no literals', () => {
    expect(() => new Grammar([rule('r', 'normal', skipTo())])).toThrow('expected non-empty "literals" at r.body');
  });

  it('keeps its own frozen copy of every rule', () => {
    const source = rule('r', 'normal', str('a'));
    const grammar = new Grammar([source]);
    const vm = new Vm(grammar);

    source.body = str('b');
    source.kind = 'silent';

    expect(grammar.get('r')).toEqual({ name: 'r', kind: 'normal', body: { type: 'literal', value: 'a' } });
    expect(Object.isFrozen(grammar.get('r'))).toBe(true);
    expect(Object.isFrozen(grammar.rules[0].body)).toBe(true);
    expect(vm.parse('r', 'b').success).toBe(false);
    expect(vm.parse('r', 'a').success).toBe(true);
  });

  it('lists references to rules that are not defined', () => {
    const grammar = new Grammar([
      rule('a', 'normal', seq(ident('b'), ident('c'), ident('any'))),
      rule('b', 'normal', choice(str('x'), ident('c'))),
    ]);
    expect(grammar.undefinedReferences()).toEqual(['c']);
  });
});

describe('Grammar JSON loading', () => {
  it('loads the calculator example', () => {
    const json = fs.readFileSync(path.resolve(__dirname, '../examples/calc.grammar.json'), 'utf-8');
    const grammar = loadGrammar(json);
    expect(grammar.ruleNames).toEqual(['main', 'expr', 'term', 'op', 'number', 'whitespace']);
    expect(grammar.get('op')?.kind).toBe('atomic');
    expect(grammar.undefinedReferences()).toEqual([]);
  });

  it('accepts a bare rule array and defaults the kind to normal', () => {
    const grammar = loadGrammar('[{"name":"a","body":{"type":"literal","value":"a"}}]');
    expect(grammar.get('a')).toEqual({ name: 'a', kind: 'normal', body: { type: 'literal', value: 'a' } });
  });

  it('reports the path of an invalid node', () => {
    expect(() => loadGrammar('[{"name":"a","body":{"type":"nope"}}]')).toThrow(
      'unknown expression type "nope" at $[0].body'
    );
    expect(() => loadGrammar('{"rules":[{"name":"a","body":{"type":"optional"}}]}')).toThrow(
      'expected expression object at $.rules[0].body.expr'
    );
  });

  it('rejects unknown rule kinds and bad bounds', () => {
    expect(() => loadGrammar('[{"name":"a","kind":"loud","body":{"type":"literal","value":"a"}}]')).toThrow(
      InvalidGrammarError
    );
    const inverted = JSON.stringify([{ name: 'a', body: repMinMax(str('a'), 3, 1) }]);
    expect(() => loadGrammar(inverted)).toThrow('"max" is smaller than "min" at $[0].body');
  });

  it('rejects malformed JSON', () => {
    expect(() => loadGrammar('[')).toThrow(InvalidGrammarError);
  });
});
