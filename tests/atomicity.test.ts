import {
  ident,
  not,
  range,
  rep,
  rep1,
  rule,
  seq,
  skipTo,
  str,
  type Rule,
} from '../src/grammar/index';
import { Vm, type ParseResult } from '../src/vm/index';

const flat = (result: ParseResult): string[] =>
  result.success ? Array.from(result.pairs.flatten(), (pair) => pair.toString()) : [];

const endOf = (result: ParseResult): number | null => (result.success ? result.end.offset : null);

const ab: Rule = rule('s', 'normal', seq(str('a'), str('b')));

describe('Implicit separators', () => {
  it('consumes interleaved whitespace and comments as one skip', () => {
    const vm = new Vm([
      rule('s', 'normal', seq(str('A'), str('B'))),
      rule('whitespace', 'silent', rep1(str(' '))),
      rule('comment', 'silent', seq(str('#'), rep(seq(not(str('\\n')), ident('any'))), str('\\n'))),
    ]);
    const result = vm.parse('s', 'A  # c\n  B');
    expect(endOf(result)).toBe(10);
    expect(flat(result)).toEqual(['s@0..10']);
  });

  it('skips comments alone when no whitespace rule exists', () => {
    const vm = new Vm([ab, rule('comment', 'silent', seq(str('/*'), skipTo('*/'), str('*/')))]);
    expect(endOf(vm.parse('s', 'a/* x *//**/b'))).toBe(13);
    expect(vm.parse('s', 'a b').success).toBe(false);
  });

  it('never skips before the first or after the last element of a rule', () => {
    const vm = new Vm([rule('a', 'normal', str('a')), rule('whitespace', 'silent', str(' '))]);
    expect(vm.parse('a', ' a').success).toBe(false);
    expect(endOf(vm.parse('a', 'a '))).toBe(1);
  });

  it('evaluates separator rules atomically', () => {
    const vm = new Vm([ab, rule('whitespace', 'silent', seq(str(' '), str(' ')))]);
    expect(endOf(vm.parse('s', 'a    b'))).toBe(6);
    expect(vm.parse('s', 'a     b').success).toBe(false);
  });

  it('emits separator tokens only for normal and atomic separator rules', () => {
    const normal = new Vm([ab, rule('whitespace', 'normal', str(' '))]);
    expect(flat(normal.parse('s', 'a b'))).toEqual(['s@0..3', 'whitespace@1..2']);

    const atomic = new Vm([ab, rule('whitespace', 'atomic', str(' '))]);
    expect(flat(atomic.parse('s', 'a b'))).toEqual(['s@0..3', 'whitespace@1..2']);

    const nonAtomic = new Vm([ab, rule('whitespace', 'non-atomic', str(' '))]);
    expect(flat(nonAtomic.parse('s', 'a b'))).toEqual(['s@0..3']);

    const compound = new Vm([ab, rule('whitespace', 'compound-atomic', str(' '))]);
    expect(flat(compound.parse('s', 'a b'))).toEqual(['s@0..3']);
  });
});

describe('Rule kinds', () => {
  const digit = rule('d', 'normal', range('0', '9'));
  const whitespace = rule('whitespace', 'silent', str(' '));

  it('suppresses separators and nested tokens in atomic rules', () => {
    const vm = new Vm([rule('at', 'atomic', seq(ident('d'), ident('d'))), digit, whitespace]);
    expect(flat(vm.parse('at', '12'))).toEqual(['at@0..2']);
    expect(vm.parse('at', '1 2').success).toBe(false);
  });

  it('keeps nested tokens but not separators in compound-atomic rules', () => {
    const vm = new Vm([rule('c', 'compound-atomic', seq(ident('d'), ident('d'))), digit, whitespace]);
    expect(flat(vm.parse('c', '12'))).toEqual(['c@0..2', 'd@0..1', 'd@1..2']);
    expect(vm.parse('c', '1 2').success).toBe(false);
  });

  it('delegates silently', () => {
    const vm = new Vm([rule('s', 'silent', ident('d')), digit]);
    expect(flat(vm.parse('s', '7'))).toEqual(['d@0..1']);
  });

  it('lets a non-atomic rule re-enable separators inside an atomic one', () => {
    const vm = new Vm([
      rule('a', 'atomic', seq(ident('plain'), ident('na'))),
      rule('plain', 'normal', seq(str('x'), str('y'))),
      rule('na', 'non-atomic', seq(str('p'), str('q'))),
      whitespace,
    ]);
    const result = vm.parse('a', 'xyp q');
    expect(endOf(result)).toBe(5);
    expect(flat(result)).toEqual(['a@0..5', 'na@2..5']);
    expect(vm.parse('a', 'x yp q').success).toBe(false);
    expect(vm.parse('a', 'xy p q').success).toBe(false);
  });
});
