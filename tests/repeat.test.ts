import {
  ident,
  opt,
  push,
  rep,
  rep1,
  repExact,
  repMax,
  repMin,
  repMinMax,
  rule,
  seq,
  str,
  type Expr,
} from '../src/grammar/index';
import { EmptyStackError, Vm, type ParseResult } from '../src/vm/index';

const endOf = (result: ParseResult): number | null => (result.success ? result.end.offset : null);

const flat = (result: ParseResult): string[] =>
  result.success ? Array.from(result.pairs.flatten(), (pair) => pair.toString()) : [];

const single = (body: Expr): Vm => new Vm([rule('r', 'normal', body)]);

describe('Repetition', () => {
  it('honours both bounds of a min/max repetition', () => {
    const vm = single(repMinMax(str('a'), 2, 4));
    expect(endOf(vm.parse('r', 'aaa'))).toBe(3);
    expect(endOf(vm.parse('r', 'a'))).toBeNull();
    expect(endOf(vm.parse('r', 'aaaaa'))).toBe(4);
  });

  it('matches an exact count and stops there', () => {
    const vm = single(repExact(str('a'), 3));
    expect(endOf(vm.parse('r', 'aaaaa'))).toBe(3);
    expect(endOf(vm.parse('r', 'aa'))).toBeNull();
  });

  it('matches nothing when the maximum is zero', () => {
    expect(endOf(single(repMax(str('a'), 0)).parse('r', 'aa'))).toBe(0);
    expect(endOf(single(repMax(str('a'), 2)).parse('r', 'aaa'))).toBe(2);
  });

  it('keeps going past the minimum', () => {
    expect(endOf(single(repMin(str('a'), 2)).parse('r', 'aaaa'))).toBe(4);
    expect(endOf(single(repMin(str('a'), 2)).parse('r', 'ab'))).toBeNull();
  });

  it('distinguishes zero-or-more from one-or-more', () => {
    expect(endOf(single(rep(str('a'))).parse('r', ''))).toBe(0);
    expect(endOf(single(rep1(str('a'))).parse('r', ''))).toBeNull();
    expect(endOf(single(rep1(str('a'))).parse('r', 'aab'))).toBe(2);
  });

  it('stops on an occurrence that consumes nothing', () => {
    const vm = single(rep(opt(str('a'))));
    expect(endOf(vm.parse('r', 'b'))).toBe(0);
    expect(endOf(vm.parse('r', 'aab'))).toBe(2);
  });

  it('rolls back captures when a mandatory occurrence fails', () => {
    const vm = new Vm([rule('r', 'silent', seq(opt(repExact(push(ident('any')), 3)), ident('peek')))]);
    expect(() => vm.parse('r', 'ab')).toThrow(EmptyStackError);
  });

  it('skips separators between occurrences but not after the last one', () => {
    const vm = new Vm([
      rule('r', 'normal', repMinMax(str('a'), 1, 3)),
      rule('whitespace', 'silent', str(' ')),
    ]);
    expect(endOf(vm.parse('r', 'a a a a'))).toBe(5);
    expect(endOf(vm.parse('r', 'a a '))).toBe(3);
  });

  it('drops the separators before an occurrence that consumes nothing', () => {
    const vm = new Vm([
      rule('r', 'normal', rep(opt(str('a')))),
      rule('whitespace', 'normal', str(' ')),
    ]);
    const trailing = vm.parse('r', 'a ');
    expect(endOf(trailing)).toBe(1);
    expect(flat(trailing)).toEqual(['r@0..1']);

    const separated = vm.parse('r', 'a a ');
    expect(endOf(separated)).toBe(3);
    expect(flat(separated)).toEqual(['r@0..3', 'whitespace@1..2']);
  });

  it('does not skip separators inside an atomic rule', () => {
    const vm = new Vm([
      rule('r', 'atomic', rep(str('a'))),
      rule('whitespace', 'silent', str(' ')),
    ]);
    expect(endOf(vm.parse('r', 'a a'))).toBe(1);
  });
});
