import type { Location } from '../utils/index';
import { describeAttempts } from '../utils/format';
import type { ParseFailure, ParseOptions, ParseSuccess, Vm } from '../vm/index';

/** A failed parse, flattened into what a diagnostic needs. */
export interface ParseError {
  success: false;
  error: string;
  location?: Location;
  expected?: string[];
  unexpected?: string[];
  found?: string | null;
  input?: string;
  snippet?: string;
}

export type ParseOutcome = ParseSuccess | ParseError;

/**
 * Convert a parse failure into a ParseError. The rule attempts give the
 * location when there are any; otherwise the furthest failure does.
 */
export function toParseError(failure: ParseFailure): ParseError {
  const { attempts, input } = failure;
  const hasAttempts = attempts.expected.length > 0 || attempts.unexpected.length > 0;
  const reported = hasAttempts ? attempts.position : failure.position;
  const point = reported.lineCol();
  const codePoint = input.codePointAt(reported.offset);

  return {
    success: false,
    error: describeAttempts(attempts.expected, attempts.unexpected),
    location: { start: point, end: point },
    expected: attempts.expected.length > 0 ? attempts.expected : undefined,
    unexpected: attempts.unexpected.length > 0 ? attempts.unexpected : undefined,
    found: codePoint === undefined ? null : String.fromCodePoint(codePoint),
    input,
  };
}

/** Parse `input` from `rule`, reporting failure as a ParseError. */
export function parseInput(vm: Vm, rule: string, input: string, options?: ParseOptions): ParseOutcome {
  const result = vm.parse(rule, input, options);
  return result.success ? result : toParseError(result);
}

/** Parse and require the start rule to consume the whole input. */
export function parseComplete(vm: Vm, rule: string, input: string, options?: ParseOptions): ParseOutcome {
  const outcome = parseInput(vm, rule, input, options);
  if (!outcome.success || outcome.end.offset === input.length) return outcome;

  const point = outcome.end.lineCol();
  const codePoint = input.codePointAt(outcome.end.offset);
  return {
    success: false,
    error: 'unexpected trailing input',
    location: { start: point, end: point },
    found: codePoint === undefined ? null : String.fromCodePoint(codePoint),
    input,
  };
}
