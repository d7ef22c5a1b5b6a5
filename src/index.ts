// src/index.ts
// ============================================
// 🌐 pegvm Main API Surface (Public Entry)
// ============================================

// 🧠 Grammar model
export {
  Grammar,
  unescape,
  unescapeChar,
  str,
  insens,
  range,
  ident,
  ahead,
  not,
  opt,
  rep,
  rep1,
  repExact,
  repMin,
  repMax,
  repMinMax,
  push,
  skipTo,
  seq,
  choice,
  rule,
  walkExpr,
  RESERVED_RULES,
  RULE_KINDS,
  type Expr,
  type ExprType,
  type Rule,
  type RuleKind,
} from './grammar/index';
export { loadGrammar, loadGrammarFromFile, toRules, toExpr } from './grammar/json';

// ⚙️ Interpreter
export {
  Vm,
  VmError,
  UndefinedRuleError,
  EmptyStackError,
  LiteralDecodeError,
  DuplicateRuleError,
  ReservedRuleError,
  InvalidGrammarError,
  RecursionLimitError,
  type VmErrorCode,
  type ParseResult,
  type ParseSuccess,
  type ParseFailure,
  type ParseOptions,
  type ParserTracer,
  type TraceEvent,
  type RuleAttempts,
} from './vm/index';

// 📍 Runtime values
export { Position, Span, type MatchResult } from './runtime/position';
export { Pair, Pairs, type Token, type PairJSON } from './runtime/pairs';
export type { Atomicity } from './runtime/state';

// 📥 Parse helpers
export { parseInput, parseComplete, toParseError, type ParseError, type ParseOutcome } from './parser/index';

// 🧾 Utilities
export {
  formatError,
  formatErrorWithColors,
  formatAnyError,
  formatLocation,
  highlightSnippet,
  createLogger,
  createTraceLogger,
  type Logger,
  type Location,
  type LineColumn,
} from './utils/index';
