// Fatal errors. These signal a defect in the grammar (or in whatever built it),
// never a mismatch between grammar and input.

export type VmErrorCode =
  | 'UNDEFINED_RULE'
  | 'EMPTY_STACK'
  | 'LITERAL_DECODE'
  | 'DUPLICATE_RULE'
  | 'RESERVED_RULE'
  | 'INVALID_GRAMMAR'
  | 'RECURSION_LIMIT';

export class VmError extends Error {
  public code: VmErrorCode;
  public rule?: string;
  public suggestion?: string;

  constructor(code: VmErrorCode, message: string, rule?: string, suggestion?: string) {
    super(message);
    this.name = 'VmError';
    this.code = code;
    this.rule = rule;
    this.suggestion = suggestion;
  }

  toString(): string {
    let output = `${this.name} [${this.code}]: ${this.message}`;
    if (this.rule) {
      output += ` (rule "${this.rule}")`;
    }
    if (this.suggestion) {
      output += `\n\n  Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}

export class UndefinedRuleError extends VmError {
  constructor(rule: string) {
    super('UNDEFINED_RULE', `undefined rule ${rule}`, rule, 'Verify all referenced rules are defined');
    this.name = 'UndefinedRuleError';
  }
}

export class EmptyStackError extends VmError {
  public operation: 'peek' | 'pop';

  constructor(operation: 'peek' | 'pop') {
    super('EMPTY_STACK', `${operation} was called on empty stack`, operation, 'Push a capture before matching it again');
    this.name = 'EmptyStackError';
    this.operation = operation;
  }
}

export class LiteralDecodeError extends VmError {
  public literal: string;

  constructor(literal: string, rule?: string) {
    super('LITERAL_DECODE', `incorrect literal ${JSON.stringify(literal)}`, rule);
    this.name = 'LiteralDecodeError';
    this.literal = literal;
  }
}

export class DuplicateRuleError extends VmError {
  constructor(rule: string) {
    super('DUPLICATE_RULE', `rule ${rule} is defined more than once`, rule, 'Remove duplicate rule definitions');
    this.name = 'DuplicateRuleError';
  }
}

export class ReservedRuleError extends VmError {
  constructor(rule: string) {
    super('RESERVED_RULE', `${rule} is a built-in rule and cannot be redefined`, rule);
    this.name = 'ReservedRuleError';
  }
}

export class InvalidGrammarError extends VmError {
  public path: string;

  constructor(message: string, path: string) {
    super('INVALID_GRAMMAR', `${message} at ${path}`);
    this.name = 'InvalidGrammarError';
    this.path = path;
  }
}

export class RecursionLimitError extends VmError {
  public depth: number;

  constructor(rule: string, depth: number) {
    super('RECURSION_LIMIT', `rule nesting exceeded ${depth} levels`, rule, 'Check the grammar for left recursion');
    this.name = 'RecursionLimitError';
    this.depth = depth;
  }
}
