#!/usr/bin/env node
import fs from 'node:fs/promises';
import { isColorSupported, createColors } from 'colorette';

import { loadGrammarFromFile } from '../grammar/json';
import { Vm, type ParseOptions } from '../vm/index';
import { parseComplete, parseInput, type ParseOutcome } from '../parser/index';
import { createLogger, createTraceLogger, type Logger } from '../utils/logger';
import { formatAnyError, formatErrorWithColors } from '../utils/format';

// Configuration interface
export interface CLIConfig {
  grammarPath: string;
  rule?: string;
  testInput?: string;
  testFile?: string;
  json: boolean;
  complete: boolean;
  validate: boolean;
  trace: boolean;
  maxDepth?: number;
  benchmark?: number;
  color: boolean;
  verbose: boolean;
  help: boolean;
}

export class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIUsageError';
  }
}

export function helpText(useColor: boolean): string {
  const c = createColors({ useColor });
  return `
${c.bold('pegvm')} - Runtime PEG interpreter

${c.bold('USAGE:')}
  pegvm <grammar.json> [options]

${c.bold('OPTIONS:')}
  ${c.green('--rule <name>')}           Start rule (default: first rule in the grammar)
  ${c.green('--test <input>')}          Parse the input string
  ${c.green('--test-file <file>')}      Parse the content of a file
  ${c.green('--complete')}              Fail unless the whole input is consumed
  ${c.green('--json')}                  Print matched pairs as JSON
  ${c.green('--validate')}              Only check the grammar
  ${c.green('--trace')}                 Log every rule attempt (implies --verbose)
  ${c.green('--max-depth <n>')}         Abort when rules nest deeper than n
  ${c.green('--benchmark [n]')}         Parse the input n times (default: 1000)
  ${c.green('--no-color')}              Disable colored output
  ${c.green('--verbose, -v')}           Enable verbose output
  ${c.green('--help, -h')}              Show this help

${c.bold('EXAMPLES:')}
  pegvm json.grammar.json --test '{"a": [1, 2]}'
  pegvm calc.grammar.json --rule expr --test-file input.txt --json
`;
}

function positiveInteger(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CLIUsageError(`${flag} expects a positive integer, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CLIConfig {
  const config: CLIConfig = {
    grammarPath: '',
    json: false,
    complete: false,
    validate: false,
    trace: false,
    color: isColorSupported && env.NO_COLOR !== '1',
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--rule':
      case '--test':
      case '--test-file': {
        if (nextArg === undefined) throw new CLIUsageError(`${arg} expects a value`);
        if (arg === '--rule') config.rule = nextArg;
        if (arg === '--test') config.testInput = nextArg;
        if (arg === '--test-file') config.testFile = nextArg;
        i++;
        break;
      }
      case '--max-depth':
        config.maxDepth = positiveInteger(arg, nextArg);
        i++;
        break;
      case '--benchmark':
        if (nextArg !== undefined && /^\d+$/.test(nextArg)) {
          config.benchmark = positiveInteger(arg, nextArg);
          i++;
        } else {
          config.benchmark = 1000;
        }
        break;
      case '--json':
        config.json = true;
        break;
      case '--complete':
        config.complete = true;
        break;
      case '--validate':
        config.validate = true;
        break;
      case '--trace':
        config.trace = true;
        config.verbose = true;
        break;
      case '--no-color':
        config.color = false;
        break;
      case '--verbose':
      case '-v':
        config.verbose = true;
        break;
      case '--help':
      case '-h':
        config.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new CLIUsageError(`Unknown option: ${arg}`);
        if (config.grammarPath) throw new CLIUsageError(`Unexpected argument: ${arg}`);
        config.grammarPath = arg;
    }
  }

  return config;
}

function benchmarkParsing(parse: () => ParseOutcome, iterations: number, log: Logger): void {
  log.info(`Running benchmark with ${iterations} iterations...`);

  let successCount = 0;
  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    if (parse().success) successCount++;
  }
  const totalTime = performance.now() - start;

  log.info(`Total time: ${totalTime.toFixed(2)}ms`);
  log.info(`Average per parse: ${(totalTime / iterations).toFixed(4)}ms`);
  log.info(`Successful parses: ${successCount}/${iterations}`);
}

/** Run the CLI with a parsed configuration; resolves to the process exit code. */
export async function run(config: CLIConfig, log: Logger = createLogger({ useColor: config.color, verbose: config.verbose })): Promise<number> {
  if (config.help || !config.grammarPath) {
    console.log(helpText(config.color));
    return config.help ? 0 : 1;
  }

  try {
    const grammar = await loadGrammarFromFile(config.grammarPath);
    log.debug(`Loaded ${grammar.ruleNames.length} rules from ${config.grammarPath}`);

    const missing = grammar.undefinedReferences();
    if (missing.length > 0) {
      log.error(`Undefined rules: ${missing.join(', ')}`);
      return 1;
    }
    if (config.validate) {
      log.success(`Grammar is valid: ${config.grammarPath}`);
      return 0;
    }

    const rule = config.rule ?? grammar.ruleNames[0];
    if (rule === undefined) {
      log.error('Grammar has no rules');
      return 1;
    }

    const input = config.testFile !== undefined ? await fs.readFile(config.testFile, 'utf-8') : config.testInput;
    if (input === undefined) {
      log.info('No test input provided. Grammar loaded successfully.');
      return 0;
    }

    const vm = new Vm(grammar);
    const options: ParseOptions = { maxDepth: config.maxDepth };
    if (config.trace) options.tracer = createTraceLogger(log);

    const parse = (): ParseOutcome =>
      config.complete ? parseComplete(vm, rule, input, options) : parseInput(vm, rule, input, options);

    if (config.benchmark !== undefined) {
      benchmarkParsing(parse, config.benchmark, log);
      return 0;
    }

    const outcome = parse();

    if (!outcome.success) {
      log.error('Parse failed');
      console.error(formatErrorWithColors(outcome, config.color));
      return 1;
    }

    log.success(`Parse successful (${outcome.end.offset}/${input.length} characters)`);
    console.log(config.json ? JSON.stringify(outcome.pairs, null, 2) : outcome.pairs.print());
    return 0;
  } catch (err: unknown) {
    console.error(formatAnyError(err, config.color));
    return 1;
  }
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  let config: CLIConfig;
  try {
    config = parseArgs(args);
  } catch (err: unknown) {
    createLogger().error(err instanceof Error ? err.message : String(err));
    return 1;
  }
  return run(config);
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      createLogger().error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  );
}
