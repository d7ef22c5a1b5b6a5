import * as colors from 'colorette';
import type { Location } from './types';
import type { ParseError } from '../parser/index';
import { highlightSnippet } from './highlight';
import { VmError } from '../vm/errors';

/** `a`, `a or b`, `a, b, or c` */
export function enumerate(items: string[]): string {
  if (items.length <= 1) return items.join('');
  if (items.length === 2) return `${items[0]} or ${items[1]}`;
  return `${items.slice(0, -1).join(', ')}, or ${items[items.length - 1]}`;
}

/** Message for a failed parse given the rules attempted at the failure point. */
export function describeAttempts(expected: string[], unexpected: string[]): string {
  if (expected.length > 0 && unexpected.length > 0) {
    return `unexpected ${enumerate(unexpected)}; expected ${enumerate(expected)}`;
  }
  if (expected.length > 0) return `expected ${enumerate(expected)}`;
  if (unexpected.length > 0) return `unexpected ${enumerate(unexpected)}`;
  return 'unknown parsing error';
}

export function formatLocation(location: Location): string {
  const { start, end } = location;
  return start.line === end.line && start.column === end.column
    ? `Line ${start.line}, Col ${start.column}`
    : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

function formatFound(found: string | null): string {
  return found === null ? 'end of input' : `"${found}"`;
}

export function formatError(error: ParseError): string {
  return formatErrorWithColors(error, false);
}

export function formatErrorWithColors(error: ParseError, useColors: boolean = true): string {
  const c = colors.createColors({ useColor: useColors });
  const parts: string[] = [`${c.red('❌ Parse Error:')} ${error.error || 'Unknown error'}`];

  if (error.location) {
    parts.push(`${c.blue('↪ at')} ${formatLocation(error.location)}`);
  }

  if (error.expected && error.expected.length > 0) {
    parts.push(`${c.yellow('Expected:')} ${error.expected.join(', ')}`);
  }

  if (error.found !== undefined) {
    parts.push(`${c.yellow('Found:')} ${formatFound(error.found)}`);
  }

  const snippet = error.snippet ?? (error.input !== undefined && error.location
    ? highlightSnippet(error.input, error.location, useColors)
    : '');
  if (snippet) {
    parts.push('\n' + c.dim('--- Snippet ---') + '\n' + snippet);
  }

  return parts.join('\n');
}

/** Render anything thrown out of a parse, fatal grammar errors included. */
export function formatAnyError(err: unknown, useColors: boolean = true): string {
  const c = colors.createColors({ useColor: useColors });

  if (err instanceof VmError) {
    const lines = [`${c.red(`❌ ${err.name}:`)} ${err.message}`];
    if (err.suggestion) lines.push(`${c.cyan('💡 Suggestion:')} ${err.suggestion}`);
    return lines.join('\n');
  }
  if (err instanceof Error) {
    return `${c.red('❌ Error:')} ${err.message}`;
  }
  return `${c.red('❌ Error:')} ${typeof err === 'string' ? err : 'Unknown error'}`;
}
