import chalk from 'chalk';
import { Position } from '../runtime/position';
import type { Location } from './types';

const plain = new chalk.Instance({ level: 0 });

/**
 * The line holding `location.start` with a caret under its column, framed
 * by the lines before and after it.
 */
export function highlightSnippet(input: string, location: Location, useColor = true): string {
  const at = Position.at(input, location.start.offset);
  if (at === null) return '';

  const paint = useColor ? chalk : plain;
  const { line, column } = at.lineCol();
  const prefix = `${line}: `;
  const numbered = (pos: Position, n: number): string => `${n}: ${pos.lineOf()}`;

  const previous = at.previousLine();
  const next = at.nextLine();

  return [
    previous && numbered(previous, line - 1),
    prefix + paint.redBright(at.lineOf()),
    paint.yellow(' '.repeat(prefix.length + column - 1) + '^'),
    next && numbered(next, line + 1),
  ]
    .filter((entry): entry is string => typeof entry === 'string')
    .join('\n');
}
