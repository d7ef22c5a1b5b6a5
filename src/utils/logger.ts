import { createColors, isColorSupported } from 'colorette';
import type { ParserTracer } from '../runtime/state';

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
}

export interface LoggerOptions {
  useColor?: boolean;
  verbose?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { useColor = isColorSupported, verbose = false } = options;
  const c = createColors({ useColor });

  return {
    info: (msg) => console.log(`${c.blue('ℹ️')}  ${msg}`),
    success: (msg) => console.log(`${c.green('✅')} ${msg}`),
    warn: (msg) => console.warn(`${c.yellow('⚠️')}  ${msg}`),
    error: (msg) => console.error(`${c.red('❌')} ${msg}`),
    debug: (msg) => {
      if (verbose) console.log(c.dim(`🐛 ${msg}`));
    },
  };
}

/** Tracer that writes rule entry and exit to the debug log, indented by depth. */
export function createTraceLogger(log: Logger): ParserTracer {
  return {
    trace(event) {
      const indent = '  '.repeat(Math.max(0, event.depth - 1));
      const marker = event.type === 'enter' ? '→' : event.type === 'match' ? '✓' : '✗';
      log.debug(`${indent}${marker} ${event.rule} @${event.offset}`);
    },
  };
}
