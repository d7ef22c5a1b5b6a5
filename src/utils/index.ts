// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export {
  formatError,
  formatErrorWithColors,
  formatAnyError,
  formatLocation,
  describeAttempts,
  enumerate,
} from './format';
export { highlightSnippet } from './highlight';
export { createLogger, createTraceLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
export type { Location, LineColumn } from './types';
