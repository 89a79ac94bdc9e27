/**
 * report-convert - library entry
 *
 * Research report JSON -> Quarto / Markdown conversion and BibTeX key normalization.
 */

export * from './services/bibliography';
export * from './services/citation';
export * from './services/report';
export * from './schemas/report.schemas';
export { AppError } from './utils/app-error';
export { ErrorCodes } from './utils/error-codes';
export type { ErrorCode } from './utils/error-codes';
export * from './commands';
export { run, createContext } from './cli';
