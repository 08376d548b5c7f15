/**
 * Logging module - structured logging implementations
 */

export { ConsoleLogger, createConsoleLogger } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';

// Run summary
export type { PhaseEntryRecord, RunSummary } from './run-summary';
export { RunSummaryBuilder, createRunSummaryBuilder, formatRunSummaryMarkdown } from './run-summary';
