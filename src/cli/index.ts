/**
 * CLI Module
 *
 * Exports for the CLI argument parsing module
 */

export { parseArgs, splitWorkerArgs } from './arg-parser';
export { getUsageText } from './help';
export type { ParsedArgs, ParseResult } from './types';
export { DEFAULT_ARGS } from './types';
