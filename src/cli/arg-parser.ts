/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';

type ValueResult<T> = { value: T; error?: undefined } | { value?: undefined; error: string };

/**
 * Parse a positive integer from a string
 */
function parsePositiveInt(value: string, name: string): ValueResult<number> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return { error: `${name} must be a positive integer` };
  }
  return { value: parsed };
}

/**
 * Split worker arguments on whitespace, dropping empty pieces
 */
export function splitWorkerArgs(value: string): string[] {
  return value.split(/\s+/).filter((piece) => piece.length > 0);
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 * `passThrough` values may be empty or start with `--` (worker arguments).
 */
function getArgValue(
  args: string[],
  index: number,
  argName: string,
  passThrough = false
): { value: string; skip: number; error?: undefined } | { value?: undefined; skip: number; error: string } {
  const arg = args[index];

  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value && !passThrough) {
      return { error: `${argName}= requires a value`, skip: 0 };
    }
    return { value, skip: 0 };
  }

  const nextArg = args[index + 1];
  if (nextArg === undefined || (nextArg.startsWith('--') && !passThrough)) {
    return { error: `${argName} requires a value`, skip: 0 };
  }
  return { value: nextArg, skip: 1 };
}

const INTEGER_FLAGS = {
  '--timeout': 'timeoutSeconds',
  '--max-total-iterations': 'maxTotalIterations',
  '--max-phase-iterations': 'maxPhaseIterations',
} as const;

type IntegerFlag = keyof typeof INTEGER_FLAGS;

function isIntegerFlag(name: string): name is IntegerFlag {
  return name in INTEGER_FLAGS;
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0];

    if (isIntegerFlag(argBase)) {
      const raw = getArgValue(args, i, argBase);
      if (raw.error !== undefined) return { success: false, error: `Error: ${raw.error}` };
      const parsed = parsePositiveInt(raw.value, argBase);
      if (parsed.error !== undefined) return { success: false, error: `Error: ${parsed.error}` };
      result[INTEGER_FLAGS[argBase]] = parsed.value;
      i += raw.skip;
      continue;
    }

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--task':
      case '--workflow':
      case '--repo':
      case '--worker': {
        const raw = getArgValue(args, i, argBase);
        if (raw.error !== undefined) return { success: false, error: `Error: ${raw.error}` };
        if (argBase === '--task') result.task = raw.value;
        else if (argBase === '--workflow') result.workflowPath = raw.value;
        else if (argBase === '--repo') result.repo = raw.value;
        else result.worker = raw.value;
        i += raw.skip;
        break;
      }

      case '--worker-args': {
        const raw = getArgValue(args, i, argBase, true);
        if (raw.error !== undefined) return { success: false, error: `Error: ${raw.error}` };
        result.workerArgs = splitWorkerArgs(raw.value);
        i += raw.skip;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      default: {
        if (arg.startsWith('--')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        positional.push(arg);
      }
    }
  }

  if (positional.length > 0) {
    if (result.task) {
      return { success: false, error: 'Error: Give the task either with --task or as arguments, not both' };
    }
    result.task = positional.join(' ');
  }

  if (!result.help && !result.version && !result.task.trim()) {
    return { success: false, error: 'Error: A task is required (--task "<description>")' };
  }

  return { success: true, args: result };
}
