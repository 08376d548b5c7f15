/**
 * JSON extraction from worker output
 *
 * Workers are asked to print one JSON object, but their output is free text:
 * it may be wrapped in a markdown fence, preceded by chatter, or followed by
 * a sign-off. Extraction looks at fenced blocks first and falls back to the
 * raw text; in both tiers the first candidate that parses to an object wins.
 */

import { ControlObject, isControlObject } from '../types/control';
import { ExtractionError } from '../types/errors';
import { Result, ok, err } from '../types/result';

/** Opening fence, optional `json` tag, body up to the closing fence */
const FENCED_BLOCK_RE = /```(?:json)?\s*([\s\S]*?)```/gi;

/**
 * Find the balanced `{...}` region starting at `start`
 * Braces inside JSON string literals are ignored. Returns undefined when the
 * region never closes.
 */
export function findBalancedObject(text: string, start: number): string | undefined {
  if (text[start] !== '{') {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}

/**
 * Parse a candidate, accepting only JSON objects
 */
function parseObject(candidate: string): ControlObject | undefined {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isControlObject(parsed) ? parsed : undefined;
  } catch {
    // Not JSON; the caller moves on to the next candidate
    return undefined;
  }
}

/**
 * Try every fenced block whose body is a single object
 */
function extractFromFencedBlocks(text: string): ControlObject | undefined {
  for (const match of text.matchAll(FENCED_BLOCK_RE)) {
    const body = match[1].trim();
    const candidate = findBalancedObject(body, 0);
    if (candidate === undefined || candidate.length !== body.length) {
      continue;
    }
    const parsed = parseObject(candidate);
    if (parsed) {
      return parsed;
    }
  }
  return undefined;
}

/**
 * Try every balanced region of the raw text, left to right
 */
function extractFromRawText(text: string): ControlObject | undefined {
  let start = text.indexOf('{');
  while (start !== -1) {
    const candidate = findBalancedObject(text, start);
    if (candidate !== undefined) {
      const parsed = parseObject(candidate);
      if (parsed) {
        return parsed;
      }
    }
    start = text.indexOf('{', start + 1);
  }
  return undefined;
}

/**
 * Recover a single JSON object from worker output
 */
export function extractJson(text: string): Result<ControlObject, ExtractionError> {
  const fenced = extractFromFencedBlocks(text);
  if (fenced) {
    return ok(fenced);
  }

  const raw = extractFromRawText(text);
  if (raw) {
    return ok(raw);
  }

  return err(new ExtractionError('No JSON object found in worker output'));
}
