/**
 * Goal checks
 *
 * Works backwards from what the plan and implement phases said they would
 * touch: every named file must exist and must not be a stub. Runs after the
 * gates on each verify entry; a failed check fails verification just like a
 * failed gate.
 */

import { ControlObject, GoalCheck, GoalCheckReport, JsonValue } from '../types/control';
import { FileSystem } from '../types/file-system';
import { IMPLEMENT_PHASE_ID } from '../types/workflow-config';

/** Phase whose control object lists the files it expects to touch */
export const PLAN_PHASE_ID = 'plan';

/** Longest stub excerpt kept in a check detail */
const MAX_STUB_EXCERPT = 120;

const STUB_PATTERNS: readonly RegExp[] = [
  /\b(TODO|FIXME|PLACEHOLDER|HACK)\b/i,
  /(not\s+implemented|coming\s+soon|lorem\s+ipsum)/i,
  /return\s+(null|nil|None)\s*;?\s*$/i,
  /return\s+(\{\}|\[\])\s*;?\s*$/i,
  /^\s*pass\s*$/i,
  /panic\(\s*"(not implemented|todo|unimplemented)"/i,
  /throw\s+new\s+Error\(\s*["'](not implemented|todo)/i,
];

const COMMENT_PREFIXES = ['//', '#', '/*', '*', "'''", '"""'];

function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Files the plan expects (`files`) and the implement phase reports (`changes[].path`)
 * Duplicates are dropped; plan files come first.
 */
export function collectGoalFiles(controls: Readonly<Record<string, ControlObject>>): string[] {
  const files: string[] = [];

  const planned = controls[PLAN_PHASE_ID]?.files;
  if (Array.isArray(planned)) {
    for (const file of planned) {
      if (typeof file === 'string') files.push(file);
    }
  }

  const changes = controls[IMPLEMENT_PHASE_ID]?.changes;
  if (Array.isArray(changes)) {
    for (const change of changes) {
      if (isJsonObject(change) && typeof change.path === 'string') files.push(change.path);
    }
  }

  return [...new Set(files.map((file) => file.trim()).filter((file) => file.length > 0))];
}

/**
 * Lines that look like placeholder code, as `L<n>: <line>`
 */
export function detectStubs(content: string): string[] {
  const stubs: string[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (STUB_PATTERNS.some((pattern) => pattern.test(line))) {
      const stub = `L${index + 1}: ${line.trim()}`;
      stubs.push(stub.length > MAX_STUB_EXCERPT ? `${stub.slice(0, MAX_STUB_EXCERPT)}...` : stub);
    }
  });
  return stubs;
}

/**
 * Why a file counts as empty or trivial, or undefined when it has substance
 */
export function describeTrivialFile(content: string): string | undefined {
  if (content.length === 0) {
    return 'file is empty (0 bytes)';
  }
  const substantive = content.split(/\r?\n/).filter((line) => {
    const trimmed = line.trim();
    return trimmed.length > 0 && !COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
  }).length;
  if (substantive <= 1) {
    return `file has only ${substantive} substantive line(s), likely a stub`;
  }
  return undefined;
}

/**
 * Check the goal files against the working tree
 */
export async function runGoalChecks(
  fileSystem: FileSystem,
  repoRoot: string,
  files: readonly string[]
): Promise<GoalCheckReport> {
  if (files.length === 0) {
    return { allPassed: true, checks: [], summary: 'No files to verify (no plan/implement output found)' };
  }

  const checks: GoalCheck[] = [];
  for (const file of files) {
    const read = await fileSystem.readFile(fileSystem.resolve(repoRoot, file));
    if (!read.ok) {
      checks.push({ category: 'artifact_existence', file, passed: false, detail: 'file does not exist on disk' });
      continue;
    }
    checks.push({ category: 'artifact_existence', file, passed: true, detail: 'exists' });

    const stubs = detectStubs(read.value);
    checks.push(
      stubs.length > 0
        ? { category: 'stub_detection', file, passed: false, detail: `found ${stubs.length} stub(s): ${stubs.join('; ')}` }
        : { category: 'stub_detection', file, passed: true, detail: 'no stubs detected' }
    );

    const trivial = describeTrivialFile(read.value);
    if (trivial !== undefined) {
      checks.push({ category: 'stub_detection', file, passed: false, detail: trivial });
    }
  }

  const failed = checks.filter((check) => !check.passed).length;
  return {
    allPassed: failed === 0,
    checks,
    summary: `Goal checks: ${checks.length - failed} passed, ${failed} failed across ${files.length} files`,
  };
}

/**
 * Failure line recorded for a failed goal check
 */
export function formatGoalFailure(check: GoalCheck): string {
  return `${check.category} ${check.file}: ${check.detail}`;
}
