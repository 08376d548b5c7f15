/**
 * Write Policy Enforcement
 * Polices the files a phase left changed against allow/deny prefix lists.
 */

import * as path from 'path';
import { WritePolicyViolation } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { WritePolicy } from '../types/workflow-config';

/**
 * Normalize a prefix or relative path to forward slashes
 */
export function toPosixPath(value: string): string {
  return value.replace(/\\/g, '/');
}

/**
 * Path of `changedPath` relative to `repoRoot`, with forward slashes
 * Returns undefined when the path lies outside the repository.
 */
export function relativeToRepo(repoRoot: string, changedPath: string): string | undefined {
  const relative = path.relative(path.resolve(repoRoot), path.resolve(repoRoot, changedPath));
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return undefined;
  }
  return toPosixPath(relative);
}

/**
 * Check every changed path against the policy
 * The first offending path, in input order, is reported. Forbidden prefixes
 * are checked before the allow-list.
 */
export function enforceWritePolicy(
  repoRoot: string,
  changedPaths: readonly string[],
  policy: Pick<WritePolicy, 'allowedPrefixes' | 'forbiddenPrefixes'>
): Result<void, WritePolicyViolation> {
  const allowed = policy.allowedPrefixes.map(toPosixPath);
  const forbidden = policy.forbiddenPrefixes.map(toPosixPath);

  for (const changedPath of changedPaths) {
    const relative = relativeToRepo(repoRoot, changedPath);
    if (relative === undefined) {
      return err(
        new WritePolicyViolation(
          `Write policy violation: attempted change outside repository: ${toPosixPath(changedPath)}`,
          changedPath
        )
      );
    }

    if (forbidden.some((prefix) => relative.startsWith(prefix))) {
      return err(
        new WritePolicyViolation(
          `Write policy violation: attempted change in forbidden path: ${relative}`,
          relative
        )
      );
    }

    if (allowed.length > 0 && !allowed.some((prefix) => relative.startsWith(prefix))) {
      return err(
        new WritePolicyViolation(
          `Write policy violation: attempted change outside allowed paths: ${relative}`,
          relative
        )
      );
    }
  }

  return ok(undefined);
}
