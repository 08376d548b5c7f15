/**
 * Tests for the goal checks
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  collectGoalFiles,
  describeTrivialFile,
  detectStubs,
  formatGoalFailure,
  runGoalChecks,
} from './goal-check';
import { MemoryFileSystem } from '../io/memory-file-system';

describe('Goal checks', () => {
  describe('collectGoalFiles', () => {
    it('should list planned files before implemented ones without duplicates', () => {
      const files = collectGoalFiles({
        plan: { phase: 'plan', files: ['src/a.ts', ' src/b.ts ', 7] },
        implement: {
          phase: 'implement',
          changes: [
            { path: 'src/b.ts', description: 'edit' },
            { path: 'src/c.ts', description: 'add' },
            { description: 'no path' },
            'src/d.ts',
          ],
        },
      });

      expect(files).toEqual(['src/a.ts', 'src/b.ts', 'src/c.ts']);
    });

    it('should return nothing before plan or implement have run', () => {
      expect(collectGoalFiles({})).toEqual([]);
    });
  });

  describe('detectStubs', () => {
    it('should report placeholder lines with their line numbers', () => {
      const content = [
        'export function load(): string[] {',
        '  // TODO: read the file',
        '  return [];',
        '}',
      ].join('\n');

      expect(detectStubs(content)).toEqual(['L2: // TODO: read the file', 'L3: return [];']);
    });

    it('should ignore ordinary code', () => {
      expect(detectStubs('const total = items.reduce((sum, item) => sum + item, 0);\nreturn total;')).toEqual([]);
    });

    it('should truncate long lines', () => {
      const [stub] = detectStubs(`// FIXME ${'x'.repeat(200)}`);
      expect(stub).toHaveLength(123);
      expect(stub.endsWith('...')).toBe(true);
    });
  });

  describe('describeTrivialFile', () => {
    it('should flag an empty file', () => {
      expect(describeTrivialFile('')).toBe('file is empty (0 bytes)');
    });

    it('should flag a file with a single line of code', () => {
      expect(describeTrivialFile('// greeting\nexport const greet = 1;\n')).toBe(
        'file has only 1 substantive line(s), likely a stub'
      );
    });

    it('should accept a file with real content', () => {
      expect(describeTrivialFile('export function greet(): string {\n  return "hi";\n}\n')).toBeUndefined();
    });
  });

  describe('runGoalChecks', () => {
    let fs: MemoryFileSystem;

    beforeEach(async () => {
      fs = new MemoryFileSystem('/');
      await fs.writeFile('/work/src/greet.ts', 'export function greet(): string {\n  return "hi";\n}\n', {
        createParents: true,
      });
      await fs.writeFile('/work/src/empty.ts', '');
    });

    it('should pass when there is nothing to check', async () => {
      expect(await runGoalChecks(fs, '/work', [])).toEqual({
        allPassed: true,
        checks: [],
        summary: 'No files to verify (no plan/implement output found)',
      });
    });

    it('should check existence and substance of every file', async () => {
      const report = await runGoalChecks(fs, '/work', ['src/greet.ts', 'src/missing.ts', 'src/empty.ts']);

      expect(report.allPassed).toBe(false);
      expect(report.checks).toEqual([
        { category: 'artifact_existence', file: 'src/greet.ts', passed: true, detail: 'exists' },
        { category: 'stub_detection', file: 'src/greet.ts', passed: true, detail: 'no stubs detected' },
        { category: 'artifact_existence', file: 'src/missing.ts', passed: false, detail: 'file does not exist on disk' },
        { category: 'artifact_existence', file: 'src/empty.ts', passed: true, detail: 'exists' },
        { category: 'stub_detection', file: 'src/empty.ts', passed: true, detail: 'no stubs detected' },
        { category: 'stub_detection', file: 'src/empty.ts', passed: false, detail: 'file is empty (0 bytes)' },
      ]);
      expect(report.summary).toBe('Goal checks: 4 passed, 2 failed across 3 files');
    });
  });

  describe('formatGoalFailure', () => {
    it('should name the category and file', () => {
      expect(
        formatGoalFailure({ category: 'artifact_existence', file: 'src/a.ts', passed: false, detail: 'file does not exist on disk' })
      ).toBe('artifact_existence src/a.ts: file does not exist on disk');
    });
  });
});
