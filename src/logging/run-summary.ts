/**
 * Run Summary Generator
 * Collects what happened in a run into the `run-summary.json` / `run-summary.md` artifacts
 */

import { Clock } from '../types/clock';
import { RunErrorCode } from '../types/errors';
import { IterationLimits } from '../types/workflow-config';

/**
 * One entry into a phase
 */
export interface PhaseEntryRecord {
  /** Phase id */
  phase: string;
  /** Entry count of the phase (1-indexed) */
  iteration: number;
  /** Worker exit code, once the worker has run */
  workerExitCode?: number;
  /** Worker wall time in milliseconds */
  workerDurationMs?: number;
  /** Gate verdict, for verify entries that reached the gates */
  gatesPassed?: boolean;
  /** Failed gate descriptions, for verify entries */
  gateFailures?: string[];
}

/**
 * Run summary data structure
 */
export interface RunSummary {
  schemaVersion: '1.0.0';
  runId: string;
  task: string;
  success: boolean;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  /** Phase entries across the whole run */
  totalIterations: number;
  /** Entry count per phase id */
  phaseIterations: Record<string, number>;
  /** Number of verify→implement loop-backs */
  repairLoops: number;
  entries: PhaseEntryRecord[];
  limits: IterationLimits;
  error?: {
    code: RunErrorCode | 'UNEXPECTED_ERROR';
    message: string;
    phase?: string;
  };
}

/**
 * Builder for collecting run summary data
 */
export class RunSummaryBuilder {
  private readonly runId: string;
  private readonly task: string;
  private readonly limits: IterationLimits;
  private readonly clock: Clock;
  private readonly startedAt: Date;
  private readonly entries: PhaseEntryRecord[] = [];
  private repairLoops = 0;

  constructor(runId: string, task: string, limits: IterationLimits, clock: Clock) {
    this.runId = runId;
    this.task = task;
    this.limits = limits;
    this.clock = clock;
    this.startedAt = clock.now();
  }

  /**
   * Record entry into a phase; later `record*` calls update this entry
   */
  recordPhaseEntry(phase: string, iteration: number): void {
    this.entries.push({ phase, iteration });
  }

  recordWorker(exitCode: number, durationMs: number): void {
    const entry = this.currentEntry();
    if (entry) {
      entry.workerExitCode = exitCode;
      entry.workerDurationMs = durationMs;
    }
  }

  recordGates(allPassed: boolean, failures: string[]): void {
    const entry = this.currentEntry();
    if (entry) {
      entry.gatesPassed = allPassed;
      entry.gateFailures = [...failures];
    }
  }

  recordRepairLoop(): void {
    this.repairLoops++;
  }

  /**
   * Build the final summary
   */
  build(
    totalIterations: number,
    phaseIterations: Record<string, number>,
    error?: RunSummary['error']
  ): RunSummary {
    const endedAt = this.clock.now();

    return {
      schemaVersion: '1.0.0',
      runId: this.runId,
      task: this.task,
      success: error === undefined,
      startedAt: this.startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - this.startedAt.getTime(),
      totalIterations,
      phaseIterations: { ...phaseIterations },
      repairLoops: this.repairLoops,
      entries: this.entries.map((entry) => ({ ...entry })),
      limits: this.limits,
      error,
    };
  }

  private currentEntry(): PhaseEntryRecord | undefined {
    return this.entries[this.entries.length - 1];
  }
}

/**
 * Format run summary as markdown
 */
export function formatRunSummaryMarkdown(summary: RunSummary): string {
  const lines: string[] = [
    '# Run Summary',
    '',
    `**Run ID:** ${summary.runId}`,
    `**Status:** ${summary.success ? '✅ Success' : '❌ Failed'}`,
    `**Duration:** ${formatDuration(summary.durationMs)}`,
    '',
    '## Iterations',
    '',
    `- Total: ${summary.totalIterations}/${summary.limits.maxTotalIterations}`,
    `- Repair loops: ${summary.repairLoops}`,
  ];

  for (const [phase, count] of Object.entries(summary.phaseIterations)) {
    lines.push(`- ${phase}: ${count}/${summary.limits.maxPhaseIterations}`);
  }

  if (summary.entries.length > 0) {
    lines.push('');
    lines.push('## Phase Entries');
    lines.push('');
    lines.push('| Phase | Iteration | Worker Exit | Duration | Gates |');
    lines.push('|-------|-----------|-------------|----------|-------|');

    for (const entry of summary.entries) {
      const exit = entry.workerExitCode === undefined ? '-' : String(entry.workerExitCode);
      const duration = entry.workerDurationMs === undefined ? '-' : formatDuration(entry.workerDurationMs);
      const gates = entry.gatesPassed === undefined ? '-' : entry.gatesPassed ? 'passed' : 'failed';
      lines.push(`| ${entry.phase} | ${entry.iteration} | ${exit} | ${duration} | ${gates} |`);
    }
  }

  if (summary.error) {
    lines.push('');
    lines.push('## Error');
    lines.push('');
    lines.push(`Code: ${summary.error.code}`);
    lines.push('');
    lines.push('```');
    lines.push(summary.error.message);
    lines.push('```');
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Create a run summary builder
 */
export function createRunSummaryBuilder(
  runId: string,
  task: string,
  limits: IterationLimits,
  clock: Clock
): RunSummaryBuilder {
  return new RunSummaryBuilder(runId, task, limits, clock);
}
