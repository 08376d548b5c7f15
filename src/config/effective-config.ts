/**
 * Effective config artifact
 * The resolved configuration, with the source of each overridable value,
 * as written next to the run's other artifacts and shown with --verbose
 */

import { redactSecrets } from '../types/logger';
import { WorkflowConfig } from '../types/workflow-config';

/**
 * Effective config artifact content
 */
export interface EffectiveConfigArtifact {
  schemaVersion: '1.0.0';
  artifactType: 'effective-config';
  generatedAt: string;
  runId: string;
  config: WorkflowConfig;
}

/**
 * Build the artifact, redacting secrets that may sit in gate commands
 */
export function buildEffectiveConfigArtifact(
  config: WorkflowConfig,
  runId: string,
  generatedAt: string
): EffectiveConfigArtifact {
  const commands: Record<string, string> = {};
  for (const [name, command] of Object.entries(config.gates.commands)) {
    commands[name] = redactSecrets(command);
  }

  return {
    schemaVersion: '1.0.0',
    artifactType: 'effective-config',
    generatedAt,
    runId,
    config: { ...config, gates: { ...config.gates, commands } },
  };
}

/**
 * Format effective config for human-readable display
 */
export function formatEffectiveConfigForDisplay(config: WorkflowConfig): string {
  const source = (key: string): string => {
    const value = config.sources?.[key];
    return value ? ` [${value}]` : '';
  };

  const lines: string[] = [
    'Effective configuration',
    `  Workflow:             ${config.paths.workflowPath}`,
    `  Repository:           ${config.paths.repoRoot}`,
    `  Phases:               ${config.phases.map((phase) => phase.id).join(' -> ')}`,
    `  Max total iterations: ${config.limits.maxTotalIterations}${source('limits.maxTotalIterations')}`,
    `  Max phase iterations: ${config.limits.maxPhaseIterations}${source('limits.maxPhaseIterations')}`,
    `  Worker:               ${[config.worker.command, ...config.worker.args].join(' ')}${source('worker.command')}`,
    `  Worker timeout:       ${config.worker.timeoutMs / 1000}s${source('worker.timeoutMs')}`,
    `  File writes:          ${config.writePolicy.allowFileWrites ? 'allowed' : 'not checked'}`,
  ];

  if (config.writePolicy.allowedPrefixes.length > 0) {
    lines.push(`  Allowed paths:        ${config.writePolicy.allowedPrefixes.join(', ')}`);
  }
  if (config.writePolicy.forbiddenPrefixes.length > 0) {
    lines.push(`  Forbidden paths:      ${config.writePolicy.forbiddenPrefixes.join(', ')}`);
  }
  if (config.gates.requiredChecks.length > 0) {
    lines.push(`  Gates:                ${config.gates.requiredChecks.join(', ')}`);
  }
  if (config.gates.goalChecks) {
    lines.push('  Goal checks:          on');
  }

  return lines.join('\n');
}
