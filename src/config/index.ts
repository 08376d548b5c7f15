/**
 * Config module - configuration resolution
 */

export { resolveConfig, resolveWorkflowPath, loadWorkflowFile, loadWorkflowConfig } from './resolve-config';
export type { CliFlags } from './resolve-config';
export { buildEffectiveConfigArtifact, formatEffectiveConfigForDisplay } from './effective-config';
export type { EffectiveConfigArtifact } from './effective-config';
