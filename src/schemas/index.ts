/**
 * Schemas module exports
 */

export { extractJson, findBalancedObject } from './json-extractor';
export {
  SchemaValidator,
  createSchemaValidator,
  formatInstancePath,
  toViolations,
} from './schema-validator';
export type { CompiledSchema } from './schema-validator';
export { workflowFileSchema, validateWorkflowFile, parseWorkflowFile } from './workflow-config.schema';
export type { WorkflowFile, ValidationResult } from './workflow-config.schema';
