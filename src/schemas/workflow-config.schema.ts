/**
 * Workflow file schema (zod)
 * Shape of the JSON workflow definition read at the start of a run.
 */

import { z } from 'zod';

const positiveInt = z.number().int().positive();

const phaseSchema = z.object({
  id: z.string().min(1, 'Phase id cannot be empty'),
  /** Schema path, relative to the workflow file's directory */
  schema: z.string().min(1, 'Phase schema path cannot be empty'),
});

export const workflowFileSchema = z
  .object({
    phases: z.array(phaseSchema).min(1, 'No phases defined in workflow'),
    limits: z
      .object({
        maxTotalIterations: positiveInt.optional(),
        maxPhaseIterations: positiveInt.optional(),
      })
      .default({}),
    policies: z
      .object({
        allowFileWrites: z.boolean().optional(),
        allowedWritePaths: z.array(z.string()).default([]),
        forbidWritePaths: z.array(z.string()).default([]),
      })
      .default({}),
    commands: z.record(z.string()).default({}),
    gates: z
      .object({
        requiredChecks: z.array(z.string().min(1)).default([]),
        /** Check that planned and implemented files exist and are not stubs */
        goalChecks: z.boolean().default(false),
      })
      .default({}),
    worker: z
      .object({
        command: z.string().min(1).optional(),
        args: z.array(z.string()).optional(),
        timeoutSeconds: positiveInt.optional(),
      })
      .default({}),
    /** Prompt directory, relative to the workflow file's directory */
    prompts: z.string().min(1).default('prompts'),
  })
  .superRefine((workflow, ctx) => {
    const seen = new Set<string>();
    workflow.phases.forEach((phase, index) => {
      if (seen.has(phase.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phases', index, 'id'],
          message: `Duplicate phase id '${phase.id}'`,
        });
      }
      seen.add(phase.id);
    });

    const ids = workflow.phases.map((phase) => phase.id);
    if (ids.includes('verify') && !ids.includes('implement')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['phases'],
        message: "A 'verify' phase needs an 'implement' phase to loop back to",
      });
    }
  });

export type WorkflowFile = z.infer<typeof workflowFileSchema>;

/**
 * Validation result type
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Validate a parsed workflow document
 */
export function validateWorkflowFile(data: unknown): ValidationResult<WorkflowFile> {
  const result = workflowFileSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((e) => `${e.path.length > 0 ? e.path.join('.') : '<root>'}: ${e.message}`),
  };
}

/**
 * Parse a workflow document from JSON text
 */
export function parseWorkflowFile(json: string): ValidationResult<WorkflowFile> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validateWorkflowFile(data);
}
