/**
 * Interface for prompt templates that support string interpolation
 */
export interface PromptTemplate {
  /**
   * The template string with placeholders (e.g., "{{variable}}")
   */
  template: string;

  /**
   * Description of what this template is used for
   */
  description?: string;

  /**
   * List of required variables for this template
   */
  requiredVariables?: string[];
}

const PLACEHOLDER_RE = /\{\{(\w+)\}\}/g;

/**
 * Names of required variables that have no value
 */
export function findMissingVariables(template: PromptTemplate, variables: Record<string, string>): string[] {
  return (template.requiredVariables ?? []).filter((name) => variables[name] === undefined);
}

/**
 * Process a prompt template by interpolating variables
 *
 * Substitution is a single pass, so values that themselves contain
 * `{{name}}` (a diff, a schema) are inserted verbatim. Placeholders without a
 * value are left in place.
 *
 * @throws Error if required variables are missing
 */
export function interpolateTemplate(template: PromptTemplate, variables: Record<string, string>): string {
  const missing = findMissingVariables(template, variables);
  if (missing.length > 0) {
    throw new Error(`Missing required variables: ${missing.join(', ')}`);
  }

  return template.template.replace(PLACEHOLDER_RE, (placeholder: string, name: string) => {
    const value = variables[name];
    return value === undefined ? placeholder : value;
  });
}
