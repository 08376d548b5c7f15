/**
 * Prompt templates
 */
export { interpolateTemplate, findMissingVariables } from './prompt-template';
export type { PromptTemplate } from './prompt-template';
export {
  PromptAssembler,
  PHASE_PROMPT_TEMPLATE,
  RETURN_JSON_INSTRUCTIONS,
  SYSTEM_PROMPT_FILE,
  phasePromptFile,
} from './phase-prompt';
export type { PhasePromptRequest } from './phase-prompt';
