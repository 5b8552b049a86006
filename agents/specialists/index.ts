/**
 * Specialists Module
 *
 * Exports the invoker and the per-specialization definitions.
 */

export { SpecialistInvoker, type SpecialistRequest, type InvokerOptions } from './invoker.js';
export {
  researchSpecialist,
  codeAnalysisSpecialist,
  contentCreationSpecialist,
  DEFAULT_LANGUAGE,
  CONTENT_DEFAULTS,
  type SpecialistDefinition,
  type ResearchPayload,
  type CodeAnalysisPayload,
  type ContentCreationPayload,
} from './definitions.js';
export {
  RESEARCH_INSTRUCTIONS,
  CODE_ANALYSIS_INSTRUCTIONS,
  CONTENT_CREATION_INSTRUCTIONS,
  ROUTING_INSTRUCTIONS,
} from './prompts.js';
