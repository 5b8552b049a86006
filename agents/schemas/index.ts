/**
 * Schemas Module
 *
 * Output contracts for the specialist agents.
 */

export {
  ConfidenceSchema,
  ResearchResultSchema,
  CodeAnalysisResultSchema,
  CreativeContentResultSchema,
  researchResultDescriptor,
  codeAnalysisResultDescriptor,
  creativeContentResultDescriptor,
  parseResearchResult,
  parseCodeAnalysisResult,
  parseCreativeContentResult,
  decodeWith,
  formatIssues,
  countWords,
  type Confidence,
  type ResearchResult,
  type CodeAnalysisResult,
  type CreativeContentResult,
} from './results.js';

export {
  SPECIALIST_IDS,
  type Specialization,
  type SpecialistId,
  type SpecialistResult,
  type ResearchOutcome,
  type CodeAnalysisOutcome,
  type CreativeContentOutcome,
} from './specialist-result.js';
