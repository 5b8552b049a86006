/**
 * Specialist Definitions
 *
 * One entry per specialization: who answers, with which instructions, how
 * the payload is phrased, and how the reply is decoded.
 */

import type { SchemaDescriptor } from '../../core/types.js';
import {
  codeAnalysisResultDescriptor,
  creativeContentResultDescriptor,
  parseCodeAnalysisResult,
  parseCreativeContentResult,
  parseResearchResult,
  researchResultDescriptor,
  type CodeAnalysisResult,
  type CreativeContentResult,
  type ResearchResult,
  type SpecialistId,
  type Specialization,
} from '../schemas/index.js';
import { CODE_ANALYSIS_INSTRUCTIONS, CONTENT_CREATION_INSTRUCTIONS, RESEARCH_INSTRUCTIONS } from './prompts.js';

// =============================================================================
// PAYLOADS
// =============================================================================

export interface ResearchPayload {
  topic: string;
}

export interface CodeAnalysisPayload {
  code: string;
  /** Language name, or "auto-detect" */
  language: string;
}

export interface ContentCreationPayload {
  request: string;
  contentType: string;
  audience: string;
  tone: string;
}

export const DEFAULT_LANGUAGE = 'auto-detect';

export const CONTENT_DEFAULTS = {
  contentType: 'article',
  audience: 'general',
  tone: 'professional',
} as const;

// =============================================================================
// DEFINITIONS
// =============================================================================

export interface SpecialistDefinition<TPayload, TResult> {
  specialization: Specialization;
  agentId: SpecialistId;
  instructions: string;
  outputSchema: SchemaDescriptor;
  formatPayload(payload: TPayload): string;
  decode(raw: unknown): TResult;
}

export const researchSpecialist: SpecialistDefinition<ResearchPayload, ResearchResult> = {
  specialization: 'research',
  agentId: 'research_agent',
  instructions: RESEARCH_INSTRUCTIONS,
  outputSchema: researchResultDescriptor,
  formatPayload: ({ topic }) => `Research this topic: ${topic}`,
  decode: parseResearchResult,
};

export const codeAnalysisSpecialist: SpecialistDefinition<CodeAnalysisPayload, CodeAnalysisResult> = {
  specialization: 'code_analysis',
  agentId: 'code_agent',
  instructions: CODE_ANALYSIS_INSTRUCTIONS,
  outputSchema: codeAnalysisResultDescriptor,
  formatPayload: ({ code, language }) => `Analyze this ${language} code:\n\n\`\`\`\n${code}\n\`\`\``,
  decode: parseCodeAnalysisResult,
};

export const contentCreationSpecialist: SpecialistDefinition<ContentCreationPayload, CreativeContentResult> = {
  specialization: 'content_creation',
  agentId: 'creative_agent',
  instructions: CONTENT_CREATION_INSTRUCTIONS,
  outputSchema: creativeContentResultDescriptor,
  formatPayload: ({ request, contentType, audience, tone }) =>
    `Create ${contentType} content about: ${request}. Target audience: ${audience}. Tone: ${tone}`,
  decode: parseCreativeContentResult,
};
