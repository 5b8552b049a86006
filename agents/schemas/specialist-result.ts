/**
 * Specializations and the tagged result each one produces.
 */

import type { CodeAnalysisResult, CreativeContentResult, ResearchResult } from './results.js';

export type Specialization = 'research' | 'code_analysis' | 'content_creation';

export type SpecialistId = 'research_agent' | 'code_agent' | 'creative_agent';

export const SPECIALIST_IDS: Record<Specialization, SpecialistId> = {
  research: 'research_agent',
  code_analysis: 'code_agent',
  content_creation: 'creative_agent',
};

export interface ResearchOutcome {
  kind: 'research';
  data: ResearchResult;
}

export interface CodeAnalysisOutcome {
  kind: 'code_analysis';
  data: CodeAnalysisResult;
}

export interface CreativeContentOutcome {
  kind: 'content_creation';
  data: CreativeContentResult;
}

export type SpecialistResult = ResearchOutcome | CodeAnalysisOutcome | CreativeContentOutcome;
