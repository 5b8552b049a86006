/**
 * Specialist Result Schemas
 *
 * Each specialist has two views of its output contract:
 * - a JSON Schema descriptor sent to the backend to constrain generation
 * - a zod schema that decodes and validates whatever comes back
 *
 * The backend is never trusted: a value only becomes a typed result after
 * passing the zod schema, and failures surface as SchemaViolation.
 */

import { z } from 'zod';
import type { SchemaDescriptor } from '../../core/types.js';
import { SchemaViolation } from '../../core/errors.js';

// =============================================================================
// ZOD SCHEMAS
// =============================================================================

export const ConfidenceSchema = z.enum(['High', 'Medium', 'Low']);

export const ResearchResultSchema = z.object({
  topic: z.string().trim().min(1),
  summary: z.string().trim().min(1),
  keyPoints: z.array(z.string().trim().min(1)).min(3).max(5),
  confidence: ConfidenceSchema,
  sourcesNeeded: z.array(z.string()).default([]),
});

export const CodeAnalysisResultSchema = z.object({
  language: z.string().trim().min(1),
  complexityScore: z.number().int().min(1).max(10),
  issues: z.array(z.string()).default([]),
  suggestions: z.array(z.string()).default([]),
  securityConcerns: z.array(z.string()).default([]),
});

export const CreativeContentResultSchema = z
  .object({
    contentType: z.string().trim().min(1),
    title: z.string().trim().min(1),
    body: z.string().trim().min(1),
    targetAudience: z.string().trim().min(1),
    tone: z.string().trim().min(1),
    wordCount: z.number().int().nonnegative().optional(),
  })
  // wordCount always matches the body, whatever the backend reported
  .transform((content) => ({ ...content, wordCount: countWords(content.body) }));

export type Confidence = z.infer<typeof ConfidenceSchema>;
export type ResearchResult = z.infer<typeof ResearchResultSchema>;
export type CodeAnalysisResult = z.infer<typeof CodeAnalysisResultSchema>;
export type CreativeContentResult = z.infer<typeof CreativeContentResultSchema>;

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

// =============================================================================
// DECODING
// =============================================================================

/**
 * Validate raw backend output against a schema, throwing SchemaViolation
 * with every failed check.
 */
export function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  schemaName: string,
  raw: unknown
): T {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  throw new SchemaViolation(schemaName, formatIssues(parsed.error.issues));
}

export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function parseResearchResult(raw: unknown): ResearchResult {
  return decodeWith(ResearchResultSchema, researchResultDescriptor.name, raw);
}

export function parseCodeAnalysisResult(raw: unknown): CodeAnalysisResult {
  return decodeWith(CodeAnalysisResultSchema, codeAnalysisResultDescriptor.name, raw);
}

export function parseCreativeContentResult(raw: unknown): CreativeContentResult {
  return decodeWith(CreativeContentResultSchema, creativeContentResultDescriptor.name, raw);
}

// =============================================================================
// JSON SCHEMA DESCRIPTORS (sent to the backend)
// =============================================================================

const stringList = (description: string) => ({
  type: 'array' as const,
  description,
  items: { type: 'string' as const },
});

export const researchResultDescriptor: SchemaDescriptor = {
  name: 'research_result',
  description: 'Structured findings about a research topic',
  schema: {
    type: 'object',
    properties: {
      topic: { type: 'string', description: 'The research topic' },
      summary: { type: 'string', description: 'Brief summary of findings' },
      keyPoints: {
        type: 'array',
        description: '3-5 key findings',
        items: { type: 'string' },
        minItems: 3,
        maxItems: 5,
      },
      confidence: {
        type: 'string',
        description: 'How confident the findings are',
        enum: ['High', 'Medium', 'Low'],
      },
      sourcesNeeded: stringList('Recommended sources to verify the findings'),
    },
    required: ['topic', 'summary', 'keyPoints', 'confidence', 'sourcesNeeded'],
    additionalProperties: false,
  },
};

export const codeAnalysisResultDescriptor: SchemaDescriptor = {
  name: 'code_analysis_result',
  description: 'Review of a piece of source code',
  schema: {
    type: 'object',
    properties: {
      language: { type: 'string', description: 'Programming language detected' },
      complexityScore: {
        type: 'integer',
        description: 'Code complexity from 1 (trivial) to 10 (very complex)',
        minimum: 1,
        maximum: 10,
      },
      issues: stringList('Bugs and problems identified'),
      suggestions: stringList('Improvement suggestions'),
      securityConcerns: stringList('Security issues'),
    },
    required: ['language', 'complexityScore', 'issues', 'suggestions', 'securityConcerns'],
    additionalProperties: false,
  },
};

export const creativeContentResultDescriptor: SchemaDescriptor = {
  name: 'creative_content_result',
  description: 'A piece of written content',
  schema: {
    type: 'object',
    properties: {
      contentType: { type: 'string', description: 'Type of content created' },
      title: { type: 'string', description: 'Content title' },
      body: { type: 'string', description: 'The actual content' },
      targetAudience: { type: 'string', description: 'Intended audience' },
      tone: { type: 'string', description: 'Writing tone used' },
      wordCount: { type: 'integer', description: 'Number of words in body' },
    },
    required: ['contentType', 'title', 'body', 'targetAudience', 'tone', 'wordCount'],
    additionalProperties: false,
  },
};
