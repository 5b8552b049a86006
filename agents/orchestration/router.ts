/**
 * Request Routing
 *
 * Decides which specialist(s) handle a free-form request. A route is a
 * tagged variant carrying the payload its specialist needs:
 *
 *   research | code_analysis | content_creation | composite
 *
 * Two routers share one contract:
 * - KeywordRouter: deterministic pattern matching, always available
 * - LLMRouter: asks the backend for a route plan, falling back to keywords
 *   when the backend is down or answers out of contract
 */

import { z } from 'zod';
import type { LLMClient, Logger, SchemaDescriptor } from '../../core/types.js';
import { errorMessage, isDelegationError } from '../../core/errors.js';
import { decodeWith } from '../schemas/index.js';
import {
  CONTENT_DEFAULTS,
  DEFAULT_LANGUAGE,
  ROUTING_INSTRUCTIONS,
  type CodeAnalysisPayload,
  type ContentCreationPayload,
  type ResearchPayload,
} from '../specialists/index.js';

// =============================================================================
// TYPES
// =============================================================================

export type Route =
  | { kind: 'research'; payload: ResearchPayload }
  | { kind: 'code_analysis'; payload: CodeAnalysisPayload }
  | { kind: 'content_creation'; payload: ContentCreationPayload }
  | { kind: 'composite'; payload: { topic: string } };

export interface Router {
  /** Ordered, non-empty list of routes to run for the request */
  route(request: string, signal?: AbortSignal): Promise<Route[]>;
}

// =============================================================================
// KEYWORD ROUTER
// =============================================================================

const COMPOSITE_PATTERN = /\b(?:complex|comprehensive|in-depth|deep|full)\s+(?:analysis|research)\b/i;
const COMPOSITE_TOPIC_PATTERN = /\b(?:analysis|research)\s+(?:on|of|about|into|for)\s+(.+)$/i;

const CODE_FENCE_PATTERN = /```[\w+#-]*\n?([\s\S]*?)```/;
const CODE_REQUEST_PATTERN = /\b(?:analy[sz]e|review|audit|check|inspect|debug)\b[\s\S]*\bcode\b/i;
const CODE_AFTER_COLON_PATTERN = /\bcode\b[^:\n]*:\s*([\s\S]+)$/i;

const WRITING_VERB_PATTERN = /\b(?:write|draft|compose|create|generate)\b/i;

const LEADING_RESEARCH_PATTERN = /^(?:research|investigate|look into|find out about|tell me about|explain)\b/i;

const RESEARCH_TOPIC_PATTERN =
  /\b(?:research|investigate|look into|find out about|tell me about|explain)\s+(?:on\s+|about\s+|into\s+)?(.+)$/i;

/** Longer names first so "blog post" wins over "post" */
const CONTENT_TYPES = [
  'social media post',
  'press release',
  'blog post',
  'newsletter',
  'email',
  'article',
  'report',
  'story',
  'poem',
  'tweet',
  'guide',
  'documentation',
  'product description',
];

const TONES = [
  'professional',
  'casual',
  'friendly',
  'formal',
  'humorous',
  'persuasive',
  'analytical',
  'inspirational',
  'technical',
  'enthusiastic',
];

const AUDIENCE_PATTERN =
  /\bfor\s+(?:the\s+)?(beginners|developers|engineers|executives|students|customers|managers|investors|children|kids|general public|team)\b/i;

const LANGUAGES: Array<[name: string, pattern: RegExp]> = [
  ['TypeScript', /\btypescript\b/i],
  ['JavaScript', /\bjavascript\b/i],
  ['Python', /\bpython\b/i],
  ['Java', /\bjava\b/i],
  ['Go', /\bgolang\b|\bgo\s+code\b/i],
  ['Rust', /\brust\b/i],
  ['C++', /\bc\+\+/i],
  ['C#', /\bc#/i],
  ['Ruby', /\bruby\b/i],
  ['PHP', /\bphp\b/i],
  ['Kotlin', /\bkotlin\b/i],
  ['Swift', /\bswift\b/i],
  ['SQL', /\bsql\b/i],
  ['Bash', /\b(?:bash|shell)\b/i],
];

/**
 * Deterministic router used on its own or as the LLM router's fallback.
 *
 * Precedence: composite → code analysis → content creation → research.
 * A leading research verb outranks a content type named without a writing
 * verb. Anything unrecognized is researched as a whole.
 */
export class KeywordRouter implements Router {
  async route(request: string): Promise<Route[]> {
    return [this.classify(request)];
  }

  classify(request: string): Route {
    const text = request.trim();

    if (COMPOSITE_PATTERN.test(text)) {
      const topic = text.match(COMPOSITE_TOPIC_PATTERN)?.[1] ?? text;
      return { kind: 'composite', payload: { topic: cleanTopic(topic) } };
    }

    const fenced = text.match(CODE_FENCE_PATTERN);
    if (fenced || CODE_REQUEST_PATTERN.test(text)) {
      const code = fenced?.[1] ?? text.match(CODE_AFTER_COLON_PATTERN)?.[1] ?? text;
      return { kind: 'code_analysis', payload: { code: code.trim(), language: detectLanguage(text) } };
    }

    const writing = WRITING_VERB_PATTERN.test(text);
    // "Research the history of email marketing" is research, not an email
    const contentType = writing || !LEADING_RESEARCH_PATTERN.test(text) ? findFirst(text, CONTENT_TYPES) : undefined;
    if (writing || contentType) {
      return {
        kind: 'content_creation',
        payload: {
          request: text,
          contentType: contentType ?? CONTENT_DEFAULTS.contentType,
          audience: text.match(AUDIENCE_PATTERN)?.[1]?.toLowerCase() ?? CONTENT_DEFAULTS.audience,
          tone: findFirst(text, TONES) ?? CONTENT_DEFAULTS.tone,
        },
      };
    }

    const topic = text.match(RESEARCH_TOPIC_PATTERN)?.[1] ?? text;
    return { kind: 'research', payload: { topic: cleanTopic(topic) } };
  }
}

export function detectLanguage(text: string): string {
  return LANGUAGES.find(([, pattern]) => pattern.test(text))?.[0] ?? DEFAULT_LANGUAGE;
}

function findFirst(text: string, candidates: string[]): string | undefined {
  const lower = text.toLowerCase();
  return candidates.find((candidate) => new RegExp(`\\b${candidate}s?\\b`).test(lower));
}

function cleanTopic(topic: string): string {
  return topic.trim().replace(/[?.!]+$/, '').trim();
}

// =============================================================================
// LLM ROUTER
// =============================================================================

const RouteSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('research'), topic: z.string().trim().min(1) }),
  z.object({
    kind: z.literal('code_analysis'),
    code: z.string().trim().min(1),
    language: z.string().trim().min(1).default(DEFAULT_LANGUAGE),
  }),
  z.object({
    kind: z.literal('content_creation'),
    request: z.string().trim().min(1),
    contentType: z.string().trim().min(1).default(CONTENT_DEFAULTS.contentType),
    audience: z.string().trim().min(1).default(CONTENT_DEFAULTS.audience),
    tone: z.string().trim().min(1).default(CONTENT_DEFAULTS.tone),
  }),
  z.object({ kind: z.literal('composite'), topic: z.string().trim().min(1) }),
]);

export const RoutePlanSchema = z.object({
  routes: z.array(RouteSchema).min(1).max(3),
});

export const routePlanDescriptor: SchemaDescriptor = {
  name: 'route_plan',
  description: 'Specialists to run for a request, in order',
  schema: {
    type: 'object',
    properties: {
      routes: {
        type: 'array',
        minItems: 1,
        maxItems: 3,
        items: {
          type: 'object',
          properties: {
            kind: { type: 'string', enum: ['research', 'code_analysis', 'content_creation', 'composite'] },
            topic: { type: 'string', description: 'Topic to research (research, composite)' },
            code: { type: 'string', description: 'Source code to analyze (code_analysis)' },
            language: { type: 'string', description: 'Programming language or "auto-detect" (code_analysis)' },
            request: { type: 'string', description: 'What to write (content_creation)' },
            contentType: { type: 'string', description: 'article, email, blog post, report, ... (content_creation)' },
            audience: { type: 'string', description: 'Target audience (content_creation)' },
            tone: { type: 'string', description: 'Writing tone (content_creation)' },
          },
          required: ['kind'],
        },
      },
    },
    required: ['routes'],
  },
};

/**
 * Convert a validated plan into routes.
 */
export function toRoutes(plan: z.infer<typeof RoutePlanSchema>): Route[] {
  return plan.routes.map((route): Route => {
    switch (route.kind) {
      case 'research':
        return { kind: 'research', payload: { topic: route.topic } };
      case 'code_analysis':
        return { kind: 'code_analysis', payload: { code: route.code, language: route.language } };
      case 'content_creation':
        return {
          kind: 'content_creation',
          payload: {
            request: route.request,
            contentType: route.contentType,
            audience: route.audience,
            tone: route.tone,
          },
        };
      case 'composite':
        return { kind: 'composite', payload: { topic: route.topic } };
    }
  });
}

export interface LLMRouterOptions {
  fallback?: Router;
  logger?: Logger;
}

export class LLMRouter implements Router {
  private llm: LLMClient;
  private fallback: Router;
  private logger: Logger;

  constructor(llm: LLMClient, options: LLMRouterOptions = {}) {
    this.llm = llm;
    this.fallback = options.fallback ?? new KeywordRouter();
    this.logger = options.logger ?? console.log;
  }

  async route(request: string, signal?: AbortSignal): Promise<Route[]> {
    try {
      const raw = await this.llm.complete({
        instructions: ROUTING_INSTRUCTIONS,
        payload: request,
        outputSchema: routePlanDescriptor,
        signal,
      });
      return toRoutes(decodeWith(RoutePlanSchema, routePlanDescriptor.name, raw));
    } catch (error) {
      if (!isDelegationError(error)) throw error;

      this.logger(`[Router] LLM routing failed (${errorMessage(error)}), using keyword routing`);
      return this.fallback.route(request, signal);
    }
  }
}
