/**
 * Mock LLM Client for Deterministic Testing
 *
 * Returns scripted responses first, then synthesizes schema-conformant data
 * from the request payload. Useful for:
 * - Unit testing without API calls
 * - Demonstrating the coordination flow offline
 * - Reproducing backend failures and contract violations
 */

import type { CompletionRequest, LLMClient } from '../../core/types.js';
import { BackendUnavailable, UserInterrupt } from '../../core/errors.js';

export type MockResponse =
  | { data: unknown }
  | { error: 'unavailable'; message?: string };

export type MockScenario = MockResponse[];

/**
 * Pre-defined scenarios. Once a script runs out, replies are synthesized.
 */
export const SCENARIOS: Record<'happyPath' | 'invalidResearch' | 'unavailable', MockScenario> = {
  /** Every call answered with well-formed synthesized data */
  happyPath: [],

  /** First call returns research with only two key points */
  invalidResearch: [
    {
      data: {
        topic: 'invalid research',
        summary: 'Too few findings to be useful.',
        keyPoints: ['only one', 'only two'],
        confidence: 'Low',
        sourcesNeeded: [],
      },
    },
  ],

  /** First call fails as if the backend were unreachable */
  unavailable: [{ error: 'unavailable', message: 'connect ECONNREFUSED' }],
};

export type MockScenarioName = keyof typeof SCENARIOS;

export function isMockScenarioName(name: string): name is MockScenarioName {
  return Object.prototype.hasOwnProperty.call(SCENARIOS, name);
}

export class MockLLMClient implements LLMClient {
  private scenario: MockScenario;
  private step: number = 0;
  private callLog: CompletionRequest[] = [];

  constructor(scenario: MockScenario = SCENARIOS.happyPath) {
    this.scenario = scenario;
  }

  async complete(request: CompletionRequest): Promise<unknown> {
    if (request.signal?.aborted) {
      throw new UserInterrupt('Backend call cancelled');
    }

    this.callLog.push(request);
    const scripted = this.scenario[this.step];
    this.step++;

    if (!scripted) {
      return synthesizeResponse(request);
    }
    if ('error' in scripted) {
      throw new BackendUnavailable(scripted.message ?? 'Mock backend unavailable');
    }
    return scripted.data;
  }

  /**
   * Get the log of all calls for debugging
   */
  getCallLog(): readonly CompletionRequest[] {
    return this.callLog;
  }

  /**
   * Reset the mock to start over
   */
  reset(): void {
    this.step = 0;
    this.callLog = [];
  }

  /**
   * Set a new scenario
   */
  setScenario(scenario: MockScenario): void {
    this.scenario = scenario;
    this.reset();
  }
}

// =============================================================================
// SYNTHESIZED RESPONSES
// =============================================================================

/**
 * Build a plausible reply for the requested schema from the payload text.
 * Routing plans are not synthesized; callers fall back to keyword routing.
 */
export function synthesizeResponse(request: CompletionRequest): unknown {
  const firstLine = request.payload.split('\n')[0] ?? '';

  switch (request.outputSchema.name) {
    case 'research_result': {
      const topic = firstLine.replace(/^Research this topic:\s*/, '').trim() || 'general topic';
      return {
        topic,
        summary: `An overview of the current state of ${topic}.`,
        keyPoints: [
          `${topic} is an active area of work`,
          `Adoption of ${topic} is growing`,
          `Open challenges remain for ${topic}`,
        ],
        confidence: 'Medium',
        sourcesNeeded: ['Peer-reviewed surveys', 'Industry reports'],
      };
    }

    case 'code_analysis_result': {
      const language = firstLine.match(/^Analyze this (.+?) code:/)?.[1] ?? 'auto-detect';
      const code = request.payload.match(/```\n([\s\S]*?)\n```/)?.[1] ?? '';
      const lines = code.split('\n').filter((line) => line.trim()).length;
      return {
        language: language === 'auto-detect' ? 'Unknown' : language,
        complexityScore: Math.min(10, Math.max(1, Math.ceil(lines / 5))),
        issues: [],
        suggestions: ['Add tests covering edge cases'],
        securityConcerns: [],
      };
    }

    case 'creative_content_result': {
      const match = request.payload.match(
        /^Create (.+?) content about: ([\s\S]+?)\. Target audience: (.+?)\. Tone: (.+)$/m
      );
      const contentType = match?.[1] ?? 'article';
      const subject = match?.[2] ?? firstLine;
      const body = `This ${contentType} covers ${subject}.`;
      return {
        contentType,
        title: `About ${subject.slice(0, 60)}`,
        body,
        targetAudience: match?.[3] ?? 'general',
        tone: match?.[4]?.trim() ?? 'professional',
        wordCount: body.split(/\s+/).length,
      };
    }

    default:
      throw new BackendUnavailable(`Mock client has no reply for schema "${request.outputSchema.name}"`);
  }
}

/**
 * Create a mock client for a named scenario
 */
export function createMockClient(scenarioName: MockScenarioName = 'happyPath'): MockLLMClient {
  return new MockLLMClient(SCENARIOS[scenarioName]);
}
