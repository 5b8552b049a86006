/**
 * Specialist Agent Invoker
 *
 * Wraps a single backend call for one specialization:
 * instructions + payload → LLMClient.complete → decode and validate.
 *
 * The invoker reads the context (recent conversation is passed along as
 * background) but never writes to it. Recording results is the
 * coordinator's job.
 */

import type { LLMClient, Logger } from '../../core/types.js';
import { BackendUnavailable, SchemaViolation, UserInterrupt, errorMessage } from '../../core/errors.js';
import type { CodeAnalysisOutcome, CreativeContentOutcome, ResearchOutcome, SpecialistResult } from '../schemas/index.js';
import type { ContextStore } from '../state/index.js';
import {
  codeAnalysisSpecialist,
  contentCreationSpecialist,
  researchSpecialist,
  type CodeAnalysisPayload,
  type ContentCreationPayload,
  type ResearchPayload,
  type SpecialistDefinition,
} from './definitions.js';

export type SpecialistRequest =
  | { kind: 'research'; payload: ResearchPayload }
  | { kind: 'code_analysis'; payload: CodeAnalysisPayload }
  | { kind: 'content_creation'; payload: ContentCreationPayload };

export interface InvokerOptions {
  /** Conversation entries passed along as background. Default: 5 */
  contextEntries?: number;
  verbose?: boolean;
  logger?: Logger;
}

export class SpecialistInvoker {
  private llm: LLMClient;
  private contextEntries: number;
  private log: Logger;

  constructor(llm: LLMClient, options: InvokerOptions = {}) {
    const { contextEntries = 5, verbose = false, logger = console.log } = options;
    this.llm = llm;
    this.contextEntries = contextEntries;
    this.log = (msg) => verbose && logger(msg);
  }

  /**
   * Run one specialization and return its tagged result.
   */
  async invoke(request: SpecialistRequest, context: ContextStore, signal?: AbortSignal): Promise<SpecialistResult> {
    switch (request.kind) {
      case 'research':
        return this.research(request.payload, context, signal);
      case 'code_analysis':
        return this.analyzeCode(request.payload, context, signal);
      case 'content_creation':
        return this.createContent(request.payload, context, signal);
    }
  }

  async research(payload: ResearchPayload, context: ContextStore, signal?: AbortSignal): Promise<ResearchOutcome> {
    return { kind: 'research', data: await this.run(researchSpecialist, payload, context, signal) };
  }

  async analyzeCode(
    payload: CodeAnalysisPayload,
    context: ContextStore,
    signal?: AbortSignal
  ): Promise<CodeAnalysisOutcome> {
    return { kind: 'code_analysis', data: await this.run(codeAnalysisSpecialist, payload, context, signal) };
  }

  async createContent(
    payload: ContentCreationPayload,
    context: ContextStore,
    signal?: AbortSignal
  ): Promise<CreativeContentOutcome> {
    return { kind: 'content_creation', data: await this.run(contentCreationSpecialist, payload, context, signal) };
  }

  private async run<TPayload, TResult>(
    specialist: SpecialistDefinition<TPayload, TResult>,
    payload: TPayload,
    context: ContextStore,
    signal?: AbortSignal
  ): Promise<TResult> {
    const startTime = Date.now();
    let raw: unknown;

    try {
      raw = await this.llm.complete({
        instructions: specialist.instructions,
        payload: this.buildPayload(specialist.formatPayload(payload), context),
        outputSchema: specialist.outputSchema,
        signal,
      });
    } catch (error) {
      if (error instanceof UserInterrupt || error instanceof BackendUnavailable || error instanceof SchemaViolation) {
        throw error;
      }
      throw new BackendUnavailable(`${specialist.agentId} call failed: ${errorMessage(error)}`, { cause: error });
    }

    const result = specialist.decode(raw);
    this.log(`  ← ${specialist.agentId} answered in ${Date.now() - startTime}ms`);
    return result;
  }

  private buildPayload(request: string, context: ContextStore): string {
    const recent = context.getRecentContext(this.contextEntries);
    return recent ? `${request}\n\nRecent conversation:\n${recent}` : request;
  }
}
