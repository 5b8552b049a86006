/**
 * Delegation Orchestrator
 *
 * One coordinator routes a request → delegates to specialists → synthesizes
 * a response. Every request leaves the same footprint in the context:
 *
 *   1 user entry → 1 task record per specialist call (+1 for composites) → 1 assistant entry
 *
 * Delegated calls run strictly one after another. Failures become the
 * response text (with a system entry) instead of escaping; records written
 * before the failure stay. Only cancellation propagates.
 */

import type { Logger } from '../../core/types.js';
import { UserInterrupt, errorMessage } from '../../core/errors.js';
import { SPECIALIST_IDS, type SpecialistId, type SpecialistResult } from '../schemas/index.js';
import type { SpecialistInvoker } from '../specialists/index.js';
import type { ContextStore } from '../state/index.js';
import { formatComposite, formatSection, summarizeResult } from './format.js';
import { KeywordRouter, type Route, type Router } from './router.js';

export const ERROR_PREFIX = '❌ Error processing request: ';

export interface CoordinatorOptions {
  /** Routing policy. Default: KeywordRouter */
  router?: Router;
  /** Log delegation progress. Default: false */
  verbose?: boolean;
  logger?: Logger;
}

export class Coordinator {
  private invoker: SpecialistInvoker;
  private router: Router;
  private log: Logger;

  constructor(invoker: SpecialistInvoker, options: CoordinatorOptions = {}) {
    const { router = new KeywordRouter(), verbose = false, logger = console.log } = options;
    this.invoker = invoker;
    this.router = router;
    this.log = (msg) => verbose && logger(msg);
  }

  /**
   * Full flow for one request: Route → Delegate → Synthesize
   */
  async handle(request: string, context: ContextStore, signal?: AbortSignal): Promise<string> {
    context.addConversation('user', request, 'user');

    try {
      // Phase 1: Route
      const routes = await this.router.route(request, signal);
      this.log(`Routing: ${routes.map((r) => r.kind).join(' → ')}`);

      // Phase 2: Delegate (sequentially, in routing order)
      const sections: string[] = [];
      for (const route of routes) {
        sections.push(await this.delegate(route, context, signal));
      }

      // Phase 3: Synthesize
      const response = sections.join('\n\n');
      context.addConversation('assistant', response, 'coordinator');
      return response;
    } catch (error) {
      if (error instanceof UserInterrupt) throw error;

      const message = `${ERROR_PREFIX}${errorMessage(error)}`;
      this.log(`  ✗ ${message}`);
      context.addConversation('system', message, 'error');
      return message;
    }
  }

  private async delegate(route: Route, context: ContextStore, signal?: AbortSignal): Promise<string> {
    switch (route.kind) {
      case 'research': {
        const result = await this.record(context, 'research', () =>
          this.invoker.research(route.payload, context, signal)
        );
        return formatSection(result);
      }
      case 'code_analysis': {
        const result = await this.record(context, 'code_analysis', () =>
          this.invoker.analyzeCode(route.payload, context, signal)
        );
        return formatSection(result);
      }
      case 'content_creation': {
        const result = await this.record(context, 'content_creation', () =>
          this.invoker.createContent(route.payload, context, signal)
        );
        return formatSection(result);
      }
      case 'composite':
        return this.runComposite(route.payload.topic, context, signal);
    }
  }

  /**
   * Fixed two-step pipeline: research the topic, then write a report from
   * the full research result. Records a composite task on top of the two
   * per-specialist ones.
   */
  private async runComposite(topic: string, context: ContextStore, signal?: AbortSignal): Promise<string> {
    const attempted: SpecialistId[] = [];

    try {
      attempted.push(SPECIALIST_IDS.research);
      const research = await this.record(context, 'research', () =>
        this.invoker.research({ topic }, context, signal)
      );

      const summary = research.data.summary.replace(/[.\s]+$/, '');
      attempted.push(SPECIALIST_IDS.content_creation);
      const report = await this.record(context, 'content_creation', () =>
        this.invoker.createContent(
          {
            request:
              `Create a comprehensive report based on this research: ${summary}. ` +
              `Include the key points: ${research.data.keyPoints.join(', ')}`,
            contentType: 'report',
            audience: 'professional',
            tone: 'analytical',
          },
          context,
          signal
        )
      );

      context.addTask({
        taskKind: 'composite',
        agentsInvoked: attempted,
        status: 'completed',
        summary: `Complex analysis of '${topic}' with research and report generation`,
      });
      return formatComposite(research.data, report.data);
    } catch (error) {
      if (!(error instanceof UserInterrupt)) {
        context.addTask({
          taskKind: 'composite',
          agentsInvoked: attempted,
          status: 'failed',
          summary: `Complex analysis of '${topic}' failed: ${errorMessage(error)}`,
        });
      }
      throw error;
    }
  }

  /**
   * Run one specialist call and log its outcome to the context:
   * success stores the result and a completed record, failure a failed one.
   */
  private async record<T extends SpecialistResult>(
    context: ContextStore,
    specialization: T['kind'],
    call: () => Promise<T>
  ): Promise<T> {
    let result: T;
    try {
      result = await call();
    } catch (error) {
      if (!(error instanceof UserInterrupt)) {
        const agentId = SPECIALIST_IDS[specialization];
        context.addTask({
          taskKind: specialization,
          agentsInvoked: [agentId],
          status: 'failed',
          summary: `${agentId} failed: ${errorMessage(error)}`,
        });
      }
      throw error;
    }

    context.storeResult(result);
    context.addTask({
      taskKind: result.kind,
      agentsInvoked: [SPECIALIST_IDS[result.kind]],
      status: 'completed',
      summary: summarizeResult(result),
    });
    this.log(`  → ${SPECIALIST_IDS[result.kind]}: ${summarizeResult(result)}`);
    return result;
  }
}
