import { describe, it, expect, vi } from 'vitest';
import type { CompletionRequest, LLMClient } from '../../core/types.js';
import { BackendUnavailable, SchemaViolation, UserInterrupt } from '../../core/errors.js';
import { ContextStore } from '../state/index.js';
import { SpecialistInvoker } from './invoker.js';

function fakeClient(reply: (request: CompletionRequest) => unknown): LLMClient & { calls: CompletionRequest[] } {
  const calls: CompletionRequest[] = [];
  return {
    calls,
    complete: async (request) => {
      calls.push(request);
      return reply(request);
    },
  };
}

const validResearch = {
  topic: 'tides',
  summary: 'Tides follow the moon.',
  keyPoints: ['gravity', 'rotation', 'coastline shape'],
  confidence: 'High',
  sourcesNeeded: [],
};

describe('SpecialistInvoker', () => {
  it('sends the research instructions, payload and schema', async () => {
    const llm = fakeClient(() => validResearch);
    const invoker = new SpecialistInvoker(llm);

    const result = await invoker.research({ topic: 'tides' }, new ContextStore());

    expect(result).toEqual({ kind: 'research', data: validResearch });
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].payload).toBe('Research this topic: tides');
    expect(llm.calls[0].outputSchema.name).toBe('research_result');
    expect(llm.calls[0].instructions).toContain('RESEARCH SPECIALIST');
  });

  it('phrases code and content payloads', async () => {
    const llm = fakeClient((request) =>
      request.outputSchema.name === 'code_analysis_result'
        ? { language: 'Go', complexityScore: 2, issues: [], suggestions: [], securityConcerns: [] }
        : { contentType: 'email', title: 'Hi', body: 'Hello team', targetAudience: 'team', tone: 'warm', wordCount: 2 }
    );
    const invoker = new SpecialistInvoker(llm);
    const context = new ContextStore();

    await invoker.analyzeCode({ code: 'fmt.Println(1)', language: 'Go' }, context);
    await invoker.createContent({ request: 'the launch', contentType: 'email', audience: 'team', tone: 'warm' }, context);

    expect(llm.calls[0].payload).toBe('Analyze this Go code:\n\n```\nfmt.Println(1)\n```');
    expect(llm.calls[1].payload).toBe('Create email content about: the launch. Target audience: team. Tone: warm');
  });

  it('includes recent conversation as background without writing to the context', async () => {
    const llm = fakeClient(() => validResearch);
    const invoker = new SpecialistInvoker(llm, { contextEntries: 1 });
    const context = new ContextStore();
    context.addConversation('user', 'older', 'user');
    context.addConversation('user', 'Research tides', 'user');

    await invoker.invoke({ kind: 'research', payload: { topic: 'tides' } }, context);

    expect(llm.calls[0].payload).toBe('Research this topic: tides\n\nRecent conversation:\n[user] user: Research tides');
    expect(context.conversation()).toHaveLength(2);
    expect(context.tasks()).toHaveLength(0);
  });

  it('rejects out-of-contract replies with SchemaViolation', async () => {
    const invoker = new SpecialistInvoker(
      fakeClient(() => ({ language: 'Go', complexityScore: 11, issues: [], suggestions: [], securityConcerns: [] }))
    );

    await expect(
      invoker.invoke({ kind: 'code_analysis', payload: { code: 'x', language: 'Go' } }, new ContextStore())
    ).rejects.toBeInstanceOf(SchemaViolation);
  });

  it('wraps unexpected client failures as BackendUnavailable', async () => {
    const invoker = new SpecialistInvoker(
      fakeClient(() => {
        throw new TypeError('fetch failed');
      })
    );

    const error = await invoker.research({ topic: 'tides' }, new ContextStore()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailable);
    expect(error).toMatchObject({ message: 'research_agent call failed: fetch failed' });
  });

  it('passes typed errors and cancellation through unchanged', async () => {
    const outage = new BackendUnavailable('down');
    const invoker = new SpecialistInvoker(
      fakeClient(() => {
        throw outage;
      })
    );
    await expect(invoker.research({ topic: 'x' }, new ContextStore())).rejects.toBe(outage);

    const cancelled = new SpecialistInvoker(
      fakeClient(() => {
        throw new UserInterrupt();
      })
    );
    await expect(cancelled.research({ topic: 'x' }, new ContextStore())).rejects.toBeInstanceOf(UserInterrupt);
  });

  it('forwards the abort signal', async () => {
    const llm = fakeClient(() => validResearch);
    const controller = new AbortController();

    await new SpecialistInvoker(llm).research({ topic: 'tides' }, new ContextStore(), controller.signal);

    expect(llm.calls[0].signal).toBe(controller.signal);
  });

  it('logs timing only when verbose', async () => {
    const logger = vi.fn();
    await new SpecialistInvoker(fakeClient(() => validResearch), { logger }).research(
      { topic: 'tides' },
      new ContextStore()
    );
    expect(logger).not.toHaveBeenCalled();

    await new SpecialistInvoker(fakeClient(() => validResearch), { logger, verbose: true }).research(
      { topic: 'tides' },
      new ContextStore()
    );
    expect(logger).toHaveBeenCalledWith(expect.stringMatching(/^ {2}← research_agent answered in \d+ms$/));
  });
});
