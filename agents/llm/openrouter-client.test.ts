import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { CompletionRequest } from '../../core/types.js';
import { BackendUnavailable, SchemaViolation, UserInterrupt } from '../../core/errors.js';
import { researchResultDescriptor } from '../schemas/index.js';

// -----------------------------------------------------------------------------
// Mock the OpenAI SDK
// -----------------------------------------------------------------------------

const sdk = vi.hoisted(() => {
  class FakeAPIError extends Error {
    status: number | undefined;
    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }
  class FakeAbortError extends FakeAPIError {
    constructor() {
      super(undefined, 'Request was aborted.');
    }
  }
  const constructed: unknown[] = [];
  return {
    create: vi.fn(),
    constructed,
    FakeAPIError,
    FakeAbortError,
  };
});

vi.mock('openai', () => {
  class OpenAI {
    chat = { completions: { create: sdk.create } };
    constructor(options: unknown) {
      sdk.constructed.push(options);
    }
  }
  return { default: OpenAI, APIError: sdk.FakeAPIError, APIUserAbortError: sdk.FakeAbortError };
});

import { LLMRouter } from '../orchestration/router.js';
import { OpenRouterClient, parseJsonContent } from './openrouter-client.js';

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

const request: CompletionRequest = {
  instructions: 'You are a research specialist.',
  payload: 'Research this topic: tides',
  outputSchema: researchResultDescriptor,
};

function reply(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe('OpenRouterClient', () => {
  beforeEach(() => {
    sdk.create.mockReset();
    sdk.constructed.length = 0;
  });

  it('configures the SDK for OpenRouter without retries', () => {
    new OpenRouterClient({ apiKey: 'test-key', timeoutMs: 5000 });

    expect(sdk.constructed[0]).toMatchObject({
      baseURL: 'https://openrouter.ai/api/v1',
      apiKey: 'test-key',
      timeout: 5000,
      maxRetries: 0,
    });
  });

  it('sends instructions, payload and the output schema', async () => {
    sdk.create.mockResolvedValue(reply('{"topic":"tides"}'));
    const client = new OpenRouterClient({ apiKey: 'test-key', model: 'test/model' });

    await expect(client.complete(request)).resolves.toEqual({ topic: 'tides' });

    const [body] = sdk.create.mock.calls[0];
    expect(body).toMatchObject({
      model: 'test/model',
      messages: [
        { role: 'system', content: 'You are a research specialist.' },
        { role: 'user', content: 'Research this topic: tides' },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: { name: 'research_result', schema: researchResultDescriptor.schema },
      },
    });
  });

  it('maps API errors to BackendUnavailable with the status', async () => {
    sdk.create.mockRejectedValue(new sdk.FakeAPIError(503, 'Service Unavailable'));
    const client = new OpenRouterClient({ apiKey: 'test-key' });

    const error = await client.complete(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailable);
    expect(error).toMatchObject({
      status: 503,
      message: 'OpenRouter request failed (HTTP 503): Service Unavailable',
    });
  });

  it('maps aborted requests to UserInterrupt', async () => {
    sdk.create.mockRejectedValue(new sdk.FakeAbortError());
    const client = new OpenRouterClient({ apiKey: 'test-key' });

    await expect(client.complete(request)).rejects.toBeInstanceOf(UserInterrupt);
  });

  it('rejects empty replies as SchemaViolation', async () => {
    sdk.create.mockResolvedValue(reply(null));
    const client = new OpenRouterClient({ apiKey: 'test-key' });

    await expect(client.complete(request)).rejects.toBeInstanceOf(SchemaViolation);
  });

  it('reports an error body without choices as BackendUnavailable', async () => {
    sdk.create.mockResolvedValue({ error: { message: 'Provider returned error', code: 502 } });
    const client = new OpenRouterClient({ apiKey: 'test-key' });

    const error = await client.complete(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailable);
    expect(error).toMatchObject({ message: 'OpenRouter returned no choices: Provider returned error' });
  });

  it('lets the LLM router fall back to keywords on an error body', async () => {
    sdk.create.mockResolvedValue({ error: { message: 'Provider returned error', code: 502 } });
    const logger = vi.fn();
    const router = new LLMRouter(new OpenRouterClient({ apiKey: 'test-key' }), { logger });

    await expect(router.route('Research tides')).resolves.toEqual([{ kind: 'research', payload: { topic: 'tides' } }]);
    expect(logger).toHaveBeenCalledWith(
      '[Router] LLM routing failed (OpenRouter returned no choices: Provider returned error), using keyword routing'
    );
  });

  it('wraps unexpected SDK failures as BackendUnavailable', async () => {
    sdk.create.mockRejectedValue(new TypeError('fetch failed'));
    const client = new OpenRouterClient({ apiKey: 'test-key' });

    const error = await client.complete(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailable);
    expect(error).toMatchObject({ message: 'OpenRouter request failed: fetch failed' });
  });
});

describe('parseJsonContent', () => {
  it('strips a json code fence', () => {
    expect(parseJsonContent('```json\n{"a":1}\n```', 'x')).toEqual({ a: 1 });
  });

  it('strips a bare fence around the whole reply', () => {
    expect(parseJsonContent('  ```\n{"a":1}\n```  ', 'x')).toEqual({ a: 1 });
  });

  it('keeps fences inside string values', () => {
    const body = 'Install it:\n```bash\nnpm i\n```\nDone.';

    expect(parseJsonContent(JSON.stringify({ body }), 'x')).toEqual({ body });
    expect(parseJsonContent('```json\n' + JSON.stringify({ body }) + '\n```', 'x')).toEqual({ body });
  });

  it('reports invalid JSON as SchemaViolation', () => {
    expect(() => parseJsonContent('not json', 'research_result')).toThrow(SchemaViolation);
  });
});
