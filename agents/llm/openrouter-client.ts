/**
 * OpenRouter LLM Client
 *
 * Uses the OpenAI SDK with OpenRouter's API endpoint.
 * Structured output is requested through `response_format: json_schema`;
 * the reply is parsed as JSON and handed back unvalidated.
 */

import OpenAI, { APIError, APIUserAbortError } from 'openai';
import type { CompletionRequest, LLMClient } from '../../core/types.js';
import { BackendUnavailable, SchemaViolation, UserInterrupt, errorMessage } from '../../core/errors.js';

export const DEFAULT_MODEL = 'google/gemini-2.0-flash-001';
export const DEFAULT_TIMEOUT_MS = 60_000;

export interface OpenRouterConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  siteName?: string;
}

export class OpenRouterClient implements LLMClient {
  private client: OpenAI;
  private model: string;

  constructor(config: OpenRouterConfig) {
    this.client = new OpenAI({
      baseURL: 'https://openrouter.ai/api/v1',
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // Failures surface to the caller as-is; nothing is retried.
      maxRetries: 0,
      defaultHeaders: {
        'X-Title': config.siteName ?? 'Multi-Agent Coordinator',
      },
    });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async complete(request: CompletionRequest): Promise<unknown> {
    const { outputSchema } = request;

    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.instructions },
            { role: 'user', content: request.payload },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: {
              name: outputSchema.name,
              description: outputSchema.description,
              schema: outputSchema.schema,
              strict: false,
            },
          },
        },
        { signal: request.signal }
      );
    } catch (error) {
      throw this.convertError(error);
    }

    // OpenRouter can answer 200 with an error body and no choices
    const choice = response.choices?.[0];
    if (!choice) {
      throw new BackendUnavailable(`OpenRouter returned no choices: ${describeErrorBody(response)}`);
    }

    const content = choice.message?.content;
    if (!content) {
      throw new SchemaViolation(outputSchema.name, ['(root): backend returned an empty message']);
    }

    return parseJsonContent(content, outputSchema.name);
  }

  private convertError(error: unknown): Error {
    // APIUserAbortError extends APIError, so it must be checked first
    if (error instanceof APIUserAbortError) {
      return new UserInterrupt('Backend call cancelled');
    }
    if (error instanceof APIError) {
      const status = typeof error.status === 'number' ? error.status : undefined;
      const detail = status !== undefined ? ` (HTTP ${status})` : '';
      return new BackendUnavailable(`OpenRouter request failed${detail}: ${error.message}`, {
        status,
        cause: error,
      });
    }
    if (error instanceof UserInterrupt || error instanceof BackendUnavailable) {
      return error;
    }
    return new BackendUnavailable(`OpenRouter request failed: ${errorMessage(error)}`, { cause: error });
  }
}

function describeErrorBody(response: unknown): string {
  if (typeof response === 'object' && response !== null && 'error' in response) {
    const { error } = response;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    return JSON.stringify(error);
  }
  return 'empty response';
}

const WRAPPING_FENCE = /^```(?:json)?[ \t]*\n?([\s\S]*?)\n?```$/;

/**
 * Parse a JSON reply, tolerating a fence around the whole reply.
 * Fences inside string values are left alone.
 */
export function parseJsonContent(content: string, schemaName: string): unknown {
  const trimmed = content.trim();
  const cleaned = trimmed.match(WRAPPING_FENCE)?.[1] ?? trimmed;
  try {
    return JSON.parse(cleaned);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaViolation(schemaName, [`(root): reply is not valid JSON (${reason})`]);
  }
}

/**
 * Create an OpenRouter client from loaded settings
 */
export function createOpenRouterClient(settings: {
  apiKey: string;
  model: string;
  timeoutMs: number;
}): OpenRouterClient {
  return new OpenRouterClient({
    apiKey: settings.apiKey,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
  });
}
