/**
 * LLM Client Module
 *
 * Exports both real (OpenRouter) and mock clients.
 * Use mock for testing, OpenRouter for production.
 */

export {
  OpenRouterClient,
  createOpenRouterClient,
  parseJsonContent,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
} from './openrouter-client.js';
export type { OpenRouterConfig } from './openrouter-client.js';
export {
  MockLLMClient,
  createMockClient,
  synthesizeResponse,
  isMockScenarioName,
  SCENARIOS,
} from './mock-client.js';
export type { MockResponse, MockScenario, MockScenarioName } from './mock-client.js';

import type { LLMClient, Logger } from '../../core/types.js';
import { ConfigurationError } from '../../core/errors.js';
import type { Settings } from '../config.js';
import { createOpenRouterClient } from './openrouter-client.js';
import { createMockClient } from './mock-client.js';

/**
 * Create an LLM client based on settings
 *
 * - useMock: Returns mock client for the configured scenario
 * - Otherwise: Returns OpenRouter client (requires an API key)
 */
export function createClient(settings: Settings, logger: Logger = console.log): LLMClient {
  if (settings.useMock) {
    logger(`[LLM] Using mock client with scenario: ${settings.mockScenario}`);
    return createMockClient(settings.mockScenario);
  }

  if (!settings.apiKey) {
    throw new ConfigurationError('OPENROUTER_API_KEY is required unless USE_MOCK=true');
  }

  logger(`[LLM] Using OpenRouter client (${settings.model})`);
  return createOpenRouterClient({
    apiKey: settings.apiKey,
    model: settings.model,
    timeoutMs: settings.timeoutMs,
  });
}
