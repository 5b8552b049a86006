/**
 * Configuration
 *
 * Settings come from the environment. The entry point loads `.env` and
 * `.env.local` with dotenv before calling loadConfig, so tests can pass a
 * plain object instead of touching process.env.
 *
 * Environment variables:
 *   OPENROUTER_API_KEY     - required unless USE_MOCK=true
 *   OPENROUTER_MODEL       - model id (default google/gemini-2.0-flash-001)
 *   OPENROUTER_TIMEOUT_MS  - per-call deadline in ms (default 60000)
 *   USE_MOCK               - "true" to use the deterministic mock client
 *   MOCK_SCENARIO          - happyPath | invalidResearch | unavailable
 *   ROUTER                 - llm | keyword (default: keyword with the mock, llm otherwise)
 *   VERBOSE                - "false" silences coordinator progress logs
 */

import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from './llm/openrouter-client.js';
import { isMockScenarioName, type MockScenarioName } from './llm/mock-client.js';

export type RouterMode = 'llm' | 'keyword';

export interface Settings {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  useMock: boolean;
  mockScenario: MockScenarioName;
  router: RouterMode;
  verbose: boolean;
}

export type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env): Settings {
  const useMock = env.USE_MOCK === 'true';
  const apiKey = env.OPENROUTER_API_KEY?.trim() || undefined;

  if (!useMock && !apiKey) {
    throw new ConfigurationError(
      'OPENROUTER_API_KEY not set. Copy .env.local.example to .env.local and add your key, ' +
        'or set USE_MOCK=true to run offline.'
    );
  }

  const mockScenario = env.MOCK_SCENARIO || 'happyPath';
  if (!isMockScenarioName(mockScenario)) {
    throw new ConfigurationError(`Unknown MOCK_SCENARIO "${mockScenario}"`);
  }

  const router = env.ROUTER || (useMock ? 'keyword' : 'llm');
  if (router !== 'llm' && router !== 'keyword') {
    throw new ConfigurationError(`ROUTER must be "llm" or "keyword", got "${router}"`);
  }

  return {
    apiKey,
    model: env.OPENROUTER_MODEL || DEFAULT_MODEL,
    timeoutMs: parseTimeout(env.OPENROUTER_TIMEOUT_MS),
    useMock,
    mockScenario,
    router,
    verbose: env.VERBOSE !== 'false',
  };
}

function parseTimeout(value: string | undefined): number {
  if (!value) return DEFAULT_TIMEOUT_MS;

  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`OPENROUTER_TIMEOUT_MS must be a positive integer, got "${value}"`);
  }
  return timeoutMs;
}
