/**
 * System Assembly
 *
 * Wires settings → LLM client → invoker → router → coordinator, plus the
 * session context they share. Entry points and tests build the whole
 * system through createSystem so the wiring lives in one place.
 */

import type { LLMClient, Logger } from '../core/types.js';
import { loadConfig, type Environment, type Settings } from './config.js';
import { createClient } from './llm/index.js';
import { Coordinator, ERROR_PREFIX, KeywordRouter, LLMRouter, type Router } from './orchestration/index.js';
import { SpecialistInvoker } from './specialists/index.js';
import { ContextStore } from './state/index.js';

export interface System {
  settings: Settings;
  llm: LLMClient;
  context: ContextStore;
  coordinator: Coordinator;
}

export interface SystemOptions {
  /** Client factory. Default: createClient (mock or OpenRouter per settings) */
  createClient?: (settings: Settings, logger: Logger) => LLMClient;
  logger?: Logger;
}

/**
 * Build a ready-to-use system. Throws ConfigurationError before any client
 * is created when the environment is incomplete.
 */
export function createSystem(env: Environment = process.env, options: SystemOptions = {}): System {
  const { createClient: makeClient = createClient, logger = console.log } = options;

  const settings = loadConfig(env);
  const llm = makeClient(settings, logger);

  const router: Router =
    settings.router === 'llm' ? new LLMRouter(llm, { logger }) : new KeywordRouter();
  const invoker = new SpecialistInvoker(llm, { verbose: settings.verbose, logger });
  const coordinator = new Coordinator(invoker, { router, verbose: settings.verbose, logger });

  return { settings, llm, context: new ContextStore(), coordinator };
}

export const SELF_TEST_REQUEST = 'Hello, can you help me research Python programming?';

/**
 * Send one request through the whole system on a throwaway context, so the
 * session history stays empty. Resolves to the error text on failure.
 */
export async function runSelfTest(
  system: System,
  signal?: AbortSignal
): Promise<{ ok: true } | { ok: false; error: string }> {
  const response = await system.coordinator.handle(SELF_TEST_REQUEST, new ContextStore(), signal);
  return response.startsWith(ERROR_PREFIX)
    ? { ok: false, error: response.slice(ERROR_PREFIX.length) }
    : { ok: true };
}
