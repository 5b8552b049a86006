/**
 * Example Scenarios
 *
 * The four demo requests, each with the task kinds a correct run records.
 * LLM routing is stochastic, so a scenario is run several times and judged
 * on its success rate rather than a single run.
 */

import { ERROR_PREFIX } from '../orchestration/index.js';
import type { TaskKind } from '../state/index.js';
import type { System } from '../system.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ExampleScenario {
  id: string;
  name: string;
  request: string;
  /** Task kinds recorded by a correct run, in order */
  expectedTasks: TaskKind[];
  runs: number;
}

export interface RunResult {
  id: string;
  success: boolean;
  error?: string;
  durationMs: number;
  taskKinds: TaskKind[];
  response: string;
}

export interface EvalMetrics {
  successRate: number;
  confidenceInterval: [number, number];
  avgDurationMs: number;
  p95DurationMs: number;
}

export interface ScenarioResult {
  scenario: ExampleScenario;
  runs: RunResult[];
  metrics: EvalMetrics;
}

// =============================================================================
// SCENARIOS
// =============================================================================

export const EXAMPLE_SCENARIOS: ExampleScenario[] = [
  {
    id: 'research',
    name: 'Research request',
    request: 'Research quantum computing trends',
    expectedTasks: ['research'],
    runs: 3,
  },
  {
    id: 'code-analysis',
    name: 'Inline code review',
    request: 'Analyze this Python code: def factorial(n): return 1 if n <= 1 else n * factorial(n-1)',
    expectedTasks: ['code_analysis'],
    runs: 3,
  },
  {
    id: 'email',
    name: 'Professional email',
    request: 'Write a professional email about project updates',
    expectedTasks: ['content_creation'],
    runs: 3,
  },
  {
    id: 'complex-analysis',
    name: 'Complex analysis',
    request: 'Do a complex analysis on artificial intelligence impact on healthcare',
    expectedTasks: ['research', 'content_creation', 'composite'],
    runs: 3,
  },
];

// =============================================================================
// RUNNING
// =============================================================================

/**
 * One run on a fresh system. Succeeds when the response is not an error
 * and the recorded task kinds match the expectation exactly.
 */
export async function runScenario(scenario: ExampleScenario, system: System, runId: string): Promise<RunResult> {
  const startTime = Date.now();
  const response = await system.coordinator.handle(scenario.request, system.context);
  const tasks = system.context.tasks();
  const taskKinds = tasks.map((t) => t.taskKind);
  const failed = response.startsWith(ERROR_PREFIX);

  return {
    id: runId,
    success: !failed && sameKinds(taskKinds, scenario.expectedTasks),
    error: failed ? response.slice(ERROR_PREFIX.length) : undefined,
    durationMs: Date.now() - startTime,
    taskKinds,
    response,
  };
}

export async function evaluateScenario(
  scenario: ExampleScenario,
  build: () => System,
  runs: number = scenario.runs
): Promise<ScenarioResult> {
  const results: RunResult[] = [];
  for (let i = 0; i < runs; i++) {
    results.push(await runScenario(scenario, build(), `${scenario.id}-run-${i + 1}`));
  }
  return { scenario, runs: results, metrics: calculateMetrics(results) };
}

function sameKinds(actual: TaskKind[], expected: TaskKind[]): boolean {
  return actual.length === expected.length && actual.every((kind, i) => kind === expected[i]);
}

// =============================================================================
// STATISTICAL HELPERS
// =============================================================================

export function calculateMetrics(runs: RunResult[]): EvalMetrics {
  const total = runs.length;
  const successRate = total > 0 ? runs.filter((r) => r.success).length / total : 0;
  const durations = runs.map((r) => r.durationMs);

  return {
    successRate,
    confidenceInterval: confidenceInterval95(successRate, total),
    avgDurationMs: total > 0 ? durations.reduce((a, b) => a + b, 0) / total : 0,
    p95DurationMs: percentile(durations, 95),
  };
}

/**
 * Nearest-rank percentile: the smallest value with at least p% of the
 * values at or below it. 0 for no values.
 */
export function percentile(values: number[], p: number): number {
  const sorted = values.slice().sort((a, b) => a - b);
  const rank = Math.max(1, Math.ceil((sorted.length * p) / 100));
  return sorted[rank - 1] ?? 0;
}

const Z_95 = 1.96;

/**
 * Wilson score interval for a success rate observed over `trials` runs.
 */
export function confidenceInterval95(rate: number, trials: number): [number, number] {
  if (trials === 0) return [0, 0];

  const zSquaredOverN = (Z_95 * Z_95) / trials;
  const midpoint = (rate + zSquaredOverN / 2) / (1 + zSquaredOverN);
  const halfWidth =
    (Z_95 * Math.sqrt(rate * (1 - rate) / trials + zSquaredOverN / (4 * trials))) / (1 + zSquaredOverN);

  return [Math.max(0, midpoint - halfWidth), Math.min(1, midpoint + halfWidth)];
}
