/**
 * Example Scenario Runner
 *
 * Runs each example request several times on a fresh system and prints
 * per-scenario success rates with a 95% confidence interval.
 *
 * Usage:
 *   npm run evaluate                       # Run with OpenRouter (requires API key)
 *   npm run evaluate -- --mock             # Run with the mock client
 *   npm run evaluate -- --runs=5           # Override runs per scenario
 *   npm run evaluate -- --scenario=email   # Run one scenario by id
 */

import 'dotenv/config';
import { config } from 'dotenv';

config({ path: '.env.local' });

import { ConfigurationError } from '../../core/errors.js';
import { createSystem } from '../system.js';
import { EXAMPLE_SCENARIOS, evaluateScenario, type ScenarioResult } from './scenarios.js';

// =============================================================================
// REPORT GENERATION
// =============================================================================

function printScenarioResult(result: ScenarioResult): void {
  const { metrics } = result;
  const [ciLow, ciHigh] = metrics.confidenceInterval;
  const successes = result.runs.filter((r) => r.success).length;

  for (const run of result.runs) {
    const status = run.success ? '✓' : '✗';
    const detail = run.error ?? run.taskKinds.join(' → ');
    console.log(`    ${status} ${run.id}: ${detail} (${run.durationMs}ms)`);
  }

  console.log(`\n  ┌─ Results ─────────────────────────────────────────`);
  console.log(`  │ Success Rate: ${(metrics.successRate * 100).toFixed(0)}% (${successes}/${result.runs.length})`);
  console.log(`  │ 95% CI: [${(ciLow * 100).toFixed(0)}%, ${(ciHigh * 100).toFixed(0)}%]`);
  console.log(`  │ Avg Duration: ${(metrics.avgDurationMs / 1000).toFixed(1)}s`);
  console.log(`  │ P95 Duration: ${(metrics.p95DurationMs / 1000).toFixed(1)}s`);
  console.log(`  └───────────────────────────────────────────────────`);
}

function printSummary(results: ScenarioResult[]): void {
  console.log('\n' + '═'.repeat(60));
  console.log('EVALUATION SUMMARY');
  console.log('═'.repeat(60));

  console.log('\n┌────────────────────────────────────┬──────────┬─────────┐');
  console.log('│ Scenario                           │ Success  │ Avg Dur │');
  console.log('├────────────────────────────────────┼──────────┼─────────┤');
  for (const result of results) {
    const name = result.scenario.name.substring(0, 32).padEnd(34);
    const rate = `${(result.metrics.successRate * 100).toFixed(0)}%`.padStart(6);
    const dur = `${(result.metrics.avgDurationMs / 1000).toFixed(1)}s`.padStart(6);
    console.log(`│ ${name} │ ${rate}   │ ${dur}  │`);
  }
  console.log('└────────────────────────────────────┴──────────┴─────────┘');

  const totalRuns = results.reduce((sum, r) => sum + r.runs.length, 0);
  const totalSuccesses = results.reduce((sum, r) => sum + r.runs.filter((run) => run.success).length, 0);
  const overallRate = totalRuns > 0 ? totalSuccesses / totalRuns : 0;

  console.log(`\nOverall: ${totalSuccesses}/${totalRuns} runs successful (${(overallRate * 100).toFixed(0)}%)`);
}

// =============================================================================
// MAIN
// =============================================================================

function parseRuns(args: string[]): number | undefined {
  const value = args.find((a) => a.startsWith('--runs='))?.split('=')[1];
  if (value === undefined) return undefined;

  const runs = Number(value);
  if (!Number.isInteger(runs) || runs <= 0) {
    throw new ConfigurationError(`--runs must be a positive integer, got "${value}"`);
  }
  return runs;
}

async function main() {
  const args = process.argv.slice(2);
  const useMock = args.includes('--mock');
  const runs = parseRuns(args);
  const scenarioId = args.find((a) => a.startsWith('--scenario='))?.split('=')[1];

  console.log('═'.repeat(60));
  console.log('MULTI-AGENT COORDINATOR EVALUATION');
  console.log('═'.repeat(60));

  const env = { ...process.env, VERBOSE: 'false', ...(useMock ? { USE_MOCK: 'true' } : {}) };
  const quiet = () => undefined;

  // Fail fast on configuration before running anything
  const { settings } = createSystem(env, { logger: quiet });
  console.log(
    settings.useMock
      ? '\n⚠️  Running with MOCK LLM (deterministic, no variability)'
      : `\n🔄 Using real LLM (OpenRouter, ${settings.model})`
  );

  const scenarios = scenarioId ? EXAMPLE_SCENARIOS.filter((s) => s.id === scenarioId) : EXAMPLE_SCENARIOS;
  if (scenarios.length === 0) {
    throw new ConfigurationError(
      `Unknown scenario "${scenarioId}". Known: ${EXAMPLE_SCENARIOS.map((s) => s.id).join(', ')}`
    );
  }

  const results: ScenarioResult[] = [];
  for (const scenario of scenarios) {
    console.log('\n' + '─'.repeat(60));
    console.log(scenario.name);
    console.log('─'.repeat(60));
    console.log(`Request: "${scenario.request}"`);
    console.log(`Expected: ${scenario.expectedTasks.join(' → ')}\n`);

    const result = await evaluateScenario(scenario, () => createSystem(env, { logger: quiet }), runs);
    results.push(result);
    printScenarioResult(result);
  }

  printSummary(results);
  console.log('\n' + '═'.repeat(60));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error('Error:', error);
  }
  process.exitCode = 1;
});
