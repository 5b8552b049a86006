/**
 * Multi-Agent Coordinator - Entry Point
 *
 * Starts an interactive session where one coordinator routes each request
 * to research, code analysis or content creation specialists.
 *
 * Usage:
 *   npm start                    # Run with OpenRouter (requires API key)
 *   npm run start:mock           # Run with mock LLM (deterministic)
 *   npm start -- --examples      # Run the example requests first
 *   npm start -- --self-test     # Check coordination before the session
 */

import 'dotenv/config';
import { config } from 'dotenv';

// Load .env.local if it exists
config({ path: '.env.local' });

import { ConfigurationError, UserInterrupt } from '../core/errors.js';
import { EXAMPLE_SCENARIOS } from './evaluation/scenarios.js';
import { SessionDriver } from './session/driver.js';
import { createSystem, runSelfTest, type System } from './system.js';

const BANNER = [
  '='.repeat(60),
  '🤖 MULTI-AGENT SYSTEM',
  '='.repeat(60),
  'Available agents:',
  '  🔍 Research Agent - Topic research and analysis',
  '  💻 Code Agent - Code analysis and review',
  '  ✍️  Creative Agent - Content creation and writing',
  '  🎭 Coordinator - Orchestrates all agents',
  '',
  'Commands:',
  '  • Type any request and agents will coordinate automatically',
  "  • 'history' - View task history",
  "  • 'quit' or 'exit' - Stop the system",
  '='.repeat(60),
].join('\n');

/**
 * Run the example requests through the session's own coordinator, so they
 * show up in `history` afterwards.
 */
async function runExamples(system: System, signal: AbortSignal): Promise<void> {
  console.log('\n🧪 MULTI-AGENT EXAMPLES');
  console.log('='.repeat(30));

  for (const [i, scenario] of EXAMPLE_SCENARIOS.entries()) {
    console.log(`\n${i + 1}. Example: ${scenario.request}`);
    console.log('-'.repeat(40));
    const response = await system.coordinator.handle(scenario.request, system.context, signal);
    console.log(response);
  }

  console.log('\n✅ Examples completed!');
}

async function main() {
  console.log('🚀 Initializing Multi-Agent System...');

  let system: System;
  try {
    system = createSystem();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const driver = new SessionDriver(system.coordinator, system.context);
  const examples = new AbortController();
  process.once('SIGINT', () => {
    examples.abort();
    driver.interrupt();
  });

  console.log(`\n${BANNER}`);

  try {
    if (process.argv.includes('--self-test')) {
      console.log('\n🔧 Testing agent coordination...');
      const result = await runSelfTest(system, examples.signal);
      if (!result.ok) {
        console.error(`❌ System test failed: ${result.error}`);
        process.exitCode = 1;
        return;
      }
      console.log('✅ Multi-agent system ready!');
    }
    if (process.argv.includes('--examples')) {
      await runExamples(system, examples.signal);
    }
    await driver.run();
  } catch (error) {
    if (!(error instanceof UserInterrupt)) throw error;
    console.log('\n⚠️  Interrupted. Ending session.');
  }

  console.log(`\n📋 Session summary:\n${system.context.getSummary()}`);
}

main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exitCode = 1;
});
