import { describe, it, expect } from 'vitest';
import { ContextStore } from '../state/index.js';
import { NO_TASKS_MESSAGE, summarizeHistory } from './history.js';

describe('summarizeHistory', () => {
  const now = () => new Date(2024, 2, 5, 9, 7, 3);

  it('reports an empty session', () => {
    expect(summarizeHistory(new ContextStore({ now }))).toBe(NO_TASKS_MESSAGE);
  });

  it('renders the most recent records oldest first', () => {
    const context = new ContextStore({ now });
    for (let i = 1; i <= 7; i++) {
      context.addTask({
        taskKind: 'research',
        agentsInvoked: ['research_agent'],
        status: i === 7 ? 'failed' : 'completed',
        summary: `Researched: topic ${i} (Confidence: High)`,
      });
    }

    const lines = summarizeHistory(context).split('\n');

    expect(lines[0]).toBe('📊 Session 20240305_090703 - 7 tasks recorded:');
    expect(lines[1]).toBe('');
    expect(lines.slice(2)).toHaveLength(10);
    expect(lines[2]).toBe('1. RESEARCH: Researched: topic 3 (Confidence: High)');
    expect(lines[3]).toBe('   Agents: research_agent | Status: completed');
    expect(lines[10]).toBe('5. RESEARCH: Researched: topic 7 (Confidence: High)');
    expect(lines[11]).toBe('   Agents: research_agent | Status: failed');
  });

  it('honors a custom limit', () => {
    const context = new ContextStore({ now });
    context.addTask({
      taskKind: 'composite',
      agentsInvoked: ['research_agent', 'creative_agent'],
      status: 'completed',
      summary: "Complex analysis of 'tides' with research and report generation",
    });
    context.addTask({
      taskKind: 'code_analysis',
      agentsInvoked: ['code_agent'],
      status: 'completed',
      summary: 'Analyzed Go code (Complexity: 2/10)',
    });

    expect(summarizeHistory(context, 1)).toBe(
      [
        '📊 Session 20240305_090703 - 2 tasks recorded:',
        '',
        '1. CODE_ANALYSIS: Analyzed Go code (Complexity: 2/10)',
        '   Agents: code_agent | Status: completed',
      ].join('\n')
    );
  });
});
