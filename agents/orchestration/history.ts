/**
 * Task History Reporter
 *
 * Read-only rendering of the most recent task records.
 */

import type { ContextStore } from '../state/index.js';

export const NO_TASKS_MESSAGE = 'No tasks completed yet in this session.';

export const DEFAULT_HISTORY_LIMIT = 5;

export function summarizeHistory(context: ContextStore, limit = DEFAULT_HISTORY_LIMIT): string {
  const total = context.tasks().length;
  if (total === 0) return NO_TASKS_MESSAGE;

  const lines = [`📊 Session ${context.sessionId} - ${total} tasks recorded:`, ''];
  context.recentTasks(limit).forEach((task, i) => {
    lines.push(`${i + 1}. ${task.taskKind.toUpperCase()}: ${task.summary}`);
    lines.push(`   Agents: ${task.agentsInvoked.join(', ')} | Status: ${task.status}`);
  });
  return lines.join('\n');
}
