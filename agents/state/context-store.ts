/**
 * Context Store
 *
 * Process-lifetime state for one coordination session:
 * - conversation log (append-only)
 * - task log (append-only)
 * - last result per specialist (overwritten on each call)
 *
 * Entries are frozen on append so nothing downstream can rewrite history.
 * One store belongs to one session; concurrent sessions each get their own.
 */

import type { MessageRole } from '../../core/types.js';
import { SPECIALIST_IDS, type SpecialistId, type SpecialistResult } from '../schemas/index.js';

// =============================================================================
// RECORD TYPES
// =============================================================================

export type AgentId = 'user' | 'coordinator' | 'error' | SpecialistId;

export interface ConversationEntry {
  readonly role: MessageRole;
  readonly content: string;
  readonly sourceAgent: AgentId;
  readonly timestamp: string;
}

export type TaskKind = 'research' | 'code_analysis' | 'content_creation' | 'composite';

export type TaskStatus = 'completed' | 'failed';

export interface TaskRecord {
  readonly taskKind: TaskKind;
  readonly agentsInvoked: readonly SpecialistId[];
  readonly status: TaskStatus;
  readonly summary: string;
  readonly timestamp: string;
}

export interface ContextStoreOptions {
  /** Clock used for timestamps and the session id. Defaults to `new Date()` */
  now?: () => Date;
}

// =============================================================================
// CONTEXT STORE
// =============================================================================

export class ContextStore {
  readonly sessionId: string;

  private conversationLog: ConversationEntry[] = [];
  private taskLog: TaskRecord[] = [];
  private lastResults = new Map<SpecialistId, SpecialistResult>();
  private now: () => Date;

  constructor(options: ContextStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.sessionId = formatSessionId(this.now());
  }

  addConversation(role: MessageRole, content: string, sourceAgent: AgentId): ConversationEntry {
    const entry: ConversationEntry = Object.freeze({
      role,
      content,
      sourceAgent,
      timestamp: this.now().toISOString(),
    });
    this.conversationLog.push(entry);
    return entry;
  }

  addTask(task: Omit<TaskRecord, 'timestamp'>): TaskRecord {
    const record: TaskRecord = Object.freeze({
      taskKind: task.taskKind,
      agentsInvoked: Object.freeze([...task.agentsInvoked]),
      status: task.status,
      summary: task.summary,
      timestamp: this.now().toISOString(),
    });
    this.taskLog.push(record);
    return record;
  }

  /**
   * Keep a specialist's latest result, replacing the previous one.
   */
  storeResult(result: SpecialistResult): void {
    this.lastResults.set(SPECIALIST_IDS[result.kind], result);
  }

  getResult(agentId: SpecialistId): SpecialistResult | undefined {
    return this.lastResults.get(agentId);
  }

  conversation(): readonly ConversationEntry[] {
    return [...this.conversationLog];
  }

  tasks(): readonly TaskRecord[] {
    return [...this.taskLog];
  }

  /**
   * Most recent `limit` task records, oldest first.
   */
  recentTasks(limit: number): readonly TaskRecord[] {
    return limit > 0 ? this.taskLog.slice(-limit) : [];
  }

  /**
   * Render the last conversation entries as "[agent] role: content" lines.
   */
  getRecentContext(limit = 5): string {
    const recent = limit > 0 ? this.conversationLog.slice(-limit) : [];
    return recent.map((entry) => `[${entry.sourceAgent}] ${entry.role}: ${entry.content}`).join('\n');
  }

  getSummary(): string {
    const failed = this.taskLog.filter((t) => t.status === 'failed').length;
    return [
      `Session: ${this.sessionId}`,
      `Conversation Entries: ${this.conversationLog.length}`,
      `Tasks: ${this.taskLog.length} (${this.taskLog.length - failed} completed, ${failed} failed)`,
      `Agents With Results: ${[...this.lastResults.keys()].join(', ') || 'none'}`,
    ].join('\n');
  }
}

/**
 * Session ids look like "20250114_093005" (local time of creation).
 */
export function formatSessionId(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
