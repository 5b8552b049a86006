/**
 * State Management Module
 *
 * Exports the per-session context store.
 */

export {
  ContextStore,
  formatSessionId,
  type AgentId,
  type ConversationEntry,
  type TaskKind,
  type TaskStatus,
  type TaskRecord,
  type ContextStoreOptions,
} from './context-store.js';
