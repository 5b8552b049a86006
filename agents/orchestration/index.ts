/**
 * Orchestration Module
 *
 * Exports the coordinator, routers, history reporter and formatting.
 */

export { Coordinator, ERROR_PREFIX, type CoordinatorOptions } from './coordinator.js';
export {
  KeywordRouter,
  LLMRouter,
  RoutePlanSchema,
  routePlanDescriptor,
  toRoutes,
  detectLanguage,
  type Route,
  type Router,
  type LLMRouterOptions,
} from './router.js';
export { summarizeHistory, NO_TASKS_MESSAGE, DEFAULT_HISTORY_LIMIT } from './history.js';
export {
  SECTION_MARKERS,
  formatSection,
  formatComposite,
  formatResearchResult,
  formatCodeResult,
  formatCreativeResult,
  summarizeResult,
} from './format.js';
