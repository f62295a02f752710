/**
 * Automations module — trigger matching, action routing, execution and polling.
 */

export * from './schemas.js'
export * from './events.js'
export * from './ports.js'
export * from './template.js'
export { TriggerMatcher, evaluateOperator } from './matcher.js'
export { ACTION_ROUTES, routeFor, toToolArgs } from './routes.js'
export type { ToolRoute } from './routes.js'
export { ActionRouter } from './router.js'
export type { ActionRouterOptions, ExecuteOptions } from './router.js'
export {
  ClassifyLabelHandler,
  ClassificationSchema,
  buildClassificationPrompt,
} from './handlers/classify-label.js'
export type { Classification } from './handlers/classify-label.js'
export {
  ReviewHandoffHandler,
  handoffFileName,
  handoffCommand,
  shellQuote,
} from './handlers/review-handoff.js'
export type { HandoffOptions } from './handlers/review-handoff.js'
export type { HandlerContext, HandlerOutput } from './handlers/types.js'
export { ExecutionEngine, newExecutionId } from './engine.js'
export type { ActionDispatcher, RunOptions } from './engine.js'
export { ProcessedSet } from './processed-set.js'
export { Watcher, EmailWatcher, CodeReviewWatcher } from './watcher.js'
export type { WatcherOptions, StartOptions, PollSummary } from './watcher.js'
export { SqliteAutomationStore } from './repository.js'
export {
  activateAutomation,
  pauseAutomation,
  deleteAutomation,
  replanAutomation,
  runAutomation,
} from './lifecycle.js'
export type { ReplanInput, RunInput } from './lifecycle.js'
