/**
 * @tripwire/core
 *
 * Trigger matching, action routing, execution, polling watchers, storage,
 * LLM providers and configuration.
 */

export * from './common/index.js'
export * from './automations/index.js'
export * from './agents/index.js'
export * from './storage/index.js'
export * from './config/index.js'
