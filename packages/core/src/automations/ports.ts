/**
 * Collaborator interfaces the pipeline depends on. Concrete implementations are
 * constructed by the process entry and injected.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { TripwireError } from '../common/index.js'
import type { Automation, AutomationStatus, Execution, WatcherDomain, WatcherState } from './schemas.js'

export interface EventSource<T> {
  search(query: string, maxResults: number): Promise<T[]>
}

export interface ToolContent {
  type: string
  text?: string
  [key: string]: unknown
}

export interface ToolResult {
  success: boolean
  content: ToolContent[]
  structured: Record<string, unknown> | null
  error: string | null
}

export interface ToolInvoker {
  hasServer(name: string): boolean
  callTool(server: string, tool: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResult>
}

export interface AutomationStore {
  listAutomations(status?: AutomationStatus): Promise<Automation[]>
  getAutomation(id: string): Promise<Automation | null>
  saveAutomation(automation: Automation): Promise<void>
  /** Returns false when no automation had that id. */
  deleteAutomation(id: string): Promise<boolean>
  saveExecution(execution: Execution): Promise<void>
  getExecution(id: string): Promise<Execution | null>
  /** Newest first. */
  listExecutions(automationId?: string, limit?: number): Promise<Execution[]>
  getWatcherState(domain: WatcherDomain): Promise<WatcherState | null>
  saveWatcherState(domain: WatcherDomain, state: WatcherState): Promise<void>
}

export interface StructuredCompleter {
  completeStructured<T>(prompt: string, schema: ZodType<T, ZodTypeDef, unknown>, temperature: number): Promise<T>
}

/** Last text block of a tool result, or '' when there is none. */
export function lastText(result: ToolResult): string {
  for (let i = result.content.length - 1; i >= 0; i--) {
    const block = result.content[i]
    if (block.type === 'text' && typeof block.text === 'string') return block.text
  }
  return ''
}

/** Call a tool and throw a TOOL_ERROR when the server reports failure. */
export async function callToolOrThrow(
  tools: ToolInvoker,
  server: string,
  tool: string,
  args: Record<string, unknown>,
  signal?: AbortSignal,
): Promise<ToolResult> {
  const result = await tools.callTool(server, tool, args, signal)
  if (!result.success) throw TripwireError.tool(result.error || 'Tool call failed')
  return result
}
