/**
 * Execution engine — runs an automation's actions in order, fail-fast, and
 * records the outcome as an Execution.
 */

import { v4 as uuidv4 } from 'uuid'
import type {
  Action,
  ActionResult,
  Automation,
  Execution,
  ExecutionError,
  ResolvedVariable,
  TriggerEvent,
} from './schemas.js'
import { actionKey } from './schemas.js'
import type { AutomationStore } from './ports.js'
import type { ActionRouter, ExecuteOptions } from './router.js'
import type { TemplateContext } from './template.js'

export type ActionDispatcher = Pick<ActionRouter, 'canDispatch' | 'execute'>

export interface RunOptions {
  dryRun?: boolean
  signal?: AbortSignal
}

export function newExecutionId(): string {
  return `exec_${uuidv4().replace(/-/g, '').slice(0, 12)}`
}

function failedResult(action: Action, error: string): ActionResult {
  return { actionId: action.id, status: 'failed', output: {}, error, durationMs: 0 }
}

export class ExecutionEngine {
  constructor(
    private readonly router: ActionDispatcher,
    private readonly store: AutomationStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async run(automation: Automation, triggerEvent?: TriggerEvent, options: RunOptions = {}): Promise<Execution> {
    const dryRun = options.dryRun ?? false
    const actions = [...automation.actions]
    const event: TriggerEvent = triggerEvent ?? { type: 'manual', data: {}, timestamp: this.now().toISOString() }

    const context = this.buildContext(automation, event)
    const execution: Execution = {
      id: newExecutionId(),
      automationId: automation.id,
      automationVersion: automation.version,
      triggeredAt: this.now().toISOString(),
      completedAt: null,
      status: 'running',
      triggerEvent: event,
      variables: Object.entries(context).map(([name, value]): ResolvedVariable => ({ name, value, confidence: 1 })),
      actionResults: [],
      error: null,
    }

    const execOptions: ExecuteOptions = { dryRun, signal: options.signal }
    for (const action of actions) {
      let result: ActionResult
      if (options.signal?.aborted) {
        result = failedResult(action, 'Execution aborted')
      } else if (!this.router.canDispatch(action)) {
        result = failedResult(action, `No route or configured server for action type: ${actionKey(action)}`)
      } else {
        result = await this.router.execute(action, context, execOptions)
      }
      execution.actionResults.push(result)
      if (result.status === 'failed') break
    }

    const firstFailure = execution.actionResults.find((r) => r.status === 'failed')
    execution.completedAt = this.now().toISOString()
    execution.status = firstFailure ? 'failed' : 'success'
    if (firstFailure) {
      const error: ExecutionError = {
        message: firstFailure.error ?? 'Action failed',
        actionId: firstFailure.actionId,
        recoverable: true,
        recoveryOptions: [],
      }
      execution.error = error
    }

    if (!dryRun) {
      await this.store.saveExecution(execution)
      if (firstFailure) {
        console.warn(`[engine] ${automation.name} (${execution.id}) failed: ${execution.error?.message}`)
      }
    }

    return execution
  }

  private buildContext(automation: Automation, event: TriggerEvent): TemplateContext {
    const context: TemplateContext = { trigger: event.data }
    for (const variable of automation.variables) {
      context[variable.name] = null
    }
    return context
  }
}
