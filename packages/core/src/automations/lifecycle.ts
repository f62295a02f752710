/**
 * Lifecycle operations over stored automations.
 */

import { Ok, Err, attempt, TripwireError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { parseAutomation } from './schemas.js'
import type { Automation, AutomationStatus, Execution, TriggerEvent } from './schemas.js'
import type { AutomationStore } from './ports.js'
import type { ExecutionEngine } from './engine.js'

export interface ReplanInput {
  name?: string
  description?: string
  /** Raw trigger, normalised the same way stored automations are. */
  trigger?: unknown
  actions?: unknown[]
  variables?: unknown[]
}

export interface RunInput {
  event?: TriggerEvent
  dryRun?: boolean
  signal?: AbortSignal
}

function asError(err: unknown): TripwireError {
  return err instanceof TripwireError ? err : TripwireError.db(errorMessage(err))
}

async function load(store: AutomationStore, id: string): Promise<Result<Automation, TripwireError>> {
  try {
    const automation = await store.getAutomation(id)
    return automation ? Ok(automation) : Err(TripwireError.notFound('Automation', id))
  } catch (err) {
    return Err(asError(err))
  }
}

async function setStatus(
  store: AutomationStore,
  id: string,
  status: AutomationStatus,
): Promise<Result<Automation, TripwireError>> {
  const found = await load(store, id)
  if (!found.ok) return found

  const updated: Automation = { ...found.value, status, updatedAt: new Date().toISOString() }
  return attempt(async () => {
    await store.saveAutomation(updated)
    return updated
  }, asError)
}

export function activateAutomation(store: AutomationStore, id: string): Promise<Result<Automation, TripwireError>> {
  return setStatus(store, id, 'active')
}

export function pauseAutomation(store: AutomationStore, id: string): Promise<Result<Automation, TripwireError>> {
  return setStatus(store, id, 'paused')
}

export async function deleteAutomation(store: AutomationStore, id: string): Promise<Result<void, TripwireError>> {
  try {
    const deleted = await store.deleteAutomation(id)
    return deleted ? Ok(undefined) : Err(TripwireError.notFound('Automation', id))
  } catch (err) {
    return Err(asError(err))
  }
}

/**
 * Replace parts of an automation's definition and bump its version.
 * Executions keep the version they ran under.
 */
export async function replanAutomation(
  store: AutomationStore,
  id: string,
  input: ReplanInput,
): Promise<Result<Automation, TripwireError>> {
  const found = await load(store, id)
  if (!found.ok) return found
  const current = found.value

  const parsed = parseAutomation({
    ...current,
    name: input.name ?? current.name,
    description: input.description ?? current.description,
    trigger: input.trigger ?? current.trigger,
    variables: input.variables ?? current.variables,
    actions: input.actions ?? current.actions,
    version: current.version + 1,
    updatedAt: new Date().toISOString(),
  })
  if (!parsed.ok) return parsed

  const replanned = parsed.value
  return attempt(async () => {
    await store.saveAutomation(replanned)
    return replanned
  }, asError)
}

export async function runAutomation(
  store: AutomationStore,
  engine: Pick<ExecutionEngine, 'run'>,
  id: string,
  input: RunInput = {},
): Promise<Result<Execution, TripwireError>> {
  const found = await load(store, id)
  if (!found.ok) return found

  const automation = found.value
  return attempt(() => engine.run(automation, input.event, { dryRun: input.dryRun, signal: input.signal }), asError)
}
