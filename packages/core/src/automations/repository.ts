/**
 * SQLite-backed AutomationStore — automations, executions and watcher checkpoints.
 *
 * JSON columns are re-validated on read: automations through `parseAutomation`,
 * executions and watcher state through their zod schemas.
 */

import type Database from 'better-sqlite3'
import { TripwireError, errorMessage } from '../common/index.js'
import { ExecutionSchema, WatcherStateSchema, parseAutomation } from './schemas.js'
import type { Automation, AutomationStatus, Execution, WatcherDomain, WatcherState } from './schemas.js'
import type { AutomationStore } from './ports.js'

// ── Row interfaces (snake_case DB columns) ──

interface AutomationRow {
  id: string
  name: string
  description: string
  status: string
  trigger_json: string
  variables_json: string
  actions_json: string
  version: number
  created_at: string
  updated_at: string
}

interface ExecutionRow {
  id: string
  automation_id: string
  automation_version: number
  triggered_at: string
  completed_at: string | null
  status: string
  trigger_event_json: string
  variables_json: string
  action_results_json: string
  error_json: string | null
}

interface WatcherStateRow {
  domain: string
  last_check: string | null
  processed_ids_json: string
}

// ── Row conversion ──

function parseJson(column: string, text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    throw TripwireError.parse(`Malformed JSON in column ${column}`)
  }
}

function rowToAutomation(row: AutomationRow): Automation {
  const parsed = parseAutomation({
    id: row.id,
    name: row.name,
    description: row.description,
    status: row.status,
    trigger: parseJson('trigger_json', row.trigger_json),
    variables: parseJson('variables_json', row.variables_json),
    actions: parseJson('actions_json', row.actions_json),
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  })
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

function rowToExecution(row: ExecutionRow): Execution {
  const parsed = ExecutionSchema.safeParse({
    id: row.id,
    automationId: row.automation_id,
    automationVersion: row.automation_version,
    triggeredAt: row.triggered_at,
    completedAt: row.completed_at,
    status: row.status,
    triggerEvent: parseJson('trigger_event_json', row.trigger_event_json),
    variables: parseJson('variables_json', row.variables_json),
    actionResults: parseJson('action_results_json', row.action_results_json),
    error: row.error_json === null ? null : parseJson('error_json', row.error_json),
  })
  if (!parsed.success) {
    throw TripwireError.parse(`Invalid execution ${row.id}: ${parsed.error.issues.map((i) => i.message).join('; ')}`)
  }
  return parsed.data
}

// ── Store ──

export class SqliteAutomationStore implements AutomationStore {
  constructor(private db: Database.Database) {}

  async listAutomations(status?: AutomationStatus): Promise<Automation[]> {
    const rows = status
      ? this.query(() =>
          this.db
            .prepare<[string], AutomationRow>('SELECT * FROM automations WHERE status = ? ORDER BY created_at')
            .all(status),
        )
      : this.query(() => this.db.prepare<[], AutomationRow>('SELECT * FROM automations ORDER BY created_at').all())

    const automations: Automation[] = []
    for (const row of rows) {
      try {
        automations.push(rowToAutomation(row))
      } catch (err) {
        console.warn(`[store] skipping automation ${row.id}: ${errorMessage(err)}`)
      }
    }
    return automations
  }

  async getAutomation(id: string): Promise<Automation | null> {
    const row = this.query(() =>
      this.db.prepare<[string], AutomationRow>('SELECT * FROM automations WHERE id = ?').get(id),
    )
    return row ? rowToAutomation(row) : null
  }

  async saveAutomation(automation: Automation): Promise<void> {
    this.query(() =>
      this.db
        .prepare(
          `INSERT INTO automations (id, name, description, status, trigger_json, variables_json, actions_json,
            version, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             description = excluded.description,
             status = excluded.status,
             trigger_json = excluded.trigger_json,
             variables_json = excluded.variables_json,
             actions_json = excluded.actions_json,
             version = excluded.version,
             updated_at = excluded.updated_at`,
        )
        .run(
          automation.id,
          automation.name,
          automation.description,
          automation.status,
          JSON.stringify(automation.trigger),
          JSON.stringify(automation.variables),
          JSON.stringify(automation.actions),
          automation.version,
          automation.createdAt,
          automation.updatedAt,
        ),
    )
  }

  async deleteAutomation(id: string): Promise<boolean> {
    const info = this.query(() => this.db.prepare('DELETE FROM automations WHERE id = ?').run(id))
    return info.changes > 0
  }

  async saveExecution(execution: Execution): Promise<void> {
    this.query(() =>
      this.db
        .prepare(
          `INSERT OR REPLACE INTO executions (id, automation_id, automation_version, triggered_at, completed_at,
            status, trigger_event_json, variables_json, action_results_json, error_json)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          execution.id,
          execution.automationId,
          execution.automationVersion,
          execution.triggeredAt,
          execution.completedAt,
          execution.status,
          JSON.stringify(execution.triggerEvent),
          JSON.stringify(execution.variables),
          JSON.stringify(execution.actionResults),
          execution.error ? JSON.stringify(execution.error) : null,
        ),
    )
  }

  async getExecution(id: string): Promise<Execution | null> {
    const row = this.query(() =>
      this.db.prepare<[string], ExecutionRow>('SELECT * FROM executions WHERE id = ?').get(id),
    )
    return row ? rowToExecution(row) : null
  }

  async listExecutions(automationId?: string, limit = 50): Promise<Execution[]> {
    const rows = automationId
      ? this.query(() =>
          this.db
            .prepare<[string, number], ExecutionRow>(
              'SELECT * FROM executions WHERE automation_id = ? ORDER BY triggered_at DESC, rowid DESC LIMIT ?',
            )
            .all(automationId, limit),
        )
      : this.query(() =>
          this.db
            .prepare<[number], ExecutionRow>('SELECT * FROM executions ORDER BY triggered_at DESC, rowid DESC LIMIT ?')
            .all(limit),
        )
    return rows.map(rowToExecution)
  }

  async getWatcherState(domain: WatcherDomain): Promise<WatcherState | null> {
    const row = this.query(() =>
      this.db.prepare<[string], WatcherStateRow>('SELECT * FROM watcher_state WHERE domain = ?').get(domain),
    )
    if (!row) return null

    const parsed = WatcherStateSchema.safeParse({
      lastCheck: row.last_check,
      processedIds: parseJson('processed_ids_json', row.processed_ids_json),
    })
    if (!parsed.success) throw TripwireError.parse(`Invalid watcher state for ${domain}`)
    return parsed.data
  }

  async saveWatcherState(domain: WatcherDomain, state: WatcherState): Promise<void> {
    this.query(() =>
      this.db
        .prepare(
          `INSERT INTO watcher_state (domain, last_check, processed_ids_json, updated_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(domain) DO UPDATE SET
             last_check = excluded.last_check,
             processed_ids_json = excluded.processed_ids_json,
             updated_at = excluded.updated_at`,
        )
        .run(domain, state.lastCheck, JSON.stringify(state.processedIds), new Date().toISOString()),
    )
  }

  private query<T>(fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      throw TripwireError.db(errorMessage(err))
    }
  }
}
