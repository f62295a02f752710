/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema — automations, executions, watcher_state',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS automations (
          id TEXT PRIMARY KEY,
          name TEXT NOT NULL,
          description TEXT NOT NULL DEFAULT '',
          status TEXT NOT NULL DEFAULT 'draft',
          trigger_json TEXT NOT NULL,
          variables_json TEXT NOT NULL DEFAULT '[]',
          actions_json TEXT NOT NULL DEFAULT '[]',
          version INTEGER NOT NULL DEFAULT 1,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_automations_status ON automations(status);

        CREATE TABLE IF NOT EXISTS executions (
          id TEXT PRIMARY KEY,
          automation_id TEXT NOT NULL,
          automation_version INTEGER NOT NULL,
          triggered_at TEXT NOT NULL,
          completed_at TEXT,
          status TEXT NOT NULL DEFAULT 'running',
          trigger_event_json TEXT NOT NULL,
          variables_json TEXT NOT NULL DEFAULT '[]',
          action_results_json TEXT NOT NULL DEFAULT '[]',
          error_json TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_executions_automation ON executions(automation_id);
        CREATE INDEX IF NOT EXISTS idx_executions_triggered_at ON executions(triggered_at);

        CREATE TABLE IF NOT EXISTS watcher_state (
          domain TEXT PRIMARY KEY,
          last_check TEXT,
          processed_ids_json TEXT NOT NULL DEFAULT '[]',
          updated_at TEXT NOT NULL
        );
      `)
    },
  },
]

export function runMigrations(db: Database.Database): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`)

  const current = db.prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version').get()
  const applied = current?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version
