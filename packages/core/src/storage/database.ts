/**
 * SQLite connection for the automation store. The watcher process and one-off
 * commands may share the file, hence WAL and a busy timeout.
 */

import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

const BUSY_TIMEOUT_MS = 5000

export function openDatabase(path: string): Database.Database {
  const db = new Database(path)

  db.pragma('journal_mode = WAL')
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`)
  db.pragma('foreign_keys = ON')

  runMigrations(db)
  return db
}
