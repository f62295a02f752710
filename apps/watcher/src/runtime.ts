/**
 * Runtime assembly — every collaborator is constructed here and injected.
 */

import { mkdirSync } from 'node:fs'
import path from 'node:path'
import type Database from 'better-sqlite3'
import {
  ActionRouter,
  CodeReviewWatcher,
  EmailWatcher,
  ExecutionEngine,
  ProviderStructuredCompleter,
  SqliteAutomationStore,
  createProvider,
  errorMessage,
  openDatabase,
} from '@tripwire/core'
import type {
  Config,
  EmailRecord,
  EventSource,
  PullRequestReviews,
  StructuredCompleter,
  ToolInvoker,
  Watcher,
  WatcherOptions,
} from '@tripwire/core'
import { CodeReviewSource, GmailClient, StdioToolInvoker } from '@tripwire/integrations'

export interface RuntimeOverrides {
  db?: Database.Database
  tools?: ToolInvoker
  /** `null` disables classification; omitted builds one from `config.llm`. */
  completer?: StructuredCompleter | null
  emailSource?: EventSource<EmailRecord> | null
  codeReviewSource?: EventSource<PullRequestReviews> | null
}

export interface RunWatchersOptions {
  /** Run a single poll cycle per watcher. */
  once?: boolean
  signal?: AbortSignal
}

export interface Runtime {
  db: Database.Database
  store: SqliteAutomationStore
  router: ActionRouter
  engine: ExecutionEngine
  watchers: Watcher<unknown>[]
  run(options?: RunWatchersOptions): Promise<void>
  stop(): void
  close(): void
}

function openStore(config: Config): Database.Database {
  mkdirSync(path.dirname(config.databasePath), { recursive: true })
  return openDatabase(config.databasePath)
}

function buildCompleter(config: Config): StructuredCompleter | null {
  try {
    return new ProviderStructuredCompleter(createProvider(config.llm))
  } catch (err) {
    console.warn(`[runtime] LLM provider unavailable, email.classify actions will fail: ${errorMessage(err)}`)
    return null
  }
}

export function createRuntime(config: Config, overrides: RuntimeOverrides = {}): Runtime {
  const db = overrides.db ?? openStore(config)
  const store = new SqliteAutomationStore(db)
  const tools = overrides.tools ?? new StdioToolInvoker(config.servers)
  const completer = overrides.completer !== undefined ? overrides.completer : buildCompleter(config)

  const router = new ActionRouter(tools, {
    completer,
    handoff: {
      dir: config.handoff.dir,
      agentCommand: config.handoff.agentCommand,
      defaultWorkdir: config.handoff.workdir,
    },
  })
  const engine = new ExecutionEngine(router, store)

  const watcherOptions: WatcherOptions = {
    maxResults: config.watcher.maxResults,
    lookbackSeconds: config.watcher.lookbackSeconds,
    processedCap: config.watcher.processedCap,
    processedKeep: config.watcher.processedKeep,
  }

  const watchers: Watcher<unknown>[] = []

  const emailSource =
    overrides.emailSource !== undefined ? overrides.emailSource : config.gmail ? new GmailClient(config.gmail) : null
  if (emailSource) watchers.push(new EmailWatcher(emailSource, store, engine, watcherOptions))

  const codeReviewSource =
    overrides.codeReviewSource !== undefined
      ? overrides.codeReviewSource
      : tools.hasServer('github')
        ? new CodeReviewSource(tools)
        : null
  if (codeReviewSource) watchers.push(new CodeReviewWatcher(codeReviewSource, store, engine, watcherOptions))

  return {
    db,
    store,
    router,
    engine,
    watchers,

    async run(options: RunWatchersOptions = {}): Promise<void> {
      if (watchers.length === 0) {
        console.warn('[runtime] No event sources configured (set gmail credentials or a github server)')
        return
      }
      console.log(`[runtime] Started ${watchers.map((w) => w.domain).join(', ')} watcher(s)`)
      await Promise.all(
        watchers.map((w) =>
          w.start({
            intervalMs: config.watcher.intervalSeconds * 1000,
            maxIterations: options.once ? 1 : undefined,
            signal: options.signal,
          }),
        ),
      )
      console.log('[runtime] Stopped')
    },

    stop(): void {
      for (const w of watchers) w.stop()
    },

    close(): void {
      db.close()
    },
  }
}
