/**
 * Polling watchers — fetch new events from a source, match them against active
 * automations and run the engine for every match. Checkpoint and the processed-id
 * set persist through the store so restarts do not re-trigger.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { errorMessage } from '../common/index.js'
import type { Automation, TriggerEvent, WatcherDomain } from './schemas.js'
import type { AutomationStore, EventSource } from './ports.js'
import type { CodeReviewEvent, DomainEvent, EmailRecord, PullRequestReviews } from './events.js'
import { codeReviewTriggerEvent, emailTriggerEvent, reviewEventId, reviewEvents } from './events.js'
import { TriggerMatcher } from './matcher.js'
import type { ExecutionEngine } from './engine.js'
import { ProcessedSet } from './processed-set.js'

export interface WatcherOptions {
  maxResults?: number
  /** How far back the first cycle looks when there is no checkpoint. */
  lookbackSeconds?: number
  processedCap?: number
  processedKeep?: number
  now?: () => Date
}

export interface StartOptions {
  intervalMs?: number
  /** Stop after this many cycles; runs until stopped when omitted. */
  maxIterations?: number
  signal?: AbortSignal
}

export interface PollSummary {
  events: number
  triggered: number
}

type Engine = Pick<ExecutionEngine, 'run'>

const epochSeconds = (date: Date): number => Math.floor(date.getTime() / 1000)

export abstract class Watcher<TRecord> {
  abstract readonly domain: WatcherDomain

  protected readonly matcher = new TriggerMatcher()
  protected lastCheck: Date | null = null
  protected processed: ProcessedSet
  private controller = new AbortController()
  private readonly maxResults: number
  private readonly lookbackSeconds: number
  private readonly now: () => Date

  constructor(
    protected readonly store: AutomationStore,
    protected readonly engine: Engine,
    private readonly options: WatcherOptions = {},
  ) {
    this.maxResults = options.maxResults ?? 20
    this.lookbackSeconds = options.lookbackSeconds ?? 3600
    this.now = options.now ?? (() => new Date())
    this.processed = new ProcessedSet(options.processedCap, options.processedKeep)
  }

  protected abstract fetch(query: string, maxResults: number): Promise<TRecord[]>
  protected abstract buildQuery(since: Date): string
  protected abstract eventId(record: TRecord): string
  protected abstract toDomainEvent(record: TRecord): DomainEvent
  protected abstract toTriggerEvent(record: TRecord): TriggerEvent
  protected abstract describe(record: TRecord): string

  private get tag(): string {
    return `[watcher:${this.domain}]`
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  async start(options: StartOptions = {}): Promise<void> {
    const intervalMs = options.intervalMs ?? 60_000
    if (this.controller.signal.aborted) this.controller = new AbortController()
    const signal = this.controller.signal
    const onAbort = (): void => this.stop()
    options.signal?.addEventListener('abort', onAbort, { once: true })
    if (options.signal?.aborted) this.stop()

    try {
      await this.loop(signal, intervalMs, options.maxIterations)
    } finally {
      options.signal?.removeEventListener('abort', onAbort)
    }
  }

  private async loop(signal: AbortSignal, intervalMs: number, maxIterations: number | undefined): Promise<void> {
    await this.loadState()

    let iteration = 0
    while (!signal.aborted) {
      if (maxIterations !== undefined && iteration >= maxIterations) break

      try {
        await this.poll()
      } catch (err) {
        console.error(`${this.tag} poll error: ${errorMessage(err)}`)
      }

      iteration++
      const isLast = maxIterations !== undefined && iteration >= maxIterations
      if (isLast || signal.aborted) break

      try {
        await sleep(intervalMs, undefined, { signal })
      } catch {
        break // aborted
      }
    }
  }

  stop(): void {
    this.controller.abort()
  }

  async loadState(): Promise<void> {
    try {
      const state = await this.store.getWatcherState(this.domain)
      if (!state) return
      this.lastCheck = state.lastCheck ? new Date(state.lastCheck) : null
      this.processed = ProcessedSet.from(state.processedIds, this.options.processedCap, this.options.processedKeep)
    } catch (err) {
      console.warn(`${this.tag} failed to load state: ${errorMessage(err)}`)
    }
  }

  async poll(): Promise<PollSummary> {
    const cycleStart = this.now()
    const signal = this.controller.signal

    const active = await this.store.listAutomations('active')
    const candidates = active.filter((a) => a.trigger.type === this.domain)
    if (candidates.length === 0) return { events: 0, triggered: 0 }

    const since = this.lastCheck ?? new Date(cycleStart.getTime() - this.lookbackSeconds * 1000)
    const records = await this.fetch(this.buildQuery(since), this.maxResults)

    let events = 0
    let triggered = 0
    // A stop takes effect between events; runs already started for an event finish.
    for (const record of records) {
      if (signal.aborted) break
      const id = this.eventId(record)
      if (this.processed.has(id)) continue
      events++

      const domainEvent = this.toDomainEvent(record)
      for (const automation of candidates) {
        if (!this.matcher.matches(domainEvent, automation.trigger)) continue
        await this.trigger(automation, record)
        triggered++
      }

      this.processed.add(id)
    }

    const checkpoint =
      this.lastCheck && this.lastCheck.getTime() > cycleStart.getTime() ? this.lastCheck : cycleStart
    this.lastCheck = checkpoint
    await this.store.saveWatcherState(this.domain, {
      lastCheck: checkpoint.toISOString(),
      processedIds: this.processed.toArray(),
    })

    return { events, triggered }
  }

  private async trigger(automation: Automation, record: TRecord): Promise<void> {
    console.log(`${this.tag} Triggering '${automation.name}' for ${this.describe(record)}`)
    const execution = await this.engine.run(automation, this.toTriggerEvent(record))
    if (execution.status === 'success') {
      console.log(`${this.tag} '${automation.name}' completed successfully`)
    } else {
      console.warn(`${this.tag} '${automation.name}' failed: ${execution.error?.message ?? 'unknown error'}`)
    }
  }
}

export class EmailWatcher extends Watcher<EmailRecord> {
  readonly domain = 'email' as const

  constructor(
    private readonly source: EventSource<EmailRecord>,
    store: AutomationStore,
    engine: Engine,
    options?: WatcherOptions,
  ) {
    super(store, engine, options)
  }

  protected fetch(query: string, maxResults: number): Promise<EmailRecord[]> {
    return this.source.search(query, maxResults)
  }

  protected buildQuery(since: Date): string {
    return `in:inbox after:${epochSeconds(since)}`
  }

  protected eventId(email: EmailRecord): string {
    return email.id
  }

  protected toDomainEvent(email: EmailRecord): DomainEvent {
    return { domain: 'email', email }
  }

  protected toTriggerEvent(email: EmailRecord): TriggerEvent {
    return emailTriggerEvent(email)
  }

  protected describe(email: EmailRecord): string {
    return `email: ${email.subject}`
  }
}

export class CodeReviewWatcher extends Watcher<CodeReviewEvent> {
  readonly domain = 'code_review' as const

  constructor(
    private readonly source: EventSource<PullRequestReviews>,
    store: AutomationStore,
    engine: Engine,
    options?: WatcherOptions,
  ) {
    super(store, engine, options)
  }

  protected async fetch(query: string, maxResults: number): Promise<CodeReviewEvent[]> {
    const pullRequests = await this.source.search(query, maxResults)
    return pullRequests.flatMap(reviewEvents)
  }

  protected buildQuery(since: Date): string {
    return `since:${epochSeconds(since)}`
  }

  protected eventId(event: CodeReviewEvent): string {
    return reviewEventId(event.pullRequest, event.review)
  }

  protected toDomainEvent(review: CodeReviewEvent): DomainEvent {
    return { domain: 'code_review', review }
  }

  protected toTriggerEvent(event: CodeReviewEvent): TriggerEvent {
    return codeReviewTriggerEvent(event)
  }

  protected describe(event: CodeReviewEvent): string {
    return `review ${reviewEventId(event.pullRequest, event.review)} (${event.review.state})`
  }
}
