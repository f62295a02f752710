/**
 * Code-review event source over the `github` tool server.
 *
 * Lists the user's open pull requests that have reviews, then fetches every
 * review and inline comment per pull request.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { TripwireError, callToolOrThrow, lastText } from '@tripwire/core'
import type { EventSource, PullRequestReviews, ToolInvoker, ToolResult } from '@tripwire/core'
import { ListPrsWithReviewsSchema, PrReviewsSchema, ToolErrorPayloadSchema } from './wire.js'
import type { PrReviews } from './wire.js'

export interface CodeReviewSourceOptions {
  server?: string
  now?: () => Date
}

const DEFAULT_SINCE_HOURS = 24

/** Epoch seconds of a `since:<n>` term, or null. */
export function sinceEpoch(query: string): number | null {
  const match = /(?:^|\s)since:(\d+)(?:\s|$)/.exec(query)
  return match ? Number(match[1]) : null
}

/** Whole hours between `since:<n>` and now, at least 1. */
export function sinceHours(query: string, now: Date): number {
  const since = sinceEpoch(query)
  if (since === null) return DEFAULT_SINCE_HOURS
  return Math.max(1, Math.ceil((now.getTime() / 1000 - since) / 3600))
}

/** Drop reviews submitted before `since`; undated reviews are kept. */
function submittedSince(pr: PullRequestReviews, since: number | null): PullRequestReviews {
  if (since === null) return pr
  const reviews = pr.reviews.filter((r) => {
    const ts = r.submittedAt ? Date.parse(r.submittedAt) : Number.NaN
    return Number.isNaN(ts) || ts >= since * 1000
  })
  return { ...pr, reviews }
}

function payloadOf(result: ToolResult): unknown {
  if (result.structured) return result.structured
  const text = lastText(result)
  try {
    return JSON.parse(text)
  } catch {
    throw TripwireError.parse(`Tool reply is not JSON: ${text.slice(0, 80)}`)
  }
}

function parsePayload<T>(tool: string, result: ToolResult, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const payload = payloadOf(result)
  const reported = ToolErrorPayloadSchema.safeParse(payload)
  if (reported.success) throw TripwireError.tool(`${tool}: ${reported.data.error}`)

  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    throw TripwireError.parse(
      `${tool}: ${parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`,
    )
  }
  return parsed.data
}

export function toPullRequestReviews(wire: PrReviews): PullRequestReviews {
  return {
    repo: wire.repo,
    number: wire.pr.number,
    pr: {
      number: wire.pr.number,
      title: wire.pr.title,
      author: wire.pr.author,
      headRefName: wire.pr.headRefName,
      baseRefName: wire.pr.baseRefName,
      url: wire.pr.url,
    },
    reviews: wire.reviews.map((r) => ({
      id: r.id,
      author: r.author,
      state: r.state,
      body: r.body,
      submittedAt: r.submitted_at,
    })),
    comments: wire.comments,
  }
}

export class CodeReviewSource implements EventSource<PullRequestReviews> {
  private readonly server: string
  private readonly now: () => Date

  constructor(
    private readonly tools: ToolInvoker,
    options: CodeReviewSourceOptions = {},
  ) {
    this.server = options.server ?? 'github'
    this.now = options.now ?? (() => new Date())
  }

  async search(query: string, maxResults: number): Promise<PullRequestReviews[]> {
    const hours = sinceHours(query, this.now())
    const listed = parsePayload(
      'list_prs_with_reviews',
      await callToolOrThrow(this.tools, this.server, 'list_prs_with_reviews', { since_hours: hours }),
      ListPrsWithReviewsSchema,
    )

    const results: PullRequestReviews[] = []
    for (const pr of listed.prs_with_reviews.slice(0, maxResults)) {
      const detail = parsePayload(
        'get_pr_reviews',
        await callToolOrThrow(this.tools, this.server, 'get_pr_reviews', { repo: pr.repo, pr_number: pr.number }),
        PrReviewsSchema,
      )
      results.push(submittedSince(toPullRequestReviews(detail), sinceEpoch(query)))
    }
    return results
  }
}
