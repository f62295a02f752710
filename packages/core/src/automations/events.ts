/**
 * Domain event records produced by event sources, and their TriggerEvent payloads.
 */

import type { TriggerEvent } from './schemas.js'

// ── Email ──

export interface EmailAddress {
  name: string
  email: string
  domain: string
}

export interface EmailAttachment {
  id: string
  filename: string
  mimeType: string
  size: number
}

export interface EmailRecord {
  id: string
  threadId: string
  subject: string
  from: EmailAddress
  to: EmailAddress[]
  /** ISO timestamp, or null when the message carried no parseable Date header. */
  date: string | null
  snippet: string
  bodyText: string
  labels: string[]
  attachments: EmailAttachment[]
}

// ── Code review ──

export interface ReviewRecord {
  id: string
  author: string | null
  state: string
  body: string
  submittedAt: string | null
}

export interface ReviewComment {
  id: string
  author: string | null
  path: string | null
  line: number | null
  body: string
}

export interface PullRequestInfo {
  number: number
  title: string
  author: string | null
  headRefName: string | null
  baseRefName: string | null
  url: string | null
}

export interface PullRequestReviews {
  /** `owner/name` slug */
  repo: string
  number: number
  pr: PullRequestInfo
  reviews: ReviewRecord[]
  comments: ReviewComment[]
}

export interface CodeReviewEvent {
  pullRequest: PullRequestReviews
  review: ReviewRecord
}

export type DomainEvent =
  | { domain: 'email'; email: EmailRecord }
  | { domain: 'code_review'; review: CodeReviewEvent }

export function reviewEventId(pullRequest: PullRequestReviews, review: ReviewRecord): string {
  return `${pullRequest.repo}#${pullRequest.number}:${review.id}`
}

/** One event per submitted review. */
export function reviewEvents(pullRequest: PullRequestReviews): CodeReviewEvent[] {
  return pullRequest.reviews.map((review) => ({ pullRequest, review }))
}

// ── TriggerEvent builders ──

export function emailTriggerEvent(email: EmailRecord, now: Date = new Date()): TriggerEvent {
  return {
    type: 'email',
    timestamp: now.toISOString(),
    data: {
      email: {
        id: email.id,
        threadId: email.threadId,
        subject: email.subject,
        from: email.from.email,
        fromName: email.from.name,
        fromDomain: email.from.domain,
        to: email.to.map((a) => a.email),
        snippet: email.snippet,
        date: email.date,
        labels: email.labels,
        hasAttachments: email.attachments.length > 0,
      },
    },
  }
}

export function codeReviewTriggerEvent(event: CodeReviewEvent, now: Date = new Date()): TriggerEvent {
  const { pullRequest, review } = event
  return {
    type: 'code_review',
    timestamp: now.toISOString(),
    data: {
      repo: pullRequest.repo,
      prNumber: pullRequest.number,
      prTitle: pullRequest.pr.title,
      branch: pullRequest.pr.headRefName,
      review: {
        id: review.id,
        author: review.author,
        state: review.state,
        body: review.body,
      },
      commentCount: pullRequest.comments.length,
    },
  }
}
