/**
 * Trigger matcher — evaluates a trigger's conditions against a domain event.
 *
 * Conditions are ANDed with short-circuit; an empty list matches everything.
 */

import type {
  Trigger,
  EmailTrigger,
  CodeReviewTrigger,
  ConditionOperator,
  EmailField,
  CodeReviewField,
} from './schemas.js'
import type { DomainEvent, EmailRecord, CodeReviewEvent } from './events.js'

type Accessor<T> = (record: T) => string | null

const EMAIL_FIELDS: Record<EmailField, Accessor<EmailRecord>> = {
  from: (e) => `${e.from.name} <${e.from.email}> @${e.from.domain}`,
  to: (e) => e.to.map((a) => a.email).join(', '),
  subject: (e) => e.subject,
  body: (e) => e.bodyText || e.snippet,
  attachments: (e) => e.attachments.map((a) => a.filename).join(', '),
}

const REVIEW_FIELDS: Record<CodeReviewField, Accessor<CodeReviewEvent>> = {
  repo: (r) => r.pullRequest.repo,
  author: (r) => r.pullRequest.pr.author,
  reviewer: (r) => r.review.author,
  state: (r) => r.review.state,
  title: (r) => r.pullRequest.pr.title,
}

interface EvaluableCondition<F extends string> {
  field: F
  operator: ConditionOperator
  value: string
}

export function evaluateOperator(operator: ConditionOperator, actual: string, expected: string): boolean {
  switch (operator) {
    // `equals` is containment, matching how stored automations were authored.
    case 'equals':
    case 'contains':
    // No semantic evaluator; falls back to containment.
    case 'semantic':
      return actual.toLowerCase().includes(expected.toLowerCase())
    case 'matches':
      try {
        return new RegExp(expected, 'i').test(actual)
      } catch {
        return false
      }
  }
}

function allConditionsHold<T, F extends string>(
  record: T,
  conditions: EvaluableCondition<F>[],
  fields: Record<F, Accessor<T>>,
): boolean {
  return conditions.every((condition) => {
    const actual = fields[condition.field](record)
    if (actual === null || actual === undefined) return false
    return evaluateOperator(condition.operator, actual, condition.value)
  })
}

export class TriggerMatcher {
  matches(event: DomainEvent, trigger: Trigger): boolean {
    switch (event.domain) {
      case 'email':
        return trigger.type === 'email' && this.matchesEmail(event.email, trigger)
      case 'code_review':
        return trigger.type === 'code_review' && this.matchesReview(event.review, trigger)
    }
  }

  matchesEmail(email: EmailRecord, trigger: EmailTrigger): boolean {
    return allConditionsHold(email, trigger.conditions, EMAIL_FIELDS)
  }

  matchesReview(event: CodeReviewEvent, trigger: CodeReviewTrigger): boolean {
    const state = event.review.state.toLowerCase()
    if (!trigger.reviewStates.some((s) => s.toLowerCase() === state)) return false
    return allConditionsHold(event, trigger.conditions, REVIEW_FIELDS)
  }
}
