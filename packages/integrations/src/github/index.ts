export { CodeReviewSource, sinceEpoch, sinceHours, toPullRequestReviews } from './code-review-source.js'
export type { CodeReviewSourceOptions } from './code-review-source.js'
