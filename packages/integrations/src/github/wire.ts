/**
 * Wire shapes of the `github` tool server's replies. Snake_case as sent.
 */

import { z } from 'zod'

const login = z
  .union([z.string(), z.object({ login: z.string() }).passthrough()])
  .nullish()
  .transform((v) => (v == null ? null : typeof v === 'string' ? v : v.login))

const idString = z.union([z.string(), z.number()]).transform(String)

export const PrSummarySchema = z
  .object({
    number: z.number().int(),
    title: z.string().default(''),
    url: z.string().nullish(),
    repo: z.string(),
    branch: z.string().nullish(),
    review_count: z.number().int().default(0),
  })
  .passthrough()

export const ListPrsWithReviewsSchema = z.object({
  user: z.string().nullish(),
  prs_with_reviews: z.array(PrSummarySchema).default([]),
})
export type ListPrsWithReviews = z.infer<typeof ListPrsWithReviewsSchema>

export const WireReviewSchema = z.object({
  id: idString,
  author: login,
  state: z.string().default(''),
  body: z.string().nullish().transform((v) => v ?? ''),
  submitted_at: z.string().nullish().transform((v) => v ?? null),
})

export const WireCommentSchema = z.object({
  id: idString,
  author: login,
  path: z.string().nullish().transform((v) => v ?? null),
  line: z.number().int().nullish().transform((v) => v ?? null),
  body: z.string().nullish().transform((v) => v ?? ''),
})

export const WirePullRequestSchema = z
  .object({
    number: z.number().int(),
    title: z.string().default(''),
    author: login,
    headRefName: z.string().nullish().transform((v) => v ?? null),
    baseRefName: z.string().nullish().transform((v) => v ?? null),
    url: z.string().nullish().transform((v) => v ?? null),
  })
  .passthrough()

export const PrReviewsSchema = z.object({
  repo: z.string(),
  pr: WirePullRequestSchema,
  reviews: z.array(WireReviewSchema).default([]),
  comments: z.array(WireCommentSchema).default([]),
})
export type PrReviews = z.infer<typeof PrReviewsSchema>

/** Tool servers report some failures as `{ "error": "..." }` in a successful reply. */
export const ToolErrorPayloadSchema = z.object({ error: z.string() })
