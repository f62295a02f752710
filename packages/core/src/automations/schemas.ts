import { z } from 'zod'
import { Ok, Err, TripwireError, NonEmptyStringSchema, DottedTypeSchema, TimestampSchema } from '../common/index.js'
import type { Result } from '../common/index.js'

// ── Enums ──

export const AutomationStatusEnum = z.enum(['draft', 'active', 'paused', 'error'])
export type AutomationStatus = z.infer<typeof AutomationStatusEnum>

export const ExecutionStatusEnum = z.enum(['running', 'success', 'partial', 'failed'])
export type ExecutionStatus = z.infer<typeof ExecutionStatusEnum>

export const ConditionOperatorEnum = z.enum(['equals', 'contains', 'matches', 'semantic'])
export type ConditionOperator = z.infer<typeof ConditionOperatorEnum>

export const EmailFieldEnum = z.enum(['from', 'to', 'subject', 'body', 'attachments'])
export type EmailField = z.infer<typeof EmailFieldEnum>

export const CodeReviewFieldEnum = z.enum(['repo', 'author', 'reviewer', 'state', 'title'])
export type CodeReviewField = z.infer<typeof CodeReviewFieldEnum>

export const WatcherDomainEnum = z.enum(['email', 'code_review'])
export type WatcherDomain = z.infer<typeof WatcherDomainEnum>

// ── Conditions ──

const conditionShape = {
  operator: ConditionOperatorEnum.default('contains'),
  value: z.string(),
  // Reserved for weighting; the evaluator ignores it.
  confidence: z.number().min(0).max(1).default(1),
}

export const EmailConditionSchema = z.object({ field: EmailFieldEnum, ...conditionShape })
export type EmailCondition = z.infer<typeof EmailConditionSchema>

export const CodeReviewConditionSchema = z.object({ field: CodeReviewFieldEnum, ...conditionShape })
export type CodeReviewCondition = z.infer<typeof CodeReviewConditionSchema>

// ── Triggers ──

export const EmailTriggerSchema = z.object({
  type: z.literal('email'),
  account: z.string().default(''),
  conditions: z.array(EmailConditionSchema).default([]),
})

export const CodeReviewTriggerSchema = z.object({
  type: z.literal('code_review'),
  account: z.string().default(''),
  conditions: z.array(CodeReviewConditionSchema).default([]),
  reviewStates: z.array(z.string()).default(['changes_requested', 'commented']),
})

export const ScheduleTriggerSchema = z.object({
  type: z.literal('schedule'),
  cron: z.string().nullable().default(null),
  intervalValue: z.number().int().positive().nullable().default(null),
  intervalUnit: z.enum(['minutes', 'hours', 'days']).nullable().default(null),
  timezone: z.string().default('UTC'),
})

export const WebhookTriggerSchema = z.object({
  type: z.literal('webhook'),
  endpoint: z.string(),
  secret: z.string().nullable().default(null),
})

export const FileChangeTriggerSchema = z.object({
  type: z.literal('file_change'),
  connector: z.string(),
  pathPattern: z.string(),
  events: z.array(z.enum(['created', 'modified', 'deleted'])).default(['created', 'modified']),
})

export const ManualTriggerSchema = z.object({
  type: z.literal('manual'),
})

export const TriggerSchema = z.discriminatedUnion('type', [
  EmailTriggerSchema,
  CodeReviewTriggerSchema,
  ScheduleTriggerSchema,
  WebhookTriggerSchema,
  FileChangeTriggerSchema,
  ManualTriggerSchema,
])

export type Trigger = z.infer<typeof TriggerSchema>
export type EmailTrigger = z.infer<typeof EmailTriggerSchema>
export type CodeReviewTrigger = z.infer<typeof CodeReviewTriggerSchema>

// ── Actions ──

const actionId = z.string().min(1).optional()

// Numbers and strings both pass: templates such as "${trigger.prNumber}" resolve at run time.
const templatedNumber = z.union([z.number().int().positive(), z.string().min(1)])

export const EmailLabelActionSchema = z.object({
  id: actionId,
  type: z.literal('email.label'),
  messageId: z.string(),
  label: z.string(),
})

export const EmailArchiveActionSchema = z.object({
  id: actionId,
  type: z.literal('email.archive'),
  messageId: z.string(),
})

export const EmailSendActionSchema = z.object({
  id: actionId,
  type: z.literal('email.send'),
  to: z.union([z.string(), z.array(z.string())]).transform((v) => (typeof v === 'string' ? [v] : v)),
  subject: z.string().default(''),
  body: z.string().default(''),
})

export const EmailClassifyActionSchema = z.object({
  id: actionId,
  type: z.literal('email.classify'),
  messageId: z.string(),
  categories: z.array(NonEmptyStringSchema).min(1, 'At least one category is required'),
  /** category → label applied to the message; unmapped categories use the category name */
  labels: z.record(z.string()).default({}),
  instructions: z.string().optional(),
})

export const CodeReviewImplementActionSchema = z.object({
  id: actionId,
  type: z.literal('code_review.implement'),
  repo: z.string(),
  prNumber: templatedNumber,
  additionalInstructions: z.string().optional(),
  workdir: z.string().optional(),
})

export const CustomActionSchema = z.object({
  id: actionId,
  type: z.literal('custom'),
  operation: DottedTypeSchema,
  params: z.record(z.unknown()).default({}),
})

export const ActionSchema = z.discriminatedUnion('type', [
  EmailLabelActionSchema,
  EmailArchiveActionSchema,
  EmailSendActionSchema,
  EmailClassifyActionSchema,
  CodeReviewImplementActionSchema,
  CustomActionSchema,
])

export type Action = z.infer<typeof ActionSchema> & { id: string }
export type EmailLabelAction = Extract<Action, { type: 'email.label' }>
export type EmailArchiveAction = Extract<Action, { type: 'email.archive' }>
export type EmailSendAction = Extract<Action, { type: 'email.send' }>
export type EmailClassifyAction = Extract<Action, { type: 'email.classify' }>
export type CodeReviewImplementAction = Extract<Action, { type: 'code_review.implement' }>
export type CustomAction = Extract<Action, { type: 'custom' }>

const NAMED_ACTION_TYPES: ReadonlySet<string> = new Set([
  'email.label',
  'email.archive',
  'email.send',
  'email.classify',
  'code_review.implement',
])

/** The dotted type an action is routed by; custom actions route by their operation. */
export function actionKey(action: Action): string {
  return action.type === 'custom' ? action.operation : action.type
}

// ── Automations ──

export const VariableSchema = z.object({
  name: NonEmptyStringSchema,
  type: z.string().default('string'),
  resolvedFrom: z.string().default(''),
})
export type Variable = z.infer<typeof VariableSchema>

// ── Stored-shape normalisation ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function camelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase())
}

/** Rename top-level snake_case keys (`review_states` → `reviewStates`). */
export function camelizeKeys(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(record)) {
    out[camelCase(key)] = value
  }
  return out
}

/** Triggers stored with the legacy `github_pr` tag are code-review triggers. */
export function normalizeRawTrigger(raw: unknown): unknown {
  if (!isRecord(raw)) return raw
  const trigger = camelizeKeys(raw)
  if (trigger.type === 'github_pr') trigger.type = 'code_review'
  return trigger
}

/**
 * Any dotted type without a dedicated variant becomes a `custom` action.
 * Its parameters are the stored `params` map, or every other field when absent.
 */
export function normalizeRawAction(raw: unknown): unknown {
  if (!isRecord(raw)) return raw
  const type = raw.type
  if (typeof type !== 'string' || type === 'custom' || NAMED_ACTION_TYPES.has(type)) {
    return camelizeKeys(raw)
  }
  if (type === 'github.review' || type === 'github_review') {
    return { ...camelizeKeys(raw), type: 'code_review.implement' }
  }
  const { id, type: _type, params, ...rest } = raw
  return {
    ...(id !== undefined ? { id } : {}),
    type: 'custom',
    operation: type,
    params: isRecord(params) ? params : rest,
  }
}

const nowIso = (): string => new Date().toISOString()

const AutomationShape = z.object({
  id: NonEmptyStringSchema,
  name: NonEmptyStringSchema,
  description: z.string().default(''),
  status: AutomationStatusEnum.default('draft'),
  trigger: z.preprocess(normalizeRawTrigger, TriggerSchema),
  variables: z.array(z.preprocess((v) => (isRecord(v) ? camelizeKeys(v) : v), VariableSchema)).default([]),
  actions: z.array(z.preprocess(normalizeRawAction, ActionSchema)).default([]),
  createdAt: TimestampSchema.default(nowIso),
  updatedAt: TimestampSchema.default(nowIso),
  version: z.number().int().min(1).default(1),
})

type ParsedAutomation = z.infer<typeof AutomationShape>

export interface Automation extends Omit<ParsedAutomation, 'actions'> {
  actions: Action[]
}

export type AutomationInput = z.input<typeof AutomationShape>

export const AutomationSchema = AutomationShape.transform(
  (automation): Automation => ({
    ...automation,
    actions: automation.actions.map(
      (action, index): Action => ({ ...action, id: action.id ?? `action_${index}` }),
    ),
  }),
)

/**
 * Parse a stored or hand-written automation into its canonical form.
 * Raw maps, snake_case keys and free-form action types are all accepted here
 * so nothing downstream has to branch on representation.
 */
export function parseAutomation(raw: unknown): Result<Automation, TripwireError> {
  const parsed = AutomationSchema.safeParse(isRecord(raw) ? camelizeKeys(raw) : raw)
  if (!parsed.success) {
    return Err(
      TripwireError.validation(
        parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
      ),
    )
  }
  return Ok(parsed.data)
}

// ── Executions ──

export const TriggerEventSchema = z.object({
  type: z.string(),
  data: z.record(z.unknown()).default({}),
  timestamp: TimestampSchema.default(nowIso),
})
export type TriggerEvent = z.infer<typeof TriggerEventSchema>

export const ResolvedVariableSchema = z.object({
  name: z.string(),
  value: z.unknown(),
  confidence: z.number().min(0).max(1).default(1),
})
export type ResolvedVariable = z.infer<typeof ResolvedVariableSchema>

export const ActionResultStatusEnum = z.enum(['success', 'failed', 'skipped'])
export type ActionResultStatus = z.infer<typeof ActionResultStatusEnum>

export const ActionResultSchema = z.object({
  actionId: z.string(),
  status: ActionResultStatusEnum,
  output: z.record(z.unknown()).default({}),
  error: z.string().nullable().default(null),
  durationMs: z.number().int().nonnegative().nullable().default(null),
})
export type ActionResult = z.infer<typeof ActionResultSchema>

export const ExecutionErrorSchema = z.object({
  message: z.string(),
  actionId: z.string().nullable().default(null),
  recoverable: z.boolean().default(true),
  recoveryOptions: z.array(z.string()).default([]),
})
export type ExecutionError = z.infer<typeof ExecutionErrorSchema>

export const ExecutionSchema = z.object({
  id: z.string(),
  automationId: z.string(),
  automationVersion: z.number().int().min(1),
  triggeredAt: TimestampSchema,
  completedAt: TimestampSchema.nullable().default(null),
  status: ExecutionStatusEnum,
  triggerEvent: TriggerEventSchema,
  variables: z.array(ResolvedVariableSchema).default([]),
  actionResults: z.array(ActionResultSchema).default([]),
  error: ExecutionErrorSchema.nullable().default(null),
})
export type Execution = z.infer<typeof ExecutionSchema>

// ── Watcher checkpoints ──

export const WatcherStateSchema = z.object({
  lastCheck: TimestampSchema.nullable().default(null),
  processedIds: z.array(z.string()).default([]),
})
export type WatcherState = z.infer<typeof WatcherStateSchema>
