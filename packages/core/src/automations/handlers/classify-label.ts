/**
 * email.classify — fetch a message, classify it into one of a fixed set of
 * categories with a structured LLM completion, then apply the mapped label.
 */

import { z } from 'zod'
import { TripwireError } from '../../common/index.js'
import type { EmailClassifyAction } from '../schemas.js'
import type { StructuredCompleter, ToolInvoker, ToolResult } from '../ports.js'
import { callToolOrThrow, lastText } from '../ports.js'
import type { HandlerContext, HandlerOutput } from './types.js'

const CLASSIFY_CONTENT_LIMIT = 4000

export const ClassificationSchema = z.object({
  category: z.string(),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().default(''),
})
export type Classification = z.infer<typeof ClassificationSchema>

function messageContent(result: ToolResult): string {
  const text = lastText(result)
  if (text) return text
  return result.structured ? JSON.stringify(result.structured, null, 2) : ''
}

export function buildClassificationPrompt(action: EmailClassifyAction, content: string): string {
  const categoryList = action.categories.map((c) => `- "${c}"`).join('\n')
  const extra = action.instructions ? `\n\nAdditional guidance:\n${action.instructions}` : ''

  return `Classify the following email into exactly one of these categories:
${categoryList}${extra}

Respond with ONLY a JSON object (no markdown, no explanation):
{
  "category": "<one of the categories above, verbatim>",
  "confidence": <0.0 to 1.0>,
  "reasoning": "<one sentence explaining why>"
}

Email:
${content.slice(0, CLASSIFY_CONTENT_LIMIT)}`
}

export class ClassifyLabelHandler {
  constructor(
    private readonly tools: ToolInvoker,
    private readonly completer: StructuredCompleter | null,
  ) {}

  canRun(): boolean {
    return this.completer !== null && this.tools.hasServer('gmail')
  }

  async run(action: EmailClassifyAction, ctx: HandlerContext): Promise<HandlerOutput> {
    const args = { message_id: action.messageId }

    if (ctx.dryRun) {
      return {
        dryRun: true,
        wouldExecute: 'gmail.get_email',
        description:
          `Would fetch message ${action.messageId}, classify it as one of ` +
          `${action.categories.join(', ')} and apply the matching label with gmail.add_label`,
        steps: ['gmail.get_email', 'classify', 'gmail.add_label'],
        messageId: action.messageId,
        categories: action.categories,
        labels: action.labels,
        arguments: args,
      }
    }

    if (!this.completer) throw TripwireError.llm('No LLM provider configured for classification')

    const message = await callToolOrThrow(this.tools, 'gmail', 'get_email', args, ctx.signal)
    const prompt = buildClassificationPrompt(action, messageContent(message))
    const classification = await this.completer.completeStructured(prompt, ClassificationSchema, 0)

    const category = action.categories.find((c) => c === classification.category.trim())
    if (category === undefined) {
      throw TripwireError.validation(
        `Classifier returned unknown category "${classification.category}" (expected one of: ${action.categories.join(', ')})`,
      )
    }

    const label = action.labels[category] ?? category
    await callToolOrThrow(this.tools, 'gmail', 'add_label', { message_id: action.messageId, label }, ctx.signal)

    return {
      messageId: action.messageId,
      category,
      confidence: classification.confidence,
      reasoning: classification.reasoning,
      label,
    }
  }
}
