/**
 * code_review.implement — prepare a hand-off for a human-supervised coding agent.
 *
 * Fetches the formatted review context for a pull request, writes it to a prompt
 * file and returns a ready-to-run shell command. Nothing is executed here.
 */

import { createHash } from 'node:crypto'
import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { TripwireError } from '../../common/index.js'
import type { CodeReviewImplementAction } from '../schemas.js'
import type { ToolInvoker, ToolResult } from '../ports.js'
import { callToolOrThrow, lastText } from '../ports.js'
import type { HandlerContext, HandlerOutput } from './types.js'

export interface HandoffOptions {
  /** Directory prompt files are written to. */
  dir: string
  /** Agent CLI the prepared command invokes. */
  agentCommand: string
  /** Working directory when the action names none. */
  defaultWorkdir?: string
}

const ReviewPromptSchema = z.object({
  prompt: z.string(),
  branch: z.string().nullable().optional(),
})

export function handoffFileName(repo: string, prNumber: number): string {
  const slug = repo.replace(/[^A-Za-z0-9._-]+/g, '-')
  const digest = createHash('sha256').update(`${repo}#${prNumber}`).digest('hex').slice(0, 12)
  return `${slug}-pr-${prNumber}-${digest}.md`
}

/** POSIX single-quote a shell word. */
export function shellQuote(word: string): string {
  if (/^[A-Za-z0-9_./:=@%+-]+$/.test(word)) return word
  return `'${word.replace(/'/g, `'\\''`)}'`
}

export function handoffCommand(workdir: string, agentCommand: string, promptFile: string): string {
  return `cd ${shellQuote(workdir)} && ${agentCommand} "$(cat ${shellQuote(promptFile)})"`
}

function parsePrNumber(value: number | string): number {
  const n = typeof value === 'number' ? value : Number(value.trim())
  if (!Number.isInteger(n) || n <= 0) {
    throw TripwireError.validation(`Invalid pull request number: ${value}`)
  }
  return n
}

function parseReviewPrompt(result: ToolResult): z.infer<typeof ReviewPromptSchema> {
  let payload: unknown = result.structured
  if (payload === null) {
    try {
      payload = JSON.parse(lastText(result))
    } catch {
      throw TripwireError.parse('Review context response is not JSON')
    }
  }
  const parsed = ReviewPromptSchema.safeParse(payload)
  if (!parsed.success) {
    throw TripwireError.parse(`Invalid review context response: ${parsed.error.message}`)
  }
  return parsed.data
}

export class ReviewHandoffHandler {
  constructor(
    private readonly tools: ToolInvoker,
    private readonly options: HandoffOptions,
  ) {}

  canRun(): boolean {
    return this.tools.hasServer('github')
  }

  async run(action: CodeReviewImplementAction, ctx: HandlerContext): Promise<HandlerOutput> {
    const prNumber = parsePrNumber(action.prNumber)
    const args = { repo: action.repo, pr_number: prNumber }
    const promptFile = path.join(this.options.dir, handoffFileName(action.repo, prNumber))
    const workdir = action.workdir ?? this.options.defaultWorkdir ?? '.'
    const command = handoffCommand(workdir, this.options.agentCommand, promptFile)

    if (ctx.dryRun) {
      return {
        dryRun: true,
        wouldExecute: 'github.format_review_for_claude',
        description: `Would fetch review context for ${action.repo}#${prNumber}, write it to ${promptFile} and prepare an agent command`,
        promptFile,
        command,
        repo: action.repo,
        prNumber,
        arguments: args,
      }
    }

    const result = await callToolOrThrow(this.tools, 'github', 'format_review_for_claude', args, ctx.signal)
    const review = parseReviewPrompt(result)

    let prompt = review.prompt
    if (action.additionalInstructions) {
      prompt += `\n\n## Additional Instructions\n\n${action.additionalInstructions}`
    }

    await mkdir(this.options.dir, { recursive: true })
    await writeFile(promptFile, prompt, 'utf-8')

    return {
      promptFile,
      command,
      repo: action.repo,
      prNumber,
      branch: review.branch ?? null,
    }
  }
}
