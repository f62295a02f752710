/**
 * Action router — decides whether an action can be dispatched and executes it,
 * either against the static route table or through a specialised handler.
 *
 * `execute` never throws: collaborator failures become failed ActionResults.
 */

import { TripwireError, errorMessage } from '../common/index.js'
import type { Action, ActionResult } from './schemas.js'
import { actionKey } from './schemas.js'
import type { StructuredCompleter, ToolInvoker } from './ports.js'
import { callToolOrThrow, lastText } from './ports.js'
import { routeFor, toToolArgs } from './routes.js'
import { resolveTemplates } from './template.js'
import type { TemplateContext } from './template.js'
import { ClassifyLabelHandler } from './handlers/classify-label.js'
import { ReviewHandoffHandler } from './handlers/review-handoff.js'
import type { HandoffOptions } from './handlers/review-handoff.js'
import type { HandlerContext, HandlerOutput } from './handlers/types.js'

export interface ActionRouterOptions {
  completer?: StructuredCompleter | null
  handoff: HandoffOptions
}

export interface ExecuteOptions {
  dryRun?: boolean
  signal?: AbortSignal
}

export class ActionRouter {
  private readonly classifier: ClassifyLabelHandler
  private readonly handoff: ReviewHandoffHandler

  constructor(
    private readonly tools: ToolInvoker,
    options: ActionRouterOptions,
  ) {
    this.classifier = new ClassifyLabelHandler(tools, options.completer ?? null)
    this.handoff = new ReviewHandoffHandler(tools, options.handoff)
  }

  canDispatch(action: Action): boolean {
    switch (action.type) {
      case 'email.classify':
        return this.classifier.canRun()
      case 'code_review.implement':
        return this.handoff.canRun()
      default: {
        const route = routeFor(action)
        return route !== null && this.tools.hasServer(route.server)
      }
    }
  }

  async execute(action: Action, variables: TemplateContext, options: ExecuteOptions = {}): Promise<ActionResult> {
    const started = Date.now()
    const ctx: HandlerContext = { dryRun: options.dryRun ?? false, signal: options.signal }

    try {
      const resolved = resolveTemplates(action, variables)
      const output = await this.dispatch(resolved, ctx)
      return { actionId: action.id, status: 'success', output, error: null, durationMs: Date.now() - started }
    } catch (err) {
      return {
        actionId: action.id,
        status: 'failed',
        output: {},
        error: errorMessage(err),
        durationMs: Date.now() - started,
      }
    }
  }

  private async dispatch(action: Action, ctx: HandlerContext): Promise<HandlerOutput> {
    switch (action.type) {
      case 'email.classify':
        return this.classifier.run(action, ctx)
      case 'code_review.implement':
        return this.handoff.run(action, ctx)
      case 'email.label':
      case 'email.archive':
      case 'email.send':
      case 'custom':
        return this.callRoute(action, ctx)
    }
  }

  private async callRoute(action: Action, ctx: HandlerContext): Promise<HandlerOutput> {
    const route = routeFor(action)
    if (!route) throw TripwireError.validation(`No route for action type: ${actionKey(action)}`)

    const args = toToolArgs(action)

    if (ctx.dryRun) {
      return {
        ...args,
        dryRun: true,
        wouldExecute: `${route.server}.${route.tool}`,
        description: `Would call tool '${route.tool}' on server '${route.server}'`,
        arguments: args,
      }
    }

    const result = await callToolOrThrow(this.tools, route.server, route.tool, args, ctx.signal)
    const output: HandlerOutput = { server: route.server, tool: route.tool }
    const text = lastText(result)
    if (text) output.result = text
    if (result.structured) output.structured = result.structured
    return output
  }
}
