import type { Action } from './schemas.js'
import { actionKey } from './schemas.js'

export interface ToolRoute {
  server: string
  tool: string
}

/** Dotted action type → tool-server route. Custom actions are looked up by operation. */
export const ACTION_ROUTES: Readonly<Record<string, ToolRoute>> = {
  'email.label': { server: 'gmail', tool: 'add_label' },
  'email.archive': { server: 'gmail', tool: 'archive_email' },
  'email.send': { server: 'gmail', tool: 'send_email' },
  'outlook.list_emails': { server: 'outlook', tool: 'list_emails' },
  'outlook.reply': { server: 'outlook', tool: 'reply' },
  'outlook.get_email': { server: 'outlook', tool: 'get_email' },
  'outlook.mark_read': { server: 'outlook', tool: 'mark_read' },
  'outlook.list_events': { server: 'outlook', tool: 'list_events' },
  'outlook.get_event': { server: 'outlook', tool: 'get_event' },
}

export function routeFor(action: Action): ToolRoute | null {
  return ACTION_ROUTES[actionKey(action)] ?? null
}

/** Convert a resolved action into the tool server's snake_case arguments. */
export function toToolArgs(action: Action): Record<string, unknown> {
  switch (action.type) {
    case 'email.label':
      return { message_id: action.messageId, label: action.label }
    case 'email.archive':
      return { message_id: action.messageId }
    case 'email.send':
      return { to: action.to, subject: action.subject, body: action.body }
    case 'email.classify':
      return { message_id: action.messageId, categories: action.categories, labels: action.labels }
    case 'code_review.implement':
      return { repo: action.repo, pr_number: action.prNumber }
    case 'custom':
      return action.params
  }
}
