/**
 * Conversion of a full-format Gmail API message into an EmailRecord.
 */

import type { gmail_v1 } from 'googleapis'
import type { EmailRecord } from '@tripwire/core'
import { parseAddress, parseAddressList } from './address.js'
import { extractAttachments, extractTextBody } from './body-parser.js'

function headerMap(message: gmail_v1.Schema$Message): Map<string, string> {
  const headers = new Map<string, string>()
  for (const h of message.payload?.headers ?? []) {
    if (h.name) headers.set(h.name.toLowerCase(), h.value ?? '')
  }
  return headers
}

/** Date header as ISO, else Gmail's internalDate, else null. */
export function messageDate(dateHeader: string | undefined, internalDate: string | null | undefined): string | null {
  if (dateHeader) {
    const ts = Date.parse(dateHeader)
    if (!Number.isNaN(ts)) return new Date(ts).toISOString()
  }
  const internal = Number(internalDate)
  if (internalDate && Number.isFinite(internal) && internal > 0) return new Date(internal).toISOString()
  return null
}

export function toEmailRecord(message: gmail_v1.Schema$Message): EmailRecord | null {
  if (!message.id) return null
  const headers = headerMap(message)

  return {
    id: message.id,
    threadId: message.threadId ?? '',
    subject: headers.get('subject') ?? '',
    from: parseAddress(headers.get('from') ?? ''),
    to: parseAddressList(headers.get('to') ?? ''),
    date: messageDate(headers.get('date'), message.internalDate),
    snippet: message.snippet ?? '',
    bodyText: extractTextBody(message.payload),
    labels: message.labelIds ?? [],
    attachments: extractAttachments(message.payload),
  }
}
