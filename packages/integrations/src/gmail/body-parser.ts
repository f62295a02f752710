/**
 * Plain-text body and attachment extraction from Gmail message payloads.
 *
 * Walks multipart MIME structures depth-first; text/plain wins over anything else.
 */

import type { gmail_v1 } from 'googleapis'
import type { EmailAttachment } from '@tripwire/core'

type Part = gmail_v1.Schema$MessagePart

const MIME_TO_EXT: Record<string, string> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'xlsx',
  'application/vnd.ms-excel': 'xls',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
}

export function extractTextBody(payload: Part | undefined): string {
  if (!payload) return ''

  if (payload.mimeType === 'text/plain' && payload.body?.data && !payload.body.attachmentId) {
    return Buffer.from(payload.body.data, 'base64url').toString('utf-8')
  }

  for (const part of payload.parts ?? []) {
    const text = extractTextBody(part)
    if (text) return text
  }
  return ''
}

function cleanFilename(part: Part, index: number): string {
  const clean = (part.filename ?? '').trim().replace(/^"|"$/g, '').split(/[?#]/)[0]
  if (clean) return clean
  const ext = MIME_TO_EXT[(part.mimeType ?? '').toLowerCase()]
  return ext ? `attachment-${index}.${ext}` : ''
}

/**
 * Parts stored out of line (they carry an attachmentId) and named, or unnamed with a
 * document mime type. Forwarded messages are not descended into.
 */
export function extractAttachments(payload: Part | undefined): EmailAttachment[] {
  const results: EmailAttachment[] = []
  if (!payload) return results

  function walk(part: Part, index: number): void {
    const mimeType = part.mimeType ?? ''
    if (mimeType === 'message/rfc822') return

    const attachmentId = part.body?.attachmentId
    if (attachmentId && !mimeType.startsWith('multipart/')) {
      const filename = cleanFilename(part, index)
      if (filename) {
        results.push({ id: attachmentId, filename, mimeType, size: part.body?.size ?? 0 })
      }
      return
    }

    const children = part.parts ?? []
    for (let i = 0; i < children.length; i++) walk(children[i], i)
  }

  walk(payload, 0)
  return results
}
