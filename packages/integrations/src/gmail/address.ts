/**
 * RFC 5322-ish address parsing for From/To headers.
 */

import type { EmailAddress } from '@tripwire/core'

/** `Name <a@b.com>`, `"Doe, Jane" <a@b.com>` or a bare `a@b.com`. */
export function parseAddress(raw: string): EmailAddress {
  const trimmed = raw.trim()
  const angled = /^(.*?)<([^>]*)>\s*$/.exec(trimmed)

  let name = ''
  let email = trimmed
  if (angled) {
    name = angled[1].trim().replace(/^"(.*)"$/, '$1').trim()
    email = angled[2].trim()
  }

  const at = email.lastIndexOf('@')
  return { name, email, domain: at >= 0 ? email.slice(at + 1) : '' }
}

/** Split a header on commas that are outside quoted names. */
export function splitAddressList(header: string): string[] {
  const parts: string[] = []
  let current = ''
  let quoted = false
  for (const ch of header) {
    if (ch === '"') quoted = !quoted
    if (ch === ',' && !quoted) {
      parts.push(current)
      current = ''
      continue
    }
    current += ch
  }
  parts.push(current)
  return parts.map((p) => p.trim()).filter(Boolean)
}

export function parseAddressList(header: string): EmailAddress[] {
  return splitAddressList(header).map(parseAddress)
}
