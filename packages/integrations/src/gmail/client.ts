/**
 * Gmail event source — searches the mailbox and returns fully parsed messages.
 *
 * OAuth2 with a stored refresh token; googleapis refreshes the access token.
 */

import { google } from 'googleapis'
import type { gmail_v1 } from 'googleapis'
import { TripwireError, errorMessage } from '@tripwire/core'
import type { EmailRecord, EventSource, GmailCredentials } from '@tripwire/core'
import { toEmailRecord } from './message.js'

const FETCH_BATCH = 5

export class GmailClient implements EventSource<EmailRecord> {
  private gmail: gmail_v1.Gmail

  constructor(credentials: GmailCredentials) {
    const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret)
    auth.setCredentials({ refresh_token: credentials.refreshToken })
    this.gmail = google.gmail({ version: 'v1', auth })
  }

  /** Messages matching a Gmail query, newest first. */
  async search(query: string, maxResults: number): Promise<EmailRecord[]> {
    let refs: gmail_v1.Schema$Message[]
    try {
      const listRes = await this.gmail.users.messages.list({ userId: 'me', q: query, maxResults })
      refs = listRes.data.messages ?? []
    } catch (err) {
      throw TripwireError.io(`Gmail search failed: ${errorMessage(err)}`)
    }

    const records: EmailRecord[] = []
    for (let i = 0; i < refs.length; i += FETCH_BATCH) {
      const batch = refs.slice(i, i + FETCH_BATCH)
      const fetched = await Promise.all(batch.map((ref) => (ref.id ? this.getMessage(ref.id) : null)))
      for (const record of fetched) {
        if (record) records.push(record)
      }
    }
    return records
  }

  /** A single message, or null when it cannot be fetched (deleted since listing, etc). */
  async getMessage(id: string): Promise<EmailRecord | null> {
    try {
      const res = await this.gmail.users.messages.get({ userId: 'me', id, format: 'full' })
      return toEmailRecord(res.data)
    } catch (err) {
      console.warn(`[gmail] failed to fetch message ${id}: ${errorMessage(err)}`)
      return null
    }
  }
}
