import { describe, it, expect } from 'vitest'
import type { gmail_v1 } from 'googleapis'
import { extractAttachments, extractTextBody } from '../src/gmail/body-parser.js'

const b64 = (text: string): string => Buffer.from(text, 'utf-8').toString('base64url')

function makePart(overrides: Partial<gmail_v1.Schema$MessagePart> = {}): gmail_v1.Schema$MessagePart {
  return {
    mimeType: 'application/pdf',
    filename: 'report.pdf',
    body: { attachmentId: 'att-1', size: 1234 },
    ...overrides,
  }
}

function makeMultipart(
  parts: gmail_v1.Schema$MessagePart[],
  mimeType = 'multipart/mixed',
): gmail_v1.Schema$MessagePart {
  return { mimeType, parts, body: {} }
}

describe('extractTextBody', () => {
  it('returns empty for undefined payload', () => {
    expect(extractTextBody(undefined)).toBe('')
  })

  it('decodes a single-part text/plain body', () => {
    expect(extractTextBody({ mimeType: 'text/plain', body: { data: b64('Hello there') } })).toBe('Hello there')
  })

  it('prefers text/plain inside multipart/alternative', () => {
    const payload = makeMultipart(
      [
        { mimeType: 'text/html', body: { data: b64('<p>Hi</p>') } },
        { mimeType: 'text/plain', body: { data: b64('Hi') } },
      ],
      'multipart/alternative',
    )
    expect(extractTextBody(payload)).toBe('Hi')
  })

  it('finds text nested below attachments', () => {
    const payload = makeMultipart([
      makeMultipart([{ mimeType: 'text/plain', body: { data: b64('Nested body') } }], 'multipart/alternative'),
      makePart(),
    ])
    expect(extractTextBody(payload)).toBe('Nested body')
  })

  it('ignores text/plain files sent as attachments', () => {
    const payload = makeMultipart([
      { mimeType: 'text/plain', filename: 'notes.txt', body: { attachmentId: 'a9', data: b64('file'), size: 4 } },
    ])
    expect(extractTextBody(payload)).toBe('')
  })
})

describe('extractAttachments', () => {
  it('returns empty for undefined payload', () => {
    expect(extractAttachments(undefined)).toEqual([])
  })

  it('extracts a single PDF attachment', () => {
    const payload = makeMultipart([{ mimeType: 'text/plain', body: { data: b64('hello') } }, makePart()])
    expect(extractAttachments(payload)).toEqual([
      { id: 'att-1', filename: 'report.pdf', mimeType: 'application/pdf', size: 1234 },
    ])
  })

  it('keeps MIME order', () => {
    const payload = makeMultipart([
      makePart({ filename: 'first.pdf', body: { attachmentId: 'a1', size: 100 } }),
      makePart({
        filename: 'second.xlsx',
        mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
        body: { attachmentId: 'a2', size: 200 },
      }),
    ])
    expect(extractAttachments(payload).map((a) => a.filename)).toEqual(['first.pdf', 'second.xlsx'])
  })

  it('synthesizes a filename for an unnamed document part', () => {
    const payload = makeMultipart([
      { mimeType: 'text/plain', body: { data: b64('x') } },
      makePart({ filename: '', body: { attachmentId: 'a1', size: 50 } }),
    ])
    expect(extractAttachments(payload)[0].filename).toBe('attachment-1.pdf')
  })

  it('skips unnamed parts of other types', () => {
    const payload = makeMultipart([makePart({ filename: '', mimeType: 'image/png', body: { attachmentId: 'a1' } })])
    expect(extractAttachments(payload)).toEqual([])
  })

  it('strips quotes and query strings from filenames', () => {
    const payload = makeMultipart([makePart({ filename: ' "scan.pdf?x=1" ' })])
    expect(extractAttachments(payload)[0].filename).toBe('scan.pdf')
  })

  it('does not descend into forwarded messages', () => {
    const payload = makeMultipart([
      {
        mimeType: 'message/rfc822',
        filename: 'forwarded.eml',
        parts: [makePart({ filename: 'inner.pdf', body: { attachmentId: 'in', size: 1 } })],
      },
      makePart({ filename: 'real.pdf', body: { attachmentId: 'r1', size: 100 } }),
    ])
    expect(extractAttachments(payload).map((a) => a.filename)).toEqual(['real.pdf'])
  })

  it('skips parts with no attachmentId', () => {
    const payload = makeMultipart([makePart({ filename: 'inline.pdf', body: { data: 'AAAA', size: 3 } })])
    expect(extractAttachments(payload)).toEqual([])
  })

  it('handles deeply nested multipart structures', () => {
    const payload = makeMultipart([
      makeMultipart([
        makeMultipart([
          makePart({
            filename: 'deep.docx',
            mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
            body: { attachmentId: 'd1', size: 400 },
          }),
        ]),
      ]),
    ])
    expect(extractAttachments(payload)).toEqual([
      {
        id: 'd1',
        filename: 'deep.docx',
        mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
        size: 400,
      },
    ])
  })
})
