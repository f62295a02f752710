/**
 * Normalisation of raw tools/call replies into the pipeline's ToolResult.
 */

import { z } from 'zod'
import type { ToolContent, ToolResult } from '@tripwire/core'

const TextContentSchema = z.object({ type: z.literal('text'), text: z.string() })
const ImageContentSchema = z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string() })
const ResourceContentSchema = z.object({
  type: z.literal('resource'),
  resource: z.object({ uri: z.string(), text: z.string().optional() }).passthrough(),
})

const RawToolResultSchema = z
  .object({
    content: z.array(z.object({ type: z.string() }).passthrough()).default([]),
    isError: z.boolean().optional(),
    structuredContent: z.record(z.unknown()).optional(),
  })
  .passthrough()

function normalizeContent(block: { type: string }): ToolContent | null {
  const text = TextContentSchema.safeParse(block)
  if (text.success) return { type: 'text', text: text.data.text }

  const image = ImageContentSchema.safeParse(block)
  if (image.success) return { type: 'image', data: image.data.data, mimeType: image.data.mimeType }

  const resource = ResourceContentSchema.safeParse(block)
  if (resource.success) {
    const { uri, text: resourceText } = resource.data.resource
    return resourceText === undefined ? { type: 'resource', uri } : { type: 'resource', uri, text: resourceText }
  }
  return null
}

/**
 * Text, image and embedded-resource blocks are kept; other block types are dropped.
 * An `isError` reply becomes a failure whose error is its text.
 */
export function normalizeToolResult(raw: unknown): ToolResult {
  const parsed = RawToolResultSchema.safeParse(raw)
  if (!parsed.success) {
    return { success: false, content: [], structured: null, error: 'Malformed tool result' }
  }

  const content: ToolContent[] = []
  for (const block of parsed.data.content) {
    const normalized = normalizeContent(block)
    if (normalized) content.push(normalized)
  }

  const failed = parsed.data.isError === true
  const errorText = content
    .filter((c) => c.type === 'text' && typeof c.text === 'string')
    .map((c) => c.text)
    .join('\n')

  return {
    success: !failed,
    content,
    structured: parsed.data.structuredContent ?? null,
    error: failed ? errorText || 'Tool reported an error' : null,
  }
}
