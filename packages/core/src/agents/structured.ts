/**
 * Structured completion over any LLMProvider: ask for a JSON object, strip
 * markdown fences, parse, and validate with zod.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import { TripwireError } from '../common/index.js'
import type { StructuredCompleter } from '../automations/ports.js'
import type { LLMProvider } from './provider.js'

const STRUCTURED_SYSTEM_PROMPT = `You are a precise assistant that answers with data, not prose.
Respond with ONLY a single valid JSON object matching the format requested by the user.
Do not wrap it in markdown code blocks and do not add explanations.`

/** Remove a surrounding ``` / ```json fence if present. */
export function stripCodeFences(text: string): string {
  return text.replace(/```json\s*|\s*```/g, '').trim()
}

export class ProviderStructuredCompleter implements StructuredCompleter {
  constructor(private readonly provider: LLMProvider) {}

  async completeStructured<T>(
    prompt: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    temperature: number,
  ): Promise<T> {
    const response = await this.provider.chatComplete(
      [{ role: 'user', content: prompt }],
      STRUCTURED_SYSTEM_PROMPT,
      { temperature },
    )
    if (!response.ok) throw response.error

    let parsed: unknown
    try {
      parsed = JSON.parse(stripCodeFences(response.value))
    } catch {
      throw TripwireError.parse(`Failed to parse structured response: ${response.value}`)
    }

    const validated = schema.safeParse(parsed)
    if (!validated.success) {
      throw TripwireError.parse(`Invalid structured response: ${validated.error.message}`)
    }
    return validated.data
  }
}
