/**
 * `${dotted.path}` template resolution against a run's variable context.
 * Unknown paths are left untouched so nothing is silently dropped.
 */

const PLACEHOLDER = /\$\{([^}]+)\}/g

export type TemplateContext = Record<string, unknown>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Walk `context` one dotted segment at a time.
 * Returns `undefined` when a segment is missing, a non-map is reached early, or the value is null.
 */
export function lookupPath(context: TemplateContext, path: string): unknown {
  let current: unknown = context
  for (const segment of path.trim().split('.')) {
    if (!isRecord(current) || !Object.hasOwn(current, segment)) return undefined
    current = current[segment]
    if (current === null || current === undefined) return undefined
  }
  return current
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

export function resolveString(template: string, context: TemplateContext): string {
  return template.replace(PLACEHOLDER, (match, path: string) => {
    const value = lookupPath(context, path)
    return value === undefined ? match : stringify(value)
  })
}

/** Recursively resolve every string inside maps and lists; other scalars pass through. */
export function resolveTemplates<T>(node: T, context: TemplateContext): T
export function resolveTemplates(node: unknown, context: TemplateContext): unknown {
  if (typeof node === 'string') return resolveString(node, context)
  if (Array.isArray(node)) return node.map((item) => resolveTemplates(item, context))
  if (isRecord(node)) {
    const out: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(node)) {
      out[key] = resolveTemplates(value, context)
    }
    return out
  }
  return node
}

/** Unique placeholder paths referenced by a template, in order of first use. */
export function extractPlaceholders(template: string): string[] {
  const matches = template.matchAll(PLACEHOLDER)
  return [...new Set([...matches].map((m) => m[1].trim()))]
}
