export interface HandlerContext {
  dryRun: boolean
  signal?: AbortSignal
}

/** Output of a handler run; becomes `ActionResult.output`. */
export type HandlerOutput = Record<string, unknown>
