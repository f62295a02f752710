/**
 * Typed error class for Tripwire operations.
 */

export type ErrorCode =
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'
  | 'LLM_ERROR'
  | 'PARSE_ERROR'
  | 'CONFIG_ERROR'
  | 'TOOL_ERROR'

export class TripwireError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'TripwireError'
    this.code = code
  }

  static notFound(entity: string, id: string): TripwireError {
    return new TripwireError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): TripwireError {
    return new TripwireError('VALIDATION_ERROR', message)
  }

  static db(message: string): TripwireError {
    return new TripwireError('DB_ERROR', message)
  }

  static io(message: string): TripwireError {
    return new TripwireError('IO_ERROR', message)
  }

  static llm(message: string): TripwireError {
    return new TripwireError('LLM_ERROR', message)
  }

  static parse(message: string): TripwireError {
    return new TripwireError('PARSE_ERROR', message)
  }

  static config(message: string): TripwireError {
    return new TripwireError('CONFIG_ERROR', message)
  }

  static tool(message: string): TripwireError {
    return new TripwireError('TOOL_ERROR', message)
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
