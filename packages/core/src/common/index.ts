/**
 * Common utilities — shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr, attempt } from './result.js'
export type { Result } from './result.js'

export { TripwireError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export { TimestampSchema, NonEmptyStringSchema, DottedTypeSchema } from './schemas.js'
