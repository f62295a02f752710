/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const TimestampSchema = z.string().datetime({ offset: true })

export const NonEmptyStringSchema = z.string().trim().min(1, 'Value cannot be empty')

/** Dotted identifier such as `email.label` or `outlook.reply`. */
export const DottedTypeSchema = z
  .string()
  .regex(/^[a-z][a-z0-9_]*(\.[a-z][a-z0-9_]*)+$/, 'Expected a dotted type such as "email.label"')
