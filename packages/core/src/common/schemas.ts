/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const UUIDSchema = z.string().uuid()

export const TimestampSchema = z.string().datetime()

/** Identifier used for mission-type names, state names, tool and observation ids. */
export const IdentifierSchema = z
  .string()
  .min(1, 'Identifier cannot be empty')
  .max(64, 'Identifier must be 64 characters or fewer')
  .regex(/^[A-Za-z0-9_]+$/, 'Identifier may only contain letters, numbers and underscores')

/** Relative path inside a project directory (forward slashes, no traversal). */
export const RelativePathSchema = z
  .string()
  .min(1, 'Path cannot be empty')
  .refine((p) => !p.startsWith('/') && !p.split(/[\\/]/).includes('..'), {
    message: 'Path must be relative and stay inside the project',
  })
