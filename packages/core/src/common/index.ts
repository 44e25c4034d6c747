/**
 * Common utilities: shared types, Result pattern, error handling, atomic writes.
 */

export { Ok, Err } from './result.js'
export type { Result } from './result.js'

export { StudioError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export { UUIDSchema, TimestampSchema, IdentifierSchema, RelativePathSchema } from './schemas.js'

export { writeFileAtomic, writeJsonAtomic } from './atomic-write.js'
export { KeyedMutex } from './keyed-mutex.js'
