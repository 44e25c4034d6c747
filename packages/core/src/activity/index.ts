/**
 * Activity log: project events stored in SQLite.
 */

export { ActivityRepository, recordActivity } from './repository.js'
export { ActivityEventTypeSchema, CreateActivityInputSchema, ActivityEntrySchema } from './schemas.js'
export type { ActivityEventType, CreateActivityInput, ActivityEntry } from './schemas.js'
