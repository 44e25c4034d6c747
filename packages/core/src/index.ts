/**
 * @mission-studio/core
 *
 * Framework-agnostic core library: mission types, projects, the editor draft model,
 * mission generation, hub sync, settings and the activity log.
 */

export * from './common/index.js'
export * from './mission-types/index.js'
export * from './projects/index.js'
export * from './editor/index.js'
export * from './providers/index.js'
export * from './generation/index.js'
export * from './hub/index.js'
export * from './settings/index.js'
export * from './activity/index.js'
export * from './storage/index.js'
