/**
 * Projects: missions, waypoints and media on the local filesystem.
 */

export { ProjectStore, MEDIA_EXTENSIONS } from './store.js'
export type { AttachMediaInput } from './store.js'
export {
  ProjectSchema,
  MissionSchema,
  WaypointSchema,
  LandmarkSchema,
  GeoPositionSchema,
  MissionValidationSchema,
  DatasetSplitSchema,
  CreationSourceSchema,
  LandmarkCategorySchema,
  ProjectNameSchema,
  EntityIdSchema,
  DATASET_SPLITS,
  PROJECT_SCHEMA_VERSION,
} from './schemas.js'
export type {
  Project,
  ProjectInput,
  ProjectSummary,
  Mission,
  MissionInput,
  Waypoint,
  WaypointInput,
  Landmark,
  LandmarkCategory,
  GeoPosition,
  MissionValidation,
  DatasetSplit,
  CreationSource,
  StagedMediaFile,
} from './schemas.js'
export {
  createMission,
  createWaypoint,
  referencedMissionTypes,
} from './mutations.js'
export type { NewMissionInput } from './mutations.js'
export { isLegacyProjectDocument, migrateLegacyProject, normalizeLegacyMedia } from './legacy.js'
