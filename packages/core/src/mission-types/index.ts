/**
 * Mission types: state-machine configurations shared by missions.
 */

export { MissionTypeManager } from './manager.js'
export type { MissionTypeReference, MissionTypeReferenceIndex } from './manager.js'
export {
  MissionTypeConfigSchema,
  StateDefinitionSchema,
  TransitionSchema,
  TransitionKindSchema,
  ImageResolutionSchema,
  NodePositionSchema,
} from './schemas.js'
export type {
  MissionTypeConfig,
  MissionTypeConfigInput,
  StateDefinition,
  StateDefinitionInput,
  Transition,
  TransitionInput,
  TransitionKind,
  ImageResolution,
  NodePosition,
  MissionTypeIssue,
  OutputKey,
  Verifier,
} from './schemas.js'
export {
  validateMissionType,
  collectMissionTypeIssues,
  listMissionTypeWarnings,
  normalizeConfig,
} from './validation.js'
export { documentToConfig, configToDocument } from './document.js'
export type { MissionTypeDocument } from './document.js'
export { loadDefaultMissionTypes } from './defaults.js'
export {
  TOOL_CATALOG,
  OBSERVATION_CATALOG,
  CONDITION_TEMPLATES,
  STATE_TEMPLATES,
} from './catalog.js'
export type { ConditionTemplate, StateTemplateId } from './catalog.js'
