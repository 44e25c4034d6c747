export {
  GenerationAdapter,
  GenerationParamsSchema,
  MAX_MISSIONS_PER_RUN,
  MAX_WAYPOINTS_PER_MISSION,
} from './adapter.js'
export type {
  GenerationParams,
  GenerationParamsInput,
  GenerationRequest,
  GenerationProgress,
  GenerateOptions,
  GenerationAdapterDeps,
} from './adapter.js'
export { buildGenerationPrompt, describeMissionType, hasBuiltInProfile } from './prompt-builder.js'
export type { GenerationPrompt } from './prompt-builder.js'
export {
  parseGeneratedMission,
  extractJson,
  toMission,
  forwardRenderingPrompt,
  groundRenderingPrompt,
  GeneratedMissionSchema,
} from './output-parser.js'
export type { GeneratedMission, ToMissionOptions } from './output-parser.js'
export { createRng, weightedChoice, placeLandmarks, LANDMARK_DISTRIBUTIONS } from './random.js'
export type { Rng, LandmarkDistribution } from './random.js'
export { GeminiImageRenderer } from './media-renderer.js'
export type { MediaRenderer, RenderedImage, RenderOptions, GeminiImageRendererOptions } from './media-renderer.js'
export {
  GeminiMissionReviewer,
  DEFAULT_REVIEW_THRESHOLD,
  applyReviewThreshold,
  buildReviewPrompt,
  failedReview,
  parseReviewReply,
} from './mission-reviewer.js'
export type {
  MissionReviewer,
  ReviewImage,
  ReviewRequest,
  ReviewPromptPart,
  GeminiMissionReviewerOptions,
} from './mission-reviewer.js'
