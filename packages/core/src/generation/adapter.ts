/**
 * Generation adapter: synthesize missions for a project through an LLM provider.
 *
 * A run is all-or-nothing: missions and their rendered media are collected in memory
 * and handed to the project store in one append. Runs for one project are serialized
 * with hub operations through the shared operations lock.
 */

import { z } from 'zod'
import { Ok, Err, StudioError, KeyedMutex } from '../common/index.js'
import type { Result } from '../common/index.js'
import { DATASET_SPLITS, DatasetSplitSchema } from '../projects/index.js'
import type { DatasetSplit, Mission, MissionValidation, ProjectStore, StagedMediaFile, Waypoint } from '../projects/index.js'
import type { MissionTypeManager } from '../mission-types/index.js'
import type { LLMProvider } from '../providers/index.js'
import type { MediaRenderer } from './media-renderer.js'
import { DEFAULT_REVIEW_THRESHOLD, applyReviewThreshold, failedReview } from './mission-reviewer.js'
import type { MissionReviewer, ReviewImage } from './mission-reviewer.js'
import { buildGenerationPrompt } from './prompt-builder.js'
import { parseGeneratedMission, toMission } from './output-parser.js'
import { LANDMARK_DISTRIBUTIONS, createRng, weightedChoice } from './random.js'

export const MAX_MISSIONS_PER_RUN = 100
export const MAX_WAYPOINTS_PER_MISSION = 20

export const GenerationParamsSchema = z
  .object({
    count: z.number().int().min(1).max(MAX_MISSIONS_PER_RUN),
    waypointsPerMission: z.number().int().min(1).max(MAX_WAYPOINTS_PER_MISSION).default(3),
    landmarkDistribution: z.enum(LANDMARK_DISTRIBUTIONS).default('model'),
    seed: z.number().int().optional(),
    splitWeights: z.record(DatasetSplitSchema, z.number().min(0)).default({}),
  })
  .superRefine((params, ctx) => {
    const total = DATASET_SPLITS.reduce((sum, s) => sum + (params.splitWeights[s] ?? 1), 0)
    if (total <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one split weight must be positive', path: ['splitWeights'] })
    }
  })
export type GenerationParams = z.infer<typeof GenerationParamsSchema>
export type GenerationParamsInput = z.input<typeof GenerationParamsSchema>

export interface GenerationRequest {
  projectId: string
  missionType: string
  params: GenerationParamsInput
}

export interface GenerationProgress {
  completed: number
  total: number
  missionId?: string
}

export interface GenerateOptions {
  provider: LLMProvider
  renderer?: MediaRenderer
  /** Reviews missions that have rendered images; verdicts land in `Mission.validation`. */
  reviewer?: MissionReviewer
  /** Confidence below which a review always asks for a person. */
  reviewThreshold?: number
  signal?: AbortSignal
  onProgress?: (progress: GenerationProgress) => void
}

export interface GenerationAdapterDeps {
  store: ProjectStore
  missionTypes: MissionTypeManager
  /** Shared with the hub adapter so generation and sync never interleave on one project. */
  operations?: KeyedMutex
}

const RENDER_ASPECT: Record<string, string> = {
  forward_image: '16:9',
  ground_image: '1:1',
  secondary_ground_image: '1:1',
}

function aborted(signal?: AbortSignal): boolean {
  return signal?.aborted === true
}

function renderPromptsOf(metadata: Record<string, unknown>): Array<[string, string]> {
  const prompts = metadata.renderPrompts
  if (typeof prompts !== 'object' || prompts === null) return []
  return Object.entries(prompts).filter((e): e is [string, string] => typeof e[1] === 'string')
}

export class GenerationAdapter {
  private readonly operations: KeyedMutex

  constructor(private readonly deps: GenerationAdapterDeps) {
    this.operations = deps.operations ?? new KeyedMutex()
  }

  async generate(request: GenerationRequest, options: GenerateOptions): Promise<Result<Mission[], StudioError>> {
    const parsed = GenerationParamsSchema.safeParse(request.params)
    if (!parsed.success) {
      return Err(StudioError.validation(parsed.error.issues.map((i) => i.message).join('; ')))
    }
    const params = parsed.data

    return this.operations.runExclusive(request.projectId, async () => {
      const project = await this.deps.store.open(request.projectId)
      if (!project.ok) return project
      const config = await this.deps.missionTypes.load(request.missionType)
      if (!config.ok) return config

      const rng = createRng(params.seed)
      const splits: Array<[DatasetSplit, number]> = DATASET_SPLITS.map((s) => [s, params.splitWeights[s] ?? 1])
      const prompt = buildGenerationPrompt(config.value, params.waypointsPerMission)
      const offset = project.value.missions.length
      const missions: Mission[] = []
      const media: StagedMediaFile[] = []

      console.log(
        `[generation] project=${request.projectId} type=${request.missionType} count=${params.count} provider=${options.provider.name}/${options.provider.model}`,
      )

      for (let i = 0; i < params.count; i++) {
        if (aborted(options.signal)) return this.abortedResult(i, params.count)

        const reply = await options.provider.chatComplete([{ role: 'user', content: prompt.user }], prompt.system, {
          signal: options.signal,
        })
        if (!reply.ok) {
          if (aborted(options.signal)) return this.abortedResult(i, params.count)
          console.error(`[generation] provider failed on mission ${i + 1}/${params.count}: ${reply.error.message}`)
          return reply
        }

        const generated = parseGeneratedMission(reply.value, params.waypointsPerMission)
        if (!generated.ok) {
          console.error(`[generation] invalid output on mission ${i + 1}/${params.count}: ${generated.error.message}`)
          return generated
        }

        const mission = toMission(generated.value, {
          name: `${config.value.name} ${String(offset + i + 1).padStart(3, '0')}`,
          missionType: config.value.name,
          datasetSplit: weightedChoice(rng, splits),
          distribution: params.landmarkDistribution,
          rng,
        })

        if (options.renderer) {
          const rendered = await this.renderMedia(mission, options.renderer, options.signal)
          if (!rendered.ok) {
            if (aborted(options.signal)) return this.abortedResult(i, params.count)
            return rendered
          }
          let reviewed = rendered.value.mission
          if (options.reviewer && rendered.value.images.length > 0) {
            const validation = await options.reviewer.review({
              mission: reviewed,
              images: rendered.value.images,
              signal: options.signal,
            })
            if (!validation.ok && aborted(options.signal)) return this.abortedResult(i, params.count)
            reviewed = { ...reviewed, validation: this.verdict(validation, options.reviewThreshold, i, params.count) }
          }
          missions.push(reviewed)
          media.push(...rendered.value.files)
        } else {
          missions.push(mission)
        }
        options.onProgress?.({ completed: i + 1, total: params.count, missionId: mission.id })
      }

      if (aborted(options.signal)) return this.abortedResult(params.count, params.count)

      const saved = await this.deps.store.appendMissions(request.projectId, missions, media)
      if (!saved.ok) return saved
      console.log(`[generation] appended ${missions.length} mission(s) to ${request.projectId}`)
      return Ok(missions)
    })
  }

  private abortedResult(completed: number, total: number): Result<never, StudioError> {
    console.warn(`[generation] aborted after ${completed}/${total} mission(s); nothing was saved`)
    return Err(StudioError.service('Generation was aborted; no missions were saved'))
  }

  private verdict(
    result: Result<MissionValidation, StudioError>,
    threshold: number | undefined,
    index: number,
    total: number,
  ): MissionValidation {
    if (!result.ok) {
      console.warn(`[generation] review failed on mission ${index + 1}/${total}: ${result.error.message}`)
      return failedReview(result.error.message)
    }
    return applyReviewThreshold(result.value, threshold ?? DEFAULT_REVIEW_THRESHOLD)
  }

  private async renderMedia(
    mission: Mission,
    renderer: MediaRenderer,
    signal?: AbortSignal,
  ): Promise<Result<{ mission: Mission; files: StagedMediaFile[]; images: ReviewImage[] }, StudioError>> {
    const files: StagedMediaFile[] = []
    const images: ReviewImage[] = []
    const waypoints: Waypoint[] = []
    for (const waypoint of mission.waypoints) {
      const mediaMap = { ...waypoint.media }
      for (const [label, prompt] of renderPromptsOf(waypoint.metadata)) {
        const image = await renderer.render(prompt, { aspectRatio: RENDER_ASPECT[label] ?? '1:1', signal })
        if (!image.ok) return image
        const relativePath = `media/${mission.id}/${waypoint.id}/${label}.${image.value.ext}`
        files.push({ relativePath, data: image.value.data })
        images.push({ waypointId: waypoint.id, label, data: image.value.data, ext: image.value.ext })
        mediaMap[label] = relativePath
      }
      waypoints.push({ ...waypoint, media: mediaMap })
    }
    return Ok({ mission: { ...mission, waypoints }, files, images })
  }
}
