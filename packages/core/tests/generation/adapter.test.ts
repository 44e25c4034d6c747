import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Ok, Err, StudioError, KeyedMutex } from '../../src/common/index.js'
import { MissionTypeManager } from '../../src/mission-types/index.js'
import { ProjectStore } from '../../src/projects/index.js'
import { GenerationAdapter } from '../../src/generation/index.js'
import type { MediaRenderer, MissionReviewer } from '../../src/generation/index.js'
import type { MissionValidation } from '../../src/projects/index.js'
import type { LLMProvider } from '../../src/providers/index.js'
import { generatedMissionJson } from './fixtures.js'

function fakeProvider(...replies: string[]): LLMProvider {
  const chatComplete = vi.fn()
  for (const reply of replies) chatComplete.mockResolvedValueOnce(Ok(reply))
  return { name: 'fake', model: 'fake-1', chatComplete }
}

const fakeRenderer: MediaRenderer = {
  render: vi.fn().mockResolvedValue(Ok({ data: Buffer.from('img'), ext: 'png' })),
}

function fakeReviewer(verdict: MissionValidation): MissionReviewer {
  return { review: vi.fn().mockResolvedValue(Ok(verdict)) }
}

describe('GenerationAdapter', () => {
  let root: string
  let store: ProjectStore
  let adapter: GenerationAdapter
  let projectId: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'studio-generation-'))
    store = new ProjectStore(join(root, 'projects'))
    const missionTypes = new MissionTypeManager(join(root, 'mission_types'), store)
    await missionTypes.seedDefaults()
    adapter = new GenerationAdapter({ store, missionTypes, operations: new KeyedMutex() })

    const created = await store.create('Field day')
    if (!created.ok) throw created.error
    projectId = created.value.id
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('appends numbered missions in one step', async () => {
    const provider = fakeProvider(generatedMissionJson(2), generatedMissionJson(2))
    const progress = vi.fn()

    const result = await adapter.generate(
      {
        projectId,
        missionType: 'locate_and_report',
        params: { count: 2, waypointsPerMission: 2, seed: 7, splitWeights: { sft_train: 0, rl_train: 1, validation: 0 } },
      },
      { provider, onProgress: progress },
    )

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((m) => m.name)).toEqual(['locate_and_report 001', 'locate_and_report 002'])
    expect(result.value.every((m) => m.datasetSplit === 'rl_train')).toBe(true)
    expect(progress).toHaveBeenCalledTimes(2)
    expect(progress).toHaveBeenLastCalledWith({ completed: 2, total: 2, missionId: result.value[1].id })

    const [messages, system] = vi.mocked(provider.chatComplete).mock.calls[0]
    expect(messages[0].content.startsWith('Mission profile: LOCATE_AND_REPORT')).toBe(true)
    expect(system).toContain('synthetic data generator')

    const project = await store.open(projectId)
    expect(project.ok).toBe(true)
    if (project.ok) {
      expect(project.value.missions).toHaveLength(2)
      expect(project.value.missionTypes).toEqual(['locate_and_report'])
    }
  })

  it('continues numbering after existing missions', async () => {
    await adapter.generate(
      { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 2 } },
      { provider: fakeProvider(generatedMissionJson(2)) },
    )
    const second = await adapter.generate(
      { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 2 } },
      { provider: fakeProvider(generatedMissionJson(2)) },
    )
    expect(second.ok).toBe(true)
    if (second.ok) expect(second.value[0].name).toBe('locate_and_report 002')
  })

  it('renders media for every prompt and stores the files', async () => {
    const result = await adapter.generate(
      { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 2 } },
      { provider: fakeProvider(generatedMissionJson(2)), renderer: fakeRenderer },
    )
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const mission = result.value[0]
    const target = mission.waypoints[1]
    expect(target.media).toEqual({
      forward_image: `media/${mission.id}/waypoint_02/forward_image.png`,
      ground_image: `media/${mission.id}/waypoint_02/ground_image.png`,
    })
    const bytes = await store.readMedia(projectId, target.media.forward_image)
    expect(bytes.ok).toBe(true)
    if (bytes.ok) expect(bytes.value.toString()).toBe('img')
    expect(vi.mocked(fakeRenderer.render).mock.calls[0][1].aspectRatio).toBe('16:9')
  })

  it('saves nothing when a later mission fails', async () => {
    const provider = fakeProvider(generatedMissionJson(2))
    vi.mocked(provider.chatComplete).mockResolvedValueOnce(Err(StudioError.service('rate limited')))

    const result = await adapter.generate(
      { projectId, missionType: 'locate_and_report', params: { count: 2, waypointsPerMission: 2 } },
      { provider },
    )
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('rate limited')
    expect(provider.chatComplete).toHaveBeenCalledTimes(2)
    expect(await vi.mocked(provider.chatComplete).mock.results[0].value).toEqual(Ok(generatedMissionJson(2)))

    const project = await store.open(projectId)
    if (project.ok) expect(project.value.missions).toEqual([])
  })

  describe('review', () => {
    it('records the verdict on each rendered mission', async () => {
      const verdict: MissionValidation = { isValid: true, confidence: 0.9, needsHumanReview: false, reasoning: 'Clear.' }
      const reviewer = fakeReviewer(verdict)

      const result = await adapter.generate(
        { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 2 } },
        { provider: fakeProvider(generatedMissionJson(2)), renderer: fakeRenderer, reviewer },
      )
      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value[0].validation).toEqual(verdict)

      const [request] = vi.mocked(reviewer.review).mock.calls[0]
      expect(request.mission.id).toBe(result.value[0].id)
      expect(request.images.map((img) => `${img.waypointId}/${img.label}.${img.ext}`)).toEqual([
        'waypoint_01/forward_image.png',
        'waypoint_01/ground_image.png',
        'waypoint_02/forward_image.png',
        'waypoint_02/ground_image.png',
      ])

      const project = await store.open(projectId)
      if (project.ok) expect(project.value.missions[0].validation).toEqual(verdict)
    })

    it('sends a low-confidence verdict to a person', async () => {
      const reviewer = fakeReviewer({ isValid: true, confidence: 0.6, needsHumanReview: false, reasoning: 'Blurry.' })

      const result = await adapter.generate(
        { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 2 } },
        { provider: fakeProvider(generatedMissionJson(2)), renderer: fakeRenderer, reviewer, reviewThreshold: 0.8 },
      )
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value[0].validation).toEqual({
          isValid: true,
          confidence: 0.6,
          needsHumanReview: true,
          reasoning: 'Blurry. [review forced: confidence 0.6 is below 0.8]',
        })
      }
    })

    it('keeps the mission and flags it when the reviewer fails', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      const reviewer: MissionReviewer = {
        review: vi.fn().mockResolvedValue(Err(StudioError.service('Mission review failed: quota'))),
      }

      const result = await adapter.generate(
        { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 2 } },
        { provider: fakeProvider(generatedMissionJson(2)), renderer: fakeRenderer, reviewer },
      )
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value[0].validation).toEqual({
          isValid: false,
          confidence: 0,
          needsHumanReview: true,
          reasoning: 'Review failed: Mission review failed: quota',
        })
      }
      expect(warn).toHaveBeenCalledWith('[generation] review failed on mission 1/1: Mission review failed: quota')
      warn.mockRestore()
    })

    it('skips review when nothing was rendered', async () => {
      const reviewer = fakeReviewer({ isValid: true, confidence: 1, needsHumanReview: false, reasoning: 'ok' })
      const result = await adapter.generate(
        { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 2 } },
        { provider: fakeProvider(generatedMissionJson(2)), reviewer },
      )
      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value[0].validation).toBeNull()
      expect(reviewer.review).not.toHaveBeenCalled()
    })
  })

  it('rejects output with the wrong shape', async () => {
    const result = await adapter.generate(
      { projectId, missionType: 'locate_and_report', params: { count: 1, waypointsPerMission: 3 } },
      { provider: fakeProvider(generatedMissionJson(2)) },
    )
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Generated mission has 2 waypoints, expected 3')
  })

  it('stops without saving when aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const result = await adapter.generate(
      { projectId, missionType: 'locate_and_report', params: { count: 1 } },
      { provider: fakeProvider(generatedMissionJson(3)), signal: controller.signal },
    )
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('SERVICE_ERROR')
      expect(result.error.message).toBe('Generation was aborted; no missions were saved')
    }
  })

  it('validates parameters and references', async () => {
    const provider = fakeProvider()

    const badCount = await adapter.generate({ projectId, missionType: 'locate_and_report', params: { count: 0 } }, { provider })
    expect(badCount.ok).toBe(false)
    if (!badCount.ok) expect(badCount.error.code).toBe('VALIDATION_ERROR')

    const noWeights = await adapter.generate(
      {
        projectId,
        missionType: 'locate_and_report',
        params: { count: 1, splitWeights: { sft_train: 0, rl_train: 0, validation: 0 } },
      },
      { provider },
    )
    expect(noWeights.ok).toBe(false)
    if (!noWeights.ok) expect(noWeights.error.message).toBe('At least one split weight must be positive')

    const unknownType = await adapter.generate({ projectId, missionType: 'ghost', params: { count: 1 } }, { provider })
    expect(unknownType.ok).toBe(false)
    if (!unknownType.ok) expect(unknownType.error.code).toBe('NOT_FOUND')

    const unknownProject = await adapter.generate(
      { projectId: 'missing', missionType: 'locate_and_report', params: { count: 1 } },
      { provider },
    )
    expect(unknownProject.ok).toBe(false)
    if (!unknownProject.ok) expect(unknownProject.error.code).toBe('NOT_FOUND')
    expect(provider.chatComplete).not.toHaveBeenCalled()
  })
})
