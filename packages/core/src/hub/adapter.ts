/**
 * Hub sync adapter: push projects to a dataset host and pull them back.
 *
 * Single writer: push, pull and generation for one project run one at a time through the
 * shared operations lock. There is no merge; a pull always creates a new project.
 */

import { mkdir } from 'node:fs/promises'
import { join, resolve, sep } from 'node:path'
import { Ok, Err, StudioError, KeyedMutex, errorMessage, writeFileAtomic, IdentifierSchema } from '../common/index.js'
import type { Result } from '../common/index.js'
import { configToDocument, documentToConfig } from '../mission-types/index.js'
import type { MissionTypeConfig, MissionTypeManager } from '../mission-types/index.js'
import { referencedMissionTypes } from '../projects/index.js'
import type { Mission, Project, ProjectStore, StagedMediaFile } from '../projects/index.js'
import {
  DATASET_INFO_FILE,
  buildDataset,
  entryToMission,
  parseDatasetInfo,
  parseSplitFile,
} from './format.js'
import type { DatasetFile } from './format.js'
import type { DatasetHost, RemoteLocator, RemoteReference } from './host.js'

export interface PushOptions {
  repoId: string
  private?: boolean
  message?: string
}

export interface PullOptions {
  /** Name for the new local project; defaults to the dataset's project name. */
  name?: string
}

export interface HubSyncAdapterDeps {
  store: ProjectStore
  missionTypes: MissionTypeManager
  operations?: KeyedMutex
}

const REPO_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*\/[A-Za-z0-9][A-Za-z0-9._-]*$/

function checkRepoId(repoId: string): Result<string, StudioError> {
  return REPO_ID_PATTERN.test(repoId)
    ? Ok(repoId)
    : Err(StudioError.validation(`Repository id must look like "namespace/name": ${repoId}`))
}

/** Mission-type documents compare without editor layout. */
function sameMissionType(a: MissionTypeConfig, b: MissionTypeConfig): boolean {
  const strip = (c: MissionTypeConfig) => {
    const { ui_metadata: _layout, ...rest } = configToDocument(c)
    return JSON.stringify(rest)
  }
  return strip(a) === strip(b)
}

export class HubSyncAdapter {
  private readonly operations: KeyedMutex

  constructor(private readonly deps: HubSyncAdapterDeps) {
    this.operations = deps.operations ?? new KeyedMutex()
  }

  private async collect(projectId: string): Promise<Result<{ project: Project; files: DatasetFile[] }, StudioError>> {
    const project = await this.deps.store.open(projectId)
    if (!project.ok) return project

    const configs: MissionTypeConfig[] = []
    for (const name of referencedMissionTypes(project.value.missions)) {
      const config = await this.deps.missionTypes.load(name)
      if (!config.ok) return config
      configs.push(config.value)
    }

    const files = await buildDataset(project.value, configs, (rel) => this.deps.store.readMedia(projectId, rel))
    if (!files.ok) return files
    return Ok({ project: project.value, files: files.value })
  }

  async push(projectId: string, host: DatasetHost, options: PushOptions): Promise<Result<RemoteReference, StudioError>> {
    const repoId = checkRepoId(options.repoId)
    if (!repoId.ok) return repoId

    return this.operations.runExclusive(projectId, async () => {
      const collected = await this.collect(projectId)
      if (!collected.ok) return collected

      const ensured = await host.ensureRepo(repoId.value, { private: options.private ?? true })
      if (!ensured.ok) return ensured

      const message = options.message?.trim() || `Update dataset from project ${collected.value.project.name}`
      const ref = await host.upload(repoId.value, collected.value.files, message)
      if (!ref.ok) {
        console.error(`[hub-sync] push of ${projectId} to ${repoId.value} failed: ${ref.error.message}`)
        return ref
      }
      console.log(`[hub-sync] pushed ${projectId} to ${ref.value.repoId}@${ref.value.revision} (${collected.value.files.length} files)`)
      return ref
    })
  }

  /** Write the dataset layout to a local directory. */
  async exportToDirectory(projectId: string, dir: string): Promise<Result<string[], StudioError>> {
    return this.operations.runExclusive(projectId, async () => {
      const collected = await this.collect(projectId)
      if (!collected.ok) return collected

      const base = resolve(dir)
      try {
        await mkdir(base, { recursive: true })
        for (const file of collected.value.files) {
          const target = resolve(base, file.path)
          if (!target.startsWith(base + sep)) {
            return Err(StudioError.validation(`Dataset path escapes the export directory: ${file.path}`))
          }
          await writeFileAtomic(target, file.data)
        }
      } catch (err) {
        return Err(StudioError.io(`Failed to export project ${projectId}: ${errorMessage(err)}`))
      }
      console.log(`[hub-sync] exported ${projectId} to ${base}`)
      return Ok(collected.value.files.map((f) => f.path))
    })
  }

  /**
   * Download a dataset into a new project. Every file is fetched and checked before
   * anything is written; a failure while writing removes what was written.
   */
  async pull(host: DatasetHost, locator: RemoteLocator, options: PullOptions = {}): Promise<Result<Project, StudioError>> {
    const repoId = checkRepoId(locator.repoId)
    if (!repoId.ok) return repoId

    return this.operations.runExclusive(`pull:${repoId.value}`, async () => {
      const infoBytes = await host.download(locator, DATASET_INFO_FILE)
      if (!infoBytes.ok) {
        if (infoBytes.error.code === 'NOT_FOUND') {
          return Err(StudioError.format(`${repoId.value} has no ${DATASET_INFO_FILE}`))
        }
        return infoBytes
      }
      const info = parseDatasetInfo(infoBytes.value)
      if (!info.ok) return info

      // Mission types: each must be valid and match any local type of the same name.
      const imported = new Map<string, MissionTypeConfig>()
      const toCreate: MissionTypeConfig[] = []
      for (const [name, doc] of Object.entries(info.value.mission_types)) {
        if (!IdentifierSchema.safeParse(name).success) {
          return Err(StudioError.format(`Invalid mission type name in dataset: ${name}`))
        }
        const config = documentToConfig(name, doc)
        if (!config.ok) return Err(StudioError.format(config.error.message))
        imported.set(name, config.value)

        const local = await this.deps.missionTypes.load(name)
        if (local.ok) {
          if (!sameMissionType(local.value, config.value)) {
            return Err(StudioError.conflict(`Mission type ${name} differs from the local mission type of the same name`))
          }
        } else if (local.error.code === 'NOT_FOUND') {
          toCreate.push(config.value)
        } else {
          return local
        }
      }

      // Missions and media.
      const now = new Date().toISOString()
      const missions: Mission[] = []
      const media: StagedMediaFile[] = []
      for (const split of info.value.splits) {
        const bytes = await host.download(locator, `data/${split}.json`)
        if (!bytes.ok) {
          if (bytes.error.code === 'NOT_FOUND') return Err(StudioError.format(`Dataset lists split ${split} but has no data/${split}.json`))
          return bytes
        }
        const entries = parseSplitFile(bytes.value, split)
        if (!entries.ok) return entries

        for (const entry of entries.value) {
          if (!imported.has(entry.type)) {
            return Err(StudioError.format(`Mission ${entry.id} uses mission type ${entry.type}, which the dataset does not define`))
          }
          const mapped = entryToMission(entry, now)
          if (!mapped.ok) return mapped
          for (const file of mapped.value.media) {
            const data = await host.download(locator, file.source)
            if (!data.ok) {
              if (data.error.code === 'NOT_FOUND') return Err(StudioError.format(`Dataset is missing media file ${file.source}`))
              return data
            }
            media.push({ relativePath: file.target, data: data.value })
          }
          missions.push(mapped.value.mission)
        }
      }

      const ids = new Set<string>()
      for (const mission of missions) {
        if (ids.has(mission.id)) return Err(StudioError.format(`Dataset contains mission ${mission.id} more than once`))
        ids.add(mission.id)
      }

      const name = options.name?.trim() || info.value.project.name
      const existing = await this.deps.store.list()
      if (!existing.ok) return existing
      if (existing.value.some((p) => p.name.toLowerCase() === name.toLowerCase())) {
        return Err(StudioError.conflict(`Project already exists: ${name}`))
      }

      return this.commitPull(name, info.value.project.description, toCreate, missions, media)
    })
  }

  private async commitPull(
    name: string,
    description: string,
    missionTypes: MissionTypeConfig[],
    missions: Mission[],
    media: StagedMediaFile[],
  ): Promise<Result<Project, StudioError>> {
    const created = await this.deps.store.create(name, description)
    if (!created.ok) return created

    const savedTypes: string[] = []
    const rollback = async (error: StudioError): Promise<Result<never, StudioError>> => {
      const removed = await this.deps.store.delete(created.value.id)
      if (!removed.ok) console.error(`[hub-sync] rollback could not remove project ${created.value.id}: ${removed.error.message}`)
      for (const typeName of savedTypes) {
        const deleted = await this.deps.missionTypes.delete(typeName)
        if (!deleted.ok) console.error(`[hub-sync] rollback could not remove mission type ${typeName}: ${deleted.error.message}`)
      }
      return Err(error)
    }

    for (const config of missionTypes) {
      const saved = await this.deps.missionTypes.save(config)
      if (!saved.ok) return rollback(saved.error)
      savedTypes.push(config.name)
    }

    const appended = await this.deps.store.appendMissions(created.value.id, missions, media)
    if (!appended.ok) {
      const error = appended.error.code === 'VALIDATION_ERROR' ? StudioError.format(appended.error.message) : appended.error
      return rollback(error)
    }
    console.log(`[hub-sync] pulled ${missions.length} mission(s) into project ${appended.value.id} (${name})`)
    return appended
  }
}
