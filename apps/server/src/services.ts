/**
 * Service graph for one data directory. Factories that turn settings into external
 * clients can be swapped, so tests run without network access.
 */

import { mkdir } from 'node:fs/promises'
import {
  ActivityRepository,
  GeminiImageRenderer,
  GeminiMissionReviewer,
  GenerationAdapter,
  HubSyncAdapter,
  KeyedMutex,
  MissionTypeManager,
  ProjectStore,
  SettingsStore,
  createProvider,
  openDatabase,
} from '@mission-studio/core'
import type {
  DatasetHost,
  LLMProvider,
  MediaRenderer,
  MissionReviewer,
  Result,
  Settings,
  StudioError,
} from '@mission-studio/core'
import { HuggingFaceHubClient } from '@mission-studio/integrations'
import { dataPaths } from './config.js'
import { DraftRegistry } from './drafts.js'

export interface ServiceFactories {
  provider(settings: Settings): Result<LLMProvider, StudioError>
  /** Undefined when image rendering is switched off. */
  renderer(settings: Settings): MediaRenderer | undefined
  /** Undefined when review is switched off. */
  reviewer(settings: Settings): MissionReviewer | undefined
  host(settings: Settings): DatasetHost
}

export const defaultFactories: ServiceFactories = {
  provider: (settings) =>
    createProvider({
      provider: settings.generation.provider,
      model: settings.generation.model,
      apiKey: settings.generation.apiKey,
      ollamaBaseUrl: settings.generation.ollamaBaseUrl,
    }),
  renderer: (settings) => {
    if (!settings.images.enabled) return undefined
    const apiKey = settings.images.apiKey || settings.generation.apiKey
    if (!apiKey) {
      console.warn('[server] image rendering is enabled but no image API key is set; skipping images')
      return undefined
    }
    return new GeminiImageRenderer({ apiKey, model: settings.images.model })
  },
  reviewer: (settings) => {
    if (!settings.review.enabled) return undefined
    const apiKey = settings.review.apiKey || settings.images.apiKey || settings.generation.apiKey
    if (!apiKey) {
      console.warn('[server] mission review is enabled but no review API key is set; skipping review')
      return undefined
    }
    return new GeminiMissionReviewer({ apiKey, model: settings.review.model })
  },
  host: (settings) => new HuggingFaceHubClient({ token: settings.hub.token }),
}

export interface Services {
  settings: SettingsStore
  missionTypes: MissionTypeManager
  projects: ProjectStore
  generation: GenerationAdapter
  hub: HubSyncAdapter
  activity: ActivityRepository
  drafts: DraftRegistry
  factories: ServiceFactories
  close(): void
}

export interface BuildServicesOptions {
  dataDir: string
  /** Defaults to `<dataDir>/activity.db`; `:memory:` in tests. */
  databasePath?: string
  factories?: Partial<ServiceFactories>
}

export async function buildServices(options: BuildServicesOptions): Promise<Services> {
  const paths = dataPaths(options.dataDir)
  await mkdir(paths.projects, { recursive: true })
  await mkdir(paths.missionTypes, { recursive: true })

  const db = openDatabase(options.databasePath ?? paths.database)
  const projects = new ProjectStore(paths.projects)
  const missionTypes = new MissionTypeManager(paths.missionTypes, projects)
  const operations = new KeyedMutex()

  const settings = new SettingsStore(paths.settings)
  await settings.load()

  return {
    settings,
    missionTypes,
    projects,
    generation: new GenerationAdapter({ store: projects, missionTypes, operations }),
    hub: new HubSyncAdapter({ store: projects, missionTypes, operations }),
    activity: new ActivityRepository(db),
    drafts: new DraftRegistry(),
    factories: { ...defaultFactories, ...options.factories },
    close: () => db.close(),
  }
}
