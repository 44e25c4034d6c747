/**
 * Settings: credentials and service choices, kept in one JSON file outside any project.
 *
 * The loaded object is passed explicitly to the services built from it; nothing reads
 * settings from module state.
 */

import { readFile, rename } from 'node:fs/promises'
import { z } from 'zod'
import { Ok, Err, StudioError, errorMessage, writeJsonAtomic } from '../common/index.js'
import type { Result } from '../common/index.js'
import { PROVIDER_NAMES, DEFAULT_OLLAMA_URL } from '../providers/index.js'

export const REDACTED = '********'

export const SettingsSchema = z.object({
  generation: z
    .object({
      provider: z.enum(PROVIDER_NAMES).default('gemini'),
      model: z.string().trim().max(128).default(''),
      apiKey: z.string().default(''),
      ollamaBaseUrl: z.string().default(DEFAULT_OLLAMA_URL),
    })
    .default({}),
  hub: z
    .object({
      token: z.string().default(''),
      /** Default user or organisation for new dataset repositories. */
      namespace: z.string().default(''),
    })
    .default({}),
  images: z
    .object({
      enabled: z.boolean().default(false),
      /** Falls back to the generation key when empty. */
      apiKey: z.string().default(''),
      model: z.string().default('gemini-2.5-flash-image'),
    })
    .default({}),
  review: z
    .object({
      enabled: z.boolean().default(false),
      /** Falls back to the image key, then the generation key, when empty. */
      apiKey: z.string().default(''),
      model: z.string().default('gemini-2.5-flash-lite'),
      confidenceThreshold: z.number().min(0).max(1).default(0.75),
    })
    .default({}),
})
export type Settings = z.infer<typeof SettingsSchema>

export const SettingsPatchSchema = z.object({
  generation: SettingsSchema.shape.generation.removeDefault().partial().optional(),
  hub: SettingsSchema.shape.hub.removeDefault().partial().optional(),
  images: SettingsSchema.shape.images.removeDefault().partial().optional(),
  review: SettingsSchema.shape.review.removeDefault().partial().optional(),
})
export type SettingsPatch = z.infer<typeof SettingsPatchSchema>

export function defaultSettings(): Settings {
  return SettingsSchema.parse({})
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

function mask(secret: string): string {
  return secret ? REDACTED : ''
}

/** Copy safe to send to clients: secrets become a fixed mask. */
export function redactSettings(settings: Settings): Settings {
  return {
    generation: { ...settings.generation, apiKey: mask(settings.generation.apiKey) },
    hub: { ...settings.hub, token: mask(settings.hub.token) },
    images: { ...settings.images, apiKey: mask(settings.images.apiKey) },
    review: { ...settings.review, apiKey: mask(settings.review.apiKey) },
  }
}

/** A masked value sent back by a client means "keep the stored secret". */
function keepSecret(next: string | undefined, current: string): string {
  return next === undefined || next === REDACTED ? current : next
}

export class SettingsStore {
  private current: Settings | null = null
  /** Set while the file on disk could not be read or moved aside; saving would overwrite it. */
  private blocked: string | null = null

  constructor(private readonly path: string) {}

  /**
   * Read the file. A missing file gives defaults. A file that is not valid settings is
   * moved aside before defaults are used, so the next save cannot overwrite it.
   */
  async load(): Promise<Settings> {
    this.blocked = null
    let text: string
    try {
      text = await readFile(this.path, 'utf-8')
    } catch (err) {
      if (!isErrno(err, 'ENOENT')) {
        console.warn(`[settings] could not read ${this.path}, using defaults: ${errorMessage(err)}`)
        this.blocked = `Settings file ${this.path} could not be read: ${errorMessage(err)}`
      }
      this.current = defaultSettings()
      return this.current
    }

    let problem: string | null = null
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      problem = `not valid JSON: ${errorMessage(err)}`
    }
    if (problem === null) {
      const parsed = SettingsSchema.safeParse(raw)
      if (parsed.success) {
        this.current = parsed.data
        return this.current
      }
      problem = `malformed: ${parsed.error.issues[0].message}`
    }

    await this.moveAside(problem)
    this.current = defaultSettings()
    return this.current
  }

  private async moveAside(problem: string): Promise<void> {
    const backup = `${this.path}.corrupt-${Date.now()}`
    try {
      await rename(this.path, backup)
      console.warn(`[settings] ${this.path} is ${problem}; moved it to ${backup} and using defaults`)
    } catch (err) {
      console.warn(`[settings] ${this.path} is ${problem}; could not move it aside: ${errorMessage(err)}`)
      this.blocked = `Settings file ${this.path} is ${problem}`
    }
  }

  async get(): Promise<Settings> {
    return this.current ?? this.load()
  }

  /** Merge a patch into the stored settings and persist them. */
  async save(patch: unknown): Promise<Result<Settings, StudioError>> {
    const parsed = SettingsPatchSchema.safeParse(patch)
    if (!parsed.success) {
      return Err(StudioError.validation(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')))
    }
    const current = await this.get()
    if (this.blocked !== null) return Err(StudioError.io(`${this.blocked}; not overwriting it`))
    const p = parsed.data

    const next = SettingsSchema.safeParse({
      generation: {
        ...current.generation,
        ...p.generation,
        apiKey: keepSecret(p.generation?.apiKey, current.generation.apiKey),
      },
      hub: { ...current.hub, ...p.hub, token: keepSecret(p.hub?.token, current.hub.token) },
      images: { ...current.images, ...p.images, apiKey: keepSecret(p.images?.apiKey, current.images.apiKey) },
      review: { ...current.review, ...p.review, apiKey: keepSecret(p.review?.apiKey, current.review.apiKey) },
    })
    if (!next.success) {
      return Err(StudioError.validation(next.error.issues.map((i) => i.message).join('; ')))
    }

    try {
      await writeJsonAtomic(this.path, next.data)
    } catch (err) {
      return Err(StudioError.io(`Failed to save settings: ${errorMessage(err)}`))
    }
    this.current = next.data
    console.log('[settings] saved')
    return Ok(next.data)
  }
}
