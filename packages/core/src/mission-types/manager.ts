/**
 * Mission-type manager: one JSON document per mission type under a configs directory.
 */

import { opendir, readFile, rm, stat } from 'node:fs/promises'
import { join } from 'node:path'
import type { Dir } from 'node:fs'
import { Ok, Err, StudioError, errorMessage, writeJsonAtomic, KeyedMutex, IdentifierSchema } from '../common/index.js'
import type { Result } from '../common/index.js'
import { configToDocument, documentToConfig } from './document.js'
import { validateMissionType } from './validation.js'
import { loadDefaultMissionTypes } from './defaults.js'
import type { MissionTypeConfig, MissionTypeConfigInput } from './schemas.js'

const EXTENSION = '.json'

export interface MissionTypeReference {
  projectId: string
  projectName: string
  missionId: string
  missionName: string
}

/** Answers "which missions use this mission type". Implemented by the project store. */
export interface MissionTypeReferenceIndex {
  findMissionTypeReferences(name: string): Promise<Result<MissionTypeReference[], StudioError>>
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

export class MissionTypeManager {
  private readonly locks = new KeyedMutex()

  constructor(
    private readonly dir: string,
    private readonly references?: MissionTypeReferenceIndex,
  ) {}

  private pathFor(name: string): string {
    return join(this.dir, `${name}${EXTENSION}`)
  }

  private checkName(name: string): Result<string, StudioError> {
    const parsed = IdentifierSchema.safeParse(name)
    if (!parsed.success) {
      return Err(StudioError.validation(`Invalid mission type name "${name}": ${parsed.error.issues[0].message}`))
    }
    return Ok(parsed.data)
  }

  async load(name: string): Promise<Result<MissionTypeConfig, StudioError>> {
    const checked = this.checkName(name)
    if (!checked.ok) return checked

    let text: string
    try {
      text = await readFile(this.pathFor(name), 'utf-8')
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return Err(StudioError.notFound('Mission type', name))
      return Err(StudioError.io(`Failed to read mission type ${name}: ${errorMessage(err)}`))
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      return Err(StudioError.format(`Mission type ${name} is not valid JSON: ${errorMessage(err)}`))
    }
    return documentToConfig(name, raw)
  }

  async exists(name: string): Promise<boolean> {
    if (!this.checkName(name).ok) return false
    try {
      return (await stat(this.pathFor(name))).isFile()
    } catch {
      return false
    }
  }

  /** Validate, then atomically replace the stored document. An invalid config never touches disk. */
  async save(input: MissionTypeConfigInput): Promise<Result<MissionTypeConfig, StudioError>> {
    const validated = validateMissionType(input)
    if (!validated.ok) return validated
    const config = validated.value

    return this.locks.runExclusive(config.name, async () => {
      try {
        await writeJsonAtomic(this.pathFor(config.name), configToDocument(config))
        return Ok(config)
      } catch (err) {
        return Err(StudioError.io(`Failed to save mission type ${config.name}: ${errorMessage(err)}`))
      }
    })
  }

  /**
   * Lazily enumerate stored mission-type names. Each iteration re-reads the directory,
   * so the iterable can be walked any number of times.
   */
  list(): AsyncIterable<string> {
    const dir = this.dir
    return {
      async *[Symbol.asyncIterator]() {
        let handle: Dir
        try {
          handle = await opendir(dir)
        } catch (err) {
          if (isErrno(err, 'ENOENT')) return
          throw err
        }
        for await (const entry of handle) {
          if (!entry.isFile() || entry.name.startsWith('.') || !entry.name.endsWith(EXTENSION)) continue
          const name = entry.name.slice(0, -EXTENSION.length)
          if (IdentifierSchema.safeParse(name).success) yield name
        }
      },
    }
  }

  /** Sorted list of names. */
  async listNames(): Promise<Result<string[], StudioError>> {
    try {
      const names: string[] = []
      for await (const name of this.list()) names.push(name)
      return Ok(names.sort())
    } catch (err) {
      return Err(StudioError.io(`Failed to list mission types: ${errorMessage(err)}`))
    }
  }

  /** Load every stored mission type. Fails on the first unreadable document. */
  async loadAll(): Promise<Result<MissionTypeConfig[], StudioError>> {
    const names = await this.listNames()
    if (!names.ok) return names
    const configs: MissionTypeConfig[] = []
    for (const name of names.value) {
      const loaded = await this.load(name)
      if (!loaded.ok) return loaded
      configs.push(loaded.value)
    }
    return Ok(configs)
  }

  /** Delete a mission type. Blocked with IN_USE while any mission references it. */
  async delete(name: string): Promise<Result<void, StudioError>> {
    const checked = this.checkName(name)
    if (!checked.ok) return checked

    return this.locks.runExclusive(name, async () => {
      if (!(await this.exists(name))) return Err(StudioError.notFound('Mission type', name))

      if (this.references) {
        const refs = await this.references.findMissionTypeReferences(name)
        if (!refs.ok) return refs
        if (refs.value.length > 0) {
          const where = refs.value
            .slice(0, 3)
            .map((r) => `${r.projectName}/${r.missionName}`)
            .join(', ')
          const more = refs.value.length > 3 ? ` and ${refs.value.length - 3} more` : ''
          return Err(
            StudioError.inUse(
              `Mission type ${name} is used by ${refs.value.length} mission(s): ${where}${more}`,
            ),
          )
        }
      }

      try {
        await rm(this.pathFor(name))
        return Ok(undefined)
      } catch (err) {
        return Err(StudioError.io(`Failed to delete mission type ${name}: ${errorMessage(err)}`))
      }
    })
  }

  /** Write the bundled defaults when no mission type is stored yet. Returns the names written. */
  async seedDefaults(): Promise<Result<string[], StudioError>> {
    const existing = await this.listNames()
    if (!existing.ok) return existing
    if (existing.value.length > 0) return Ok([])

    const defaults = await loadDefaultMissionTypes()
    if (!defaults.ok) return defaults

    const written: string[] = []
    for (const config of defaults.value) {
      const saved = await this.save(config)
      if (!saved.ok) return saved
      written.push(config.name)
    }
    console.log(`[mission-types] seeded defaults: ${written.join(', ')}`)
    return Ok(written)
  }
}
