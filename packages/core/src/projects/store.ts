/**
 * Project store: one directory per project under a projects root:
 *
 *   <root>/<projectId>/project.json
 *   <root>/<projectId>/media/<missionId>/<waypointId>/<label>.<ext>
 *
 * Every write replaces project.json atomically. Writes to one project are serialized.
 */

import { mkdir, readFile, readdir, rename, rm, stat } from 'node:fs/promises'
import { join, resolve, sep } from 'node:path'
import { randomBytes } from 'node:crypto'
import { v4 as uuidv4 } from 'uuid'
import {
  Ok,
  Err,
  StudioError,
  errorMessage,
  writeFileAtomic,
  writeJsonAtomic,
  KeyedMutex,
} from '../common/index.js'
import type { Result } from '../common/index.js'
import type { MissionTypeReference, MissionTypeReferenceIndex } from '../mission-types/index.js'
import { EntityIdSchema, ProjectNameSchema, ProjectSchema, PROJECT_SCHEMA_VERSION } from './schemas.js'
import type { Mission, Project, ProjectInput, ProjectSummary, StagedMediaFile } from './schemas.js'
import { isLegacyProjectDocument, migrateLegacyProject } from './legacy.js'
import { referencedMissionTypes } from './mutations.js'

const PROJECT_FILE = 'project.json'
const LEGACY_FILE = 'metadata.json'
const MEDIA_DIR = 'media'
const NAMES_LOCK = '\u0000names'

export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set(['png', 'jpg', 'jpeg', 'webp', 'gif'])

export interface AttachMediaInput {
  missionId: string
  waypointId: string
  label: string
  /** File extension without the dot. */
  ext: string
  data: Uint8Array
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

function formatIssues(issues: Array<{ path: (string | number)[]; message: string }>): string {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ')
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase()
}

export class ProjectStore implements MissionTypeReferenceIndex {
  private readonly locks = new KeyedMutex()

  constructor(private readonly rootDir: string) {}

  projectDir(id: string): string {
    return join(this.rootDir, id)
  }

  /** Absolute path of a project-relative media path; rejects paths leaving the project. */
  resolveMediaPath(id: string, relativePath: string): Result<string, StudioError> {
    if (!EntityIdSchema.safeParse(id).success) return Err(StudioError.notFound('Project', id))
    const base = resolve(this.projectDir(id))
    const target = resolve(base, relativePath)
    if (!target.startsWith(base + sep)) {
      return Err(StudioError.validation(`Media path escapes the project directory: ${relativePath}`))
    }
    return Ok(target)
  }

  // ── Reading ──

  private async read(id: string): Promise<Result<Project, StudioError>> {
    if (!EntityIdSchema.safeParse(id).success) return Err(StudioError.notFound('Project', id))
    const dir = this.projectDir(id)

    let text: string
    let legacyFile = false
    try {
      text = await readFile(join(dir, PROJECT_FILE), 'utf-8')
    } catch (err) {
      if (!isErrno(err, 'ENOENT')) {
        return Err(StudioError.io(`Failed to read project ${id}: ${errorMessage(err)}`))
      }
      try {
        text = await readFile(join(dir, LEGACY_FILE), 'utf-8')
        legacyFile = true
      } catch (legacyErr) {
        if (isErrno(legacyErr, 'ENOENT') || isErrno(legacyErr, 'ENOTDIR')) {
          return Err(StudioError.notFound('Project', id))
        }
        return Err(StudioError.io(`Failed to read project ${id}: ${errorMessage(legacyErr)}`))
      }
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      return Err(StudioError.format(`Project ${id} is not valid JSON: ${errorMessage(err)}`))
    }

    if (legacyFile || isLegacyProjectDocument(raw)) {
      if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        return Err(StudioError.format(`Project ${id} has an unrecognized layout`))
      }
      const createdAt = (await stat(dir)).mtime.toISOString()
      raw = migrateLegacyProject({ ...raw }, { id, name: id, createdAt })
      console.log(`[project-store] migrated legacy project document: ${id}`)
    }

    const parsed = ProjectSchema.safeParse(raw)
    if (!parsed.success) {
      return Err(StudioError.format(`Project ${id} is malformed: ${formatIssues(parsed.error.issues)}`))
    }
    if (parsed.data.id !== id) {
      return Err(StudioError.format(`Project ${id} declares a different id: ${parsed.data.id}`))
    }
    return Ok(parsed.data)
  }

  private async readAll(): Promise<Result<Project[], StudioError>> {
    let entries
    try {
      entries = await readdir(this.rootDir, { withFileTypes: true })
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return Ok([])
      return Err(StudioError.io(`Failed to list projects: ${errorMessage(err)}`))
    }

    const projects: Project[] = []
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue
      const result = await this.read(entry.name)
      if (result.ok) {
        projects.push(result.value)
      } else if (result.error.code !== 'NOT_FOUND') {
        console.warn(`[project-store] skipping ${entry.name}: ${result.error.message}`)
      }
    }
    return Ok(projects)
  }

  async list(): Promise<Result<ProjectSummary[], StudioError>> {
    const all = await this.readAll()
    if (!all.ok) return all
    return Ok(
      all.value
        .map((p) => ({
          id: p.id,
          name: p.name,
          description: p.description,
          missionCount: p.missions.length,
          createdAt: p.createdAt,
          updatedAt: p.updatedAt,
        }))
        .sort((a, b) => a.name.localeCompare(b.name)),
    )
  }

  async open(id: string): Promise<Result<Project, StudioError>> {
    return this.read(id)
  }

  private async nameTaken(name: string, exceptId?: string): Promise<Result<boolean, StudioError>> {
    const all = await this.readAll()
    if (!all.ok) return all
    return Ok(all.value.some((p) => p.id !== exceptId && sameName(p.name, name)))
  }

  // ── Writing ──

  private async write(project: Project): Promise<Result<Project, StudioError>> {
    const dir = this.projectDir(project.id)
    try {
      await writeJsonAtomic(join(dir, PROJECT_FILE), project)
      await rm(join(dir, LEGACY_FILE), { force: true })
      return Ok(project)
    } catch (err) {
      return Err(StudioError.io(`Failed to save project ${project.id}: ${errorMessage(err)}`))
    }
  }

  /** Validate a mutated project and stamp it for writing. */
  private prepare(input: ProjectInput): Result<Project, StudioError> {
    const parsed = ProjectSchema.safeParse(input)
    if (!parsed.success) {
      return Err(StudioError.validation(formatIssues(parsed.error.issues)))
    }
    const project = parsed.data
    return Ok({
      ...project,
      missionTypes: referencedMissionTypes(project.missions),
      updatedAt: new Date().toISOString(),
    })
  }

  /** Create an empty project. Fails with CONFLICT (and writes nothing) if the name is taken. */
  async create(name: string, description = ''): Promise<Result<Project, StudioError>> {
    const parsedName = ProjectNameSchema.safeParse(name)
    if (!parsedName.success) {
      return Err(StudioError.validation(formatIssues(parsedName.error.issues)))
    }

    return this.locks.runExclusive(NAMES_LOCK, async () => {
      const taken = await this.nameTaken(parsedName.data)
      if (!taken.ok) return taken
      if (taken.value) return Err(StudioError.conflict(`Project already exists: ${parsedName.data}`))

      const now = new Date().toISOString()
      const project: Project = {
        schemaVersion: PROJECT_SCHEMA_VERSION,
        id: uuidv4(),
        name: parsedName.data,
        description,
        createdAt: now,
        updatedAt: now,
        missionTypes: [],
        missions: [],
      }

      const dir = this.projectDir(project.id)
      try {
        await mkdir(join(dir, MEDIA_DIR), { recursive: true })
      } catch (err) {
        return Err(StudioError.io(`Failed to create project directory: ${errorMessage(err)}`))
      }
      const written = await this.write(project)
      if (!written.ok) {
        await rm(dir, { recursive: true, force: true })
        return written
      }
      console.log(`[project-store] created project ${project.id} (${project.name})`)
      return written
    })
  }

  /** Persist the full object graph. The project must already exist. */
  async save(input: ProjectInput): Promise<Result<Project, StudioError>> {
    const prepared = this.prepare(input)
    if (!prepared.ok) return prepared
    const project = prepared.value
    return this.locks.runExclusive(project.id, () => this.replace(project))
  }

  /** Caller holds the project's lock. */
  private async replace(project: Project): Promise<Result<Project, StudioError>> {
    const existing = await this.read(project.id)
    if (!existing.ok && existing.error.code === 'NOT_FOUND') return existing

    return this.locks.runExclusive(NAMES_LOCK, async () => {
      const taken = await this.nameTaken(project.name, project.id)
      if (!taken.ok) return taken
      if (taken.value) return Err(StudioError.conflict(`Project already exists: ${project.name}`))
      return this.write(project)
    })
  }

  async rename(id: string, name: string): Promise<Result<Project, StudioError>> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.read(id)
      if (!current.ok) return current
      const prepared = this.prepare({ ...current.value, name })
      if (!prepared.ok) return prepared
      return this.replace(prepared.value)
    })
  }

  /** Remove the project directory with all missions, waypoints and media. */
  async delete(id: string): Promise<Result<void, StudioError>> {
    return this.locks.runExclusive(id, async () => {
      const existing = await this.read(id)
      if (!existing.ok && existing.error.code === 'NOT_FOUND') return existing

      const dir = this.projectDir(id)
      const trash = join(this.rootDir, `.deleted-${id}-${randomBytes(4).toString('hex')}`)
      try {
        await rename(dir, trash)
      } catch (err) {
        return Err(StudioError.io(`Failed to delete project ${id}: ${errorMessage(err)}`))
      }
      try {
        await rm(trash, { recursive: true, force: true })
      } catch (err) {
        console.warn(`[project-store] project ${id} deleted but cleanup of ${trash} failed: ${errorMessage(err)}`)
      }
      console.log(`[project-store] deleted project ${id}`)
      return Ok(undefined)
    })
  }

  /**
   * Append missions (and the media files they reference) in one step. Either every mission
   * and file is stored or none is.
   */
  async appendMissions(
    id: string,
    missions: Mission[],
    media: StagedMediaFile[] = [],
  ): Promise<Result<Project, StudioError>> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.read(id)
      if (!current.ok) return current

      const prepared = this.prepare({ ...current.value, missions: [...current.value.missions, ...missions] })
      if (!prepared.ok) return prepared

      const written: string[] = []
      try {
        for (const file of media) {
          if (!file.relativePath.startsWith(`${MEDIA_DIR}/`)) {
            throw StudioError.validation(`Staged media must live under ${MEDIA_DIR}/: ${file.relativePath}`)
          }
          const target = this.resolveMediaPath(id, file.relativePath)
          if (!target.ok) throw target.error
          await writeFileAtomic(target.value, file.data)
          written.push(target.value)
        }
      } catch (err) {
        await Promise.all(written.map((p) => rm(p, { force: true })))
        if (err instanceof StudioError) return Err(err)
        return Err(StudioError.io(`Failed to write media for project ${id}: ${errorMessage(err)}`))
      }

      const saved = await this.write(prepared.value)
      if (!saved.ok) {
        await Promise.all(written.map((p) => rm(p, { force: true })))
      }
      return saved
    })
  }

  /** Remove one mission and release its media folder. */
  async deleteMission(id: string, missionId: string): Promise<Result<Project, StudioError>> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.read(id)
      if (!current.ok) return current
      if (!current.value.missions.some((m) => m.id === missionId)) {
        return Err(StudioError.notFound('Mission', missionId))
      }

      const prepared = this.prepare({
        ...current.value,
        missions: current.value.missions.filter((m) => m.id !== missionId),
      })
      if (!prepared.ok) return prepared
      const saved = await this.write(prepared.value)
      if (!saved.ok) return saved

      const mediaDir = this.resolveMediaPath(id, join(MEDIA_DIR, missionId))
      if (mediaDir.ok) await rm(mediaDir.value, { recursive: true, force: true })
      return saved
    })
  }

  /** Store a media file for a waypoint under `label`, replacing any previous file for that label. */
  async attachMedia(id: string, input: AttachMediaInput): Promise<Result<Project, StudioError>> {
    const label = EntityIdSchema.safeParse(input.label)
    if (!label.success) return Err(StudioError.validation(`Invalid media label: ${input.label}`))
    const ext = input.ext.toLowerCase().replace(/^\./, '')
    if (!MEDIA_EXTENSIONS.has(ext)) return Err(StudioError.validation(`Unsupported media type: ${input.ext}`))

    return this.locks.runExclusive(id, async () => {
      const current = await this.read(id)
      if (!current.ok) return current
      const mission = current.value.missions.find((m) => m.id === input.missionId)
      if (!mission) return Err(StudioError.notFound('Mission', input.missionId))
      const waypoint = mission.waypoints.find((w) => w.id === input.waypointId)
      if (!waypoint) return Err(StudioError.notFound('Waypoint', input.waypointId))

      const relativePath = `${MEDIA_DIR}/${mission.id}/${waypoint.id}/${label.data}.${ext}`
      const previous = waypoint.media[label.data]
      const target = this.resolveMediaPath(id, relativePath)
      if (!target.ok) return target

      try {
        await writeFileAtomic(target.value, input.data)
      } catch (err) {
        return Err(StudioError.io(`Failed to write media: ${errorMessage(err)}`))
      }

      const prepared = this.prepare({
        ...current.value,
        missions: current.value.missions.map((m) =>
          m.id !== mission.id
            ? m
            : {
                ...m,
                updatedAt: new Date().toISOString(),
                waypoints: m.waypoints.map((w) =>
                  w.id !== waypoint.id ? w : { ...w, media: { ...w.media, [label.data]: relativePath } },
                ),
              },
        ),
      })
      const saved = prepared.ok ? await this.write(prepared.value) : prepared
      if (!saved.ok) {
        if (previous !== relativePath) await rm(target.value, { force: true })
        return saved
      }

      if (previous && previous !== relativePath && previous.startsWith(`${MEDIA_DIR}/`)) {
        const old = this.resolveMediaPath(id, previous)
        if (old.ok) await rm(old.value, { force: true })
      }
      return saved
    })
  }

  async detachMedia(
    id: string,
    missionId: string,
    waypointId: string,
    label: string,
  ): Promise<Result<Project, StudioError>> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.read(id)
      if (!current.ok) return current
      const mission = current.value.missions.find((m) => m.id === missionId)
      if (!mission) return Err(StudioError.notFound('Mission', missionId))
      const waypoint = mission.waypoints.find((w) => w.id === waypointId)
      if (!waypoint) return Err(StudioError.notFound('Waypoint', waypointId))
      const path = waypoint.media[label]
      if (path === undefined) return Err(StudioError.notFound('Media', label))

      const prepared = this.prepare({
        ...current.value,
        missions: current.value.missions.map((m) =>
          m.id !== missionId
            ? m
            : {
                ...m,
                waypoints: m.waypoints.map((w) => {
                  if (w.id !== waypointId) return w
                  const media = { ...w.media }
                  delete media[label]
                  return { ...w, media }
                }),
              },
        ),
      })
      if (!prepared.ok) return prepared
      const saved = await this.write(prepared.value)
      if (!saved.ok) return saved

      if (path.startsWith(`${MEDIA_DIR}/`)) {
        const abs = this.resolveMediaPath(id, path)
        if (abs.ok) await rm(abs.value, { force: true })
      }
      return saved
    })
  }

  async readMedia(id: string, relativePath: string): Promise<Result<Buffer, StudioError>> {
    const abs = this.resolveMediaPath(id, relativePath)
    if (!abs.ok) return abs
    try {
      return Ok(await readFile(abs.value))
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return Err(StudioError.notFound('Media', relativePath))
      return Err(StudioError.io(`Failed to read media ${relativePath}: ${errorMessage(err)}`))
    }
  }

  async findMissionTypeReferences(name: string): Promise<Result<MissionTypeReference[], StudioError>> {
    const all = await this.readAll()
    if (!all.ok) return all
    return Ok(
      all.value.flatMap((p) =>
        p.missions
          .filter((m) => m.missionType === name)
          .map((m) => ({ projectId: p.id, projectName: p.name, missionId: m.id, missionName: m.name })),
      ),
    )
  }
}
