/**
 * HTTP API for the editor. JSON in, JSON out; every StudioError code has a fixed status.
 */

import { createServer } from 'node:http'
import type { Server, IncomingMessage, ServerResponse } from 'node:http'
import { extname } from 'node:path'
import type { z } from 'zod'
import {
  MissionSchema,
  Ok,
  Err,
  StudioError,
  KNOWN_MODELS,
  DEFAULT_MODELS,
  PROVIDER_NAMES,
  applyOperation,
  blankMissionType,
  configToDocument,
  createMission,
  describeGraph,
  documentToConfig,
  errorMessage,
  listMissionTypeWarnings,
  validateMissionType,
  recordActivity,
  redactSettings,
  IdentifierSchema,
} from '@mission-studio/core'
import type { ErrorCode, MissionTypeConfig, Result } from '@mission-studio/core'
import type { Services } from './services.js'
import { viewDraft } from './drafts.js'
import {
  AttachMediaBodySchema,
  CreateProjectBodySchema,
  DraftOperationsBodySchema,
  GenerateBodySchema,
  NewMissionBodySchema,
  PullBodySchema,
  PushBodySchema,
  RenameProjectBodySchema,
  UpdateProjectBodySchema,
} from './schemas.js'

export const MAX_BODY_BYTES = 25 * 1024 * 1024

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  CONFLICT: 409,
  IN_USE: 409,
  VALIDATION_ERROR: 422,
  FORMAT_ERROR: 422,
  AUTH_ERROR: 401,
  SERVICE_ERROR: 502,
  IO_ERROR: 500,
  DB_ERROR: 500,
}

const MEDIA_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
}

/** Malformed or oversized request; answered with `status` directly. */
class RequestError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message)
    this.name = 'RequestError'
  }
}

export function statusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code]
}

function sendJSON(res: ServerResponse, statusCode: number, data: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' })
  res.end(JSON.stringify(data))
}

function sendError(res: ServerResponse, error: StudioError): void {
  sendJSON(res, statusFor(error.code), { error: { code: error.code, message: error.message } })
}

function sendResult<T>(
  res: ServerResponse,
  result: Result<T, StudioError>,
  status = 200,
  map: (value: T) => unknown = (v) => v,
): void {
  if (result.ok) sendJSON(res, status, map(result.value))
  else sendError(res, result.error)
}

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let bytes = 0

    req.on('data', (chunk: Buffer) => {
      bytes += chunk.length
      if (bytes > MAX_BODY_BYTES) {
        req.destroy()
        reject(new RequestError(413, 'Request body too large'))
        return
      }
      chunks.push(chunk)
    })

    req.on('end', () => resolve(Buffer.concat(chunks)))
    req.on('error', reject)
  })
}

interface RequestContext {
  req: IncomingMessage
  res: ServerResponse
  url: URL
  params: Record<string, string>
  /** Parsed JSON body; an empty body reads as `{}`. */
  json(): Promise<unknown>
  /** Parse the body against a schema; a mismatch is a VALIDATION_ERROR. */
  body<S extends z.ZodTypeAny>(schema: S): Promise<Result<z.output<S>, StudioError>>
}

type Handler = (ctx: RequestContext) => Promise<void>

interface Route {
  method: string
  pattern: RegExp
  keys: string[]
  handler: Handler
}

/** `:name` matches one path segment, a trailing `*` the rest of the path (as `path`). */
function route(method: string, path: string, handler: Handler): Route {
  const keys: string[] = []
  const source = path
    .split('/')
    .map((segment) => {
      if (segment.startsWith(':')) {
        keys.push(segment.slice(1))
        return '([^/]+)'
      }
      if (segment === '*') {
        keys.push('path')
        return '(.+)'
      }
      return segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    })
    .join('/')
  return { method, pattern: new RegExp(`^${source}$`), keys, handler }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function issues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ')
}

function slugify(name: string): string {
  return (
    name
      .toLowerCase()
      .replace(/[^a-z0-9._-]+/g, '-')
      .replace(/^-+|-+$/g, '') || 'dataset'
  )
}

function missionTypeView(config: MissionTypeConfig) {
  return {
    config,
    document: configToDocument(config),
    graph: describeGraph(config),
    warnings: listMissionTypeWarnings(config),
  }
}

function buildRoutes(services: Services): Route[] {
  const { projects, missionTypes, drafts, activity } = services

  return [
    route('GET', '/api/ping', async ({ res }) => {
      sendJSON(res, 200, { ok: true })
    }),

    // ── Settings ──

    route('GET', '/api/settings', async ({ res }) => {
      sendJSON(res, 200, redactSettings(await services.settings.get()))
    }),

    route('PUT', '/api/settings', async ({ res, json }) => {
      sendResult(res, await services.settings.save(await json()), 200, redactSettings)
    }),

    route('GET', '/api/providers', async ({ res }) => {
      sendJSON(res, 200, { providers: PROVIDER_NAMES, knownModels: KNOWN_MODELS, defaultModels: DEFAULT_MODELS })
    }),

    // ── Mission types ──

    route('GET', '/api/mission-types', async ({ res }) => {
      sendResult(res, await missionTypes.listNames())
    }),

    route('GET', '/api/mission-types/:name', async ({ res, params }) => {
      sendResult(res, await missionTypes.load(params.name), 200, missionTypeView)
    }),

    route('PUT', '/api/mission-types/:name', async ({ res, params, json }) => {
      const body = await json()
      if (!isRecord(body)) {
        sendError(res, StudioError.validation('Mission type body must be an object'))
        return
      }
      // Stored-document layout (snake_case) or config layout (camelCase).
      const input =
        'initial_state' in body || 'default_state' in body
          ? documentToConfig(params.name, body)
          : validateMissionType({ ...body, name: params.name })
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      const saved = await missionTypes.save(input.value)
      if (saved.ok) {
        recordActivity(activity, {
          eventType: 'mission_type_saved',
          summary: `Saved mission type ${saved.value.name}`,
        })
      }
      sendResult(res, saved, 200, missionTypeView)
    }),

    route('DELETE', '/api/mission-types/:name', async ({ res, params }) => {
      const deleted = await missionTypes.delete(params.name)
      if (!deleted.ok) {
        sendError(res, deleted.error)
        return
      }
      recordActivity(activity, { eventType: 'mission_type_deleted', summary: `Deleted mission type ${params.name}` })
      res.writeHead(204)
      res.end()
    }),

    // ── Editor drafts ──

    route('POST', '/api/mission-types/:name/drafts', async ({ res, params }) => {
      if (!IdentifierSchema.safeParse(params.name).success) {
        sendError(res, StudioError.validation(`Invalid mission type name "${params.name}"`))
        return
      }
      const loaded = await missionTypes.load(params.name)
      let config: MissionTypeConfig
      if (loaded.ok) {
        config = loaded.value
      } else if (loaded.error.code === 'NOT_FOUND') {
        config = blankMissionType(params.name)
      } else {
        sendError(res, loaded.error)
        return
      }
      sendJSON(res, 201, viewDraft(drafts.open(config)))
    }),

    route('GET', '/api/drafts/:id', async ({ res, params }) => {
      const session = drafts.get(params.id)
      if (!session) {
        sendError(res, StudioError.notFound('Draft', params.id))
        return
      }
      sendJSON(res, 200, viewDraft(session))
    }),

    route('POST', '/api/drafts/:id/operations', async ({ res, params, json }) => {
      const session = drafts.get(params.id)
      if (!session) {
        sendError(res, StudioError.notFound('Draft', params.id))
        return
      }
      const body = await json()
      const batch = DraftOperationsBodySchema.safeParse(body)
      const operations = batch.success ? batch.data.operations : [body]
      for (const operation of operations) {
        const applied = applyOperation(session.store, operation)
        if (!applied.ok) {
          sendJSON(res, statusFor(applied.error.code), {
            error: { code: applied.error.code, message: applied.error.message },
            draft: viewDraft(session),
          })
          return
        }
      }
      sendJSON(res, 200, viewDraft(session))
    }),

    route('POST', '/api/drafts/:id/validate', async ({ res, params }) => {
      const session = drafts.get(params.id)
      if (!session) {
        sendError(res, StudioError.notFound('Draft', params.id))
        return
      }
      const result = session.store.getState().validate()
      sendJSON(res, 200, {
        valid: result.ok,
        error: result.ok ? null : { code: result.error.code, message: result.error.message },
      })
    }),

    route('POST', '/api/drafts/:id/commit', async ({ res, params }) => {
      const session = drafts.get(params.id)
      if (!session) {
        sendError(res, StudioError.notFound('Draft', params.id))
        return
      }
      const committed = await session.store.getState().commit(missionTypes)
      if (committed.ok) {
        recordActivity(activity, {
          eventType: 'mission_type_saved',
          summary: `Saved mission type ${committed.value.name} from the editor`,
        })
      }
      sendResult(res, committed, 200, () => viewDraft(session))
    }),

    route('POST', '/api/drafts/:id/reset', async ({ res, params }) => {
      const session = drafts.get(params.id)
      if (!session) {
        sendError(res, StudioError.notFound('Draft', params.id))
        return
      }
      session.store.getState().reset()
      sendJSON(res, 200, viewDraft(session))
    }),

    route('DELETE', '/api/drafts/:id', async ({ res, params }) => {
      if (!drafts.close(params.id)) {
        sendError(res, StudioError.notFound('Draft', params.id))
        return
      }
      res.writeHead(204)
      res.end()
    }),

    // ── Projects ──

    route('GET', '/api/projects', async ({ res }) => {
      sendResult(res, await projects.list())
    }),

    route('POST', '/api/projects', async ({ res, body }) => {
      const input = await body(CreateProjectBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      const created = await projects.create(input.value.name, input.value.description)
      if (created.ok) {
        recordActivity(activity, {
          projectId: created.value.id,
          eventType: 'project_created',
          summary: `Created project ${created.value.name}`,
        })
      }
      sendResult(res, created, 201)
    }),

    route('GET', '/api/projects/:id', async ({ res, params }) => {
      sendResult(res, await projects.open(params.id))
    }),

    route('PUT', '/api/projects/:id', async ({ res, params, body }) => {
      const input = await body(UpdateProjectBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      const current = await projects.open(params.id)
      if (!current.ok) {
        sendError(res, current.error)
        return
      }
      sendResult(
        res,
        await projects.save({
          ...current.value,
          description: input.value.description ?? current.value.description,
          missions: input.value.missions ?? current.value.missions,
        }),
      )
    }),

    route('POST', '/api/projects/:id/rename', async ({ res, params, body }) => {
      const input = await body(RenameProjectBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      sendResult(res, await projects.rename(params.id, input.value.name))
    }),

    route('DELETE', '/api/projects/:id', async ({ res, params }) => {
      const deleted = await projects.delete(params.id)
      if (!deleted.ok) {
        sendError(res, deleted.error)
        return
      }
      recordActivity(activity, { projectId: params.id, eventType: 'project_deleted', summary: `Deleted project ${params.id}` })
      res.writeHead(204)
      res.end()
    }),

    route('POST', '/api/projects/:id/missions', async ({ res, params, body }) => {
      const input = await body(NewMissionBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      const type = await missionTypes.load(input.value.missionType)
      if (!type.ok) {
        sendError(res, type.error)
        return
      }
      const base = createMission({
        name: input.value.name,
        missionType: type.value.name,
        instruction: input.value.instruction,
        datasetSplit: input.value.datasetSplit,
      })
      const mission = MissionSchema.safeParse({
        ...base,
        waypoints: input.value.waypoints.map((w, i) => ({ id: `waypoint_${String(i + 1).padStart(2, '0')}`, ...w })),
      })
      if (!mission.success) {
        sendError(res, StudioError.validation(issues(mission.error)))
        return
      }
      sendResult(res, await projects.appendMissions(params.id, [mission.data]), 201, () => mission.data)
    }),

    route('DELETE', '/api/projects/:id/missions/:missionId', async ({ res, params }) => {
      sendResult(res, await projects.deleteMission(params.id, params.missionId))
    }),

    route('PUT', '/api/projects/:id/missions/:missionId/waypoints/:waypointId/media/:label', async (ctx) => {
      const { res, params } = ctx
      const input = await ctx.body(AttachMediaBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      sendResult(
        res,
        await projects.attachMedia(params.id, {
          missionId: params.missionId,
          waypointId: params.waypointId,
          label: params.label,
          ext: input.value.ext,
          data: Buffer.from(input.value.data, 'base64'),
        }),
      )
    }),

    route('DELETE', '/api/projects/:id/missions/:missionId/waypoints/:waypointId/media/:label', async ({ res, params }) => {
      sendResult(res, await projects.detachMedia(params.id, params.missionId, params.waypointId, params.label))
    }),

    route('GET', '/api/projects/:id/files/*', async ({ res, params }) => {
      const data = await projects.readMedia(params.id, params.path)
      if (!data.ok) {
        sendError(res, data.error)
        return
      }
      res.writeHead(200, {
        'Content-Type': MEDIA_TYPES[extname(params.path).toLowerCase()] ?? 'application/octet-stream',
        'Content-Length': data.value.length,
      })
      res.end(data.value)
    }),

    route('GET', '/api/projects/:id/activity', async ({ res, params, url }) => {
      const limit = Number(url.searchParams.get('limit') ?? 100)
      sendResult(res, activity.listByProject(params.id, Number.isInteger(limit) && limit > 0 ? limit : 100))
    }),

    route('GET', '/api/activity', async ({ res }) => {
      sendResult(res, activity.listRecent())
    }),

    // ── Generation and hub ──

    route('POST', '/api/projects/:id/generate', async ({ res, params, body }) => {
      const input = await body(GenerateBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      const settings = await services.settings.get()
      const provider = services.factories.provider(settings)
      if (!provider.ok) {
        sendError(res, provider.error)
        return
      }

      // A client that hangs up cancels the run.
      const controller = new AbortController()
      res.on('close', () => {
        if (!res.writableEnded) controller.abort()
      })

      const generated = await services.generation.generate(
        { projectId: params.id, missionType: input.value.missionType, params: input.value.params },
        {
          provider: provider.value,
          renderer: services.factories.renderer(settings),
          reviewer: services.factories.reviewer(settings),
          reviewThreshold: settings.review.confidenceThreshold,
          signal: controller.signal,
        },
      )
      recordActivity(activity, {
        projectId: params.id,
        eventType: generated.ok ? 'generation_completed' : 'generation_failed',
        summary: generated.ok
          ? `Generated ${generated.value.length} ${input.value.missionType} mission(s)`
          : `Generation of ${input.value.missionType} missions failed: ${generated.error.message}`,
        detail: { missionType: input.value.missionType, count: input.value.params.count },
      })
      sendResult(res, generated, 201)
    }),

    route('POST', '/api/projects/:id/hub/push', async ({ res, params, body }) => {
      const input = await body(PushBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      const settings = await services.settings.get()
      let repoId = input.value.repoId
      if (!repoId) {
        if (!settings.hub.namespace) {
          sendError(res, StudioError.validation('repoId is required when no hub namespace is configured'))
          return
        }
        const project = await projects.open(params.id)
        if (!project.ok) {
          sendError(res, project.error)
          return
        }
        repoId = `${settings.hub.namespace}/${slugify(project.value.name)}`
      }

      const pushed = await services.hub.push(params.id, services.factories.host(settings), {
        repoId,
        private: input.value.private,
        message: input.value.message,
      })
      if (pushed.ok) {
        recordActivity(activity, {
          projectId: params.id,
          eventType: 'hub_pushed',
          summary: `Pushed to ${pushed.value.repoId}`,
          detail: { ...pushed.value },
        })
      }
      sendResult(res, pushed)
    }),

    route('POST', '/api/hub/pull', async ({ res, body }) => {
      const input = await body(PullBodySchema)
      if (!input.ok) {
        sendError(res, input.error)
        return
      }
      const settings = await services.settings.get()
      const pulled = await services.hub.pull(
        services.factories.host(settings),
        { repoId: input.value.repoId, revision: input.value.revision },
        { name: input.value.name },
      )
      if (pulled.ok) {
        recordActivity(activity, {
          projectId: pulled.value.id,
          eventType: 'hub_pulled',
          summary: `Pulled ${input.value.repoId} into ${pulled.value.name}`,
          detail: { repoId: input.value.repoId, revision: input.value.revision ?? null },
        })
      }
      sendResult(res, pulled, 201)
    }),
  ]
}

export function createStudioServer(services: Services): Server {
  const routes = buildRoutes(services)

  const server = createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost')
    const method = req.method ?? 'GET'

    let matchedPath = false
    for (const r of routes) {
      const match = r.pattern.exec(url.pathname)
      if (!match) continue
      matchedPath = true
      if (r.method !== method) continue

      let bodyCache: Promise<unknown> | undefined
      const json = (): Promise<unknown> => {
        bodyCache ??= readBody(req).then((buf) => {
          if (buf.length === 0) return {}
          try {
            return JSON.parse(buf.toString('utf-8'))
          } catch {
            throw new RequestError(400, 'Malformed JSON body')
          }
        })
        return bodyCache
      }

      try {
        const params: Record<string, string> = {}
        r.keys.forEach((key, i) => {
          params[key] = decodeURIComponent(match[i + 1])
        })
        await r.handler({
          req,
          res,
          url,
          params,
          json,
          body: async (schema) => {
            const parsed = schema.safeParse(await json())
            return parsed.success ? Ok(parsed.data) : Err(StudioError.validation(issues(parsed.error)))
          },
        })
      } catch (err) {
        if (res.headersSent) {
          console.error(`[server] ${method} ${url.pathname} failed after responding: ${errorMessage(err)}`)
          res.end()
        } else if (err instanceof RequestError) {
          sendJSON(res, err.status, { error: { code: 'BAD_REQUEST', message: err.message } })
        } else if (err instanceof URIError) {
          sendJSON(res, 400, { error: { code: 'BAD_REQUEST', message: 'Malformed URL' } })
        } else {
          console.error(`[server] ${method} ${url.pathname} failed: ${errorMessage(err)}`)
          sendJSON(res, 500, { error: { code: 'INTERNAL', message: 'Internal server error' } })
        }
      }
      return
    }

    if (matchedPath) {
      sendJSON(res, 405, { error: { code: 'METHOD_NOT_ALLOWED', message: `${method} not allowed on ${url.pathname}` } })
    } else {
      sendJSON(res, 404, { error: { code: 'NOT_FOUND', message: 'Not found' } })
    }
  })

  server.headersTimeout = 10_000
  // Generation runs can take minutes.
  server.requestTimeout = 0

  return server
}
