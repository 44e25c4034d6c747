/**
 * Hugging Face Hub client for dataset repositories, over the Hub's HTTP API.
 *
 * Uploads go through the NDJSON commit endpoint with base64 file bodies, so a push is
 * one commit. Files left over from an earlier push are deleted in the same commit.
 */

import { z } from 'zod'
import { Ok, Err, StudioError, errorMessage } from '@mission-studio/core'
import type { DatasetFile, DatasetHost, RemoteLocator, RemoteReference, Result } from '@mission-studio/core'

export const DEFAULT_HUB_ENDPOINT = 'https://huggingface.co'

export interface HuggingFaceHubClientConfig {
  token: string
  endpoint?: string
  /** Branch used for pushes and as the default pull revision. */
  branch?: string
}

const WhoAmISchema = z.object({ name: z.string() })
const TreeSchema = z.array(z.object({ type: z.string(), path: z.string() }))
const CommitSchema = z.object({ commitOid: z.string(), commitUrl: z.string().optional() })

/** Files the hub manages itself; never deleted by a push. */
const PRESERVED_FILES = new Set(['.gitattributes'])

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/')
}

export class HuggingFaceHubClient implements DatasetHost {
  private readonly endpoint: string
  private readonly branch: string

  constructor(private readonly config: HuggingFaceHubClientConfig) {
    this.endpoint = (config.endpoint ?? DEFAULT_HUB_ENDPOINT).replace(/\/+$/, '')
    this.branch = config.branch ?? 'main'
  }

  private async request(
    path: string,
    init: { method?: string; body?: string; headers?: Record<string, string> } = {},
  ): Promise<Result<Response, StudioError>> {
    if (!this.config.token) return Err(StudioError.auth('A hub access token is required'))

    let res: Response
    try {
      res = await fetch(`${this.endpoint}${path}`, {
        method: init.method ?? 'GET',
        body: init.body,
        headers: { Authorization: `Bearer ${this.config.token}`, ...init.headers },
      })
    } catch (e) {
      return Err(StudioError.service(`Hub request failed: ${errorMessage(e)}`))
    }

    if (res.ok) return Ok(res)
    const text = await res.text().catch((e: unknown) => errorMessage(e))
    if (res.status === 401 || res.status === 403) {
      return Err(StudioError.auth(`Hub rejected the access token (HTTP ${res.status})`))
    }
    if (res.status === 404) return Err(StudioError.notFound('Hub resource', path))
    return Err(StudioError.service(`Hub returned HTTP ${res.status}: ${text.slice(0, 200)}`))
  }

  private async json<T>(res: Response, schema: z.ZodType<T>, what: string): Promise<Result<T, StudioError>> {
    let body: unknown
    try {
      body = await res.json()
    } catch (e) {
      return Err(StudioError.service(`Hub sent an unreadable ${what}: ${errorMessage(e)}`))
    }
    const parsed = schema.safeParse(body)
    if (!parsed.success) return Err(StudioError.service(`Hub sent an unexpected ${what}`))
    return Ok(parsed.data)
  }

  /** Name of the account the token belongs to. */
  async whoAmI(): Promise<Result<string, StudioError>> {
    const res = await this.request('/api/whoami-v2')
    if (!res.ok) return res
    const body = await this.json(res.value, WhoAmISchema, 'account description')
    if (!body.ok) return body
    return Ok(body.value.name)
  }

  async ensureRepo(repoId: string, options: { private: boolean }): Promise<Result<void, StudioError>> {
    const existing = await this.request(`/api/datasets/${repoId}`)
    if (existing.ok) return Ok(undefined)
    if (existing.error.code !== 'NOT_FOUND') return existing

    const user = await this.whoAmI()
    if (!user.ok) return user
    const [namespace, name] = repoId.split('/')
    const created = await this.request('/api/repos/create', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        type: 'dataset',
        name,
        private: options.private,
        ...(namespace !== user.value ? { organization: namespace } : {}),
      }),
    })
    if (!created.ok) return created
    console.log(`[huggingface] created dataset repository ${repoId}`)
    return Ok(undefined)
  }

  async listFiles(locator: RemoteLocator): Promise<Result<string[], StudioError>> {
    const revision = encodeURIComponent(locator.revision ?? this.branch)
    const res = await this.request(`/api/datasets/${locator.repoId}/tree/${revision}?recursive=true`)
    if (!res.ok) return res
    const tree = await this.json(res.value, TreeSchema, 'file listing')
    if (!tree.ok) return tree
    return Ok(tree.value.filter((e) => e.type === 'file').map((e) => e.path))
  }

  async download(locator: RemoteLocator, path: string): Promise<Result<Uint8Array, StudioError>> {
    const revision = encodeURIComponent(locator.revision ?? this.branch)
    const res = await this.request(`/datasets/${locator.repoId}/resolve/${revision}/${encodePath(path)}`)
    if (!res.ok) {
      if (res.error.code === 'NOT_FOUND') return Err(StudioError.notFound('Dataset file', path))
      return res
    }
    try {
      return Ok(new Uint8Array(await res.value.arrayBuffer()))
    } catch (e) {
      return Err(StudioError.service(`Download of ${path} failed: ${errorMessage(e)}`))
    }
  }

  async upload(repoId: string, files: DatasetFile[], message: string): Promise<Result<RemoteReference, StudioError>> {
    const existing = await this.listFiles({ repoId })
    let stale: string[] = []
    if (existing.ok) {
      const next = new Set(files.map((f) => f.path))
      stale = existing.value.filter((p) => !next.has(p) && !PRESERVED_FILES.has(p))
    } else if (existing.error.code !== 'NOT_FOUND') {
      return existing
    }

    const lines = [
      JSON.stringify({ key: 'header', value: { summary: message, description: '' } }),
      ...files.map((f) =>
        JSON.stringify({
          key: 'file',
          value: { path: f.path, encoding: 'base64', content: Buffer.from(f.data).toString('base64') },
        }),
      ),
      ...stale.map((path) => JSON.stringify({ key: 'deletedFile', value: { path } })),
    ]

    const res = await this.request(`/api/datasets/${repoId}/commit/${encodeURIComponent(this.branch)}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-ndjson' },
      body: lines.join('\n'),
    })
    if (!res.ok) return res
    const commit = await this.json(res.value, CommitSchema, 'commit result')
    if (!commit.ok) return commit

    return Ok({
      repoId,
      revision: commit.value.commitOid,
      url: commit.value.commitUrl ?? `${this.endpoint}/datasets/${repoId}`,
    })
  }
}
