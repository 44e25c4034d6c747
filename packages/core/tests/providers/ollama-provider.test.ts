import { describe, it, expect, vi, afterEach } from 'vitest'
import { normalizeOllamaUrl, OllamaProvider } from '../../src/providers/index.js'

describe('normalizeOllamaUrl', () => {
  it('strips trailing slashes and a /v1 suffix', () => {
    expect(normalizeOllamaUrl('http://localhost:11434')).toEqual({ ok: true, value: 'http://localhost:11434' })
    expect(normalizeOllamaUrl('http://localhost:11434///')).toEqual({ ok: true, value: 'http://localhost:11434' })
    expect(normalizeOllamaUrl('  https://gpu.local:11434/v1/ ')).toEqual({ ok: true, value: 'https://gpu.local:11434' })
  })

  it('requires an http or https scheme', () => {
    const result = normalizeOllamaUrl('ftp://localhost:11434')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe('Ollama URL must start with http:// or https://, got: ftp://localhost:11434')
    }
  })
})

describe('OllamaProvider.listModels', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('reads model names from the tags endpoint', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        json: () => Promise.resolve({ models: [{ name: 'llama3.1' }, { name: 'mistral' }] }),
      }),
    )

    const provider = new OllamaProvider({ model: 'llama3.1', baseUrl: 'http://gpu.local:11434' })
    const result = await provider.listModels()

    expect(result).toEqual({ ok: true, value: ['llama3.1', 'mistral'] })
    expect(vi.mocked(fetch).mock.calls[0][0]).toBe('http://gpu.local:11434/api/tags')
  })

  it('reports HTTP errors and unreachable servers as SERVICE_ERROR', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 500, json: () => Promise.resolve({}) }))
    const provider = new OllamaProvider({ model: 'llama3.1' })
    const httpError = await provider.listModels()
    expect(httpError.ok).toBe(false)
    if (!httpError.ok) expect(httpError.error.message).toBe('Ollama returned HTTP 500')

    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED')))
    const down = await provider.listModels()
    expect(down.ok).toBe(false)
    if (!down.ok) {
      expect(down.error.code).toBe('SERVICE_ERROR')
      expect(down.error.message).toBe('Ollama is unreachable: connect ECONNREFUSED')
    }
  })
})
