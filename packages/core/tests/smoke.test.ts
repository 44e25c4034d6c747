import { describe, it, expect } from 'vitest'

describe('core package entry', () => {
  it('exposes the main services', async () => {
    const core = await import('../src/index.js')
    expect(typeof core.ProjectStore).toBe('function')
    expect(typeof core.MissionTypeManager).toBe('function')
    expect(typeof core.GenerationAdapter).toBe('function')
    expect(typeof core.HubSyncAdapter).toBe('function')
    expect(typeof core.createDraftStore).toBe('function')
  })
})
