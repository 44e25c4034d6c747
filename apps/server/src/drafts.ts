/**
 * Open editor drafts, keyed by id. Drafts live only in memory.
 */

import { v4 as uuidv4 } from 'uuid'
import { createDraftStore, describeGraph } from '@mission-studio/core'
import type { DraftStore, GraphDescription, MissionTypeConfig } from '@mission-studio/core'

export const MAX_OPEN_DRAFTS = 50

export interface DraftSession {
  id: string
  store: DraftStore
  openedAt: string
}

export interface DraftView {
  id: string
  draft: MissionTypeConfig
  dirty: boolean
  lastError: { code: string; message: string } | null
  graph: GraphDescription
}

export class DraftRegistry {
  private readonly sessions = new Map<string, DraftSession>()

  open(config: MissionTypeConfig): DraftSession {
    if (this.sessions.size >= MAX_OPEN_DRAFTS) {
      // Map iteration order is insertion order: the first key is the oldest draft.
      const oldest = this.sessions.keys().next()
      if (!oldest.done) {
        this.sessions.delete(oldest.value)
        console.warn(`[drafts] closed draft ${oldest.value}; too many open drafts`)
      }
    }
    const session: DraftSession = { id: uuidv4(), store: createDraftStore(config), openedAt: new Date().toISOString() }
    this.sessions.set(session.id, session)
    return session
  }

  get(id: string): DraftSession | undefined {
    return this.sessions.get(id)
  }

  close(id: string): boolean {
    return this.sessions.delete(id)
  }

  get size(): number {
    return this.sessions.size
  }
}

export function viewDraft(session: DraftSession): DraftView {
  const state = session.store.getState()
  return {
    id: session.id,
    draft: state.draft,
    dirty: state.dirty,
    lastError: state.lastError ? { code: state.lastError.code, message: state.lastError.message } : null,
    graph: describeGraph(state.draft),
  }
}
