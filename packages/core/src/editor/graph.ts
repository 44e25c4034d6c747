/**
 * Read-only helpers for rendering a mission type as a node graph.
 */

import { Ok, Err, StudioError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CONDITION_TEMPLATES } from '../mission-types/index.js'
import type { MissionTypeConfig, NodePosition, TransitionKind } from '../mission-types/index.js'

export type NodeKind = 'initial' | 'normal' | 'terminal'

export interface GraphNode {
  name: string
  kind: NodeKind
  position: NodePosition
}

export interface GraphEdge {
  from: string
  to: string
  label: string
  kind: TransitionKind
}

export interface GraphDescription {
  nodes: GraphNode[]
  edges: GraphEdge[]
}

export const LAYOUT_ORIGIN: NodePosition = [80, 80]
export const LAYER_SPACING = 220
export const ROW_SPACING = 140

/** Grid slot used for a state that has no stored position. */
export function defaultPosition(index: number): NodePosition {
  return [LAYOUT_ORIGIN[0] + (index % 4) * LAYER_SPACING, LAYOUT_ORIGIN[1] + Math.floor(index / 4) * ROW_SPACING]
}

/** Fill a condition template. `custom` takes the value verbatim. */
export function conditionFromTemplate(templateId: string, value = ''): Result<string, StudioError> {
  const template = CONDITION_TEMPLATES.find((t) => t.id === templateId)
  if (!template) return Err(StudioError.notFound('Condition template', templateId))

  const trimmed = value.trim()
  if (template.id === 'custom') {
    if (!trimmed) return Err(StudioError.validation('A custom condition must not be empty'))
    return Ok(trimmed)
  }
  if (template.template.includes('{value}')) {
    if (!trimmed) return Err(StudioError.validation(`Condition template ${template.id} needs a value`))
    return Ok(template.template.replace('{value}', trimmed))
  }
  return Ok(template.template)
}

export function describeGraph(config: MissionTypeConfig): GraphDescription {
  const outgoing = new Set(config.transitions.map((t) => t.from))
  const nodes = config.states.map((state, index): GraphNode => {
    let kind: NodeKind = 'normal'
    if (state.name === config.initialState) kind = 'initial'
    else if (!outgoing.has(state.name)) kind = 'terminal'
    return { name: state.name, kind, position: config.layout[state.name] ?? defaultPosition(index) }
  })
  const edges = config.transitions.map((t) => ({
    from: t.from,
    to: t.to,
    label: t.kind === 'error' ? 'error' : t.condition,
    kind: t.kind,
  }))
  return { nodes, edges }
}

/**
 * Layered layout: breadth-first from the initial state, one column per depth.
 * States unreachable from the initial state go into a trailing column.
 */
export function computeLayout(config: MissionTypeConfig): Record<string, NodePosition> {
  const depth = new Map<string, number>()
  const declared = new Set(config.states.map((s) => s.name))

  if (declared.has(config.initialState)) {
    depth.set(config.initialState, 0)
    const queue = [config.initialState]
    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      const d = depth.get(current) ?? 0
      for (const t of config.transitions) {
        if (t.from === current && declared.has(t.to) && !depth.has(t.to)) {
          depth.set(t.to, d + 1)
          queue.push(t.to)
        }
      }
    }
  }

  const maxDepth = Math.max(-1, ...depth.values())
  const rows = new Map<number, number>()
  const layout: Record<string, NodePosition> = {}
  for (const state of config.states) {
    const column = depth.get(state.name) ?? maxDepth + 1
    const row = rows.get(column) ?? 0
    rows.set(column, row + 1)
    layout[state.name] = [LAYOUT_ORIGIN[0] + column * LAYER_SPACING, LAYOUT_ORIGIN[1] + row * ROW_SPACING]
  }
  return layout
}
