export { createDraftStore, blankMissionType } from './draft-store.js'
export type { DraftState, DraftStore, AddStateTemplate, StatePatch, TransitionPatch, MetaPatch } from './draft-store.js'
export { conditionFromTemplate, describeGraph, computeLayout, defaultPosition } from './graph.js'
export type { GraphDescription, GraphNode, GraphEdge, NodeKind } from './graph.js'
export { EditorOperationSchema, applyOperation } from './operations.js'
export type { EditorOperation } from './operations.js'
