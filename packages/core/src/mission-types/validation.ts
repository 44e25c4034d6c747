/**
 * State-machine invariants for mission-type configurations.
 */

import { Ok, Err, StudioError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { MissionTypeConfigSchema } from './schemas.js'
import type { MissionTypeConfig, MissionTypeIssue } from './schemas.js'
import { OBSERVATION_CATALOG, TOOL_CATALOG } from './catalog.js'

/** All invariant violations of a structurally valid config, in a stable order. */
export function collectMissionTypeIssues(config: MissionTypeConfig): MissionTypeIssue[] {
  const issues: MissionTypeIssue[] = []
  const declared = new Set<string>()

  for (const state of config.states) {
    if (declared.has(state.name)) {
      issues.push({ code: 'DUPLICATE_STATE', message: `Duplicate state name: ${state.name}` })
    }
    declared.add(state.name)
  }

  if (!config.initialState) {
    issues.push({ code: 'NO_INITIAL_STATE', message: 'No initial state is marked' })
  } else if (!declared.has(config.initialState)) {
    issues.push({
      code: 'UNDECLARED_INITIAL_STATE',
      message: `Initial state is not declared: ${config.initialState}`,
    })
  }

  const errorSources = new Set<string>()
  config.transitions.forEach((t, index) => {
    for (const endpoint of [t.from, t.to]) {
      if (!declared.has(endpoint)) {
        issues.push({
          code: 'UNDECLARED_ENDPOINT',
          message: `Transition ${index} (${t.from} -> ${t.to}) references undeclared state: ${endpoint}`,
        })
      }
    }
    if (t.kind === 'condition' && t.condition.trim().length === 0) {
      issues.push({
        code: 'EMPTY_CONDITION',
        message: `Transition ${index} (${t.from} -> ${t.to}) has an empty condition`,
      })
    }
    if (t.kind === 'error') {
      if (errorSources.has(t.from)) {
        issues.push({
          code: 'DUPLICATE_ERROR_TRANSITION',
          message: `State ${t.from} has more than one error transition`,
        })
      }
      errorSources.add(t.from)
    }
  })

  return issues
}

/**
 * Parse and check a config. Structural problems and invariant violations both
 * come back as VALIDATION_ERROR; the message lists every violation.
 */
export function validateMissionType(input: unknown): Result<MissionTypeConfig, StudioError> {
  const parsed = MissionTypeConfigSchema.safeParse(input)
  if (!parsed.success) {
    return Err(StudioError.validation(parsed.error.issues.map(formatZodIssue).join('; ')))
  }

  const config = normalizeConfig(parsed.data)
  const issues = collectMissionTypeIssues(config)
  if (issues.length > 0) {
    return Err(StudioError.validation(issues.map((i) => i.message).join('; ')))
  }
  return Ok(config)
}

/** Non-blocking remarks: identifiers outside the known tool/observation catalogue. */
export function listMissionTypeWarnings(config: MissionTypeConfig): string[] {
  const warnings: string[] = []
  for (const state of config.states) {
    for (const tool of state.tools) {
      if (!TOOL_CATALOG.includes(tool)) warnings.push(`State ${state.name} uses unknown tool: ${tool}`)
    }
    for (const obs of state.observations) {
      if (!OBSERVATION_CATALOG.includes(obs)) {
        warnings.push(`State ${state.name} uses unknown observation: ${obs}`)
      }
    }
  }
  return warnings
}

/** Deduplicate tool/observation sets and trim conditions. */
export function normalizeConfig(config: MissionTypeConfig): MissionTypeConfig {
  return {
    ...config,
    states: config.states.map((s) => ({
      ...s,
      tools: dedupe(s.tools),
      observations: dedupe(s.observations),
    })),
    transitions: config.transitions.map((t) => ({
      ...t,
      condition: t.kind === 'error' ? '' : t.condition.trim(),
    })),
  }
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)]
}

function formatZodIssue(issue: { path: (string | number)[]; message: string }): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}
