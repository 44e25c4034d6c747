/**
 * Known tools, observations, condition templates and state templates offered by the editor.
 */

import type { StateDefinition } from './schemas.js'

export const TOOL_CATALOG: readonly string[] = ['next_goal', 'report_final_conclusion', 'land', 'track_target']

export const OBSERVATION_CATALOG: readonly string[] = [
  'current_location',
  'plan',
  'locations_to_be_visited',
  'past_locations',
  'waypoint',
]

export interface ConditionTemplate {
  id: string
  label: string
  /** `{value}` is replaced by the user-supplied value. Empty for custom conditions. */
  template: string
}

export const CONDITION_TEMPLATES: readonly ConditionTemplate[] = [
  { id: 'always', label: 'Always True', template: 'True' },
  { id: 'else', label: 'Else (fallback)', template: 'else' },
  { id: 'next_goal_equals', label: 'Next Goal == value', template: "{next_goal} == '{value}'" },
  { id: 'action_name_equals', label: 'Action Name == value', template: "action.name == '{value}'" },
  {
    id: 'current_location_equals',
    label: 'Current Location == value',
    template: "{current_location} == '{value}'",
  },
  { id: 'nothing_left', label: 'Locations to Visit Empty', template: '{locations_to_be_visited} == []' },
  { id: 'past_locations_over', label: 'Past Locations > N', template: 'len({past_locations}) > {value}' },
  { id: 'custom', label: 'Custom Condition', template: '' },
]

export type StateTemplateId = 'empty' | 'execution' | 'conclusion'

export const STATE_TEMPLATES: Record<StateTemplateId, Omit<StateDefinition, 'name'>> = {
  empty: { prompt: '', tools: [], observations: [], outputKeys: [], verifiers: [] },
  execution: {
    prompt:
      'You are a UAV controller executing a task plan.\n\n## Reasoning\nPut your thought process inside <think></think> tags.',
    tools: ['next_goal'],
    observations: ['current_location', 'plan', 'locations_to_be_visited'],
    outputKeys: [],
    verifiers: [],
  },
  conclusion: {
    prompt: 'Provide the final answer based on all gathered data.',
    tools: ['report_final_conclusion'],
    observations: ['plan'],
    outputKeys: [],
    verifiers: [],
  },
}
