/**
 * Bundled default mission types, written to an empty configs directory on first use.
 */

import { readFile } from 'node:fs/promises'
import { Ok, Err, StudioError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { documentToConfig } from './document.js'
import type { MissionTypeConfig } from './schemas.js'

const DEFAULTS_URL = new URL('../../data/default-mission-types.json', import.meta.url)

export async function loadDefaultMissionTypes(): Promise<Result<MissionTypeConfig[], StudioError>> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(DEFAULTS_URL, 'utf-8'))
  } catch (err) {
    return Err(StudioError.io(`Failed to read default mission types: ${errorMessage(err)}`))
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return Err(StudioError.format('Default mission types must be an object keyed by name'))
  }

  const configs: MissionTypeConfig[] = []
  for (const [name, doc] of Object.entries(raw)) {
    const result = documentToConfig(name, doc)
    if (!result.ok) return result
    configs.push(result.value)
  }
  return Ok(configs)
}
