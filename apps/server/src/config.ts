/**
 * Command-line and environment configuration for the server process.
 */

import { parseArgs } from 'node:util'
import { join, resolve } from 'node:path'
import { Ok, Err, StudioError, errorMessage } from '@mission-studio/core'
import type { Result } from '@mission-studio/core'

export const DEFAULT_PORT = 8765
export const DEFAULT_HOST = '127.0.0.1'
export const DEFAULT_DATA_DIR = './data'

export const USAGE = `Usage: mission-studio [--port N] [--host H] [--data-dir D]

  --port      port to listen on (default ${DEFAULT_PORT}, env PORT)
  --host      interface to bind (default ${DEFAULT_HOST}, env HOST)
  --data-dir  directory for projects, mission types and settings
              (default ${DEFAULT_DATA_DIR}, env MISSION_STUDIO_DATA_DIR)`

export interface ServerConfig {
  port: number
  host: string
  dataDir: string
  help: boolean
}

export interface DataPaths {
  projects: string
  missionTypes: string
  settings: string
  database: string
}

export function dataPaths(dataDir: string): DataPaths {
  return {
    projects: join(dataDir, 'projects'),
    missionTypes: join(dataDir, 'mission_types'),
    settings: join(dataDir, 'settings.json'),
    database: join(dataDir, 'activity.db'),
  }
}

function parsePort(raw: string): Result<number, StudioError> {
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    return Err(StudioError.validation(`Invalid port: ${raw}`))
  }
  return Ok(port)
}

/** Flags win over environment variables, which win over defaults. */
export function parseServerConfig(argv: string[], env: NodeJS.ProcessEnv): Result<ServerConfig, StudioError> {
  let values: { port?: string; host?: string; 'data-dir'?: string; help?: boolean }
  try {
    values = parseArgs({
      args: argv,
      options: {
        port: { type: 'string', short: 'p' },
        host: { type: 'string' },
        'data-dir': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values
  } catch (err) {
    return Err(StudioError.validation(errorMessage(err)))
  }

  const port = parsePort(values.port ?? env.PORT ?? String(DEFAULT_PORT))
  if (!port.ok) return port

  return Ok({
    port: port.value,
    host: values.host ?? env.HOST ?? DEFAULT_HOST,
    dataDir: resolve(values['data-dir'] ?? env.MISSION_STUDIO_DATA_DIR ?? DEFAULT_DATA_DIR),
    help: values.help ?? false,
  })
}
