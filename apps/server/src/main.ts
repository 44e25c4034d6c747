/**
 * Process entry point: parse flags, build services, serve until signalled.
 */

import { errorMessage } from '@mission-studio/core'
import { parseServerConfig, USAGE } from './config.js'
import { buildServices } from './services.js'
import { createStudioServer } from './server.js'

async function main(): Promise<void> {
  const config = parseServerConfig(process.argv.slice(2), process.env)
  if (!config.ok) {
    console.error(`[server] ${config.error.message}\n\n${USAGE}`)
    process.exitCode = 2
    return
  }
  if (config.value.help) {
    console.log(USAGE)
    return
  }

  const services = await buildServices({ dataDir: config.value.dataDir })
  const seeded = await services.missionTypes.seedDefaults()
  if (!seeded.ok) {
    console.warn(`[server] could not seed default mission types: ${seeded.error.message}`)
  }

  const server = createStudioServer(services)
  server.on('error', (err) => {
    console.error(`[server] ${errorMessage(err)}`)
    services.close()
    process.exit(1)
  })

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`)
    server.close(() => {
      services.close()
      process.exit(0)
    })
    server.closeAllConnections()
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  server.listen(config.value.port, config.value.host, () => {
    console.log(`[server] listening on http://${config.value.host}:${config.value.port} (data: ${config.value.dataDir})`)
  })
}

main().catch((err: unknown) => {
  console.error(`[server] fatal: ${errorMessage(err)}`)
  process.exit(1)
})
