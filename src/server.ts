import 'dotenv/config'
import { serve } from '@hono/node-server'
import { openAccountStore } from './accounts/store-factory.ts'
import { createApp } from './app.ts'
import { getServerConfig } from './config.ts'
import { shutdownDatabase } from './database/client.ts'
import { describeError, log, logError } from './plumbing/logger.ts'

const main = async (): Promise<void> => {
  const { port, isPortDefaulted } = getServerConfig()
  if (isPortDefaulted) {
    log(`process.env.PORT is undefined - defaulting to ${port}`)
  }

  const accountStore = await openAccountStore()
  const app = createApp({ accountStore })

  const server = serve({ fetch: app.fetch, port }, (address) => {
    log(`Account service listening at http://localhost:${address.port}`)
  })

  const shutdown = (signal: string): void => {
    log({ message: 'Shutting down', signal })
    server.close(() => {
      shutdownDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logError({ message: 'Shutdown failed', error: describeError(error) })
          process.exit(1)
        })
    })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

main().catch(async (error: unknown) => {
  logError({ message: 'Fatal error', error: describeError(error) })
  await shutdownDatabase()
  process.exit(1)
})
