import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import info from '../package.json' with { type: 'json' }
import accounts from './accounts/routes.ts'
import type { AccountStore } from './accounts/store.ts'
import { methodNotAllowed } from './middleware/method-not-allowed.ts'
import { securityHeaders } from './middleware/security-headers.ts'
import { jsonError } from './plumbing/error-response.ts'
import { MethodNotAllowedError } from './plumbing/http-errors.ts'
import { describeError, logError } from './plumbing/logger.ts'

const { name, version } = info

export interface AppOptions {
  accountStore: AccountStore
}

const READ_ONLY_METHODS = ['GET', 'HEAD', 'OPTIONS'] as const

/**
 * Build the HTTP application around an injected account store.
 */
export const createApp = ({ accountStore }: AppOptions): Hono => {
  const app = new Hono()

  app.use('*', securityHeaders)
  app.use('*', cors())
  app.use('*', async (c, next) => {
    c.set('accountStore', accountStore)
    await next()
  })

  app.get('/', (c) => {
    return c.json({
      name,
      version,
      paths: new URL('/accounts', c.req.url).toString(),
    })
  })
  app.all('/', methodNotAllowed(READ_ONLY_METHODS))

  app.get('/health', (c) => {
    return c.json({ status: 'OK' })
  })
  app.all('/health', methodNotAllowed(READ_ONLY_METHODS))

  app.route('/accounts', accounts)

  app.notFound((c) => {
    return jsonError(404, `Path ${new URL(c.req.url).pathname} was not found`)
  })

  app.onError((error, c) => {
    if (error instanceof MethodNotAllowedError) {
      return jsonError(error.status, error.message, {
        Allow: error.allowedMethods.join(', '),
      })
    }
    if (error instanceof HTTPException) {
      return jsonError(error.status, error.message)
    }

    logError({
      message: 'Unhandled error',
      method: c.req.method,
      path: c.req.path,
      error: describeError(error),
    })
    return jsonError(500, 'An unexpected error occurred')
  })

  return app
}
