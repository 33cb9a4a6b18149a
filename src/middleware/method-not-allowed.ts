import type { Context } from 'hono'
import { MethodNotAllowedError } from '../plumbing/http-errors.ts'

/**
 * Catch-all for a known path. Register it after the path's real handlers so
 * it only runs when none of them matched the method.
 */
export const methodNotAllowed =
  (allowedMethods: readonly string[]) =>
  (c: Context): never => {
    throw new MethodNotAllowedError(c.req.method, allowedMethods)
  }
