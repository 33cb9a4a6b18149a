import type { Context, Next } from 'hono'
import { isJsonContentType, JSON_MEDIA_TYPE } from '../accounts/validation.ts'
import { UnsupportedMediaTypeError } from '../plumbing/http-errors.ts'

/**
 * Rejects the request with 415 unless it declares a JSON body. Runs before
 * the handler so no body parsing or store lookup happens on rejection.
 */
export const requireJsonContentType = async (
  c: Context,
  next: Next,
): Promise<void> => {
  if (!isJsonContentType(c.req.header('Content-Type'))) {
    throw new UnsupportedMediaTypeError(JSON_MEDIA_TYPE)
  }
  await next()
}
