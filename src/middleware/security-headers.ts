import type { Context, Next } from 'hono'

const SECURITY_HEADERS: Record<string, string> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'SAMEORIGIN',
  'Content-Security-Policy': "default-src 'self'; object-src 'none'",
  'Referrer-Policy': 'strict-origin-when-cross-origin',
}

const HSTS_HEADER = 'max-age=31536000; includeSubDomains'

/**
 * Returns true if the request is over HTTPS (direct or via x-forwarded-proto).
 */
export const isHttps = (c: Context): boolean => {
  try {
    const url = new URL(c.req.url)
    if (url.protocol === 'https:') return true
  } catch {
    // relative or unparsable URL; fall back to the proxy header
  }
  return c.req.header('x-forwarded-proto') === 'https'
}

/**
 * Security headers middleware. Headers are applied after next() so error
 * responses built by the app's error handler carry them as well.
 */
export const securityHeaders = async (c: Context, next: Next): Promise<void> => {
  await next()

  for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
    c.res.headers.set(name, value)
  }
  if (isHttps(c)) {
    c.res.headers.set('Strict-Transport-Security', HSTS_HEADER)
  }
}
