/**
 * JSON error bodies shared by every failure path of the service.
 */

const REASON_PHRASES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  415: 'Unsupported Media Type',
  500: 'Internal Server Error',
}

interface ErrorBody {
  status: number
  error: string
  message: string
}

const reasonPhrase = (status: number): string =>
  REASON_PHRASES[status] ?? 'Error'

const buildErrorBody = (status: number, message: string): ErrorBody => ({
  status,
  error: reasonPhrase(status),
  message,
})

/**
 * Returns a JSON error response. Extra headers (e.g. Allow on 405) are merged
 * over the JSON content type.
 */
export const jsonError = (
  status: number,
  message: string,
  headers?: Record<string, string>,
): Response =>
  new Response(JSON.stringify(buildErrorBody(status, message)), {
    status,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  })
