import { Hono } from 'hono'
import { methodNotAllowed } from '../middleware/method-not-allowed.ts'
import { requireJsonContentType } from '../middleware/require-json-content-type.ts'
import { log } from '../plumbing/logger.ts'
import {
  createAccount,
  deleteAccount,
  getAccount,
  listAccounts,
  toAccountResponse,
  updateAccount,
} from './service.ts'
import { decodeJsonBody } from './validation.ts'

const accounts = new Hono()

const ACCOUNT_PATH = '/:id{[0-9]+}'

export const COLLECTION_METHODS = ['GET', 'HEAD', 'OPTIONS', 'POST'] as const
export const ACCOUNT_METHODS = ['DELETE', 'GET', 'HEAD', 'OPTIONS', 'PUT'] as const

/**
 * Digits that do not fit a safe integer cannot name a stored account.
 */
const parseAccountId = (raw: string | undefined): number | null => {
  const id = Number(raw)
  return Number.isSafeInteger(id) ? id : null
}

/**
 * POST /accounts
 * Create an account
 */
accounts.post('/', requireJsonContentType, async (c) => {
  log('Request to create an Account')
  const body = decodeJsonBody(await c.req.text())

  const account = await createAccount(c.get('accountStore'), body)
  const location = new URL(`/accounts/${account.id}`, c.req.url).toString()

  return c.json(toAccountResponse(account), 201, { Location: location })
})

/**
 * GET /accounts
 * List every account in insertion order
 */
accounts.get('/', async (c) => {
  log('Request to list Accounts')
  const all = await listAccounts(c.get('accountStore'))
  return c.json(all.map(toAccountResponse))
})

accounts.all('/', methodNotAllowed(COLLECTION_METHODS))

/**
 * GET /accounts/:id
 * Read a single account
 */
accounts.get(ACCOUNT_PATH, async (c) => {
  const accountId = parseAccountId(c.req.param('id'))
  if (accountId === null) {
    return c.notFound()
  }
  log({ message: 'Request to read an Account', accountId })

  const account = await getAccount(c.get('accountStore'), accountId)
  return c.json(toAccountResponse(account))
})

/**
 * PUT /accounts/:id
 * Replace an account's fields
 */
accounts.put(ACCOUNT_PATH, requireJsonContentType, async (c) => {
  const accountId = parseAccountId(c.req.param('id'))
  if (accountId === null) {
    return c.notFound()
  }
  log({ message: 'Request to update an Account', accountId })

  const body = decodeJsonBody(await c.req.text())
  const account = await updateAccount(c.get('accountStore'), accountId, body)
  return c.json(toAccountResponse(account))
})

/**
 * DELETE /accounts/:id
 * Remove an account
 */
accounts.delete(ACCOUNT_PATH, async (c) => {
  const accountId = parseAccountId(c.req.param('id'))
  if (accountId === null) {
    return c.notFound()
  }
  log({ message: 'Request to delete an Account', accountId })

  await deleteAccount(c.get('accountStore'), accountId)
  return c.body(null, 204)
})

accounts.all(ACCOUNT_PATH, methodNotAllowed(ACCOUNT_METHODS))

export default accounts
