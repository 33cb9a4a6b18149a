import { log } from '../plumbing/logger.ts'
import { AccountNotFoundError, ValidationError } from '../plumbing/http-errors.ts'
import { today } from './dates.ts'
import type { AccountStore } from './store.ts'
import type { Account, AccountInput, AccountPayload } from './types/account.ts'
import {
  type DecodedBody,
  reconcileAccountId,
  validateAccountPayload,
} from './validation.ts'

/**
 * Fixed key order for every serialized account.
 */
export const toAccountResponse = (account: Account): Account => ({
  id: account.id,
  name: account.name,
  email: account.email,
  address: account.address,
  phone_number: account.phone_number,
  date_joined: account.date_joined,
})

// A body id is never persisted; the store (create) or the path (update) owns it.
const toAccountInput = (payload: AccountPayload): AccountInput => ({
  name: payload.name,
  email: payload.email,
  address: payload.address,
  phone_number: payload.phone_number,
  date_joined: payload.date_joined ?? today(),
})

const requireValidPayload = (body: DecodedBody): AccountPayload => {
  const result = validateAccountPayload(body)
  if (!result.isValid) {
    throw new ValidationError(result.error)
  }
  return result.data
}

/**
 * Create an account. Nothing is inserted unless the whole payload is valid.
 */
export const createAccount = async (
  store: AccountStore,
  body: DecodedBody,
): Promise<Account> => {
  const payload = requireValidPayload(body)
  const account = await store.insert(toAccountInput(payload))
  log({ message: 'Account created', accountId: account.id })
  return account
}

export const getAccount = async (
  store: AccountStore,
  accountId: number,
): Promise<Account> => {
  const account = await store.findById(accountId)
  if (!account) {
    throw new AccountNotFoundError(accountId)
  }
  return account
}

export const listAccounts = async (store: AccountStore): Promise<Account[]> => {
  const accounts = await store.findAll()
  log({ message: 'Accounts listed', count: accounts.length })
  return accounts
}

/**
 * Replace every mutable field of an account. The path id is authoritative:
 * a conflicting body id is rejected before the store is consulted, and an
 * omitted date_joined becomes the date of this update.
 */
export const updateAccount = async (
  store: AccountStore,
  accountId: number,
  body: DecodedBody,
): Promise<Account> => {
  const reconciled = reconcileAccountId(body, accountId)
  if (!reconciled.isValid) {
    throw new ValidationError(reconciled.error)
  }

  const existing = await store.findById(accountId)
  if (!existing) {
    throw new AccountNotFoundError(accountId)
  }

  const payload = requireValidPayload(body)
  const updated = await store.update(accountId, toAccountInput(payload))
  if (!updated) {
    throw new AccountNotFoundError(accountId)
  }

  log({ message: 'Account updated', accountId })
  return updated
}

export const deleteAccount = async (
  store: AccountStore,
  accountId: number,
): Promise<void> => {
  const existing = await store.findById(accountId)
  if (!existing) {
    throw new AccountNotFoundError(accountId)
  }

  const isDeleted = await store.delete(accountId)
  log({ message: 'Account deleted', accountId, isDeleted })
}
