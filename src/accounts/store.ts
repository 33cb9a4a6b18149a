import type { Account, AccountInput } from './types/account.ts'

/**
 * Persistence for accounts keyed by integer id. An unknown id is reported as
 * null (or false for delete), never thrown.
 */
export interface AccountStore {
  insert(input: AccountInput): Promise<Account>
  findById(id: number): Promise<Account | null>
  /** Every account, ascending by id (insertion order). */
  findAll(): Promise<Account[]>
  update(id: number, input: AccountInput): Promise<Account | null>
  delete(id: number): Promise<boolean>
}
