import type { AccountStore } from './store.ts'
import type { Account, AccountInput } from './types/account.ts'

/**
 * Process-local account store. Used when ScyllaDB is disabled for the
 * environment and by the HTTP tests.
 */
export const createMemoryAccountStore = (): AccountStore => {
  const accounts = new Map<number, Account>()
  let lastId = 0

  return {
    insert: async (input: AccountInput): Promise<Account> => {
      lastId += 1
      const account: Account = { id: lastId, ...input }
      accounts.set(account.id, account)
      return { ...account }
    },

    findById: async (id: number): Promise<Account | null> => {
      const account = accounts.get(id)
      return account ? { ...account } : null
    },

    findAll: async (): Promise<Account[]> =>
      [...accounts.values()]
        .sort((a, b) => a.id - b.id)
        .map((account) => ({ ...account })),

    update: async (id: number, input: AccountInput): Promise<Account | null> => {
      if (!accounts.has(id)) {
        return null
      }
      const account: Account = { id, ...input }
      accounts.set(id, account)
      return { ...account }
    },

    delete: async (id: number): Promise<boolean> => accounts.delete(id),
  }
}
