import { initializeDatabase, isDatabaseEnabledForEnv } from '../database/client.ts'
import { getDatabaseConfig } from '../database/config.ts'
import { ensureAccountSchema } from '../database/schema.ts'
import { log } from '../plumbing/logger.ts'
import { createMemoryAccountStore } from './memory-store.ts'
import { createScyllaAccountStore } from './storage.ts'
import type { AccountStore } from './store.ts'

/**
 * Pick the account store for the current environment: ScyllaDB when the
 * database is enabled, otherwise the process-local store.
 */
export const openAccountStore = async (): Promise<AccountStore> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database disabled for this environment - using in-memory account store')
    return createMemoryAccountStore()
  }

  const client = await initializeDatabase()
  const { keyspace } = getDatabaseConfig()
  await ensureAccountSchema(client, keyspace)
  return createScyllaAccountStore(client, keyspace)
}
