import { type Client, type QueryOptions, types } from 'cassandra-driver'
import type { AccountStore } from './store.ts'
import type { Account, AccountInput } from './types/account.ts'

const SEQUENCE_NAME = 'accounts'
const MAX_ID_ALLOCATION_ATTEMPTS = 10

// Prepared statements encode numbers as INT; unprepared ones would send doubles.
const QUERY_OPTIONS: QueryOptions = { prepare: true }

const ACCOUNT_COLUMNS = 'id, name, email, address, phone_number, date_joined'

const mapRowToAccount = (row: types.Row): Account => ({
  id: Number(row.id),
  name: String(row.name),
  email: String(row.email),
  address: String(row.address),
  phone_number: String(row.phone_number),
  // LocalDate renders as YYYY-MM-DD
  date_joined: String(row.date_joined),
})

/**
 * Account store on ScyllaDB / Cassandra. Ids come from a sequence row guarded
 * by lightweight transactions; update and delete use IF EXISTS so the
 * [applied] flag doubles as the not-found signal.
 */
export const createScyllaAccountStore = (
  client: Client,
  keyspace: string,
): AccountStore => {
  const allocateAccountId = async (): Promise<number> => {
    for (let attempt = 1; attempt <= MAX_ID_ALLOCATION_ATTEMPTS; attempt++) {
      const current = await client.execute(
        `SELECT next_id FROM ${keyspace}.account_sequence WHERE name = ?`,
        [SEQUENCE_NAME],
        QUERY_OPTIONS,
      )

      if (current.rows.length === 0) {
        const claimed = await client.execute(
          `INSERT INTO ${keyspace}.account_sequence (name, next_id)
           VALUES (?, ?)
           IF NOT EXISTS`,
          [SEQUENCE_NAME, 2],
          QUERY_OPTIONS,
        )
        if (claimed.wasApplied()) {
          return 1
        }
        continue
      }

      const nextId = Number(current.rows[0].next_id)
      const advanced = await client.execute(
        `UPDATE ${keyspace}.account_sequence SET next_id = ?
         WHERE name = ?
         IF next_id = ?`,
        [nextId + 1, SEQUENCE_NAME, nextId],
        QUERY_OPTIONS,
      )
      if (advanced.wasApplied()) {
        return nextId
      }
    }

    throw new Error(
      `Could not allocate an account id after ${MAX_ID_ALLOCATION_ATTEMPTS} attempts`,
    )
  }

  return {
    insert: async (input: AccountInput): Promise<Account> => {
      const id = await allocateAccountId()

      await client.execute(
        `INSERT INTO ${keyspace}.accounts (${ACCOUNT_COLUMNS})
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          id,
          input.name,
          input.email,
          input.address,
          input.phone_number,
          types.LocalDate.fromString(input.date_joined),
        ],
        QUERY_OPTIONS,
      )

      return { id, ...input }
    },

    findById: async (id: number): Promise<Account | null> => {
      const result = await client.execute(
        `SELECT ${ACCOUNT_COLUMNS} FROM ${keyspace}.accounts WHERE id = ?`,
        [id],
        QUERY_OPTIONS,
      )

      if (result.rows.length === 0) {
        return null
      }
      return mapRowToAccount(result.rows[0])
    },

    findAll: async (): Promise<Account[]> => {
      const result = await client.execute(
        `SELECT ${ACCOUNT_COLUMNS} FROM ${keyspace}.accounts`,
        [],
        QUERY_OPTIONS,
      )

      // Async iteration fetches every page, not just the first.
      const accounts: Account[] = []
      for await (const row of result) {
        accounts.push(mapRowToAccount(row))
      }
      // Partitions come back in token order; ids are allocated in insert order.
      return accounts.sort((a, b) => a.id - b.id)
    },

    update: async (id: number, input: AccountInput): Promise<Account | null> => {
      const result = await client.execute(
        `UPDATE ${keyspace}.accounts SET
         name = ?,
         email = ?,
         address = ?,
         phone_number = ?,
         date_joined = ?
         WHERE id = ?
         IF EXISTS`,
        [
          input.name,
          input.email,
          input.address,
          input.phone_number,
          types.LocalDate.fromString(input.date_joined),
          id,
        ],
        QUERY_OPTIONS,
      )

      return result.wasApplied() ? { id, ...input } : null
    },

    delete: async (id: number): Promise<boolean> => {
      const result = await client.execute(
        `DELETE FROM ${keyspace}.accounts WHERE id = ? IF EXISTS`,
        [id],
        QUERY_OPTIONS,
      )
      return result.wasApplied()
    },
  }
}
