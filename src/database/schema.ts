import type { Client } from 'cassandra-driver'
import { log } from '../plumbing/logger.ts'

/**
 * Create the keyspace and account tables when they are missing. Safe to run
 * on every start; existing tables are left untouched.
 */
export const ensureAccountSchema = async (
  client: Client,
  keyspace: string,
): Promise<void> => {
  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)

  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.accounts (
      id INT,
      name TEXT,
      email TEXT,
      address TEXT,
      phone_number TEXT,
      date_joined DATE,
      PRIMARY KEY (id)
    )
  `)

  // Single-row sequence advanced with lightweight transactions.
  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.account_sequence (
      name TEXT,
      next_id INT,
      PRIMARY KEY (name)
    )
  `)

  log({ message: 'Account schema ready', keyspace })
}
