import { parseNonNegativeInteger } from '../plumbing/parse-number.ts'
import type { DatabaseConfig } from './types/database-config.ts'

const KEYSPACE_NAME = /^[A-Za-z][A-Za-z0-9_]{0,47}$/

export const DEFAULT_KEYSPACE = 'account_service'

export const getDatabaseConfig = (): DatabaseConfig => {
  const rawHosts = process.env.SCYLLA_HOSTS || 'localhost'
  const hosts = rawHosts
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0)

  // The keyspace is interpolated into CQL, so only plain identifiers pass.
  const rawKeyspace = process.env.SCYLLA_KEYSPACE?.trim()
  if (rawKeyspace && !KEYSPACE_NAME.test(rawKeyspace)) {
    throw new Error(`Invalid SCYLLA_KEYSPACE: ${rawKeyspace}`)
  }

  return {
    hosts,
    port: parseNonNegativeInteger(process.env.SCYLLA_PORT, 9042),
    keyspace: rawKeyspace || DEFAULT_KEYSPACE,
    localDataCenter: process.env.SCYLLA_LOCAL_DATACENTER || 'datacenter1',
    username: process.env.SCYLLA_USERNAME,
    password: process.env.SCYLLA_PASSWORD,
    isSslEnabled: process.env.SCYLLA_SSL === 'true',
    connectTimeoutMs: parseNonNegativeInteger(
      process.env.SCYLLA_CONNECT_TIMEOUT_MS,
      10_000,
    ),
    connectRetries: parseNonNegativeInteger(
      process.env.SCYLLA_CONNECT_RETRIES,
      3,
    ),
    connectRetryDelayMs: parseNonNegativeInteger(
      process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
      1_000,
    ),
  }
}
