import { Client, type ClientOptions } from 'cassandra-driver'
import { describeError, log } from '../plumbing/logger.ts'
import { getDatabaseConfig } from './config.ts'
import type { DatabaseConfig } from './types/database-config.ts'

let databaseClient: Client | null = null

export const isDatabaseEnabledForEnv = (): boolean => {
  if (process.env.SCYLLA_DISABLED === 'true') {
    return false
  }

  // Tests run against the memory store unless a real cluster is requested.
  if (
    process.env.NODE_ENV === 'test' &&
    process.env.SCYLLA_ENABLE_IN_TESTS !== 'true'
  ) {
    return false
  }

  return true
}

const toContactPoints = (config: DatabaseConfig): string[] =>
  config.hosts.map((host) => `${host}:${config.port}`)

/**
 * Statements always qualify tables with the keyspace, so the client connects
 * without one and can create it on first start.
 */
const createCassandraClient = (config: DatabaseConfig): Client => {
  const clientOptions: ClientOptions = {
    contactPoints: toContactPoints(config),
    localDataCenter: config.localDataCenter,
    credentials:
      config.username && config.password
        ? {
            username: config.username,
            password: config.password,
          }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
  }

  return new Client(clientOptions)
}

export const initializeDatabase = async (): Promise<Client> => {
  if (databaseClient) {
    log('Database client already initialized')
    return databaseClient
  }

  const config = getDatabaseConfig()
  const maxAttempts = Math.max(1, config.connectRetries)
  let attempt = 0

  while (true) {
    attempt += 1
    const client = createCassandraClient(config)

    try {
      await client.connect()
      databaseClient = client

      log({
        message: 'Database connection established',
        hosts: toContactPoints(config),
        keyspace: config.keyspace,
        localDataCenter: config.localDataCenter,
        attempt,
      })

      return client
    } catch (error) {
      log({
        message: 'Failed to connect to database',
        error: describeError(error),
        attempt,
      })

      try {
        await client.shutdown()
      } catch (shutdownError) {
        log({
          message: 'Error shutting down failed client',
          error: describeError(shutdownError),
        })
      }

      if (attempt >= maxAttempts) {
        throw error instanceof Error
          ? error
          : new Error(String(error ?? 'Unknown database connection error'))
      }

      await new Promise((resolve) => {
        setTimeout(resolve, config.connectRetryDelayMs)
      })
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null

  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log({
      message: 'Error while closing database connection',
      error: describeError(error),
    })
  }
}
