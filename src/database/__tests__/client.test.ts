import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  initializeDatabase,
  isDatabaseEnabledForEnv,
  shutdownDatabase,
} from '../client.ts'

const { MockClient, connect, shutdown } = vi.hoisted(() => {
  const connect = vi.fn()
  const shutdown = vi.fn()
  const MockClient = vi.fn(function () {
    return { connect, shutdown }
  })
  return { MockClient, connect, shutdown }
})

vi.mock('cassandra-driver', () => ({ Client: MockClient }))

const originalEnv = process.env

describe('Database client', () => {
  beforeEach(() => {
    process.env = { ...originalEnv }
    delete process.env.SCYLLA_DISABLED
    delete process.env.SCYLLA_ENABLE_IN_TESTS
    delete process.env.SCYLLA_HOSTS
    delete process.env.SCYLLA_PORT
    delete process.env.SCYLLA_CONNECT_RETRIES
    delete process.env.SCYLLA_KEYSPACE
    delete process.env.SCYLLA_LOCAL_DATACENTER
    delete process.env.SCYLLA_USERNAME
    delete process.env.SCYLLA_PASSWORD
    delete process.env.SCYLLA_SSL
    process.env.SCYLLA_CONNECT_RETRY_DELAY_MS = '0'

    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    MockClient.mockClear()
    connect.mockReset()
    shutdown.mockReset()
    connect.mockResolvedValue(undefined)
    shutdown.mockResolvedValue(undefined)
  })

  afterEach(async () => {
    await shutdownDatabase()
    process.env = originalEnv
    vi.restoreAllMocks()
  })

  describe('isDatabaseEnabledForEnv', () => {
    it('should be disabled when SCYLLA_DISABLED is true', () => {
      process.env.NODE_ENV = 'production'
      process.env.SCYLLA_DISABLED = 'true'

      expect(isDatabaseEnabledForEnv()).toBe(false)
    })

    it('should be disabled under tests by default', () => {
      process.env.NODE_ENV = 'test'

      expect(isDatabaseEnabledForEnv()).toBe(false)
    })

    it('should be enabled under tests when requested', () => {
      process.env.NODE_ENV = 'test'
      process.env.SCYLLA_ENABLE_IN_TESTS = 'true'

      expect(isDatabaseEnabledForEnv()).toBe(true)
    })

    it('should be enabled outside tests', () => {
      process.env.NODE_ENV = 'development'

      expect(isDatabaseEnabledForEnv()).toBe(true)
    })
  })

  it('should connect to the configured contact points', async () => {
    const client = await initializeDatabase()

    expect(MockClient).toHaveBeenCalledWith(
      expect.objectContaining({
        contactPoints: ['localhost:9042'],
        localDataCenter: 'datacenter1',
        credentials: undefined,
        sslOptions: undefined,
      }),
    )
    expect(connect).toHaveBeenCalledTimes(1)
    expect(client).toBe(MockClient.mock.results[0]?.value)
  })

  it('should reuse existing client instance across multiple initializations', async () => {
    const first = await initializeDatabase()
    const second = await initializeDatabase()

    expect(second).toBe(first)
    expect(MockClient).toHaveBeenCalledTimes(1)
  })

  it('should retry with a fresh client after a failed connection', async () => {
    connect
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockResolvedValueOnce(undefined)

    await initializeDatabase()

    expect(MockClient).toHaveBeenCalledTimes(3)
    expect(shutdown).toHaveBeenCalledTimes(2)
  })

  it('should give up after the configured number of attempts', async () => {
    process.env.SCYLLA_CONNECT_RETRIES = '2'
    connect.mockRejectedValue(new Error('connection refused'))

    await expect(initializeDatabase()).rejects.toThrow('connection refused')

    expect(MockClient).toHaveBeenCalledTimes(2)
    expect(shutdown).toHaveBeenCalledTimes(2)

    connect.mockResolvedValue(undefined)
    await initializeDatabase()
    expect(MockClient).toHaveBeenCalledTimes(3)
  })

  it('should close the client on shutdown', async () => {
    await initializeDatabase()

    await shutdownDatabase()

    expect(shutdown).toHaveBeenCalledTimes(1)

    await initializeDatabase()
    expect(MockClient).toHaveBeenCalledTimes(2)
  })

  it('should swallow shutdown failures and still forget the client', async () => {
    await initializeDatabase()
    shutdown.mockRejectedValueOnce(new Error('already closed'))

    await expect(shutdownDatabase()).resolves.toBeUndefined()

    await initializeDatabase()
    expect(MockClient).toHaveBeenCalledTimes(2)
  })
})
