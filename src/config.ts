import { parseNonNegativeInteger } from './plumbing/parse-number.ts'

export const DEFAULT_PORT = 8080

export interface ServerConfig {
  port: number
  isPortDefaulted: boolean
}

export const getServerConfig = (): ServerConfig => {
  return {
    port: parseNonNegativeInteger(process.env.PORT, DEFAULT_PORT),
    isPortDefaulted: !process.env.PORT,
  }
}
