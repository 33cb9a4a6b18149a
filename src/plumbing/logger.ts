import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogFields = { [key: string]: string | number | boolean | object }

type LogInput = string | ({ message: string } & LogFields)

const toLogMessage = (
  message: LogInput,
): { message: string; app: string; version: string } & LogFields => {
  if (typeof message === 'string') {
    return {
      message,
      app: name,
      version,
    }
  }
  return {
    ...message,
    app: name,
    version,
  }
}

export const log = (message: LogInput): void => {
  console.log(toLogMessage(message))
}

export const logError = (message: LogInput): void => {
  console.error(toLogMessage(message))
}

/**
 * Flattens an unknown thrown value into something safe to put in a log line.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
