import { HTTPException } from 'hono/http-exception'

export class ValidationError extends HTTPException {
  constructor(message: string) {
    super(400, { message })
    this.name = 'ValidationError'
  }
}

export class AccountNotFoundError extends HTTPException {
  readonly accountId: number

  constructor(accountId: number) {
    super(404, { message: `Account with id [${accountId}] could not be found.` })
    this.name = 'AccountNotFoundError'
    this.accountId = accountId
  }
}

export class MethodNotAllowedError extends HTTPException {
  readonly allowedMethods: readonly string[]

  constructor(method: string, allowedMethods: readonly string[]) {
    super(405, {
      message: `Method ${method} is not allowed. Allowed: ${allowedMethods.join(', ')}`,
    })
    this.name = 'MethodNotAllowedError'
    this.allowedMethods = allowedMethods
  }
}

export class UnsupportedMediaTypeError extends HTTPException {
  constructor(expected: string) {
    super(415, { message: `Content-Type must be ${expected}` })
    this.name = 'UnsupportedMediaTypeError'
  }
}
