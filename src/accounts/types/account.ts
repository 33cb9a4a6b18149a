// Wire and storage shape are the same flat record; date_joined is YYYY-MM-DD.

export interface Account {
  id: number
  name: string
  email: string
  address: string
  phone_number: string
  date_joined: string
}

export type AccountInput = Omit<Account, 'id'>

/**
 * A decoded request body that passed field validation. date_joined is left
 * undefined when the client omitted it so the caller can default it.
 */
export interface AccountPayload {
  id?: number
  name: string
  email: string
  address: string
  phone_number: string
  date_joined?: string
}
