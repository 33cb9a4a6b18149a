import type { AccountStore } from '../accounts/store.ts'

declare module 'hono' {
  interface ContextVariableMap {
    accountStore: AccountStore
  }
}
