/**
 * Request payload checks for the accounts resource. Every check returns a
 * tagged result so the handler knows the failure kind before anything is
 * written.
 */
import { isCalendarDate } from './dates.ts'
import type { AccountPayload } from './types/account.ts'

export const JSON_MEDIA_TYPE = 'application/json'

export type Validation<T> =
  | { isValid: true; data: T }
  | { isValid: false; error: string }

export type DecodedBody =
  | { isParsed: true; value: unknown }
  | { isParsed: false; error: string }

type RequiredTextField = 'name' | 'email' | 'address' | 'phone_number'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isAbsent = (value: unknown): value is null | undefined =>
  value === undefined || value === null

/**
 * Media type comparison ignores parameters such as charset and letter case.
 */
export const isJsonContentType = (header: string | undefined): boolean => {
  if (!header) {
    return false
  }
  const mediaType = header.split(';')[0]?.trim().toLowerCase()
  return mediaType === JSON_MEDIA_TYPE
}

export const decodeJsonBody = (text: string): DecodedBody => {
  try {
    const value: unknown = JSON.parse(text)
    return { isParsed: true, value }
  } catch {
    return { isParsed: false, error: 'Request body is not valid JSON' }
  }
}

const validateBodyId = (value: unknown): Validation<number | undefined> => {
  if (isAbsent(value)) {
    return { isValid: true, data: undefined }
  }
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    return { isValid: false, error: 'Invalid Account: id must be an integer' }
  }
  return { isValid: true, data: value }
}

const readRequiredText = (
  record: Record<string, unknown>,
  field: RequiredTextField,
): Validation<string> => {
  const value = record[field]
  if (isAbsent(value)) {
    return { isValid: false, error: `Invalid Account: missing ${field}` }
  }
  if (typeof value !== 'string') {
    return { isValid: false, error: `Invalid Account: ${field} must be a string` }
  }
  if (field === 'name' && !value.trim()) {
    return { isValid: false, error: 'Invalid Account: name must not be empty' }
  }
  return { isValid: true, data: value }
}

const validateDateJoined = (value: unknown): Validation<string | undefined> => {
  if (isAbsent(value)) {
    return { isValid: true, data: undefined }
  }
  if (typeof value !== 'string' || !isCalendarDate(value)) {
    return {
      isValid: false,
      error: 'Invalid Account: date_joined must be a calendar date (YYYY-MM-DD)',
    }
  }
  return { isValid: true, data: value }
}

/**
 * Decode a request body into an account payload. Unknown keys are ignored;
 * a missing date_joined stays undefined.
 */
export const validateAccountPayload = (
  body: DecodedBody,
): Validation<AccountPayload> => {
  if (!body.isParsed) {
    return { isValid: false, error: body.error }
  }
  if (!isRecord(body.value)) {
    return { isValid: false, error: 'Request body must be a JSON object' }
  }
  const record = body.value

  const id = validateBodyId(record.id)
  if (!id.isValid) {
    return id
  }

  const name = readRequiredText(record, 'name')
  if (!name.isValid) {
    return name
  }
  const email = readRequiredText(record, 'email')
  if (!email.isValid) {
    return email
  }
  const address = readRequiredText(record, 'address')
  if (!address.isValid) {
    return address
  }
  const phoneNumber = readRequiredText(record, 'phone_number')
  if (!phoneNumber.isValid) {
    return phoneNumber
  }

  const dateJoined = validateDateJoined(record.date_joined)
  if (!dateJoined.isValid) {
    return dateJoined
  }

  return {
    isValid: true,
    data: {
      ...(id.data !== undefined && { id: id.data }),
      name: name.data,
      email: email.data,
      address: address.data,
      phone_number: phoneNumber.data,
      ...(dateJoined.data !== undefined && { date_joined: dateJoined.data }),
    },
  }
}

/**
 * Compare an id carried in the body against the id in the path. Bodies that
 * are malformed or carry no id pass; field validation reports those later.
 */
export const reconcileAccountId = (
  body: DecodedBody,
  pathId: number,
): Validation<number> => {
  if (!body.isParsed || !isRecord(body.value)) {
    return { isValid: true, data: pathId }
  }

  const bodyId = validateBodyId(body.value.id)
  if (!bodyId.isValid) {
    return bodyId
  }
  if (bodyId.data !== undefined && bodyId.data !== pathId) {
    return {
      isValid: false,
      error: `Account id [${bodyId.data}] in body does not match id [${pathId}] in path`,
    }
  }
  return { isValid: true, data: pathId }
}
