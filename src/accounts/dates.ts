const ISO_CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * True for a real calendar date written as YYYY-MM-DD (no time part).
 * Rejects shapes like 2023-02-30 that Date would silently roll over.
 */
export const isCalendarDate = (value: string): boolean => {
  const match = ISO_CALENDAR_DATE.exec(value)
  if (!match) {
    return false
  }

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  if (year < 1) {
    return false
  }

  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  )
}

/** Current UTC calendar date as YYYY-MM-DD. */
export const today = (now: Date = new Date()): string =>
  now.toISOString().slice(0, 10)
