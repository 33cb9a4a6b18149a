/**
 * Parse an environment value as a whole number. Empty, non-numeric,
 * fractional and negative values yield the fallback.
 */
export const parseNonNegativeInteger = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value?.trim()) {
    return fallback
  }

  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    return fallback
  }

  return parsed
}
