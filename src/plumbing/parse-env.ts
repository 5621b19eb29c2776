/**
 * Safely parse a string to a number. Returns fallback for empty, invalid, or non-finite values.
 */
export const parseNumber = (
  value: string | undefined,
  fallback: number,
): number => {
  if (!value) {
    return fallback
  }

  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    return fallback
  }

  return parsed
}

const TRUE_VALUES = ['true', 'yes', 'on', '1']
const FALSE_VALUES = ['false', 'no', 'off', '0']

/**
 * Parse a boolean-ish string. Returns undefined when the value is not recognised
 * so callers can decide between a fallback and a validation error.
 */
export const parseBoolean = (value: string | undefined): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  const normalized = value.trim().toLowerCase()
  if (TRUE_VALUES.includes(normalized)) {
    return true
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false
  }
  return undefined
}

/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 */
export const parseList = (value: string | undefined): string[] => {
  if (!value) {
    return []
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}
