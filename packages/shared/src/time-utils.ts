import parse from 'parse-duration'

/**
 * Parse duration string to milliseconds
 * @param duration - Duration string (e.g., '3m', '180s', '1h30m', '7h3m45s')
 * @returns Duration in milliseconds
 * @throws Error if duration format is invalid or negative
 */
export function parseDuration(duration: string): number {
  const result = parse(duration)

  if (result === null || result === undefined) {
    throw new Error(
      `Invalid duration format: ${duration}. Expected format: duration string (e.g., 3m, 180s, 1h30m, 7h3m45s)`
    )
  }

  if (result < 0) {
    throw new Error(
      `Invalid duration: ${duration}. Duration cannot be negative`
    )
  }

  return result
}

/**
 * Parse timeout string to milliseconds with default fallback
 * @param timeout - Timeout string (e.g., '5m', '30s', '2h')
 * @returns Timeout in milliseconds, defaults to 5 minutes if parsing fails
 */
export function parseTimeout(timeout: string): number {
  try {
    return parseDuration(timeout)
  } catch {
    return 300000 // Default to 5 minutes
  }
}

/**
 * Formats elapsed milliseconds as seconds with one decimal, e.g. '2.5s'
 */
export function formatElapsed(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`
}
