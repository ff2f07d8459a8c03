/**
 * Environment parsing shared by both services
 */

/**
 * Parse a positive integer setting. Missing values take the fallback
 * silently; unparseable, zero or negative values take it with a warning.
 */
export function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (!value) return fallback

  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed <= 0) {
    console.warn(`[Config] Ignoring invalid ${name}="${value}", using ${fallback}`)
    return fallback
  }
  return parsed
}
