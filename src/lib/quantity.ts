/** Binary unit multipliers understood by compose memory values */
const MEMORY_UNITS: Record<string, number> = {
  b: 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
}

/** Units used when writing, largest first */
const MEMORY_SUFFIXES: Array<[string, number]> = [
  ['G', 1024 ** 3],
  ['M', 1024 ** 2],
  ['K', 1024],
]

const CPU_PATTERN = /^\d+(?:\.\d+)?$/
const MEMORY_PATTERN = /^(\d+(?:\.\d+)?)\s*([bkmg])?b?$/i

/**
 * Parse a CPU count such as `0.5`, `"2"` or `"0.25"`
 *
 * @returns Core count, or null if the value is not a non-negative decimal
 */
export function parseCpus(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null
  }

  if (typeof value !== 'string' || !CPU_PATTERN.test(value.trim())) {
    return null
  }

  return Number(value.trim())
}

/** Smallest non-zero core count written to a compose file */
export const MIN_CPUS = 0.000001

/**
 * Format a core count the way compose files usually spell it (`"0.5"`, `"2"`)
 *
 * Always decimal notation, rounded to {@link MIN_CPUS}.
 */
export function formatCpus(cpus: number): string {
  return String(Number(cpus.toFixed(6)))
}

/**
 * Parse a memory quantity such as `512M`, `1g`, `64mb` or a plain byte count
 *
 * @returns Byte count, or null if the value is not a memory quantity
 */
export function parseMemory(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null
  }

  if (typeof value !== 'string') {
    return null
  }

  const match = value.trim().match(MEMORY_PATTERN)
  if (!match) {
    return null
  }

  const amount = Number(match[1])
  const unit = (match[2] ?? 'b').toLowerCase()
  const multiplier = MEMORY_UNITS[unit] ?? 1

  return Math.round(amount * multiplier)
}

/**
 * Format a byte count using the largest unit that divides it exactly
 *
 * `67108864` becomes `64M`, `1073741824` becomes `1G`, `1000` becomes `1000b`.
 */
export function formatMemory(bytes: number): string {
  if (bytes === 0) {
    return '0'
  }

  for (const [suffix, size] of MEMORY_SUFFIXES) {
    if (bytes % size === 0) {
      return `${bytes / size}${suffix}`
    }
  }

  return `${bytes}b`
}
