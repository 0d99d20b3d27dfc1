import type { ResourceLimits } from '../types.ts'

export type PresetTable = Readonly<Record<string, ResourceLimits>>

const MiB = 1024 ** 2

/**
 * Built-in resource presets
 *
 * | Preset | cpus | memory |
 * |--------|------|--------|
 * | Small  | 0.2  | 64M    |
 * | Medium | 0.5  | 128M   |
 * | Large  | 1    | 512M   |
 */
export const DEFAULT_PRESETS: PresetTable = {
  Small: { cpuLimit: 0.2, memoryLimit: 64 * MiB },
  Medium: { cpuLimit: 0.5, memoryLimit: 128 * MiB },
  Large: { cpuLimit: 1, memoryLimit: 512 * MiB },
}

/**
 * Older names for built-in presets, resolved when the table has no entry of that name
 */
export const PRESET_ALIASES: Readonly<Record<string, string>> = {
  Big: 'Large',
}

/**
 * Error thrown when a preset name is not in the table
 */
export class UnknownPresetError extends Error {
  readonly preset: string

  constructor(preset: string, known: string[]) {
    super(`Unknown resource preset "${preset}". Available presets: ${known.join(', ')}`)
    this.name = 'UnknownPresetError'
    this.preset = preset
  }
}

/**
 * Combine the built-in presets with user-configured ones
 *
 * User presets with the same name replace the built-in ones.
 */
export function buildPresetTable(userPresets: Record<string, ResourceLimits> = {}): PresetTable {
  return { ...DEFAULT_PRESETS, ...userPresets }
}

/**
 * Look up a preset by name
 *
 * `Big` is accepted for `Large` unless the table defines its own `Big`.
 *
 * @returns A copy of the preset's limits
 * @throws UnknownPresetError if no preset has that name
 */
export function resolvePreset(name: string, table: PresetTable = DEFAULT_PRESETS): ResourceLimits {
  const alias = Object.hasOwn(PRESET_ALIASES, name) ? PRESET_ALIASES[name] : undefined
  const key = !Object.hasOwn(table, name) && alias !== undefined ? alias : name
  const preset = Object.hasOwn(table, key) ? table[key] : undefined

  if (!preset) {
    throw new UnknownPresetError(name, Object.keys(table))
  }

  return { ...preset }
}
