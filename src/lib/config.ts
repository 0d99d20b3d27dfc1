import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser'
import type { ManagerConfig, ResourceLimits } from '../types.ts'
import { asRecord } from './fields.ts'
import { parseCpus, parseMemory } from './quantity.ts'

/** Directory name for user configuration */
export const CONFIG_DIR = '.compose-manager'

/** Config file name */
export const CONFIG_FILE = 'config.jsonc'

/** Environment variable that points at a different config file */
export const CONFIG_ENV = 'COMPOSE_MANAGER_CONFIG'

/** Default compose file */
export const DEFAULT_COMPOSE = 'compose.yml'

/**
 * Error thrown when config validation fails
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Get the path to the config file, honoring COMPOSE_MANAGER_CONFIG
 */
export function getConfigPath(): string {
  return process.env[CONFIG_ENV] || join(homedir(), CONFIG_DIR, CONFIG_FILE)
}

function optionalString(c: Record<string, unknown>, key: string): string | undefined {
  const value = c[key]
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${key} must be a non-empty string`)
  }
  return value.trim()
}

/**
 * Validate one preset entry into concrete limits
 */
function validatePreset(name: string, value: unknown): ResourceLimits {
  const preset = asRecord(value)
  if (!preset) {
    throw new ConfigError(`presets.${name} must be an object`)
  }

  const reservations = preset.reservations === undefined ? {} : asRecord(preset.reservations)
  if (!reservations) {
    throw new ConfigError(`presets.${name}.reservations must be an object`)
  }

  const limits: ResourceLimits = {}
  const fields = [
    ['cpus', preset.cpus, parseCpus, 'cpuLimit'],
    ['memory', preset.memory, parseMemory, 'memoryLimit'],
    ['reservations.cpus', reservations.cpus, parseCpus, 'cpuReservation'],
    ['reservations.memory', reservations.memory, parseMemory, 'memoryReservation'],
  ] as const

  for (const [path, raw, parse, key] of fields) {
    if (raw === undefined) continue

    const parsed = parse(raw)
    if (parsed === null) {
      throw new ConfigError(`presets.${name}.${path} is not a valid quantity: ${JSON.stringify(raw)}`)
    }
    limits[key] = parsed
  }

  if (Object.keys(limits).length === 0) {
    throw new ConfigError(`presets.${name} must set at least one of cpus or memory`)
  }

  return limits
}

/**
 * Validate and normalize a user configuration
 */
export function validateConfig(config: unknown): ManagerConfig {
  const c = asRecord(config)
  if (!c) {
    throw new ConfigError('Config must be an object')
  }

  const composeFile = optionalString(c, 'composeFile') ?? DEFAULT_COMPOSE
  const infraFile = optionalString(c, 'infraFile')

  const rawPresets = c.presets === undefined ? {} : asRecord(c.presets)
  if (!rawPresets) {
    throw new ConfigError('presets must be an object')
  }

  const presets: Record<string, ResourceLimits> = {}
  for (const [name, value] of Object.entries(rawPresets)) {
    presets[name] = validatePreset(name, value)
  }

  return { composeFile, infraFile, presets }
}

/**
 * Load and validate the user configuration
 *
 * @param configPath - Config file to read (default: {@link getConfigPath})
 * @returns The validated configuration, or defaults if the file does not exist
 * @throws ConfigError if the config is invalid
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<ManagerConfig> {
  if (!existsSync(configPath)) {
    return validateConfig({})
  }

  const content = await readFile(configPath, 'utf-8')

  // Parse JSONC (allows comments and trailing commas)
  const errors: ParseError[] = []
  const config: unknown = parseJsonc(content, errors, { allowTrailingComma: true })
  const [firstError] = errors

  if (firstError) {
    throw new ConfigError(
      `Invalid JSON in ${configPath}: ${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`
    )
  }

  return validateConfig(config)
}

/**
 * Get the compose file to operate on
 *
 * @param override - Path given on the command line, if any
 */
export function getComposeFile(config: ManagerConfig, override?: string): string {
  return override ?? config.composeFile
}
