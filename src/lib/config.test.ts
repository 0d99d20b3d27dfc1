import { mkdtempSync } from 'fs'
import { rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import {
  CONFIG_ENV,
  CONFIG_FILE,
  ConfigError,
  DEFAULT_COMPOSE,
  getComposeFile,
  getConfigPath,
  loadConfig,
  validateConfig,
} from './config.ts'

const MiB = 1024 ** 2

describe('loadConfig', () => {
  let dir: string
  let configPath: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'compose-manager-config-test-'))
    configPath = join(dir, CONFIG_FILE)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('uses defaults when the file does not exist', async () => {
    const config = await loadConfig(configPath)

    expect(config).toEqual({ composeFile: DEFAULT_COMPOSE, infraFile: undefined, presets: {} })
  })

  test('accepts comments and a trailing comma', async () => {
    await writeFile(
      configPath,
      [
        '{',
        '  // stack managed from the home server',
        '  "composeFile": "/srv/stack/compose.yml",',
        '  "infraFile": "/srv/infra/compose.yml",',
        '}',
      ].join('\n')
    )

    const config = await loadConfig(configPath)

    expect(config.composeFile).toBe('/srv/stack/compose.yml')
    expect(config.infraFile).toBe('/srv/infra/compose.yml')
  })

  test('rejects malformed jsonc', async () => {
    await writeFile(configPath, '{"composeFile": "compose.yml",,}')

    await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError)
  })

  test('parses presets into limits', async () => {
    await writeFile(
      configPath,
      '{ "presets": { "Tiny": { "cpus": "0.1", "memory": "32M", "reservations": { "memory": "16M" } } } }'
    )

    const config = await loadConfig(configPath)

    expect(config.presets).toEqual({
      Tiny: { cpuLimit: 0.1, memoryLimit: 32 * MiB, memoryReservation: 16 * MiB },
    })
  })
})

describe('validateConfig', () => {
  test('rejects values of the wrong type', () => {
    expect(() => validateConfig([])).toThrow('Config must be an object')
    expect(() => validateConfig({ composeFile: '' })).toThrow('composeFile must be a non-empty string')
    expect(() => validateConfig({ presets: [] })).toThrow('presets must be an object')
  })

  test('rejects presets with invalid quantities', () => {
    expect(() => validateConfig({ presets: { Tiny: { memory: 'lots' } } })).toThrow(
      'presets.Tiny.memory is not a valid quantity: "lots"'
    )
    expect(() => validateConfig({ presets: { Tiny: {} } })).toThrow(
      'presets.Tiny must set at least one of cpus or memory'
    )
  })
})

describe('paths', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  test('getConfigPath honors the environment', () => {
    vi.stubEnv(CONFIG_ENV, '/tmp/other-config.jsonc')

    expect(getConfigPath()).toBe('/tmp/other-config.jsonc')
  })

  test('getComposeFile prefers the command line', () => {
    const config = validateConfig({ composeFile: 'stack.yml' })

    expect(getComposeFile(config)).toBe('stack.yml')
    expect(getComposeFile(config, 'other.yml')).toBe('other.yml')
  })
})
