import { mkdtempSync } from 'fs'
import { readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { CONFIG_ENV } from '../lib/config.ts'
import { CliError } from '../lib/cli.ts'
import { ValidationError } from '../lib/spec.ts'

const mocks = vi.hoisted(() => ({
  success: vi.fn(),
  error: vi.fn(),
  dim: vi.fn(),
}))

vi.mock('../lib/output.ts', () => ({
  success: mocks.success,
  error: mocks.error,
  dim: mocks.dim,
  service: (name: string) => name,
  network: (name: string) => name,
  file: (path: string) => path,
}))

import { remove } from './remove.ts'

const COMPOSE = [
  'services:',
  '  web:',
  '    image: nginx',
  '    networks:',
  '      - proxy',
  '  db:',
  '    image: postgres',
  'networks:',
  '  proxy:',
  '    external: true',
  '',
].join('\n')

describe('remove command', () => {
  let dir: string
  let composeFile: string

  beforeEach(async () => {
    vi.clearAllMocks()
    dir = mkdtempSync(join(tmpdir(), 'compose-manager-remove-test-'))
    composeFile = join(dir, 'compose.yml')
    vi.stubEnv(CONFIG_ENV, join(dir, 'config.jsonc'))
    await writeFile(composeFile, COMPOSE)
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await rm(dir, { recursive: true, force: true })
  })

  test('removes a service', async () => {
    await remove('db', { file: composeFile })

    expect(await readFile(composeFile, 'utf-8')).toBe(
      [
        'services:',
        '  web:',
        '    image: nginx',
        '    networks:',
        '      - proxy',
        'networks:',
        '  proxy:',
        '    external: true',
        '',
      ].join('\n')
    )
    expect(mocks.success).toHaveBeenCalledWith(`Removed service db from ${composeFile}`)
  })

  test('refuses to remove a network that is still in use', async () => {
    await expect(remove('proxy', { file: composeFile, network: true })).rejects.toThrow(ValidationError)
    expect(await readFile(composeFile, 'utf-8')).toBe(COMPOSE)
  })

  test('reports unknown names', async () => {
    await remove('cache', { file: composeFile })

    expect(mocks.dim).toHaveBeenCalledWith(`No service named cache in ${composeFile}`)
    expect(await readFile(composeFile, 'utf-8')).toBe(COMPOSE)
  })

  test('fails when the file does not exist', async () => {
    const missing = join(dir, 'missing.yml')

    await expect(remove('web', { file: missing })).rejects.toThrow(CliError)
    expect(mocks.error).toHaveBeenCalledWith(`No compose file found at ${missing}`)
  })
})
