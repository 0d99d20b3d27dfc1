import { mkdtempSync } from 'fs'
import { rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, expect, test, vi } from 'vitest'
import { CONFIG_ENV } from '../lib/config.ts'

const mocks = vi.hoisted(() => ({
  header: vi.fn(),
}))

vi.mock('../lib/output.ts', () => ({
  header: mocks.header,
}))

import { presets } from './presets.ts'

let dir: string
let logMock: ReturnType<typeof vi.spyOn>

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'compose-manager-presets-test-'))
  vi.stubEnv(CONFIG_ENV, join(dir, 'config.jsonc'))
  logMock = vi.spyOn(console, 'log').mockImplementation(() => undefined)
})

afterEach(async () => {
  logMock.mockRestore()
  vi.unstubAllEnvs()
  await rm(dir, { recursive: true, force: true })
})

test('lists built-in and configured presets', async () => {
  await writeFile(
    join(dir, 'config.jsonc'),
    '{ "presets": { "Large": { "cpus": 2 }, "Tiny": { "memory": "32M" } } }'
  )

  await presets()

  expect(mocks.header).toHaveBeenCalledWith('Resource presets:')
  expect(logMock.mock.calls).toEqual([
    ['  Small  cpus=0.2 memory=64M'],
    ['  Medium  cpus=0.5 memory=128M'],
    ['  Large (overridden)  cpus=2'],
    ['  Tiny (custom)  memory=32M'],
  ])
})
