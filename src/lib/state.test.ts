import { mkdtempSync } from 'fs'
import { readdir, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { isFileMissingError, writeFileAtomic } from './state.ts'

describe('writeFileAtomic', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'compose-manager-state-test-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('creates missing directories and leaves no temporary files', async () => {
    const path = join(dir, 'nested', 'compose.yml')

    await writeFileAtomic(path, 'services: {}\n')

    expect(await readFile(path, 'utf-8')).toBe('services: {}\n')
    expect(await readdir(join(dir, 'nested'))).toEqual(['compose.yml'])
  })

  test('replaces existing content', async () => {
    const path = join(dir, 'compose.yml')

    await writeFileAtomic(path, 'first\n')
    await writeFileAtomic(path, 'second\n')

    expect(await readFile(path, 'utf-8')).toBe('second\n')
    expect(await readdir(dir)).toEqual(['compose.yml'])
  })

  test('keeps the previous file when the target cannot be replaced', async () => {
    const target = join(dir, 'compose.yml')
    await writeFileAtomic(join(target, 'inner.yml'), 'inner\n')

    await expect(writeFileAtomic(target, 'replacement\n')).rejects.toThrow()
    expect(await readdir(dir)).toEqual(['compose.yml'])
  })
})

describe('isFileMissingError', () => {
  test('only matches a missing file', async () => {
    const missing = await readFile(join(tmpdir(), 'compose-manager-state-test-absent', 'compose.yml')).catch(
      (error: unknown) => error
    )

    expect(isFileMissingError(missing)).toBe(true)
    expect(isFileMissingError(new Error('disk full'))).toBe(false)
    expect(isFileMissingError('ENOENT')).toBe(false)
  })
})
