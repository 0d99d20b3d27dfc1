import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from 'vitest'

const mocks = vi.hoisted(() => ({
  error: vi.fn(),
}))

vi.mock('./output.ts', () => ({
  error: mocks.error,
}))

import { CliError, collect, failWithError, handleCliError, withErrorHandling } from './cli.ts'
import { ValidationError } from './spec.ts'

describe('cli error helpers', () => {
  let exitMock: MockInstance<typeof process.exit>

  beforeEach(() => {
    vi.clearAllMocks()
    exitMock = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never)
  })

  afterEach(() => {
    exitMock.mockRestore()
  })

  test('failWithError reports and throws CliError', () => {
    expect(() => failWithError('boom')).toThrowError(CliError)
    expect(mocks.error).toHaveBeenCalledWith('boom')
  })

  test('handleCliError reports unreported CliError and exits with code', () => {
    const err = new CliError('bad', { exitCode: 12, alreadyReported: false })

    handleCliError(err)

    expect(mocks.error).toHaveBeenCalledWith('bad')
    expect(exitMock).toHaveBeenCalledWith(12)
  })

  test('handleCliError reports every validation problem', () => {
    handleCliError(new ValidationError(['first problem', 'second problem']))

    expect(mocks.error).toHaveBeenNthCalledWith(1, 'first problem')
    expect(mocks.error).toHaveBeenNthCalledWith(2, 'second problem')
    expect(exitMock).toHaveBeenCalledWith(1)
  })

  test('withErrorHandling turns a rejected action into an exit code', async () => {
    const action = withErrorHandling(async (name: string) => {
      throw new Error(`cannot handle ${name}`)
    })

    await action('web')

    expect(mocks.error).toHaveBeenCalledWith('cannot handle web')
    expect(exitMock).toHaveBeenCalledWith(1)
  })
})

test('collect accumulates repeated options', () => {
  expect(collect('b', collect('a', []))).toEqual(['a', 'b'])
})
