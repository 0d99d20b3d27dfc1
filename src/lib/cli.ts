import * as output from './output.ts'
import { ValidationError } from './spec.ts'

interface CliErrorOptions {
  exitCode?: number
  alreadyReported?: boolean
}

export class CliError extends Error {
  readonly exitCode: number
  readonly alreadyReported: boolean

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message)
    this.name = 'CliError'
    this.exitCode = options.exitCode ?? 1
    this.alreadyReported = options.alreadyReported ?? false
  }
}

export function failWithError(message: string, exitCode = 1): never {
  output.error(message)
  throw new CliError(message, { exitCode, alreadyReported: true })
}

export function handleCliError(error: unknown): never {
  if (error instanceof CliError) {
    if (!error.alreadyReported && error.message) {
      output.error(error.message)
    }
    process.exit(error.exitCode)
  }

  if (error instanceof ValidationError) {
    for (const problem of error.problems) {
      output.error(problem)
    }
    process.exit(1)
  }

  if (error instanceof Error) {
    output.error(error.message)
    process.exit(1)
  }

  output.error('An unexpected error occurred')
  process.exit(1)
}

/**
 * Wrap a command so that errors are reported and turned into an exit code
 */
export function withErrorHandling<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args)
    } catch (error) {
      handleCliError(error)
    }
  }
}

/**
 * Accumulate a repeatable option into a list
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}
