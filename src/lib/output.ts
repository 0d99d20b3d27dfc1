import chalk from 'chalk'

/**
 * Output a success message with a green checkmark
 */
export function success(message: string): void {
  console.log(chalk.green('✓') + ' ' + message)
}

/**
 * Output a warning message with a yellow warning symbol
 */
export function warn(message: string): void {
  console.warn(chalk.yellow('⚠') + ' ' + message)
}

/**
 * Output an error message with a red X
 */
export function error(message: string): void {
  console.error(chalk.red('✗') + ' ' + message)
}

/**
 * Output an info message with a blue arrow
 */
export function info(message: string): void {
  console.log(chalk.blue('→') + ' ' + message)
}

/**
 * Output a dim/muted message (for secondary information)
 */
export function dim(message: string): void {
  console.log(chalk.dim(message))
}

/**
 * Output a header/title in bold
 */
export function header(message: string): void {
  console.log(chalk.bold(message))
}

/**
 * Format a service name in magenta
 */
export function service(name: string): string {
  return chalk.magenta(name)
}

/**
 * Format a network name in cyan
 */
export function network(name: string): string {
  return chalk.cyan(name)
}

/**
 * Format a file path in yellow
 */
export function file(path: string): string {
  return chalk.yellow(path)
}

/**
 * Output labelled detail lines under an entry, skipping empty values
 */
export function details(rows: Array<[label: string, value: string | undefined]>): void {
  for (const [label, value] of rows) {
    if (value) {
      console.log('    ' + chalk.dim(`${label}:`) + ' ' + value)
    }
  }
}

/**
 * Output a blank line
 */
export function newline(): void {
  console.log()
}
