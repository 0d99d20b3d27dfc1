import { loadConfig, getComposeFile } from '../lib/config.ts'
import { initComposeFile } from '../lib/document.ts'
import * as output from '../lib/output.ts'

export interface InitOptions {
  file?: string
}

/**
 * Create an empty compose file with `services` and `networks` sections
 */
export async function init(options: InitOptions = {}): Promise<void> {
  const config = await loadConfig()
  const composeFile = getComposeFile(config, options.file)

  if (await initComposeFile(composeFile)) {
    output.success(`Created ${output.file(composeFile)}`)
  } else {
    output.dim(`${composeFile} already exists`)
  }
}
