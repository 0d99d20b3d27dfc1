import { loadConfig, getComposeFile } from '../lib/config.ts'
import { loadComposeFile, writeComposeFile } from '../lib/document.ts'
import { removeComposeEntry } from '../lib/merge.ts'
import { failWithError } from '../lib/cli.ts'
import * as output from '../lib/output.ts'

export interface RemoveOptions {
  file?: string
  /** Remove a network instead of a service */
  network?: boolean
}

/**
 * Remove a service or network from the compose file
 *
 * @param name - The service (or network) to remove
 */
export async function remove(name: string, options: RemoveOptions = {}): Promise<void> {
  const config = await loadConfig()
  const composeFile = getComposeFile(config, options.file)
  const kind = options.network ? 'network' : 'service'
  const tree = await loadComposeFile(composeFile)

  if (!tree) {
    failWithError(`No compose file found at ${composeFile}`)
  }

  if (!removeComposeEntry(tree, options.network ? 'networks' : 'services', name)) {
    output.dim(`No ${kind} named ${name} in ${composeFile}`)
    return
  }

  await writeComposeFile(tree, composeFile)

  const label = options.network ? output.network(name) : output.service(name)
  output.success(`Removed ${kind} ${label} from ${output.file(composeFile)}`)
}
