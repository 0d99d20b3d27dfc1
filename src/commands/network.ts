import type { NetworkSpec } from '../types.ts'
import { loadConfig, getComposeFile } from '../lib/config.ts'
import { loadComposeFile, readComposeDocument, writeComposeFile } from '../lib/document.ts'
import { mergeCompose } from '../lib/merge.ts'
import { isNetworkDriver, ValidationError } from '../lib/spec.ts'
import { reportChanges } from './add.ts'

export interface NetworkOptions {
  file?: string
  driver?: string
  internal?: boolean
  ipv6?: boolean
  external?: boolean
}

/**
 * Build a network description from command line options
 *
 * @param isNew - Whether the network does not exist yet; new internal
 *   networks default to the bridge driver
 * @throws ValidationError if the driver is unknown
 */
export function buildNetworkSpec(name: string, options: NetworkOptions, isNew: boolean): NetworkSpec {
  const network: NetworkSpec = { name }

  if (options.driver !== undefined) {
    if (!isNetworkDriver(options.driver)) {
      throw new ValidationError([`unknown network driver "${options.driver}"`])
    }
    network.driver = options.driver
  }

  if (options.internal !== undefined) network.internal = options.internal
  if (options.ipv6 !== undefined) network.enableIpv6 = options.ipv6
  if (options.external !== undefined) network.external = options.external

  if (isNew && !network.external) {
    network.driver ??= 'bridge'
  }

  return network
}

/**
 * Add a network to the compose file, or update the given fields of an existing one
 */
export async function network(name: string, options: NetworkOptions = {}): Promise<void> {
  const config = await loadConfig()
  const composeFile = getComposeFile(config, options.file)
  const tree = await loadComposeFile(composeFile)

  const isNew = tree ? !readComposeDocument(tree).networks.some(existing => existing.name === name) : true
  const spec = buildNetworkSpec(name, options, isNew)
  const result = mergeCompose(tree, { services: [], networks: [spec] })

  if (result.changes.some(change => change.action !== 'unchanged')) {
    await writeComposeFile(result.tree, composeFile)
  }

  reportChanges(result.changes, composeFile)
}
