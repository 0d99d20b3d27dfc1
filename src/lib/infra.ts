import type { ComposeDocument, NetworkSpec } from '../types.ts'
import { readComposeDocument, type ComposeTree } from './document.ts'

/**
 * Attach networks defined in a shared infra compose file
 *
 * Every network a service references that is defined neither in the document
 * nor in the target file, but exists in the infra file, is added to the
 * document as an external network. Anything still unresolved is left for the
 * merge to reject.
 *
 * @param document - Services and networks about to be merged
 * @param tree - Current content of the target file, if any
 * @param infra - Content of the infra file, if any
 * @returns The document with the external networks appended
 */
export function attachInfraNetworks(
  document: ComposeDocument,
  tree: ComposeTree | null,
  infra: ComposeTree | null
): ComposeDocument {
  if (!infra) {
    return document
  }

  const infraNetworks = new Set(readComposeDocument(infra).networks.map(network => network.name))
  const known = new Set([
    ...document.networks.map(network => network.name),
    ...(tree ? readComposeDocument(tree).networks.map(network => network.name) : []),
  ])

  const external: NetworkSpec[] = []
  for (const name of document.services.flatMap(service => service.networks ?? [])) {
    if (known.has(name) || !infraNetworks.has(name)) continue

    known.add(name)
    external.push({ name, external: true })
  }

  return { ...document, networks: [...document.networks, ...external] }
}
