import { readFile } from 'fs/promises'
import { Document, YAMLMap, isMap, isScalar, parseDocument } from 'yaml'
import { AUTO_UPDATE_LABEL, type ComposeDocument, type NetworkSpec, type ServiceSpec } from '../types.ts'
import {
  asRecord,
  readAutoUpdate,
  readKeyValues,
  readPorts,
  readResources,
  readStringList,
  readVolumes,
  scalarString,
} from './fields.ts'
import { keyName, sortMap, type OrderScope } from './ordering.ts'
import { isNetworkDriver, isRestartPolicy } from './spec.ts'
import { isFileMissingError, writeFileAtomic } from './state.ts'

/** Indentation used when the source gives no hint */
export const DEFAULT_INDENT = 2

/**
 * Error thrown when a compose file cannot be used as a compose document
 */
export class ComposeParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ComposeParseError'
  }
}

/**
 * Error thrown when a compose file cannot be written
 */
export class ComposeWriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ComposeWriteError'
  }
}

/**
 * Editable compose file
 *
 * Wraps a `yaml` Document, which keeps comments, key order and blank lines,
 * together with the mappings a merge rewrote.
 */
export interface ComposeTree {
  document: Document
  /** Mappings whose keys are put in canonical order on write */
  dirty: Map<YAMLMap, OrderScope>
  /** Indentation width to write with */
  indent: number
  /** Whether block sequences are indented below their key */
  indentSeq: boolean
}

/**
 * Guess the indentation width from the first indented line
 */
function detectIndent(text: string): number {
  const match = text.match(/^( +)[^\s#]/m)
  return match?.[1]?.length ?? DEFAULT_INDENT
}

/**
 * Tell whether the first block sequence is indented below its key
 *
 * `ports:` followed by `  - 80:80` is indented, `- 80:80` at the key's own
 * column is not. Files without a block sequence count as indented.
 */
function detectIndentSeq(text: string): boolean {
  const match = text.match(/^( *)[^\s#-][^\n]*:[ \t]*(?:#[^\n]*)?\n(?:[ \t]*(?:#[^\n]*)?\n)*( *)- /m)
  return match ? (match[2]?.length ?? 0) > (match[1]?.length ?? 0) : true
}

/**
 * Create an empty compose tree
 */
export function createComposeTree(): ComposeTree {
  return { document: new Document(new YAMLMap()), dirty: new Map(), indent: DEFAULT_INDENT, indentSeq: true }
}

/**
 * Parse compose YAML into an editable tree
 *
 * @param text - YAML source
 * @param source - Name used in error messages
 * @throws ComposeParseError if the text is not YAML or not a mapping
 */
export function parseComposeText(text: string, source: string = 'compose file'): ComposeTree {
  const document = parseDocument(text)
  const [firstError] = document.errors

  if (firstError) {
    throw new ComposeParseError(`Invalid YAML in ${source}: ${firstError.message}`)
  }

  if (document.contents !== null && !isMap(document.contents)) {
    throw new ComposeParseError(`${source} must contain a mapping at the root`)
  }

  return { document, dirty: new Map(), indent: detectIndent(text), indentSeq: detectIndentSeq(text) }
}

/**
 * Load a compose file
 *
 * @returns The parsed tree, or null if the file does not exist yet
 * @throws ComposeParseError if the file exists but is not a compose mapping
 */
export async function loadComposeFile(path: string): Promise<ComposeTree | null> {
  let text: string

  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    if (isFileMissingError(error)) {
      return null
    }
    throw error
  }

  return parseComposeText(text, path)
}

/**
 * Root mapping of a tree, created if the document is empty
 */
export function getRoot(tree: ComposeTree): YAMLMap {
  const { contents } = tree.document

  if (isMap(contents)) {
    return contents
  }

  const root = new YAMLMap()
  tree.document.contents = root
  return root
}

/**
 * Record that a mapping was rewritten and must be written in canonical order
 */
export function markDirty(tree: ComposeTree, map: YAMLMap, scope: OrderScope): void {
  map.flow = false
  tree.dirty.set(map, scope)
}

/**
 * Render a tree as YAML
 *
 * Dirty mappings are sorted into canonical order first; everything else is
 * written as it was read.
 */
export function serializeComposeTree(tree: ComposeTree): string {
  for (const [map, scope] of tree.dirty) {
    sortMap(map, scope)
  }

  return tree.document.toString({ indent: tree.indent, indentSeq: tree.indentSeq, lineWidth: 0 })
}

/**
 * Write a tree to disk, atomically replacing any existing file
 *
 * @throws ComposeWriteError if the file cannot be written; the previous
 *   content of `path` is then left in place
 */
export async function writeComposeFile(tree: ComposeTree, path: string): Promise<void> {
  const content = serializeComposeTree(tree)

  try {
    await writeFileAtomic(path, content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ComposeWriteError(`Failed to write ${path}: ${message}`, { cause: error })
  }
}

/**
 * Create a compose file with empty `services` and `networks` sections
 *
 * @returns false if the file already existed and was left alone
 */
export async function initComposeFile(path: string): Promise<boolean> {
  if (await loadComposeFile(path)) {
    return false
  }

  const tree = createComposeTree()
  const root = getRoot(tree)
  root.set('services', new YAMLMap())
  root.set('networks', new YAMLMap())

  await writeComposeFile(tree, path)
  return true
}

/**
 * Comment lines directly under a service key
 */
export function readNotes(block: YAMLMap): string[] {
  const [first] = block.items
  const comment = block.commentBefore ?? (first && isScalar(first.key) ? first.key.commentBefore : undefined)

  if (!comment) {
    return []
  }

  return comment.split('\n').map(line => (line.startsWith(' ') ? line.slice(1) : line))
}

function readService(name: string, value: unknown, node: unknown): ServiceSpec {
  const block = asRecord(value) ?? {}
  const service: ServiceSpec = { name }

  const containerName = scalarString(block.container_name)
  const image = scalarString(block.image)
  const restart = scalarString(block.restart)
  const labels = readKeyValues(block.labels)

  if (containerName !== undefined) service.containerName = containerName
  if (image !== undefined) service.image = image
  if (restart !== undefined && isRestartPolicy(restart)) service.restart = restart

  const networks = readStringList(block.networks)
  const ports = readPorts(block.ports)
  const environment = readKeyValues(block.environment)
  const volumes = readVolumes(block.volumes)
  const dependsOn = readStringList(block.depends_on)
  const resources = readResources(block.deploy)
  const autoUpdate = readAutoUpdate(block.labels)

  if (networks) service.networks = networks
  if (ports) service.ports = ports
  if (environment) service.environment = environment
  if (volumes) service.volumes = volumes
  if (dependsOn) service.dependsOn = dependsOn
  if (resources) service.resources = resources
  if (autoUpdate !== undefined) service.autoUpdate = autoUpdate

  const notes = isMap(node) ? readNotes(node) : []
  if (notes.length > 0) service.notes = notes

  if (labels) {
    delete labels[AUTO_UPDATE_LABEL]
    service.labels = labels
  }

  return service
}

function readNetwork(name: string, value: unknown): NetworkSpec {
  const block = asRecord(value) ?? {}
  const network: NetworkSpec = { name }
  const driver = scalarString(block.driver)

  if (driver !== undefined && isNetworkDriver(driver)) network.driver = driver
  if (block.internal === true) network.internal = true
  if (block.enable_ipv6 === true) network.enableIpv6 = true
  if (block.external === true || asRecord(block.external)) network.external = true

  return network
}

/**
 * Reconstruct the services and networks of a loaded tree
 *
 * The result is a snapshot for display; it shares nothing with the tree.
 */
export function readComposeDocument(tree: ComposeTree): ComposeDocument {
  const root = asRecord(tree.document.toJS()) ?? {}
  const services = asRecord(root.services) ?? {}
  const networks = asRecord(root.networks) ?? {}
  const contents = tree.document.contents
  const serviceNodes = new Map<string, unknown>()
  const section = isMap(contents) ? contents.get('services', true) : undefined

  if (isMap(section)) {
    for (const pair of section.items) serviceNodes.set(keyName(pair.key), pair.value)
  }

  return {
    services: Object.entries(services).map(([name, value]) => readService(name, value, serviceNodes.get(name))),
    networks: Object.entries(networks).map(([name, value]) => readNetwork(name, value)),
  }
}
